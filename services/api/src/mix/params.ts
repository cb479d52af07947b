// Parameter Resolver: one canonical MixRequest from up to two raw knob sources
import { z } from "zod";
import type { KnobKey, KnobSource, MixRequest } from "@voicebed/contracts";
import { LOUDNESS_DEFAULTS } from "@voicebed/contracts";

type FlagField = "voiceOnlyMode" | "step1OnlyMode";
type NumericField = Exclude<keyof MixRequest, FlagField>;

export interface NumericKnob {
  key: KnobKey;
  defaultValue: number;
  /** Range the value must satisfy, otherwise the default is used */
  schema: z.ZodNumber;
}

export interface FlagKnob {
  key: KnobKey;
  defaultValue: boolean;
}

const finite = () => z.number().finite();

// Every knob, its wire key, compiled default and accepted range
export const NUMERIC_KNOBS: Record<NumericField, NumericKnob> = {
  bedVolume: { key: "bg_vol", defaultValue: 0.25, schema: finite().positive() },
  voiceGain: { key: "voice_gain", defaultValue: 1.5, schema: finite().positive() },
  bedWeight: { key: "bed_weight", defaultValue: 0.25, schema: finite().positive() },
  voiceWeight: { key: "voice_weight", defaultValue: 1.0, schema: finite().positive() },
  narrationDelaySeconds: { key: "narr_delay", defaultValue: 0, schema: finite().nonnegative() },
  duckThreshold: { key: "duck_threshold", defaultValue: 0.02, schema: finite().positive() },
  duckRatio: { key: "duck_ratio", defaultValue: 12, schema: finite().min(1) },
  crossfadeSeconds: { key: "xfade", defaultValue: 1.0, schema: finite().nonnegative() },
  outroGain: { key: "outro_gain", defaultValue: 1.0, schema: finite().positive() },
  targetLoudnessLUFS: { key: "lufs", defaultValue: LOUDNESS_DEFAULTS.TARGET_LUFS, schema: finite().negative() },
  truePeakCeilingDb: { key: "tp", defaultValue: LOUDNESS_DEFAULTS.TRUE_PEAK_MAX, schema: finite().nonpositive() },
  loudnessRangeLU: { key: "lra", defaultValue: LOUDNESS_DEFAULTS.LRA, schema: finite().positive() },
};

export const FLAG_KNOBS: Record<FlagField, FlagKnob> = {
  voiceOnlyMode: { key: "voice_only", defaultValue: false },
  step1OnlyMode: { key: "step1_only", defaultValue: false },
};

export const KNOB_KEYS: KnobKey[] = [
  ...Object.values(NUMERIC_KNOBS).map((k) => k.key),
  ...Object.values(FLAG_KNOBS).map((k) => k.key),
];

/**
 * Coerce a raw query/form value to a number; NaN when it is not numeric
 */
function toNumeric(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string") return value.trim() === "" ? NaN : Number(value.trim());
  return NaN;
}

/**
 * A value counts as present unless it is missing, null or blank.
 * Repeated keys arrive as arrays; the first occurrence wins.
 */
function presentValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.length > 0 ? presentValue(value[0]) : undefined;
  if (value === null || value === undefined) return undefined;
  if (typeof value === "string" && value.trim() === "") return undefined;
  return value;
}

function pick(primary: KnobSource, secondary: KnobSource, key: KnobKey): unknown {
  const first = presentValue(primary[key]);
  return first !== undefined ? first : presentValue(secondary[key]);
}

function resolveNumber(knob: NumericKnob, raw: unknown): number {
  return z.preprocess(toNumeric, knob.schema).catch(knob.defaultValue).parse(raw);
}

// Exactly 1 is true; any other integer, or anything that fails to coerce (=> 0), is false
function resolveFlag(knob: FlagKnob, raw: unknown): boolean {
  if (raw === undefined) return knob.defaultValue;
  const n = z.preprocess(toNumeric, z.number().int()).catch(0).parse(raw);
  return n === 1;
}

/**
 * Resolve every knob: primary source > secondary source > compiled default.
 * Never throws - unparsable or out-of-range values resolve to the default.
 */
export function resolveMixRequest(primary: KnobSource = {}, secondary: KnobSource = {}): MixRequest {
  const num = (field: NumericField): number =>
    resolveNumber(NUMERIC_KNOBS[field], pick(primary, secondary, NUMERIC_KNOBS[field].key));
  const flag = (field: FlagField): boolean =>
    resolveFlag(FLAG_KNOBS[field], pick(primary, secondary, FLAG_KNOBS[field].key));

  return {
    bedVolume: num("bedVolume"),
    voiceGain: num("voiceGain"),
    bedWeight: num("bedWeight"),
    voiceWeight: num("voiceWeight"),
    narrationDelaySeconds: num("narrationDelaySeconds"),
    duckThreshold: num("duckThreshold"),
    duckRatio: num("duckRatio"),
    crossfadeSeconds: num("crossfadeSeconds"),
    outroGain: num("outroGain"),
    targetLoudnessLUFS: num("targetLoudnessLUFS"),
    truePeakCeilingDb: num("truePeakCeilingDb"),
    loudnessRangeLU: num("loudnessRangeLU"),
    voiceOnlyMode: flag("voiceOnlyMode"),
    step1OnlyMode: flag("step1OnlyMode"),
  };
}

/**
 * The request produced when no knob is supplied
 */
export function defaultMixRequest(): MixRequest {
  return resolveMixRequest();
}
