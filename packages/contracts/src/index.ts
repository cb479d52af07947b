// Shared contract definitions for the voicebed mixer API and its callers.
// Defines the knob names, the resolved mix request and the run/error shapes.

// ============================================================================
// Knobs
// ============================================================================

/** Wire keys accepted from the query string or form fields */
export type KnobKey =
  | "bg_vol"
  | "voice_gain"
  | "bed_weight"
  | "voice_weight"
  | "narr_delay"
  | "duck_threshold"
  | "duck_ratio"
  | "xfade"
  | "outro_gain"
  | "lufs"
  | "tp"
  | "lra"
  | "voice_only"
  | "step1_only";

/** One raw source of knob values, e.g. parsed query string or multipart fields */
export type KnobSource = Partial<Record<string, unknown>>;

// ============================================================================
// Mix Request
// ============================================================================

export interface MixRequest {
  /** Linear gain on the intro bed before ducking */
  bedVolume: number;
  /** Linear gain on the narration after high-pass filtering */
  voiceGain: number;
  /** amix weight of the ducked bed */
  bedWeight: number;
  /** amix weight of the narration */
  voiceWeight: number;
  /** Narration onset offset relative to bed start */
  narrationDelaySeconds: number;
  /** Sidechain threshold, linear engine units */
  duckThreshold: number;
  duckRatio: number;
  /** Overlap between the bed+voice mix and the outro */
  crossfadeSeconds: number;
  outroGain: number;
  targetLoudnessLUFS: number;
  truePeakCeilingDb: number;
  loudnessRangeLU: number;
  /** Narration chain only, no bed, no outro. Wins over step1OnlyMode. */
  voiceOnlyMode: boolean;
  /** Stop after the bed+voice mix */
  step1OnlyMode: boolean;
}

// ============================================================================
// Assets and Stages
// ============================================================================

export type AssetRole = "intro" | "narration" | "outro";

export type StageIndex = 1 | 2 | 3;

export type StageName = "bed-voice-mix" | "outro-crossfade" | "loudness-normalize";

export const STAGE_NAMES: Record<StageIndex, StageName> = {
  1: "bed-voice-mix",
  2: "outro-crossfade",
  3: "loudness-normalize",
};

export type EarlyExitReason = "voice-only" | "step1-only";

export type RunStatus =
  | { kind: "succeeded" }
  | { kind: "succeeded-early"; reason: EarlyExitReason }
  | { kind: "failed"; stage: StageIndex; diagnostic: string };

// ============================================================================
// API Error Body
// ============================================================================

export type MixErrorCode = "INVALID_INPUT" | "ENGINE_FAILURE" | "CONFIGURATION_ERROR";

export interface MixErrorBody {
  error: string;
  code?: MixErrorCode;
  message: string;
  statusCode: number;
  /** Failing stage, present for engine failures */
  stage?: StageIndex;
}

// ============================================================================
// Loudness Constants
// ============================================================================

export const LOUDNESS_DEFAULTS = {
  /** Integrated loudness target in LUFS */
  TARGET_LUFS: -16.0,
  /** True peak ceiling in dBTP */
  TRUE_PEAK_MAX: -1.5,
  /** Loudness range target in LU */
  LRA: 11.0,
} as const;
