/**
 * Signal Graph Builder
 *
 * Builds the declarative graph of each pipeline stage from a resolved
 * MixRequest and serializes it to ffmpeg filter_complex syntax. Pure: no I/O.
 *
 * Every value that reaches the serialized text is either a finite number or a
 * token from a fixed vocabulary, so caller input can never inject filters.
 */

import type { AssetRole, MixRequest, StageIndex, StageName } from '@voicebed/contracts';
import { STAGE_NAMES } from '@voicebed/contracts';

export type FilterName =
  | 'aformat'
  | 'aresample'
  | 'volume'
  | 'highpass'
  | 'adelay'
  | 'asplit'
  | 'sidechaincompress'
  | 'amix'
  | 'acrossfade'
  | 'concat'
  | 'loudnorm';

/** A list value, e.g. amix weights ("0.25 1") or per-channel delays ("500|500") */
export type ParamList = { values: number[]; separator: ' ' | '|' };

export type ParamValue = number | string | ParamList;

export interface FilterArg {
  /** Omitted for the filter's positional first argument */
  key?: string;
  value: ParamValue;
}

export interface FilterNode {
  name: FilterName;
  args: FilterArg[];
}

export type StreamRef =
  | { kind: 'input'; index: number }
  | { kind: 'label'; name: string };

export interface GraphChain {
  from: StreamRef[];
  filters: FilterNode[];
  to: string[];
}

/** Where an engine input comes from */
export type GraphSource =
  | { kind: 'asset'; role: AssetRole }
  | { kind: 'artifact'; stage: StageIndex };

export interface SignalGraph {
  stage: StageIndex;
  name: StageName;
  /** Engine inputs, by index */
  inputs: GraphSource[];
  chains: GraphChain[];
  output: string;
}

export interface GraphFormat {
  sampleRate: number;
  channelLayout: 'stereo';
}

export const DEFAULT_GRAPH_FORMAT: GraphFormat = { sampleRate: 48000, channelLayout: 'stereo' };

// Narration chain and ducking constants - not exposed as knobs
export const NARRATION_HIGHPASS_HZ = 120;
export const DUCK_ATTACK_MS = 5;
export const DUCK_RELEASE_MS = 300;

// ============================================================================
// Node helpers
// ============================================================================

function filter(name: FilterName, params: Record<string, ParamValue> = {}): FilterNode {
  return {
    name,
    args: Object.entries(params).map(([key, value]) => ({ key, value })),
  };
}

function positional(name: FilterName, value: ParamValue): FilterNode {
  return { name, args: [{ value }] };
}

const input = (index: number): StreamRef => ({ kind: 'input', index });
const label = (name: string): StreamRef => ({ kind: 'label', name });

function normalizeFormat(format: GraphFormat): FilterNode[] {
  return [
    filter('aformat', { channel_layouts: format.channelLayout }),
    positional('aresample', format.sampleRate),
  ];
}

function delayMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

function narrationChain(request: MixRequest, format: GraphFormat): FilterNode[] {
  const nodes = [
    ...normalizeFormat(format),
    filter('highpass', { f: NARRATION_HIGHPASS_HZ }),
    positional('volume', request.voiceGain),
  ];

  const ms = delayMs(request.narrationDelaySeconds);
  if (ms > 0) {
    // One delay per channel of the stereo layout
    nodes.push(filter('adelay', { delays: { values: [ms, ms], separator: '|' } }));
  }

  return nodes;
}

// ============================================================================
// Stage graphs
// ============================================================================

/**
 * Stage 1: intro bed ducked under narration, mix bounded by the shorter input.
 * Voice-only mode: narration chain alone, the bed is not an input.
 */
export function buildBedVoiceMixGraph(
  request: MixRequest,
  format: GraphFormat = DEFAULT_GRAPH_FORMAT
): SignalGraph {
  if (request.voiceOnlyMode) {
    return {
      stage: 1,
      name: STAGE_NAMES[1],
      inputs: [{ kind: 'asset', role: 'narration' }],
      chains: [{ from: [input(0)], filters: narrationChain(request, format), to: ['mix'] }],
      output: 'mix',
    };
  }

  return {
    stage: 1,
    name: STAGE_NAMES[1],
    inputs: [
      { kind: 'asset', role: 'intro' },
      { kind: 'asset', role: 'narration' },
    ],
    chains: [
      {
        from: [input(0)],
        filters: [...normalizeFormat(format), positional('volume', request.bedVolume)],
        to: ['bgpre'],
      },
      {
        // Narration feeds both the sidechain and the mix
        from: [input(1)],
        filters: [...narrationChain(request, format), positional('asplit', 2)],
        to: ['vo_sc', 'vo_mix'],
      },
      {
        from: [label('bgpre'), label('vo_sc')],
        filters: [
          filter('sidechaincompress', {
            threshold: request.duckThreshold,
            ratio: request.duckRatio,
            attack: DUCK_ATTACK_MS,
            release: DUCK_RELEASE_MS,
          }),
        ],
        to: ['bgduck'],
      },
      {
        from: [label('bgduck'), label('vo_mix')],
        filters: [
          filter('amix', {
            inputs: 2,
            duration: 'shortest',
            dropout_transition: 0,
            weights: { values: [request.bedWeight, request.voiceWeight], separator: ' ' },
          }),
        ],
        to: ['mix'],
      },
    ],
    output: 'mix',
  };
}

/**
 * Stage 2: stage-1 output crossfaded into the outro bed
 */
export function buildOutroCrossfadeGraph(
  request: MixRequest,
  format: GraphFormat = DEFAULT_GRAPH_FORMAT
): SignalGraph {
  // acrossfade treats d=0 as "use the default length", so a zero overlap is a plain join
  const join =
    request.crossfadeSeconds > 0
      ? filter('acrossfade', { d: request.crossfadeSeconds, c1: 'tri', c2: 'tri' })
      : filter('concat', { n: 2, v: 0, a: 1 });

  return {
    stage: 2,
    name: STAGE_NAMES[2],
    inputs: [
      { kind: 'artifact', stage: 1 },
      { kind: 'asset', role: 'outro' },
    ],
    chains: [
      { from: [input(0)], filters: normalizeFormat(format), to: ['core'] },
      {
        from: [input(1)],
        filters: [...normalizeFormat(format), positional('volume', request.outroGain)],
        to: ['outro'],
      },
      { from: [label('core'), label('outro')], filters: [join], to: ['preout'] },
    ],
    output: 'preout',
  };
}

/**
 * Stage 3: integrated loudness, true peak and LRA correction
 */
export function buildLoudnessGraph(request: MixRequest): SignalGraph {
  return {
    stage: 3,
    name: STAGE_NAMES[3],
    inputs: [{ kind: 'artifact', stage: 2 }],
    chains: [
      {
        from: [input(0)],
        filters: [
          filter('loudnorm', {
            I: request.targetLoudnessLUFS,
            TP: request.truePeakCeilingDb,
            LRA: request.loudnessRangeLU,
            print_format: 'summary',
          }),
        ],
        to: ['final'],
      },
    ],
    output: 'final',
  };
}

export function buildStageGraph(
  stage: StageIndex,
  request: MixRequest,
  format: GraphFormat = DEFAULT_GRAPH_FORMAT
): SignalGraph {
  switch (stage) {
    case 1:
      return buildBedVoiceMixGraph(request, format);
    case 2:
      return buildOutroCrossfadeGraph(request, format);
    case 3:
      return buildLoudnessGraph(request);
  }
}

/**
 * Stages a request will run, in order. Diagnostic modes stop after stage 1.
 */
export function buildStagePlan(request: MixRequest): StageIndex[] {
  return request.voiceOnlyMode || request.step1OnlyMode ? [1] : [1, 2, 3];
}

/**
 * Asset roles a request reads
 */
export function requiredAssetRoles(request: MixRequest): AssetRole[] {
  if (request.voiceOnlyMode) return ['narration'];
  if (request.step1OnlyMode) return ['intro', 'narration'];
  return ['intro', 'narration', 'outro'];
}

// ============================================================================
// Serialization
// ============================================================================

const LABEL_RE = /^[a-z][a-z0-9_]*$/;
const TOKEN_RE = /^[A-Za-z][A-Za-z0-9_]*$/;
const KEY_RE = /^[A-Za-z][A-Za-z0-9_]*$/;

function formatNumber(n: number): string {
  if (!Number.isFinite(n)) {
    throw new Error(`Non-finite graph parameter: ${n}`);
  }
  return String(n);
}

function formatValue(value: ParamValue): string {
  if (typeof value === 'number') return formatNumber(value);
  if (typeof value === 'string') {
    if (!TOKEN_RE.test(value)) {
      throw new Error(`Invalid graph token: ${JSON.stringify(value)}`);
    }
    return value;
  }
  return value.values.map(formatNumber).join(value.separator);
}

function formatFilter(node: FilterNode): string {
  if (node.args.length === 0) return node.name;

  const args = node.args.map((arg) => {
    if (arg.key === undefined) return formatValue(arg.value);
    if (!KEY_RE.test(arg.key)) {
      throw new Error(`Invalid parameter name for ${node.name}: ${arg.key}`);
    }
    return `${arg.key}=${formatValue(arg.value)}`;
  });

  return `${node.name}=${args.join(':')}`;
}

function formatRef(ref: StreamRef): string {
  return ref.kind === 'input' ? `[${ref.index}:a]` : `[${ref.name}]`;
}

/**
 * Check label wiring: every label produced once and consumed once, inputs in range,
 * and the output label produced but left unconsumed
 */
export function validateGraph(graph: SignalGraph): void {
  const produced = new Set<string>();
  const consumed = new Set<string>();

  for (const chain of graph.chains) {
    if (chain.filters.length === 0) {
      throw new Error(`Stage ${graph.stage}: empty filter chain`);
    }

    for (const ref of chain.from) {
      if (ref.kind === 'input') {
        if (!Number.isInteger(ref.index) || ref.index < 0 || ref.index >= graph.inputs.length) {
          throw new Error(`Stage ${graph.stage}: input index ${ref.index} out of range`);
        }
        continue;
      }
      if (!produced.has(ref.name)) {
        throw new Error(`Stage ${graph.stage}: label [${ref.name}] used before it is produced`);
      }
      if (consumed.has(ref.name)) {
        throw new Error(`Stage ${graph.stage}: label [${ref.name}] consumed twice`);
      }
      consumed.add(ref.name);
    }

    for (const name of chain.to) {
      if (!LABEL_RE.test(name)) {
        throw new Error(`Stage ${graph.stage}: invalid label ${JSON.stringify(name)}`);
      }
      if (produced.has(name)) {
        throw new Error(`Stage ${graph.stage}: label [${name}] produced twice`);
      }
      produced.add(name);
    }
  }

  if (!produced.has(graph.output) || consumed.has(graph.output)) {
    throw new Error(`Stage ${graph.stage}: output [${graph.output}] is not a free graph output`);
  }
}

/**
 * Serialize a graph to filter_complex text
 */
export function serializeGraph(graph: SignalGraph): string {
  validateGraph(graph);

  return graph.chains
    .map((chain) => {
      const from = chain.from.map(formatRef).join('');
      const filters = chain.filters.map(formatFilter).join(',');
      const to = chain.to.map((name) => `[${name}]`).join('');
      return `${from}${filters}${to}`;
    })
    .join(';');
}
