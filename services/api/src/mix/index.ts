/**
 * Mix pipeline
 *
 * Parameter Resolver -> Signal Graph Builder -> Stage Executor -> Orchestrator
 */

export {
  resolveMixRequest,
  defaultMixRequest,
  NUMERIC_KNOBS,
  FLAG_KNOBS,
  KNOB_KEYS,
  type NumericKnob,
  type FlagKnob,
} from './params.js';
export {
  buildBedVoiceMixGraph,
  buildOutroCrossfadeGraph,
  buildLoudnessGraph,
  buildStageGraph,
  buildStagePlan,
  requiredAssetRoles,
  serializeGraph,
  validateGraph,
  DEFAULT_GRAPH_FORMAT,
  type SignalGraph,
  type GraphChain,
  type GraphSource,
  type GraphFormat,
  type FilterNode,
} from './signalGraph.js';
export {
  describeAsset,
  assetFromBytes,
  storeAsset,
  narrationFromProvider,
  requireValidAsset,
  MIN_ASSET_BYTES,
  type AudioAsset,
  type AssetSet,
  type NarrationProvider,
} from './assets.js';
export { StageExecutor, type StageArtifact, type StageExecutorOptions } from './stageExecutor.js';
export {
  MixPipeline,
  nextState,
  isTerminal,
  FINAL_OUTPUT_NAME,
  type PipelineState,
  type PipelineEvent,
  type MixInput,
  type CompletedRun,
  type MixPipelineDeps,
} from './pipeline.js';
export { allocateWorkspace, releaseWorkspace, generateRunId, type Workspace } from './workspace.js';
