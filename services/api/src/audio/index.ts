/**
 * Audio engine access
 *
 * - ffmpeg/ffprobe process wrapper with deadlines
 * - DspEngine contract used by the mix pipeline
 * - loudnorm summary parsing for diagnostics
 */

export {
  run,
  checkBinary,
  isMissingBinary,
  probeStream,
  parseProbeOutput,
  CommandTimeoutError,
  type SpawnResult,
  type StreamInfo,
} from './ffmpeg.js';
export {
  buildFfmpegArgs,
  createFfmpegEngine,
  type DspEngine,
  type EngineJob,
  type FfmpegEngineOptions,
} from './engine.js';
export { parseLoudnormSummary, type LoudnormSummary } from './loudnorm.js';
