/**
 * DSP engine adapter
 *
 * The pipeline talks to the engine only through `DspEngine`: submit a
 * serialized signal graph plus its inputs, get an exit code and captured
 * diagnostics back. The ffmpeg implementation builds an explicit argument
 * list - NEVER relies on ffmpeg defaults for the output encoding.
 */

import type { EncodingSettings } from '../lib/config.js';
import { checkBinary, probeStream, run, type SpawnResult, type StreamInfo } from './ffmpeg.js';

export interface EngineJob {
  /** Input files in engine index order ([0:a], [1:a], ...) */
  inputs: string[];
  /** Serialized filter_complex text */
  filterGraph: string;
  /** Graph label mapped to the output file */
  outputLabel: string;
  outputPath: string;
  encoding: EncodingSettings;
  timeoutMs: number;
}

export interface DspEngine {
  submit(job: EngineJob): Promise<SpawnResult>;
  probe(filePath: string): Promise<StreamInfo>;
  available(): Promise<boolean>;
}

/**
 * Build the ffmpeg argument list for one engine job
 */
export function buildFfmpegArgs(job: EngineJob): string[] {
  const args = ['-hide_banner', '-nostdin', '-v', 'info', '-y'];

  for (const input of job.inputs) {
    args.push('-i', input);
  }

  args.push(
    '-filter_complex', job.filterGraph,
    '-map', `[${job.outputLabel}]`,
    '-vn',
    '-ar', String(job.encoding.sampleRate),
    '-ac', String(job.encoding.channels),
    '-c:a', job.encoding.codec,           // EXPLICIT codec
    '-b:a', `${job.encoding.bitrateKbps}k`,
    job.outputPath,
  );

  return args;
}

export interface FfmpegEngineOptions {
  ffmpegPath: string;
  ffprobePath: string;
}

/**
 * Engine backed by the ffmpeg and ffprobe binaries
 */
export function createFfmpegEngine(opts: FfmpegEngineOptions): DspEngine {
  return {
    async submit(job) {
      return run(opts.ffmpegPath, buildFfmpegArgs(job), { timeoutMs: job.timeoutMs });
    },

    async probe(filePath) {
      return probeStream(opts.ffprobePath, filePath);
    },

    async available() {
      const [ffmpeg, ffprobe] = await Promise.all([
        checkBinary(opts.ffmpegPath),
        checkBinary(opts.ffprobePath),
      ]);
      return ffmpeg && ffprobe;
    },
  };
}
