/**
 * Stage Executor
 *
 * Runs one stage graph on the DSP engine:
 * 1. Verifies every input file exists; caller assets must reach the minimum size
 * 2. Submits the serialized graph with an explicit output encoding
 * 3. Verifies the engine wrote a non-empty output file
 * 4. Logs diagnostics (stage-1 stream properties in debug, stage-3 loudness summary)
 */

import path from 'node:path';
import type { StageIndex, StageName } from '@voicebed/contracts';
import {
  CommandTimeoutError,
  isMissingBinary,
  parseLoudnormSummary,
  type DspEngine,
  type EngineJob,
  type SpawnResult,
} from '../audio/index.js';
import type { EncodingSettings } from '../lib/config.js';
import { ConfigurationError, EngineFailureError, InvalidInputError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { fileSize } from './assets.js';
import { serializeGraph, type SignalGraph } from './signalGraph.js';

export interface StageArtifact {
  stage: StageIndex;
  name: StageName;
  path: string;
  byteLength: number;
}

export interface StageExecutorOptions {
  engine: DspEngine;
  encoding: EncodingSettings;
  timeoutMs: number;
  minAssetBytes: number;
  /** Probe and log stage-1 output properties */
  debug: boolean;
  logger: Logger;
}

export class StageExecutor {
  constructor(private readonly opts: StageExecutorOptions) {}

  /**
   * Execute one stage. `inputs` are file paths in the graph's input order.
   */
  async execute(
    graph: SignalGraph,
    inputs: string[],
    outputPath: string,
    runId: string
  ): Promise<StageArtifact> {
    if (inputs.length !== graph.inputs.length) {
      throw new Error(
        `Stage ${graph.stage} expects ${graph.inputs.length} inputs, got ${inputs.length}`
      );
    }

    await this.verifyInputs(graph, inputs);

    const filterGraph = serializeGraph(graph);
    const log = this.opts.logger.child({ runId, stage: graph.stage, stageName: graph.name });
    log.debug({ filterGraph, inputs }, 'Submitting stage graph');

    const startedAt = Date.now();
    const result = await this.submit(graph.stage, {
      inputs,
      filterGraph,
      outputLabel: graph.output,
      outputPath,
      encoding: this.opts.encoding,
      timeoutMs: this.opts.timeoutMs,
    });

    if (result.code !== 0) {
      log.error({ code: result.code, stderr: result.stderr.slice(-2000) }, 'Engine returned failure');
      throw new EngineFailureError(graph.stage, result.stderr || result.stdout || `exit code ${result.code}`);
    }

    const byteLength = await fileSize(outputPath);
    if (byteLength === null || byteLength === 0) {
      throw new EngineFailureError(
        graph.stage,
        `${result.stderr}\nengine exited 0 but wrote no output to ${path.basename(outputPath)}`
      );
    }

    log.info({ durationMs: Date.now() - startedAt, byteLength }, 'Stage complete');

    if (graph.stage === 1 && this.opts.debug) {
      await this.logStreamInfo(log, outputPath);
    }

    if (graph.stage === 3) {
      const summary = parseLoudnormSummary(result.stderr);
      if (summary) {
        log.info({ loudness: summary }, 'Loudness normalization summary');
      }
    }

    return { stage: graph.stage, name: graph.name, path: outputPath, byteLength };
  }

  // Caller assets must reach the minimum size; earlier stage outputs only need to be non-empty
  private async verifyInputs(graph: SignalGraph, inputs: string[]): Promise<void> {
    const { stage } = graph;

    for (const [index, input] of inputs.entries()) {
      const name = path.basename(input);
      const size = await fileSize(input);
      const source = graph.inputs[index];

      if (source.kind === 'artifact') {
        if (size === null || size === 0) {
          throw new EngineFailureError(
            stage,
            `stage ${source.stage} output ${name} is missing or empty`
          );
        }
        continue;
      }

      if (size === null) {
        throw new InvalidInputError(`Stage ${stage} input missing: ${name}`, name);
      }
      if (size < this.opts.minAssetBytes) {
        throw new InvalidInputError(
          `Stage ${stage} input ${name} is ${size} bytes; at least ${this.opts.minAssetBytes} required`,
          name
        );
      }
    }
  }

  private async submit(
    stage: StageIndex,
    job: EngineJob
  ): Promise<SpawnResult> {
    try {
      return await this.opts.engine.submit(job);
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        throw new EngineFailureError(stage, `${error.stderr}\n${error.message}`);
      }
      if (isMissingBinary(error)) {
        throw new ConfigurationError('DSP engine binary not found; check FFMPEG_PATH');
      }
      throw new EngineFailureError(stage, error instanceof Error ? error.message : String(error));
    }
  }

  private async logStreamInfo(log: Logger, outputPath: string): Promise<void> {
    try {
      const info = await this.opts.engine.probe(outputPath);
      log.info({ stream: info }, 'Stage 1 output stream');
    } catch (error) {
      log.warn({ err: error }, 'Could not probe stage 1 output');
    }
  }
}
