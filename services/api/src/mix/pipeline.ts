/**
 * Pipeline Orchestrator
 *
 * Sequences Bed+Voice Mix -> Crossfade to Outro -> Loudness Normalize as an
 * explicit state machine:
 *
 *   resolving -> stage(1) -> stage(2) -> stage(3) -> done
 *                         \-> done-early(voice-only | step1-only)
 *   stage(n) -> failed(n) on any stage error
 *
 * Fail-fast, no retry. Intermediates are deleted on every terminal state
 * unless debug-retain is on.
 */

import { rename, rm } from 'node:fs/promises';
import path from 'node:path';
import type {
  AssetRole,
  EarlyExitReason,
  MixRequest,
  RunStatus,
  StageIndex,
} from '@voicebed/contracts';
import type { DspEngine } from '../audio/index.js';
import type { MixerConfig } from '../lib/config.js';
import { EngineFailureError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { requireValidAsset, type AssetSet } from './assets.js';
import {
  buildStageGraph,
  buildStagePlan,
  requiredAssetRoles,
  type GraphFormat,
  type GraphSource,
} from './signalGraph.js';
import { StageExecutor, type StageArtifact } from './stageExecutor.js';
import { allocateWorkspace, releaseWorkspace, type Workspace } from './workspace.js';

export const FINAL_OUTPUT_NAME = 'final.mp3';

// ============================================================================
// State machine
// ============================================================================

export type PipelineState =
  | { kind: 'resolving' }
  | { kind: 'stage'; stage: StageIndex }
  | { kind: 'done' }
  | { kind: 'done-early'; reason: EarlyExitReason }
  | { kind: 'failed'; stage: StageIndex };

export type PipelineEvent =
  | { kind: 'resolved' }
  | { kind: 'stage-succeeded' }
  | { kind: 'stage-failed' };

export function isTerminal(state: PipelineState): boolean {
  return state.kind === 'done' || state.kind === 'done-early' || state.kind === 'failed';
}

/**
 * Pure transition function. Invalid transitions are programming errors.
 */
export function nextState(
  state: PipelineState,
  event: PipelineEvent,
  request: Pick<MixRequest, 'voiceOnlyMode' | 'step1OnlyMode'>
): PipelineState {
  if (state.kind === 'resolving' && event.kind === 'resolved') {
    return { kind: 'stage', stage: 1 };
  }

  if (state.kind === 'stage') {
    if (event.kind === 'stage-failed') {
      return { kind: 'failed', stage: state.stage };
    }

    if (event.kind === 'stage-succeeded') {
      switch (state.stage) {
        case 1:
          // voice-only wins when both flags are set
          if (request.voiceOnlyMode) return { kind: 'done-early', reason: 'voice-only' };
          if (request.step1OnlyMode) return { kind: 'done-early', reason: 'step1-only' };
          return { kind: 'stage', stage: 2 };
        case 2:
          return { kind: 'stage', stage: 3 };
        case 3:
          return { kind: 'done' };
      }
    }
  }

  throw new Error(`Invalid pipeline transition: ${state.kind} + ${event.kind}`);
}

// ============================================================================
// Runs
// ============================================================================

export interface MixInput {
  assets: AssetSet;
  request: MixRequest;
  /** Scratch area holding the uploads; allocated by the pipeline when omitted */
  workspace?: Workspace;
}

export interface CompletedRun {
  runId: string;
  request: MixRequest;
  assets: AssetSet;
  workspace: Workspace;
  /** Every stage artifact, in production order (paths may be gone after cleanup) */
  artifacts: StageArtifact[];
  output: StageArtifact;
  status: Extract<RunStatus, { kind: 'succeeded' | 'succeeded-early' }>;
}

export interface MixPipelineDeps {
  engine: DspEngine;
  config: MixerConfig;
  logger: Logger;
}

export class MixPipeline {
  private readonly executor: StageExecutor;
  private readonly format: GraphFormat;

  constructor(private readonly deps: MixPipelineDeps) {
    const { config } = deps;
    this.executor = new StageExecutor({
      engine: deps.engine,
      encoding: config.encoding,
      timeoutMs: config.engine.stageTimeoutMs,
      minAssetBytes: config.minAssetBytes,
      debug: config.debug,
      logger: deps.logger,
    });
    this.format = { sampleRate: config.encoding.sampleRate, channelLayout: 'stereo' };
  }

  /**
   * Allocate a fresh scratch directory for one run
   */
  async allocate(): Promise<Workspace> {
    return allocateWorkspace(this.deps.config.workRoot);
  }

  /**
   * Run the pipeline. Resolves with the completed run or rejects with a MixError.
   */
  async run(input: MixInput): Promise<CompletedRun> {
    const { assets, request } = input;
    const ownsWorkspace = input.workspace === undefined;
    const workspace = input.workspace ?? (await this.allocate());
    const log = this.deps.logger.child({ runId: workspace.runId });

    const artifacts: StageArtifact[] = [];
    const written: string[] = [];
    let failure: unknown = null;

    log.info(
      { request, plan: buildStagePlan(request), roles: requiredAssetRoles(request) },
      'Mix run started'
    );

    let state: PipelineState = { kind: 'resolving' };
    try {
      for (const role of requiredAssetRoles(request)) {
        requireValidAsset(assets[role], this.deps.config.minAssetBytes);
      }
    } catch (error) {
      await this.abandon(workspace, ownsWorkspace, written, log);
      throw error;
    }
    state = nextState(state, { kind: 'resolved' }, request);

    if (this.deps.config.debug) {
      await this.logAssetStreams(requiredAssetRoles(request), assets, log);
    }

    while (state.kind === 'stage') {
      const stage = state.stage;
      const graph = buildStageGraph(stage, request, this.format);
      const inputs = graph.inputs.map((source) => this.sourcePath(source, assets, artifacts));
      const outputPath = path.join(
        workspace.dir,
        stage === 3 ? FINAL_OUTPUT_NAME : `stage${stage}-${graph.name}.mp3`
      );
      written.push(outputPath);

      try {
        artifacts.push(await this.executor.execute(graph, inputs, outputPath, workspace.runId));
        state = nextState(state, { kind: 'stage-succeeded' }, request);
      } catch (error) {
        failure = error;
        state = nextState(state, { kind: 'stage-failed' }, request);
      }
    }

    if (state.kind === 'failed') {
      const diagnostic = failure instanceof EngineFailureError ? failure.diagnostic : String(failure);
      log.error({ stage: state.stage, diagnostic: diagnostic.slice(-500) }, 'Mix run failed');
      await this.abandon(workspace, ownsWorkspace, written, log);
      throw failure instanceof Error ? failure : new EngineFailureError(state.stage, String(failure));
    }

    const last = artifacts.at(-1);
    if (!last || (state.kind !== 'done' && state.kind !== 'done-early')) {
      throw new Error(`Pipeline ended in unexpected state: ${state.kind}`);
    }

    let output = last;
    let status: CompletedRun['status'] = { kind: 'succeeded' };

    if (state.kind === 'done-early') {
      // Promote the stage-1 artifact as-is; no re-encode
      const finalPath = path.join(workspace.dir, FINAL_OUTPUT_NAME);
      try {
        await rename(last.path, finalPath);
      } catch (error) {
        log.error({ err: error, from: last.path }, 'Could not promote stage 1 output');
        await this.abandon(workspace, ownsWorkspace, written, log);
        throw error;
      }
      output = { ...last, path: finalPath };
      artifacts[artifacts.length - 1] = output;
      status = { kind: 'succeeded-early', reason: state.reason };
    }

    await this.removeIntermediates(
      artifacts.filter((a) => a !== output).map((a) => a.path),
      log
    );

    log.info({ status, output: output.path, byteLength: output.byteLength }, 'Mix run finished');

    return { runId: workspace.runId, request, assets, workspace, artifacts, output, status };
  }

  /**
   * Drop a run's scratch directory once its output has been consumed
   */
  async discard(run: Pick<CompletedRun, 'workspace'>): Promise<void> {
    if (this.deps.config.debug) {
      this.deps.logger.info({ dir: run.workspace.dir }, 'Debug mode: keeping run directory');
      return;
    }
    await releaseWorkspace(run.workspace);
  }

  private sourcePath(source: GraphSource, assets: AssetSet, artifacts: StageArtifact[]): string {
    if (source.kind === 'asset') {
      return assets[source.role].path;
    }

    const artifact = artifacts.find((a) => a.stage === source.stage);
    if (!artifact) {
      throw new Error(`Stage ${source.stage} artifact is not available`);
    }
    return artifact.path;
  }

  // Stream properties of each input, debug only
  private async logAssetStreams(roles: AssetRole[], assets: AssetSet, log: Logger): Promise<void> {
    for (const role of roles) {
      try {
        const info = await this.deps.engine.probe(assets[role].path);
        log.info({ role, stream: info }, 'Input stream');
      } catch (error) {
        log.warn({ err: error, role }, 'Could not probe input');
      }
    }
  }

  private async removeIntermediates(paths: string[], log: Logger): Promise<void> {
    if (this.deps.config.debug) {
      log.debug({ paths }, 'Debug mode: retaining intermediates');
      return;
    }
    await Promise.all(paths.map((p) => rm(p, { force: true })));
  }

  private async abandon(
    workspace: Workspace,
    ownsWorkspace: boolean,
    written: string[],
    log: Logger
  ): Promise<void> {
    if (this.deps.config.debug) {
      log.info({ dir: workspace.dir }, 'Debug mode: keeping artifacts of failed run');
      return;
    }
    if (ownsWorkspace) {
      await releaseWorkspace(workspace);
      return;
    }
    await this.removeIntermediates(written, log);
  }
}
