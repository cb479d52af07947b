/**
 * Unit tests for the stage executor, run against an in-process engine stand-in
 */

import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CommandTimeoutError, type DspEngine } from '../../src/audio/index.js';
import { ConfigurationError, EngineFailureError, InvalidInputError } from '../../src/lib/errors.js';
import { defaultMixRequest } from '../../src/mix/params.js';
import { buildBedVoiceMixGraph, buildLoudnessGraph } from '../../src/mix/signalGraph.js';
import { StageExecutor } from '../../src/mix/stageExecutor.js';
import {
  createFakeEngine,
  makeTempDir,
  removeDir,
  silentLogger,
  testConfig,
  writeClip,
} from './helpers.js';

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await removeDir(dir);
});

function executor(engine: DspEngine, debug = false): StageExecutor {
  const config = testConfig(dir);
  return new StageExecutor({
    engine,
    encoding: config.encoding,
    timeoutMs: 1234,
    minAssetBytes: 500,
    debug,
    logger: silentLogger,
  });
}

async function stage1Inputs(): Promise<string[]> {
  return [await writeClip(dir, 'intro.mp3', 800), await writeClip(dir, 'narr.mp3', 900)];
}

describe('StageExecutor', () => {
  it('should submit the serialized graph and return the artifact', async () => {
    const engine = createFakeEngine();
    const inputs = await stage1Inputs();
    const outputPath = path.join(dir, 'out.mp3');

    const artifact = await executor(engine).execute(
      buildBedVoiceMixGraph(defaultMixRequest()),
      inputs,
      outputPath,
      'mix_test'
    );

    expect(artifact).toEqual({ stage: 1, name: 'bed-voice-mix', path: outputPath, byteLength: 2048 });
    expect(engine.jobs).toHaveLength(1);

    const job = engine.jobs[0];
    expect(job.inputs).toEqual(inputs);
    expect(job.outputLabel).toBe('mix');
    expect(job.outputPath).toBe(outputPath);
    expect(job.timeoutMs).toBe(1234);
    expect(job.encoding).toEqual({ codec: 'libmp3lame', sampleRate: 48000, channels: 2, bitrateKbps: 192 });
    expect(job.filterGraph.startsWith('[0:a]aformat=channel_layouts=stereo')).toBe(true);
  });

  it('should reject a mismatched input count before touching the engine', async () => {
    const engine = createFakeEngine();
    const [intro] = await stage1Inputs();

    await expect(
      executor(engine).execute(buildBedVoiceMixGraph(defaultMixRequest()), [intro], path.join(dir, 'out.mp3'), 'r')
    ).rejects.toThrow('Stage 1 expects 2 inputs, got 1');
    expect(engine.jobs).toHaveLength(0);
  });

  it('should reject a missing input', async () => {
    const engine = createFakeEngine();
    const intro = await writeClip(dir, 'intro.mp3', 800);

    const result = executor(engine).execute(
      buildBedVoiceMixGraph(defaultMixRequest()),
      [intro, path.join(dir, 'narr.mp3')],
      path.join(dir, 'out.mp3'),
      'r'
    );

    await expect(result).rejects.toBeInstanceOf(InvalidInputError);
    await expect(result).rejects.toThrow('Stage 1 input missing: narr.mp3');
    expect(engine.jobs).toHaveLength(0);
  });

  it('should reject an undersized input', async () => {
    const engine = createFakeEngine();
    const intro = await writeClip(dir, 'intro.mp3', 800);
    const narr = await writeClip(dir, 'narr.mp3', 100);

    await expect(
      executor(engine).execute(buildBedVoiceMixGraph(defaultMixRequest()), [intro, narr], path.join(dir, 'out.mp3'), 'r')
    ).rejects.toThrow('Stage 1 input narr.mp3 is 100 bytes; at least 500 required');
    expect(engine.jobs).toHaveLength(0);
  });

  it('should accept a small output of an earlier stage', async () => {
    const engine = createFakeEngine();
    const input = await writeClip(dir, 'stage2-outro-crossfade.mp3', 120);

    const artifact = await executor(engine).execute(
      buildLoudnessGraph(defaultMixRequest()),
      [input],
      path.join(dir, 'final.mp3'),
      'r'
    );

    expect(artifact.stage).toBe(3);
    expect(engine.jobs).toHaveLength(1);
  });

  it('should report an empty earlier-stage output as an engine failure', async () => {
    const engine = createFakeEngine();
    const input = await writeClip(dir, 'stage2-outro-crossfade.mp3', 0);

    const error = await executor(engine)
      .execute(buildLoudnessGraph(defaultMixRequest()), [input], path.join(dir, 'final.mp3'), 'r')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EngineFailureError);
    if (!(error instanceof EngineFailureError)) return;
    expect(error.stage).toBe(3);
    expect(error.message).toBe('Stage 3 failed: stage 2 output stage2-outro-crossfade.mp3 is missing or empty');
    expect(engine.jobs).toHaveLength(0);
  });

  it('should raise EngineFailureError on a non-zero exit', async () => {
    const engine = createFakeEngine({ failOnCall: 1 });
    const inputs = await stage1Inputs();

    const error = await executor(engine)
      .execute(buildBedVoiceMixGraph(defaultMixRequest()), inputs, path.join(dir, 'out.mp3'), 'r')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EngineFailureError);
    if (!(error instanceof EngineFailureError)) return;
    expect(error.stage).toBe(1);
    expect(error.message).toBe('Stage 1 failed: Error while filtering: Invalid argument');
    expect(error.diagnostic).toBe('Error while filtering: Invalid argument\n');
  });

  it('should raise EngineFailureError when the engine writes an empty file', async () => {
    const engine = createFakeEngine({ outputBytes: 0 });
    const inputs = await stage1Inputs();

    await expect(
      executor(engine).execute(buildBedVoiceMixGraph(defaultMixRequest()), inputs, path.join(dir, 'out.mp3'), 'r')
    ).rejects.toThrow('Stage 1 failed: engine exited 0 but wrote no output to out.mp3');
  });

  it('should turn a timeout into an EngineFailureError for the stage', async () => {
    const engine: DspEngine = {
      ...createFakeEngine(),
      async submit() {
        throw new CommandTimeoutError('ffmpeg', 50, 'size=  12kB\n');
      },
    };
    const input = await writeClip(dir, 'stage2.mp3', 700);

    const error = await executor(engine)
      .execute(buildLoudnessGraph(defaultMixRequest()), [input], path.join(dir, 'final.mp3'), 'r')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EngineFailureError);
    if (!(error instanceof EngineFailureError)) return;
    expect(error.stage).toBe(3);
    expect(error.message).toBe('Stage 3 failed: Command timed out after 50ms: ffmpeg');
  });

  it('should report a missing engine binary as a configuration error', async () => {
    const engine: DspEngine = {
      ...createFakeEngine(),
      async submit() {
        throw Object.assign(new Error('spawn ffmpeg ENOENT'), { code: 'ENOENT' });
      },
    };
    const input = await writeClip(dir, 'stage2.mp3', 700);

    const result = executor(engine).execute(
      buildLoudnessGraph(defaultMixRequest()),
      [input],
      path.join(dir, 'final.mp3'),
      'r'
    );

    await expect(result).rejects.toBeInstanceOf(ConfigurationError);
    await expect(result).rejects.toThrow('DSP engine binary not found; check FFMPEG_PATH');
  });

  describe('debug probing', () => {
    it('should probe the stage 1 output in debug mode', async () => {
      const engine = createFakeEngine();
      const outputPath = path.join(dir, 'out.mp3');

      await executor(engine, true).execute(
        buildBedVoiceMixGraph(defaultMixRequest()),
        await stage1Inputs(),
        outputPath,
        'r'
      );

      expect(engine.probe).toHaveBeenCalledTimes(1);
      expect(engine.probe).toHaveBeenCalledWith(outputPath);
    });

    it('should not probe outside debug mode', async () => {
      const engine = createFakeEngine();

      await executor(engine).execute(
        buildBedVoiceMixGraph(defaultMixRequest()),
        await stage1Inputs(),
        path.join(dir, 'out.mp3'),
        'r'
      );

      expect(engine.probe).not.toHaveBeenCalled();
    });

    it('should not probe later stages', async () => {
      const engine = createFakeEngine();
      const input = await writeClip(dir, 'stage2.mp3', 700);

      await executor(engine, true).execute(
        buildLoudnessGraph(defaultMixRequest()),
        [input],
        path.join(dir, 'final.mp3'),
        'r'
      );

      expect(engine.probe).not.toHaveBeenCalled();
    });

    it('should treat a probe failure as non-fatal', async () => {
      const engine = createFakeEngine();
      engine.probe.mockRejectedValueOnce(new Error('ffprobe failed (code=1)'));

      const artifact = await executor(engine, true).execute(
        buildBedVoiceMixGraph(defaultMixRequest()),
        await stage1Inputs(),
        path.join(dir, 'out.mp3'),
        'r'
      );

      expect(artifact.byteLength).toBe(2048);
    });
  });
});
