// Shared test fixtures: in-process DSP engine stand-in and scratch files
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { vi, type Mock } from 'vitest';
import type { DspEngine, EngineJob, SpawnResult, StreamInfo } from '../../src/audio/index.js';
import { loadConfig, type MixerConfig } from '../../src/lib/config.js';
import { createLogger } from '../../src/lib/logger.js';

export interface FakeEngineOptions {
  /** 1-based submit call that returns a failing exit code */
  failOnCall?: number;
  /** Bytes written to each output file */
  outputBytes?: number;
  stderr?: string;
  /** Runs after a successful job has written its output */
  onSubmit?: (job: EngineJob) => Promise<void>;
}

export interface FakeEngine extends DspEngine {
  jobs: EngineJob[];
  probe: Mock<(filePath: string) => Promise<StreamInfo>>;
}

/**
 * Engine that records jobs and writes a fixed-size output file instead of running ffmpeg
 */
export function createFakeEngine(opts: FakeEngineOptions = {}): FakeEngine {
  const jobs: EngineJob[] = [];

  return {
    jobs,
    async submit(job): Promise<SpawnResult> {
      jobs.push(job);
      if (opts.failOnCall === jobs.length) {
        return { code: 1, stdout: '', stderr: opts.stderr ?? 'Error while filtering: Invalid argument\n' };
      }
      await writeFile(job.outputPath, Buffer.alloc(opts.outputBytes ?? 2048, 7));
      await opts.onSubmit?.(job);
      return { code: 0, stdout: '', stderr: opts.stderr ?? '' };
    },
    probe: vi.fn(async (_filePath: string): Promise<StreamInfo> => ({
      channels: 2,
      sampleRate: 48000,
      durationSec: 42.5,
    })),
    async available() {
      return true;
    },
  };
}

export async function makeTempDir(prefix = 'voicebed-test-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write a placeholder audio file of the given size
 */
export async function writeClip(dir: string, name: string, bytes: number): Promise<string> {
  const filePath = path.join(dir, name);
  await writeFile(filePath, Buffer.alloc(bytes, 1));
  return filePath;
}

export function testConfig(workRoot: string, overrides: Record<string, string> = {}): MixerConfig {
  return loadConfig({ MIX_WORK_ROOT: workRoot, LOG_LEVEL: 'silent', ...overrides });
}

export const silentLogger = createLogger('test', 'silent');
