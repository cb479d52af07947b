/**
 * FFmpeg command execution wrapper
 *
 * Provides safe, typed command execution with timeout handling.
 * Arguments are always passed as an array - never through a shell.
 */

import { spawn } from 'node:child_process';
import { z } from 'zod';

export type SpawnResult = {
  code: number;
  stdout: string;
  stderr: string;
};

/**
 * Raised when a command exceeds its deadline and is killed
 */
export class CommandTimeoutError extends Error {
  constructor(
    public readonly command: string,
    public readonly timeoutMs: number,
    public readonly stderr: string
  ) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`);
    this.name = 'CommandTimeoutError';
  }
}

/**
 * Execute a command with proper timeout and output capture
 */
export async function run(
  cmd: string,
  args: string[],
  opts?: {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    timeoutMs?: number;
  }
): Promise<SpawnResult> {
  const timeoutMs = opts?.timeoutMs ?? 10 * 60 * 1000; // 10 minutes default

  return await new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      cwd: opts?.cwd,
      env: opts?.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';

    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      reject(new CommandTimeoutError(cmd, timeoutMs, stderr));
    }, timeoutMs);

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (err) => {
      clearTimeout(timer);
      reject(err);
    });

    child.on('close', (code) => {
      clearTimeout(timer);
      resolve({
        code: code ?? -1,
        stdout,
        stderr,
      });
    });
  });
}

/**
 * True when spawning failed because the binary does not exist
 */
export function isMissingBinary(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Check if a binary answers `-version`
 */
export async function checkBinary(cmd: string): Promise<boolean> {
  try {
    const result = await run(cmd, ['-version'], { timeoutMs: 5000 });
    return result.code === 0;
  } catch {
    return false;
  }
}

export type StreamInfo = {
  channels: number | null;
  sampleRate: number | null;
  durationSec: number | null;
};

const probeSchema = z.object({
  streams: z
    .array(
      z.object({
        channels: z.number().optional(),
        sample_rate: z.string().optional(),
      })
    )
    .default([]),
  format: z.object({ duration: z.string().optional() }).default({}),
});

function toNumber(value: string | number | undefined): number | null {
  if (value === undefined) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/**
 * Parse `ffprobe -of json` output for the first audio stream
 */
export function parseProbeOutput(json: string): StreamInfo {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new Error(`ffprobe output is not JSON: ${json.slice(0, 200)}`);
  }

  const parsed = probeSchema.parse(raw);
  const stream = parsed.streams[0];

  return {
    channels: toNumber(stream?.channels),
    sampleRate: toNumber(stream?.sample_rate),
    durationSec: toNumber(parsed.format.duration),
  };
}

/**
 * Read channel count, sample rate and duration of an audio file
 */
export async function probeStream(
  ffprobePath: string,
  filePath: string,
  timeoutMs = 30 * 1000
): Promise<StreamInfo> {
  const args = [
    '-hide_banner',
    '-v', 'error',
    '-select_streams', 'a:0',
    '-show_entries', 'stream=channels,sample_rate',
    '-show_entries', 'format=duration',
    '-of', 'json',
    filePath,
  ];

  const result = await run(ffprobePath, args, { timeoutMs });
  if (result.code !== 0) {
    throw new Error(`ffprobe failed (code=${result.code}): ${result.stderr.slice(0, 500)}`);
  }

  return parseProbeOutput(result.stdout);
}
