/**
 * Unit tests for audio module
 *
 * Tests for:
 * - loudnorm summary parser with captured FFmpeg stderr samples
 * - ffprobe JSON parsing
 * - FFmpeg argument construction (explicit output encoding)
 * - Engine failure diagnostics
 */

import { describe, it, expect } from 'vitest';
import {
  buildFfmpegArgs,
  CommandTimeoutError,
  isMissingBinary,
  parseLoudnormSummary,
  parseProbeOutput,
} from '../../src/audio/index.js';
import { EngineFailureError } from '../../src/lib/errors.js';

/**
 * Sample FFmpeg loudnorm output (print_format=summary)
 */
const SAMPLE_LOUDNORM_OUTPUT = `
size=    2304kB time=00:01:38.30 bitrate= 192.0kbits/s speed=41.2x
[Parsed_loudnorm_0 @ 0x55d4c8a3c940]
Input Integrated:    -23.4 LUFS
Input True Peak:      -6.1 dBTP
Input LRA:             5.2 LU
Input Threshold:     -33.9 LUFS

Output Integrated:   -16.1 LUFS
Output True Peak:     -1.5 dBTP
Output LRA:            4.8 LU
Output Threshold:    -26.5 LUFS

Normalization Type:   Dynamic
Target Offset:        +0.1 LU
`;

describe('parseLoudnormSummary', () => {
  it('should parse input and output measurements', () => {
    expect(parseLoudnormSummary(SAMPLE_LOUDNORM_OUTPUT)).toEqual({
      inputIntegratedLufs: -23.4,
      inputTruePeakDbtp: -6.1,
      inputLra: 5.2,
      outputIntegratedLufs: -16.1,
      outputTruePeakDbtp: -1.5,
      outputLra: 4.8,
      normalizationType: 'Dynamic',
    });
  });

  it('should return null when the summary is absent', () => {
    expect(parseLoudnormSummary('size=    2304kB time=00:01:38.30\n')).toBeNull();
  });

  it('should return null when the summary is truncated', () => {
    const truncated = SAMPLE_LOUDNORM_OUTPUT.split('Output LRA')[0];
    expect(parseLoudnormSummary(truncated)).toBeNull();
  });
});

describe('parseProbeOutput', () => {
  it('should read channels, sample rate and duration', () => {
    const json = JSON.stringify({
      streams: [{ channels: 2, sample_rate: '48000' }],
      format: { duration: '98.304000' },
    });
    expect(parseProbeOutput(json)).toEqual({ channels: 2, sampleRate: 48000, durationSec: 98.304 });
  });

  it('should report missing values as null', () => {
    expect(parseProbeOutput('{}')).toEqual({ channels: null, sampleRate: null, durationSec: null });
    expect(parseProbeOutput(JSON.stringify({ format: { duration: 'N/A' } })).durationSec).toBeNull();
  });

  it('should reject non-JSON output', () => {
    expect(() => parseProbeOutput('Invalid data found when processing input')).toThrow(
      'ffprobe output is not JSON: Invalid data found when processing input'
    );
  });
});

describe('buildFfmpegArgs', () => {
  const job = {
    inputs: ['/work/intro.mp3', '/work/narr.mp3'],
    filterGraph: '[0:a][1:a]amix=inputs=2[mix]',
    outputLabel: 'mix',
    outputPath: '/work/out.mp3',
    encoding: { codec: 'libmp3lame' as const, sampleRate: 48000, channels: 2 as const, bitrateKbps: 192 },
    timeoutMs: 1000,
  };

  it('should list every input and the explicit output encoding', () => {
    expect(buildFfmpegArgs(job)).toEqual([
      '-hide_banner', '-nostdin', '-v', 'info', '-y',
      '-i', '/work/intro.mp3',
      '-i', '/work/narr.mp3',
      '-filter_complex', '[0:a][1:a]amix=inputs=2[mix]',
      '-map', '[mix]',
      '-vn',
      '-ar', '48000',
      '-ac', '2',
      '-c:a', 'libmp3lame',
      '-b:a', '192k',
      '/work/out.mp3',
    ]);
  });

  it('should keep paths with spaces as single arguments', () => {
    const args = buildFfmpegArgs({ ...job, inputs: ['/work/my intro.mp3'] });
    expect(args.slice(5, 7)).toEqual(['-i', '/work/my intro.mp3']);
  });
});

describe('EngineFailureError', () => {
  it('should summarize the last diagnostic line', () => {
    const error = new EngineFailureError(2, 'Stream mapping:\n  ...\nError reinitializing filters!\n\n');
    expect(error.message).toBe('Stage 2 failed: Error reinitializing filters!');
    expect(error.statusCode).toBe(502);
    expect(error.code).toBe('ENGINE_FAILURE');
  });

  it('should keep only the tail of long diagnostics', () => {
    const error = new EngineFailureError(1, 'x'.repeat(5000) + '\nboom');
    expect(error.diagnostic).toHaveLength(2000);
    expect(error.diagnostic.endsWith('\nboom')).toBe(true);
  });

  it('should cope with empty diagnostics', () => {
    expect(new EngineFailureError(3, '').message).toBe('Stage 3 failed: no diagnostic output');
  });
});

describe('process errors', () => {
  it('should describe a timeout', () => {
    const error = new CommandTimeoutError('ffmpeg', 600000, '');
    expect(error.message).toBe('Command timed out after 600000ms: ffmpeg');
  });

  it('should recognise a missing binary', () => {
    expect(isMissingBinary(Object.assign(new Error('spawn nope ENOENT'), { code: 'ENOENT' }))).toBe(true);
    expect(isMissingBinary(new Error('other'))).toBe(false);
    expect(isMissingBinary('ENOENT')).toBe(false);
  });
});
