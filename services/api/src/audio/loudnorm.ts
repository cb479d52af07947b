/**
 * Parsing of the ffmpeg loudnorm summary (print_format=summary)
 *
 * Diagnostic only: the pipeline logs these values but never gates on them.
 */

export type LoudnormSummary = {
  inputIntegratedLufs: number;
  inputTruePeakDbtp: number;
  inputLra: number;
  outputIntegratedLufs: number;
  outputTruePeakDbtp: number;
  outputLra: number;
  normalizationType: string | null;
};

/**
 * Parse a numeric value following a summary label
 */
function parseNumber(label: string, text: string): number | null {
  // "Output Integrated:   -16.2 LUFS"
  // "Input True Peak:      -8.9 dBTP"
  const match = text.match(new RegExp(`${label}:\\s*([-+]?\\d+(?:\\.\\d+)?)`));
  if (!match) return null;

  const value = Number(match[1]);
  return Number.isFinite(value) ? value : null;
}

/**
 * Extract the loudnorm summary block from ffmpeg stderr, or null when absent
 */
export function parseLoudnormSummary(stderr: string): LoudnormSummary | null {
  const inputIntegratedLufs = parseNumber('Input Integrated', stderr);
  const inputTruePeakDbtp = parseNumber('Input True Peak', stderr);
  const inputLra = parseNumber('Input LRA', stderr);
  const outputIntegratedLufs = parseNumber('Output Integrated', stderr);
  const outputTruePeakDbtp = parseNumber('Output True Peak', stderr);
  const outputLra = parseNumber('Output LRA', stderr);

  if (
    inputIntegratedLufs === null ||
    inputTruePeakDbtp === null ||
    inputLra === null ||
    outputIntegratedLufs === null ||
    outputTruePeakDbtp === null ||
    outputLra === null
  ) {
    return null;
  }

  const typeMatch = stderr.match(/Normalization Type:\s*(\w+)/);

  return {
    inputIntegratedLufs,
    inputTruePeakDbtp,
    inputLra,
    outputIntegratedLufs,
    outputTruePeakDbtp,
    outputLra,
    normalizationType: typeMatch?.[1] ?? null,
  };
}
