// Typed pipeline errors
import type { AssetRole, MixErrorCode, StageIndex } from "@voicebed/contracts";

const DIAGNOSTIC_LIMIT = 2000;

/**
 * Base class for every failure the mix pipeline reports to its caller
 */
export class MixError extends Error {
  constructor(
    message: string,
    public readonly code: MixErrorCode,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = "MixError";
  }
}

/**
 * Missing, empty or undersized input asset. Raised before any stage runs.
 */
export class InvalidInputError extends MixError {
  constructor(
    message: string,
    public readonly subject: AssetRole | string
  ) {
    super(message, "INVALID_INPUT", 400);
    this.name = "InvalidInputError";
  }
}

/**
 * The DSP engine returned non-success, timed out or wrote no output
 */
export class EngineFailureError extends MixError {
  public readonly diagnostic: string;

  constructor(
    public readonly stage: StageIndex,
    diagnostic: string
  ) {
    const trimmed = diagnostic.slice(-DIAGNOSTIC_LIMIT);
    super(`Stage ${stage} failed: ${lastLine(trimmed)}`, "ENGINE_FAILURE", 502);
    this.name = "EngineFailureError";
    this.diagnostic = trimmed;
  }
}

/**
 * Engine binary unavailable or configuration invalid
 */
export class ConfigurationError extends MixError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR", 500);
    this.name = "ConfigurationError";
  }
}

function lastLine(text: string): string {
  const lines = text.split("\n").map((l) => l.trim()).filter(Boolean);
  return lines.at(-1) ?? "no diagnostic output";
}
