// Process configuration, parsed once at start-up and passed down explicitly
import { tmpdir } from "node:os";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const flagSchema = z
  .enum(["0", "1", "true", "false"])
  .default("0")
  .transform((v) => v === "1" || v === "true");

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  API_PORT: z.coerce.number().int().min(1).max(65535).default(4000),
  API_HOST: z.string().min(1).default("0.0.0.0"),
  CORS_ORIGIN: z.string().optional(),
  FFMPEG_PATH: z.string().min(1).default("ffmpeg"),
  FFPROBE_PATH: z.string().min(1).default("ffprobe"),
  MIX_WORK_ROOT: z.string().min(1).optional(),
  /** Per-stage engine deadline */
  STAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  MIN_ASSET_BYTES: z.coerce.number().int().min(1).default(500),
  /** Keep every artifact and probe the stage-1 output */
  MIX_DEBUG: flagSchema,
  MIX_SAMPLE_RATE: z.coerce.number().int().refine((n) => n === 44100 || n === 48000).default(48000),
  MIX_BITRATE_KBPS: z.coerce.number().int().min(64).max(320).default(192),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(100 * 1024 * 1024),
});

export interface EncodingSettings {
  codec: "libmp3lame";
  sampleRate: number;
  channels: 2;
  bitrateKbps: number;
}

export interface MixerConfig {
  env: string;
  logLevel: string;
  server: {
    port: number;
    host: string;
    corsOrigins: string[] | null;
    maxUploadBytes: number;
  };
  engine: {
    ffmpegPath: string;
    ffprobePath: string;
    stageTimeoutMs: number;
  };
  workRoot: string;
  minAssetBytes: number;
  /** Retain all artifacts and log stage-1 stream properties */
  debug: boolean;
  encoding: EncodingSettings;
}

/**
 * Build the mixer configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MixerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${detail}`);
  }

  const e = parsed.data;
  const corsOrigins = e.CORS_ORIGIN
    ? e.CORS_ORIGIN.split(",").map((o) => o.trim()).filter(Boolean)
    : null;

  if (!corsOrigins && e.NODE_ENV === "production") {
    throw new ConfigurationError("CORS_ORIGIN must be set in production");
  }

  return {
    env: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    server: {
      port: e.API_PORT,
      host: e.API_HOST,
      corsOrigins,
      maxUploadBytes: e.MAX_UPLOAD_BYTES,
    },
    engine: {
      ffmpegPath: e.FFMPEG_PATH,
      ffprobePath: e.FFPROBE_PATH,
      stageTimeoutMs: e.STAGE_TIMEOUT_MS,
    },
    workRoot: e.MIX_WORK_ROOT ?? tmpdir(),
    minAssetBytes: e.MIN_ASSET_BYTES,
    debug: e.MIX_DEBUG,
    encoding: {
      codec: "libmp3lame",
      sampleRate: e.MIX_SAMPLE_RATE,
      channels: 2,
      bitrateKbps: e.MIX_BITRATE_KBPS,
    },
  };
}
