// voicebed API App - Fastify instance around the mix pipeline
import Fastify from "fastify";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import type { DspEngine } from "./audio/index.js";
import type { MixerConfig } from "./lib/config.js";
import { errorHandler } from "./lib/errorTracking.js";
import mixRoutes, { type MixRunner } from "./routes/mix.js";

export const SERVICE_NAME = "voicebed-api";
export const SERVICE_VERSION = "1.0.0";

export interface AppDeps {
  pipeline: MixRunner;
  engine: Pick<DspEngine, "available">;
}

export async function buildApp(config: MixerConfig, deps: AppDeps) {
  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // Permissive CORS outside production when no origin list is configured
  if (!config.server.corsOrigins) {
    app.log.warn("CORS_ORIGIN not set. Using permissive CORS for development.");
  }
  await app.register(cors, {
    origin: config.server.corsOrigins ?? true,
    credentials: true,
  });

  await app.register(multipart, {
    limits: {
      fileSize: config.server.maxUploadBytes,
      files: 3,
    },
  });

  // Set custom error handler (before routes, so encapsulated plugins inherit it)
  app.setErrorHandler(errorHandler);

  await app.register(mixRoutes, {
    pipeline: deps.pipeline,
    minAssetBytes: config.minAssetBytes,
  });

  // Health check endpoint
  app.get("/health", async () => {
    return {
      ok: true,
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      time: new Date().toISOString(),
    };
  });

  // Readiness check (verifies the DSP engine binaries)
  app.get("/ready", async (_request, reply) => {
    const engine = await deps.engine.available();
    if (!engine) {
      reply.code(503);
      return { ok: false, engine: "unavailable" };
    }
    return { ok: true, engine: "available" };
  });

  return app;
}
