// voicebed API Server - Standalone server mode
import { buildApp } from "./app.js";
import { createFfmpegEngine } from "./audio/index.js";
import { loadConfig } from "./lib/config.js";
import { createLogger } from "./lib/logger.js";
import { MixPipeline } from "./mix/index.js";

const config = loadConfig();
const logger = createLogger("mix-pipeline", config.logLevel);

const engine = createFfmpegEngine({
  ffmpegPath: config.engine.ffmpegPath,
  ffprobePath: config.engine.ffprobePath,
});

// Check FFmpeg availability
if (!(await engine.available())) {
  logger.fatal(
    { ffmpeg: config.engine.ffmpegPath, ffprobe: config.engine.ffprobePath },
    "FFmpeg/FFprobe not found! Please install FFmpeg."
  );
  process.exit(1);
}

const pipeline = new MixPipeline({ engine, config, logger });
const app = await buildApp(config, { pipeline, engine });

// Graceful shutdown
const signals = ["SIGINT", "SIGTERM"];
for (const signal of signals) {
  process.on(signal, async () => {
    app.log.info(`Received ${signal}, shutting down...`);
    await app.close();
    process.exit(0);
  });
}

// Start server
const { port, host } = config.server;

try {
  await app.listen({ port, host });
  app.log.info(`voicebed API listening on ${host}:${port}`);
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
