import { pino } from "pino";

/**
 * Logger factory - creates structured logger instances
 */
export function createLogger(name: string, level: string = "info") {
  return pino({
    name,
    level,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export type Logger = ReturnType<typeof createLogger>;
