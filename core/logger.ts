import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL || "info"): Logger {
  return pino({
    base: undefined,
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.epochTime,
  });
}

export const logger = createLogger();

export function childLogger(scope: string): Logger {
  return logger.child({ scope });
}
