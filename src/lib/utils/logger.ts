import pino from "pino";

import { getEnv, resolveLogLevel } from "@/lib/config/env";

export const logger = pino({
  level: resolveLogLevel(getEnv()),
  base: {
    service: "immersion-progress"
  },
  formatters: {
    level: (label) => ({ level: label })
  },
  timestamp: pino.stdTimeFunctions.isoTime
});

export type Logger = typeof logger;

export interface ErrorContext {
  route?: string;
  endpoint?: string;
  status?: number;
  [key: string]: unknown;
}

export function logError(error: Error, context?: ErrorContext, customLogger?: Logger): void {
  const log = customLogger ?? logger;
  log.error(
    {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack
      },
      ...context
    },
    `Error: ${error.message}`
  );
}

export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return logger.child(bindings);
}
