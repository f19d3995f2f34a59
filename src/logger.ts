import pino from "pino";

const defaultLevel = process.env["NODE_ENV"] === "test" ? "silent" : "info";
const LOG_LEVEL = process.env["LOG_LEVEL"] ?? defaultLevel;

export const rootLogger = pino({
  level: LOG_LEVEL,
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label: string) {
      return { level: label };
    },
  },
});

export function createLogger(module: string, extra?: Record<string, unknown>): pino.Logger {
  return rootLogger.child({ module, ...extra });
}
