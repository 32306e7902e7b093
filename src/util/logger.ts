import pino from "pino";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

function resolveLevel(raw: string | undefined): LogLevel {
  const wanted = (raw ?? "info").toLowerCase();
  return LOG_LEVELS.find((l) => l === wanted) ?? "info";
}

const baseLogger = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: { service: "input-shield" },
});

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return baseLogger.child({ module: name });
}
