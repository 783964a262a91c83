import { pino, type DestinationStream, type Logger } from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type AppLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

interface CreateLoggerOptions {
  level?: LogLevel;
  name?: string;
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions = {
    level: options.level ?? "info",
    name: options.name ?? "payment-result-core",
  };
  if (options.destination) {
    return pino(loggerOptions, options.destination);
  }
  return pino(loggerOptions);
}
