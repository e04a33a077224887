import { pino, type DestinationStream, type Logger } from "pino";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(
  options: { level?: LogLevel; destination?: DestinationStream } = {}
): Logger {
  const settings = { name: "fleetrun", level: options.level ?? "info" };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}
