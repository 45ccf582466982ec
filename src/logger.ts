/**
 * Structured logging (pino): ISO timestamps, no pid/hostname noise.
 */
import { pino, stdTimeFunctions } from "pino";
import type { Logger, LoggerOptions } from "pino";

export type { Logger };

export const loggerOptions = (level: string): LoggerOptions => ({
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime,
});

export function createLogger(level = "info"): Logger {
  return pino(loggerOptions(level));
}

/** Logger that discards everything. */
export const silentLogger: Logger = pino({ level: "silent" });
