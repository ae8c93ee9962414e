import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { LogLevel } from "./config.js";

export type { Logger };

export interface LoggerOptions {
  /** Default: "info" */
  level?: LogLevel;
  /** File to append to. Ignored when `stream` is given. */
  destination?: string;
  /** Write here instead of a file or stdout. */
  stream?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions = {
    name: "hare",
    level: options.level ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options.stream) {
    return pino(pinoOptions, options.stream);
  }
  if (options.destination) {
    return pino(
      pinoOptions,
      pino.destination({ dest: options.destination, append: true, mkdir: true }),
    );
  }
  return pino(pinoOptions);
}
