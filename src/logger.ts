import { pino, destination, type DestinationStream, type Logger, type LoggerOptions } from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function createLogger(level: LogLevel, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: {
      name: "sheetpipe"
    }
  };

  return destination ? pino(options, destination) : pino(options);
}

/** Default for library callers that pass no logger */
export const silentLogger: Logger = pino({ level: "silent" });

/**
 * Synchronous stderr destination, so warnings are out before the process exits
 */
export function stderrDestination(): DestinationStream {
  return destination({ dest: 2, sync: true });
}
