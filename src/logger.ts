import pino from "pino";

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
  /** File descriptor or path. Defaults to stderr so stdout stays free for stdio transports */
  destination?: number | string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? "calc-agent",
      level: options.level ?? "info",
    },
    pino.destination({ dest: options.destination ?? 2, sync: true }),
  );
}

/**
 * Logger that discards everything. Default when no logger is injected.
 */
export const silentLogger: Logger = pino({ level: "silent" });
