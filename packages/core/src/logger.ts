import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

/**
 * Root logger for a Switchboard process. Output is newline-delimited JSON
 * on stdout; components derive children with `logger.child({ component })`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "switchboard",
    level: options.level ?? "info",
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** A logger that drops everything. Used where no logger was supplied. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
