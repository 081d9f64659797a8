import pino, { DestinationStream, Logger, LevelWithSilent } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  /** Write somewhere other than stdout (tests capture lines this way) */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const settings = { name: "cruncher", level: options.level ?? "info" };
  return options.destination ? pino(settings, options.destination) : pino(settings);
}
