/**
 * Structured logger (pino). JSON lines in production, pino-pretty in development.
 * Components receive a Logger by injection so tests can pass a silent one.
 */

import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export interface LoggerOptions {
  level: LevelWithSilent;
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino({
    level: options.level,
    transport: options.pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
