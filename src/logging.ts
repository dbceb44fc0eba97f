/**
 * @module logging
 * @description pino loggers for channel users.
 */

import pino from "pino";

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

export interface LoggerOptions {
  readonly level: LogLevel;
  /** Route output through pino-pretty. Meant for interactive use. */
  readonly pretty: boolean;
  readonly name?: string;
}

export function makeLogger(options: LoggerOptions): Logger {
  return pino({
    level: options.level,
    ...(options.name ? { name: options.name } : {}),
    ...(options.pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "HH:MM:ss.l" },
          },
        }
      : {}),
  });
}
