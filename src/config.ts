/**
 * @module config
 * @description Configuration of a channel user and its defaults.
 */

import type { CipherSuite } from "./interfaces/cipher-suite.js";
import type { ITransport } from "./interfaces/transport.js";
import type { BranchingMode } from "./types/link.js";
import { nobleSuite } from "./backends/noble-suite.js";
import { makeLogger, type LogLevel, type Logger } from "./logging.js";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface ChannelUserConfig {
  /** Seed the user's keys are derived from. */
  seed: string | Uint8Array;
  transport: ITransport;
  /** Author only. Default: "SINGLE" */
  branching?: BranchingMode;
  /** Author only: picks one of several channels per seed. Default: 0 */
  channelNonce?: number;
  /** Default: nobleSuite */
  suite?: CipherSuite;
  /** Takes precedence over logLevel and prettyLogs. */
  logger?: Logger;
  /** Default: $LOG_LEVEL, else "info" */
  logLevel?: LogLevel;
  /** Default: false */
  prettyLogs?: boolean;
}

export interface ResolvedConfig {
  readonly seed: string | Uint8Array;
  readonly transport: ITransport;
  readonly branching: BranchingMode;
  readonly channelNonce: number;
  readonly suite: CipherSuite;
  readonly logger: Logger;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
  const value = env.LOG_LEVEL?.toLowerCase();
  return value !== undefined && isLogLevel(value) ? value : undefined;
}

export function resolveConfig(config: ChannelUserConfig): ResolvedConfig {
  const nonce = config.channelNonce ?? 0;
  if (!Number.isInteger(nonce) || nonce < 0 || nonce > 0xffffffff) {
    throw new RangeError(`channelNonce must be a uint32, got ${nonce}`);
  }
  return {
    seed: config.seed,
    transport: config.transport,
    branching: config.branching ?? "SINGLE",
    channelNonce: nonce,
    suite: config.suite ?? nobleSuite,
    logger:
      config.logger ??
      makeLogger({
        level: config.logLevel ?? levelFromEnv() ?? "info",
        pretty: config.prettyLogs ?? false,
      }),
  };
}
