/**
 * @module tangle-channels
 * @description Authenticated publish/subscribe channels over an
 * append-only, content-addressed message store.
 *
 * An Author announces a channel and hands out branch keys through
 * keyloads; Subscribers follow it by polling derived addresses. Exports
 * the two roles, their interfaces, all type definitions, the address and
 * envelope codecs, the noble cipher suite and the in-memory transport.
 *
 * @version 0.1.0
 * @license MIT
 */

// ─── Types ──────────────────────────────────────────────────────────
export type * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Codecs ─────────────────────────────────────────────────────────
export * from "./codec/index.js";

// ─── Crypto Backends ────────────────────────────────────────────────
export * from "./backends/index.js";

// ─── Transport Implementations ──────────────────────────────────────
export * from "./transports/index.js";

// ─── Channel Users ──────────────────────────────────────────────────
export {
  ChannelUser,
  encodeBranchingMode,
  decodeBranchingMode,
  isPacketMessage,
  isSkippedMessage,
  isKeyloadMessage,
} from "./user.js";
export type { ChannelContext } from "./user.js";
export { Author } from "./author.js";
export { Subscriber } from "./subscriber.js";

// ─── Configuration & Logging ────────────────────────────────────────
export { resolveConfig, levelFromEnv } from "./config.js";
export type { ChannelUserConfig, ResolvedConfig } from "./config.js";
export { makeLogger } from "./logging.js";
export type { Logger, LogLevel, LoggerOptions } from "./logging.js";
