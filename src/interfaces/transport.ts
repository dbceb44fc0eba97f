/**
 * @module interfaces/transport
 * @description ITransport — the append-only, content-addressed store.
 *
 * The engine only ever writes a message once, at an address it derived
 * itself, and reads addresses it derived or was handed. Consensus and
 * storage are the transport's business.
 */

import type { Link } from "../types/link.js";

/**
 * Errors that may be thrown by ITransport operations.
 *
 * - CONFLICT: the address already holds different bytes. Never retried.
 * - UNAVAILABLE: the store could not be reached. The whole call may be retried.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly code: "CONFLICT" | "UNAVAILABLE"
  ) {
    super(message);
    this.name = "TransportError";
  }
}

/**
 * @interface ITransport
 * @description Key-value publish/fetch addressed by {@link Link}.
 */
export interface ITransport {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Stores `data` at `link`. Publishing identical bytes twice
   * is accepted.
   *
   * @throws {TransportError} code=CONFLICT if different bytes are stored there.
   * @throws {TransportError} code=UNAVAILABLE if the store cannot be reached.
   */
  publish(link: Link, data: Uint8Array): Promise<void>;

  // ─── Queries ────────────────────────────────────────────────────

  /**
   * @query
   * @description Reads the bytes stored at `link`.
   * @returns The stored bytes, or null when nothing was published there.
   * @throws {TransportError} code=UNAVAILABLE if the store cannot be reached.
   */
  fetch(link: Link): Promise<Uint8Array | null>;
}
