/**
 * @module transports/memory
 * @description In-process bucket transport.
 *
 * Stores every message in a Map keyed by the link's text form. Several
 * users sharing one instance behave like participants of one ledger.
 * Stored bytes are copied in and out so callers cannot alter history.
 */

import type { ITransport } from "../interfaces/transport.js";
import { TransportError } from "../interfaces/transport.js";
import type { Link } from "../types/link.js";
import { linkToString } from "../codec/address.js";
import { bytesEqual } from "../backends/crypto-utils.js";

export class InMemoryTransport implements ITransport {
  private readonly bucket = new Map<string, Uint8Array>();
  private available = true;

  // ─── Commands ───────────────────────────────────────────────────

  async publish(link: Link, data: Uint8Array): Promise<void> {
    this.requireAvailable();
    const key = linkToString(link);
    const existing = this.bucket.get(key);
    if (existing) {
      if (bytesEqual(existing, data)) return;
      throw new TransportError(`Address ${key} already holds different content`, "CONFLICT");
    }
    this.bucket.set(key, data.slice());
  }

  /** Simulates the store going offline or coming back. */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  clear(): void {
    this.bucket.clear();
  }

  // ─── Queries ────────────────────────────────────────────────────

  async fetch(link: Link): Promise<Uint8Array | null> {
    this.requireAvailable();
    return this.bucket.get(linkToString(link))?.slice() ?? null;
  }

  get size(): number {
    return this.bucket.size;
  }

  private requireAvailable(): void {
    if (!this.available) {
      throw new TransportError("In-memory transport is offline", "UNAVAILABLE");
    }
  }
}
