/**
 * @module primitives/psk-store
 * @description Pre-shared keys held by one user, keyed by their id.
 *
 * PSKs arrive out of band. The id is a keyed hash of the key itself, so
 * two users storing the same PSK agree on its id without exchanging it.
 */

import type { CipherSuite } from "../interfaces/cipher-suite.js";
import type { Psk, PskId } from "../types/branded.js";
import {
  KEY_LENGTH,
  PSK_ID_LENGTH,
  asPsk,
  pskIdOf,
  utf8,
  wipe,
} from "../backends/crypto-utils.js";

const PSK_ID_LABEL = utf8("channels/v1/psk-id");
const PSK_SALT = utf8("channels/v1/psk");

/** Derive a PSK from a passphrase every holder knows. */
export function createPsk(suite: CipherSuite, secret: string | Uint8Array): Psk {
  const bytes = typeof secret === "string" ? utf8(secret) : secret;
  return asPsk(suite.expand(bytes, PSK_SALT, PSK_SALT, KEY_LENGTH));
}

export function pskIdFromKey(suite: CipherSuite, psk: Psk): PskId {
  return pskIdOf(suite.keyedHash(psk, PSK_ID_LABEL, PSK_ID_LENGTH));
}

export class PskStore {
  private readonly keys = new Map<PskId, Psk>();

  constructor(private readonly suite: CipherSuite) {}

  // ─── Commands ───────────────────────────────────────────────────

  /** Keeps a copy; the caller's buffer is never wiped by this store. */
  store(psk: Psk): PskId {
    const id = pskIdFromKey(this.suite, psk);
    this.keys.get(id)?.fill(0);
    this.keys.set(id, asPsk(psk.slice()));
    return id;
  }

  remove(id: PskId): boolean {
    const psk = this.keys.get(id);
    if (!psk) return false;
    wipe(psk);
    return this.keys.delete(id);
  }

  clear(): void {
    for (const psk of this.keys.values()) wipe(psk);
    this.keys.clear();
  }

  // ─── Queries ────────────────────────────────────────────────────

  get(id: PskId): Psk | undefined {
    return this.keys.get(id);
  }

  has(id: PskId): boolean {
    return this.keys.has(id);
  }

  ids(): PskId[] {
    return [...this.keys.keys()];
  }

  get size(): number {
    return this.keys.size;
  }
}
