/**
 * @module interfaces/identity-provider
 * @description IIdentityProvider — the keys one publisher acts with.
 *
 * An identity holds a signing keypair, whose public half is the publisher
 * id every message carries, and an exchange keypair that keyloads wrap
 * session keys for. Both are derived from a seed, so the same seed always
 * yields the same publisher.
 */

import type { ExchangeKey, PublicKey, PublisherId, Signature } from "../types/branded.js";

/**
 * Errors that may be thrown by IIdentityProvider operations.
 */
export class IdentityError extends Error {
  constructor(
    message: string,
    public readonly code: "INVALID_SEED" | "DESTROYED"
  ) {
    super(message);
    this.name = "IdentityError";
  }
}

/**
 * @interface IIdentityProvider
 */
export interface IIdentityProvider {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Zeroes the secret keys. Every later sign or agree fails.
   */
  destroy(): void;

  // ─── Queries ────────────────────────────────────────────────────

  readonly publicKey: PublicKey;
  readonly publisherId: PublisherId;
  readonly exchangeKey: ExchangeKey;

  /**
   * @query
   * @throws {IdentityError} code=DESTROYED after {@link destroy}.
   */
  sign(message: Uint8Array): Signature;

  /**
   * @query
   * @description Checks a signature against any publisher's key.
   */
  verify(message: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): boolean;

  /**
   * @query
   * @description Key agreement between this identity's exchange secret and a
   * peer's exchange public key.
   * @throws {IdentityError} code=DESTROYED after {@link destroy}.
   */
  agree(peerExchangeKey: Uint8Array): Uint8Array;
}
