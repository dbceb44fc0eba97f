/**
 * @module backends/seed-identity
 * @description IIdentityProvider derived from a seed through a CipherSuite.
 *
 * The signing key is the publisher's identity on the channel; the exchange
 * key receives keyload wraps. Both come from the same seed, so restarting
 * with the seed restores the same publisher.
 */

import type { IIdentityProvider } from "../interfaces/identity-provider.js";
import { IdentityError } from "../interfaces/identity-provider.js";
import type { CipherSuite } from "../interfaces/cipher-suite.js";
import type {
  ExchangeKey,
  PublicKey,
  PublisherId,
  Signature,
} from "../types/branded.js";
import {
  asExchangeKey,
  asPublicKey,
  asSignature,
  publisherIdOf,
  utf8,
  wipe,
} from "./crypto-utils.js";

// ─── Internal State ────────────────────────────────────────────────

interface SecretState {
  signingSecret: Uint8Array;
  exchangeSecret: Uint8Array;
}

/**
 * @example
 * ```ts
 * const identity = SeedIdentity.fromSeed(nobleSuite, "author seed");
 * const sig = identity.sign(utf8("hello"));
 * identity.verify(utf8("hello"), sig, identity.publicKey); // true
 * ```
 */
export class SeedIdentity implements IIdentityProvider {
  readonly publicKey: PublicKey;
  readonly publisherId: PublisherId;
  readonly exchangeKey: ExchangeKey;

  private secrets: SecretState | null;

  private constructor(
    private readonly suite: CipherSuite,
    seed: Uint8Array
  ) {
    const keys = suite.deriveKeys(seed);
    this.publicKey = asPublicKey(keys.signing.publicKey);
    this.publisherId = publisherIdOf(this.publicKey);
    this.exchangeKey = asExchangeKey(keys.exchange.publicKey);
    this.secrets = {
      signingSecret: keys.signing.secretKey,
      exchangeSecret: keys.exchange.secretKey,
    };
  }

  /**
   * @throws {IdentityError} code=INVALID_SEED for an empty seed.
   */
  static fromSeed(suite: CipherSuite, seed: string | Uint8Array): SeedIdentity {
    const bytes = typeof seed === "string" ? utf8(seed) : seed;
    if (bytes.length === 0) {
      throw new IdentityError("Seed must not be empty", "INVALID_SEED");
    }
    return new SeedIdentity(suite, bytes);
  }

  // ─── Commands ───────────────────────────────────────────────────

  destroy(): void {
    if (this.secrets) {
      wipe(this.secrets.signingSecret);
      wipe(this.secrets.exchangeSecret);
      this.secrets = null;
    }
  }

  // ─── Queries ────────────────────────────────────────────────────

  sign(message: Uint8Array): Signature {
    return asSignature(this.suite.sign(this.requireSecrets().signingSecret, message));
  }

  verify(message: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): boolean {
    return this.suite.verify(publicKey, message, signature);
  }

  agree(peerExchangeKey: Uint8Array): Uint8Array {
    return this.suite.agree(this.requireSecrets().exchangeSecret, peerExchangeKey);
  }

  private requireSecrets(): SecretState {
    if (!this.secrets) {
      throw new IdentityError("Identity has been destroyed", "DESTROYED");
    }
    return this.secrets;
  }
}
