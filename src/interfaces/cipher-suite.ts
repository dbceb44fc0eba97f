/**
 * @module interfaces/cipher-suite
 * @description CipherSuite — the cryptographic primitives the engine runs on.
 *
 * The engine never names an algorithm. It signs, seals, agrees and hashes
 * through this interface, and a suite is picked once per user and kept for
 * the channel's lifetime. Every participant of a channel must use the same
 * suite.
 *
 * The wire format fixes the sizes a suite works with: 32-byte public keys,
 * exchange keys and symmetric keys, 64-byte signatures, 12-byte AEAD nonces
 * and 16-byte tags (see `codec/envelope.ts`).
 */

/** Secret and public halves of one keypair. */
export interface KeyPair {
  readonly secretKey: Uint8Array;
  readonly publicKey: Uint8Array;
}

/** Both keypairs an identity holds. */
export interface DerivedKeys {
  readonly signing: KeyPair;
  readonly exchange: KeyPair;
}

export interface CipherSuite {
  /** Short label used in logs. */
  readonly name: string;

  // ─── Keys ───────────────────────────────────────────────────────

  /** Derive a signing and an exchange keypair from seed material. */
  deriveKeys(seed: Uint8Array): DerivedKeys;

  /** Raw key agreement between a local exchange secret and a peer's public key. */
  agree(secretKey: Uint8Array, peerPublicKey: Uint8Array): Uint8Array;

  /** Generate an ephemeral exchange keypair. */
  ephemeralKeyPair(): KeyPair;

  // ─── Signatures ─────────────────────────────────────────────────

  sign(secretKey: Uint8Array, message: Uint8Array): Uint8Array;

  /** Returns false for a bad signature or a malformed key; never throws. */
  verify(publicKey: Uint8Array, message: Uint8Array, signature: Uint8Array): boolean;

  // ─── AEAD ───────────────────────────────────────────────────────

  /** Ciphertext is the plaintext length plus a 16-byte tag. */
  seal(key: Uint8Array, nonce: Uint8Array, plaintext: Uint8Array, aad: Uint8Array): Uint8Array;

  /** @throws {Error} When the ciphertext or associated data fail authentication. */
  open(key: Uint8Array, nonce: Uint8Array, ciphertext: Uint8Array, aad: Uint8Array): Uint8Array;

  // ─── Hashing ────────────────────────────────────────────────────

  /** Key derivation: extract-then-expand `ikm` into `length` bytes. */
  expand(ikm: Uint8Array, salt: Uint8Array, info: Uint8Array, length: number): Uint8Array;

  /** Collision-resistant keyed hash, truncated to `length` bytes (at most 32). */
  keyedHash(key: Uint8Array, data: Uint8Array, length: number): Uint8Array;

  randomBytes(length: number): Uint8Array;
}
