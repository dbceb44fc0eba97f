/**
 * @module types/branded
 * @description Branded types for compile-time safety across the channel protocol.
 *
 * Raw strings and byte arrays travel through every layer of the engine:
 * instance ids, message ids, publisher keys, session keys. Branding keeps a
 * message id from being handed where an instance id is expected, and keeps
 * a session key from leaking into a payload slot.
 *
 * @example
 * ```ts
 * const raw = "00ff";
 * // Type error: string is not assignable to MessageId
 * const id: MessageId = raw;
 * ```
 */

/** Unique symbol for branding. Not exported. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * The brand exists only at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ─── Address Brands ─────────────────────────────────────────────────

/** Lower-case hex of the 32-byte channel instance id. */
export type InstanceId = Brand<string, "InstanceId">;

/** Lower-case hex of a 12-byte message id. */
export type MessageId = Brand<string, "MessageId">;

// ─── Identity Brands ────────────────────────────────────────────────

/** A 32-byte Ed25519 public key. Doubles as the publisher id on the wire. */
export type PublicKey = Brand<Uint8Array, "PublicKey">;

/** Lower-case hex of a {@link PublicKey}, used as a map key and in results. */
export type PublisherId = Brand<string, "PublisherId">;

/** A 32-byte X25519 public key used to receive key wraps. */
export type ExchangeKey = Brand<Uint8Array, "ExchangeKey">;

/** A 64-byte Ed25519 signature. */
export type Signature = Brand<Uint8Array, "Signature">;

// ─── Cryptographic Brands ───────────────────────────────────────────

/** A 32-byte symmetric key shared by the members of one branch. */
export type SessionKey = Brand<Uint8Array, "SessionKey">;

/** A 32-byte pre-shared secret distributed out of band. */
export type Psk = Brand<Uint8Array, "Psk">;

/** Lower-case hex of the 16-byte identifier of a {@link Psk}. */
export type PskId = Brand<string, "PskId">;
