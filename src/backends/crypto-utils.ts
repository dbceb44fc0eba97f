/**
 * @module backends/crypto-utils
 * @description Byte helpers and brand constructors shared by the codecs,
 * the cipher suite and the engine.
 *
 * Every function is pure. Brand constructors validate lengths before
 * branding so a mis-sized buffer never reaches the wire.
 */

import {
  bytesToHex,
  concatBytes as nobleConcat,
  hexToBytes,
  utf8ToBytes,
} from "@noble/hashes/utils";
import type {
  ExchangeKey,
  PublicKey,
  PublisherId,
  Signature,
  SessionKey,
  Psk,
  PskId,
} from "../types/branded.js";

export const PUBLIC_KEY_LENGTH = 32;
export const SIGNATURE_LENGTH = 64;
export const KEY_LENGTH = 32;
export const PSK_ID_LENGTH = 16;

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

// ─── Bytes ─────────────────────────────────────────────────────────

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  return nobleConcat(...parts);
}

/** Constant-time over equal lengths. */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= (a[i] ?? 0) ^ (b[i] ?? 0);
  }
  return diff === 0;
}

export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}

/**
 * Decode hex of an exact byte length.
 * @returns null for odd length, wrong length or non-hex characters.
 */
export function fromHex(hex: string, length: number): Uint8Array | null {
  if (hex.length !== length * 2 || !HEX_PATTERN.test(hex)) {
    return null;
  }
  return hexToBytes(hex.toLowerCase());
}

export function utf8(text: string): Uint8Array {
  return utf8ToBytes(text);
}

export function u32be(value: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, value >>> 0, false);
  return out;
}

/** Overwrite a secret in place. */
export function wipe(bytes: Uint8Array): void {
  bytes.fill(0);
}

// ─── Brands ────────────────────────────────────────────────────────

function requireLength(bytes: Uint8Array, length: number, what: string): void {
  if (bytes.length !== length) {
    throw new RangeError(`${what} must be ${length} bytes, got ${bytes.length}`);
  }
}

export function asPublicKey(bytes: Uint8Array): PublicKey {
  requireLength(bytes, PUBLIC_KEY_LENGTH, "Public key");
  return bytes as PublicKey;
}

export function asExchangeKey(bytes: Uint8Array): ExchangeKey {
  requireLength(bytes, PUBLIC_KEY_LENGTH, "Exchange key");
  return bytes as ExchangeKey;
}

export function asSignature(bytes: Uint8Array): Signature {
  requireLength(bytes, SIGNATURE_LENGTH, "Signature");
  return bytes as Signature;
}

export function asSessionKey(bytes: Uint8Array): SessionKey {
  requireLength(bytes, KEY_LENGTH, "Session key");
  return bytes as SessionKey;
}

export function asPsk(bytes: Uint8Array): Psk {
  requireLength(bytes, KEY_LENGTH, "Pre-shared key");
  return bytes as Psk;
}

export function publisherIdOf(publicKey: PublicKey): PublisherId {
  return toHex(publicKey) as PublisherId;
}

/** @returns null unless `hex` encodes exactly one public key. */
export function publicKeyFromId(id: string): PublicKey | null {
  const bytes = fromHex(id, PUBLIC_KEY_LENGTH);
  return bytes ? asPublicKey(bytes) : null;
}

export function pskIdOf(bytes: Uint8Array): PskId {
  requireLength(bytes, PSK_ID_LENGTH, "PSK id");
  return toHex(bytes) as PskId;
}
