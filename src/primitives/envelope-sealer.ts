/**
 * @module primitives/envelope-sealer
 * @description Sealing, signing, verifying and opening envelopes.
 *
 * Send order: seal the masked payload under the branch key with the header
 * as associated data, then sign the resulting bytes. Receive order is the
 * reverse: verify first, open second.
 */

import type { CipherSuite } from "../interfaces/cipher-suite.js";
import type { Signature, SessionKey } from "../types/branded.js";
import type { Envelope, KeyWrapBlock } from "../types/message.js";
import {
  type EnvelopeHeader,
  NONCE_LENGTH,
  headerBytes,
  isSignedType,
  signingBytes,
} from "../codec/envelope.js";

export type Signer = (message: Uint8Array) => Signature;

export interface SealOptions {
  readonly suite: CipherSuite;
  readonly header: EnvelopeHeader;
  readonly sessionKey: SessionKey;
  readonly masked: Uint8Array;
  /** Required for every type except TAGGED_PACKET. */
  readonly signer?: Signer;
  readonly keyWraps?: readonly KeyWrapBlock[];
}

export function sealEnvelope(options: SealOptions): Envelope {
  const { suite, header, sessionKey, masked, signer, keyWraps } = options;
  const nonce = suite.randomBytes(NONCE_LENGTH);
  const unsigned: Envelope = {
    ...header,
    nonce,
    maskedPayload: suite.seal(sessionKey, nonce, masked, headerBytes(header)),
    ...(keyWraps ? { keyWraps } : {}),
  };
  if (!isSignedType(header.msgType)) {
    return unsigned;
  }
  if (!signer) {
    throw new Error(`${header.msgType} envelopes need a signer`);
  }
  return { ...unsigned, signature: signer(signingBytes(unsigned)) };
}

/**
 * Checks the publisher's signature. Unsigned types pass trivially.
 */
export function verifyEnvelope(suite: CipherSuite, envelope: Envelope): boolean {
  if (!isSignedType(envelope.msgType)) return true;
  if (!envelope.signature) return false;
  return suite.verify(envelope.publisher, signingBytes(envelope), envelope.signature);
}

/**
 * Opens the masked payload.
 * @returns null when the key does not fit, the expected outcome for branches
 * this user is not part of.
 */
export function openEnvelope(
  suite: CipherSuite,
  envelope: Envelope,
  sessionKey: Uint8Array
): Uint8Array | null {
  return tryOpen(suite, sessionKey, envelope.nonce, envelope.maskedPayload, headerBytes(envelope));
}

export function tryOpen(
  suite: CipherSuite,
  key: Uint8Array,
  nonce: Uint8Array,
  ciphertext: Uint8Array,
  aad: Uint8Array
): Uint8Array | null {
  try {
    return suite.open(key, nonce, ciphertext, aad);
  } catch {
    return null;
  }
}
