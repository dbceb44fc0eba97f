/**
 * @module backends/noble-suite
 * @description Default CipherSuite on the noble libraries.
 *
 * - Ed25519 signatures
 * - X25519 key agreement
 * - ChaCha20-Poly1305 AEAD
 * - HKDF-SHA256 key derivation
 * - HMAC-SHA256 keyed hash
 *
 * Everything is synchronous and deterministic given the seed, which is
 * what lets one seed always resolve to the same publisher.
 */

import { ed25519, x25519 } from "@noble/curves/ed25519";
import { chacha20poly1305 } from "@noble/ciphers/chacha";
import { hkdf } from "@noble/hashes/hkdf";
import { hmac } from "@noble/hashes/hmac";
import { sha256 } from "@noble/hashes/sha2";
import { randomBytes } from "@noble/hashes/utils";
import type { CipherSuite, DerivedKeys, KeyPair } from "../interfaces/cipher-suite.js";
import { KEY_LENGTH, utf8 } from "./crypto-utils.js";

const SIGNING_INFO = utf8("channels/v1/signing");
const EXCHANGE_INFO = utf8("channels/v1/exchange");
const SEED_SALT = utf8("channels/v1/seed");

export const nobleSuite: CipherSuite = {
  name: "ed25519-x25519-chacha20poly1305-sha256",

  deriveKeys(seed: Uint8Array): DerivedKeys {
    const signingSecret = hkdf(sha256, seed, SEED_SALT, SIGNING_INFO, KEY_LENGTH);
    const exchangeSecret = hkdf(sha256, seed, SEED_SALT, EXCHANGE_INFO, KEY_LENGTH);
    return {
      signing: {
        secretKey: signingSecret,
        publicKey: ed25519.getPublicKey(signingSecret),
      },
      exchange: {
        secretKey: exchangeSecret,
        publicKey: x25519.getPublicKey(exchangeSecret),
      },
    };
  },

  agree(secretKey: Uint8Array, peerPublicKey: Uint8Array): Uint8Array {
    return x25519.getSharedSecret(secretKey, peerPublicKey);
  },

  ephemeralKeyPair(): KeyPair {
    const secretKey = randomBytes(KEY_LENGTH);
    return { secretKey, publicKey: x25519.getPublicKey(secretKey) };
  },

  sign(secretKey: Uint8Array, message: Uint8Array): Uint8Array {
    return ed25519.sign(message, secretKey);
  },

  verify(publicKey: Uint8Array, message: Uint8Array, signature: Uint8Array): boolean {
    try {
      return ed25519.verify(signature, message, publicKey);
    } catch {
      // Malformed point or signature encoding.
      return false;
    }
  },

  seal(key: Uint8Array, nonce: Uint8Array, plaintext: Uint8Array, aad: Uint8Array): Uint8Array {
    return chacha20poly1305(key, nonce, aad).encrypt(plaintext);
  },

  open(key: Uint8Array, nonce: Uint8Array, ciphertext: Uint8Array, aad: Uint8Array): Uint8Array {
    return chacha20poly1305(key, nonce, aad).decrypt(ciphertext);
  },

  expand(ikm: Uint8Array, salt: Uint8Array, info: Uint8Array, length: number): Uint8Array {
    return hkdf(sha256, ikm, salt, info, length);
  },

  keyedHash(key: Uint8Array, data: Uint8Array, length: number): Uint8Array {
    if (length > 32) {
      throw new RangeError(`Keyed hash output is at most 32 bytes, asked for ${length}`);
    }
    return hmac(sha256, key, data).slice(0, length);
  },

  randomBytes(length: number): Uint8Array {
    return randomBytes(length);
  },
};
