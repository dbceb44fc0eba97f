/**
 * @module primitives/keyload-manager
 * @description Builds and processes keyloads, the messages that hand a
 * branch's session key to its members.
 *
 * Each recipient public key gets its own wrap: an ephemeral exchange key
 * agreed with the recipient's exchange key, expanded into a one-off wrap
 * key bound to the recipient and the keyload's message id. PSK holders get
 * a wrap keyed from the PSK. The keyload's masked payload is empty, sealed
 * under the session key, so a recipient can confirm what it unwrapped.
 */

import type { CipherSuite } from "../interfaces/cipher-suite.js";
import { IdentityError, type IIdentityProvider } from "../interfaces/identity-provider.js";
import { ChannelError } from "../interfaces/channel.js";
import type {
  ExchangeKey,
  InstanceId,
  Psk,
  PskId,
  PublicKey,
  PublisherId,
  SessionKey,
} from "../types/branded.js";
import type { Envelope, KeyWrapBlock, PskWrap, PublicKeyWrap } from "../types/message.js";
import type { Branch } from "../types/channel.js";
import type { EnvelopeHeader } from "../codec/envelope.js";
import { NONCE_LENGTH } from "../codec/envelope.js";
import { instanceIdBytes, messageIdBytes } from "../codec/address.js";
import {
  KEY_LENGTH,
  PSK_ID_LENGTH,
  asExchangeKey,
  asSessionKey,
  bytesEqual,
  concatBytes,
  fromHex,
  publisherIdOf,
  utf8,
  wipe,
} from "../backends/crypto-utils.js";
import { openEnvelope, sealEnvelope, tryOpen, type Signer } from "./envelope-sealer.js";
import type { PskStore } from "./psk-store.js";

const PUBLIC_KEY_WRAP_INFO = utf8("channels/v1/wrap/public-key");
const PSK_WRAP_INFO = utf8("channels/v1/wrap/psk");
const DEFAULT_BRANCH_SALT = utf8("channels/v1/default-branch");

export interface KeyloadRecipient {
  readonly publicKey: PublicKey;
  readonly exchangeKey: ExchangeKey;
}

export interface KeyloadPsk {
  readonly id: PskId;
  readonly key: Psk;
}

export interface BuildKeyloadOptions {
  /** Header of the keyload; its message id is also the new branch id. */
  readonly header: EnvelopeHeader;
  readonly recipients: readonly KeyloadRecipient[];
  readonly psks: readonly KeyloadPsk[];
  readonly signer: Signer;
}

export interface BuiltKeyload {
  readonly envelope: Envelope;
  readonly sessionKey: SessionKey;
}

export type KeyloadOutcome = Branch | "SKIPPED";

function pskIdBytes(id: PskId): Uint8Array {
  const bytes = fromHex(id, PSK_ID_LENGTH);
  if (!bytes) {
    throw new RangeError(`Invalid PSK id ${id}`);
  }
  return bytes;
}

export class KeyloadManager {
  constructor(private readonly suite: CipherSuite) {}

  /**
   * Key of the unrestricted branch rooted at the announcement. Derived from
   * the instance id alone, so anyone holding the announcement can read it.
   */
  defaultBranchKey(instanceId: InstanceId): SessionKey {
    return asSessionKey(
      this.suite.expand(instanceIdBytes(instanceId), DEFAULT_BRANCH_SALT, DEFAULT_BRANCH_SALT, KEY_LENGTH)
    );
  }

  // ─── Build ──────────────────────────────────────────────────────

  /**
   * @throws {ChannelError} code=EMPTY_KEYLOAD with neither recipients nor PSKs.
   */
  buildKeyload(options: BuildKeyloadOptions): BuiltKeyload {
    const { header, recipients, psks, signer } = options;
    if (recipients.length === 0 && psks.length === 0) {
      throw new ChannelError("Keyload needs at least one recipient or PSK", "EMPTY_KEYLOAD");
    }

    const sessionKey = asSessionKey(this.suite.randomBytes(KEY_LENGTH));
    const messageId = messageIdBytes(header.messageId);
    const keyWraps: KeyWrapBlock[] = [
      ...recipients.map((recipient) => this.wrapForPublicKey(sessionKey, recipient, messageId)),
      ...psks.map((psk) => this.wrapForPsk(sessionKey, psk, messageId)),
    ];

    const envelope = sealEnvelope({
      suite: this.suite,
      header,
      sessionKey,
      masked: new Uint8Array(0),
      signer,
      keyWraps,
    });
    return { envelope, sessionKey };
  }

  private wrapForPublicKey(
    sessionKey: SessionKey,
    recipient: KeyloadRecipient,
    messageId: Uint8Array
  ): PublicKeyWrap {
    const ephemeral = this.suite.ephemeralKeyPair();
    const shared = this.suite.agree(ephemeral.secretKey, recipient.exchangeKey);
    const wrapKey = this.publicKeyWrapKey(shared, ephemeral.publicKey, recipient.publicKey, messageId);
    const nonce = this.suite.randomBytes(NONCE_LENGTH);
    const wrapped = this.suite.seal(wrapKey, nonce, sessionKey, recipient.publicKey);
    wipe(ephemeral.secretKey);
    wipe(shared);
    wipe(wrapKey);
    return {
      kind: "PUBLIC_KEY",
      recipient: recipient.publicKey,
      ephemeral: asExchangeKey(ephemeral.publicKey),
      nonce,
      wrapped,
    };
  }

  private wrapForPsk(sessionKey: SessionKey, psk: KeyloadPsk, messageId: Uint8Array): PskWrap {
    const nonce = this.suite.randomBytes(NONCE_LENGTH);
    const idBytes = pskIdBytes(psk.id);
    const wrapKey = this.pskWrapKey(psk.key, nonce, idBytes, messageId);
    const wrapped = this.suite.seal(wrapKey, nonce, sessionKey, idBytes);
    wipe(wrapKey);
    return { kind: "PSK", pskId: psk.id, nonce, wrapped };
  }

  private publicKeyWrapKey(
    shared: Uint8Array,
    ephemeral: Uint8Array,
    recipient: Uint8Array,
    messageId: Uint8Array
  ): Uint8Array {
    return this.suite.expand(shared, ephemeral, concatBytes(PUBLIC_KEY_WRAP_INFO, recipient, messageId), KEY_LENGTH);
  }

  private pskWrapKey(psk: Uint8Array, nonce: Uint8Array, pskId: Uint8Array, messageId: Uint8Array): Uint8Array {
    return this.suite.expand(psk, nonce, concatBytes(PSK_WRAP_INFO, pskId, messageId), KEY_LENGTH);
  }

  // ─── Process ────────────────────────────────────────────────────

  /**
   * Try every wrap addressed to `identity` or to a PSK in `psks`.
   * @returns The opened branch, or "SKIPPED" when nothing unwraps.
   */
  processKeyload(envelope: Envelope, identity: IIdentityProvider, psks: PskStore): KeyloadOutcome {
    const wraps = envelope.keyWraps ?? [];
    const messageId = messageIdBytes(envelope.messageId);

    for (const wrap of wraps) {
      const candidate = this.unwrap(wrap, identity, psks, messageId);
      if (candidate && openEnvelope(this.suite, envelope, candidate) !== null) {
        return {
          root: { instanceId: envelope.instanceId, messageId: envelope.messageId },
          sessionKey: asSessionKey(candidate),
          recipients: new Set(recipientsOf(wraps)),
          pskIds: new Set(pskIdsOf(wraps)),
        };
      }
    }
    return "SKIPPED";
  }

  private unwrap(
    wrap: KeyWrapBlock,
    identity: IIdentityProvider,
    psks: PskStore,
    messageId: Uint8Array
  ): Uint8Array | null {
    if (wrap.kind === "PUBLIC_KEY") {
      if (!bytesEqual(wrap.recipient, identity.publicKey)) return null;
      let shared: Uint8Array;
      try {
        shared = identity.agree(wrap.ephemeral);
      } catch (err) {
        // A low-order ephemeral key cannot be ours; anything else is real.
        if (err instanceof IdentityError) throw err;
        return null;
      }
      const wrapKey = this.publicKeyWrapKey(shared, wrap.ephemeral, wrap.recipient, messageId);
      wipe(shared);
      return tryOpen(this.suite, wrapKey, wrap.nonce, wrap.wrapped, wrap.recipient);
    }
    const psk = psks.get(wrap.pskId);
    if (!psk) return null;
    const idBytes = pskIdBytes(wrap.pskId);
    const wrapKey = this.pskWrapKey(psk, wrap.nonce, idBytes, messageId);
    return tryOpen(this.suite, wrapKey, wrap.nonce, wrap.wrapped, idBytes);
  }
}

export function recipientsOf(wraps: readonly KeyWrapBlock[]): PublisherId[] {
  const ids: PublisherId[] = [];
  for (const wrap of wraps) {
    if (wrap.kind === "PUBLIC_KEY") ids.push(publisherIdOf(wrap.recipient));
  }
  return ids;
}

export function pskIdsOf(wraps: readonly KeyWrapBlock[]): PskId[] {
  const ids: PskId[] = [];
  for (const wrap of wraps) {
    if (wrap.kind === "PSK") ids.push(wrap.pskId);
  }
  return ids;
}
