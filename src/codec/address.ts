/**
 * @module codec/address
 * @description Address Codec — derivation and text form of links.
 *
 * A link is `(instanceId, messageId)`. The instance id is a keyed hash of
 * the Author's public key and a nonce. Message ids are keyed hashes of the
 * instance id and a counter. Entry messages, and every message of a MULTI
 * channel, also mix in the publisher's public key, so publishers never
 * collide. Content of a SINGLE channel is one chain: the address depends on
 * the channel-wide counter alone, and two publishers racing for the same
 * counter race for the same address.
 *
 * Text form: `"<64 hex>:<24 hex>"`.
 */

import type { CipherSuite } from "../interfaces/cipher-suite.js";
import { ChannelError } from "../interfaces/channel.js";
import type { InstanceId, MessageId, PublicKey } from "../types/branded.js";
import type { Link } from "../types/link.js";
import { concatBytes, fromHex, toHex, u32be, utf8 } from "../backends/crypto-utils.js";

// ─── Constants ─────────────────────────────────────────────────────

export const INSTANCE_ID_LENGTH = 32;
export const MESSAGE_ID_LENGTH = 12;

/** Counter of the message that opens a publisher's presence on a channel. */
export const ENTRY_SEQ = 0;
/** First counter value used for content messages. */
export const FIRST_CONTENT_SEQ = 1;

const INSTANCE_LABEL = utf8("channel-instance");
const MESSAGE_LABEL = utf8("message-id");
const CHAIN_LABEL = utf8("chain-message-id");

// ─── Brands ────────────────────────────────────────────────────────

export function instanceIdFromBytes(bytes: Uint8Array): InstanceId {
  if (bytes.length !== INSTANCE_ID_LENGTH) {
    throw new ChannelError(`Instance id must be ${INSTANCE_ID_LENGTH} bytes`, "MALFORMED_ADDRESS");
  }
  return toHex(bytes) as InstanceId;
}

export function messageIdFromBytes(bytes: Uint8Array): MessageId {
  if (bytes.length !== MESSAGE_ID_LENGTH) {
    throw new ChannelError(`Message id must be ${MESSAGE_ID_LENGTH} bytes`, "MALFORMED_ADDRESS");
  }
  return toHex(bytes) as MessageId;
}

export function instanceIdBytes(id: InstanceId): Uint8Array {
  return requireHex(id, INSTANCE_ID_LENGTH, "instance id");
}

export function messageIdBytes(id: MessageId): Uint8Array {
  return requireHex(id, MESSAGE_ID_LENGTH, "message id");
}

function requireHex(hex: string, length: number, what: string): Uint8Array {
  const bytes = fromHex(hex, length);
  if (!bytes) {
    throw new ChannelError(`Invalid ${what}: ${JSON.stringify(hex)}`, "MALFORMED_ADDRESS");
  }
  return bytes;
}

// ─── Derivation ────────────────────────────────────────────────────

/**
 * Derive the instance id of a channel created by `author` with `nonce`.
 * Different nonces give the same Author independent channels.
 */
export function deriveChannelInstance(
  suite: CipherSuite,
  author: PublicKey,
  nonce: number
): InstanceId {
  const digest = suite.keyedHash(author, concatBytes(INSTANCE_LABEL, u32be(nonce)), INSTANCE_ID_LENGTH);
  return instanceIdFromBytes(digest);
}

/**
 * Derive the address `publisher` writes its message number `seq` to.
 * Deterministic, so readers compute the same address to poll.
 */
export function deriveNextAddress(
  suite: CipherSuite,
  instanceId: InstanceId,
  publisher: PublicKey,
  seq: number
): Link {
  const digest = suite.keyedHash(
    instanceIdBytes(instanceId),
    concatBytes(MESSAGE_LABEL, publisher, u32be(seq)),
    MESSAGE_ID_LENGTH
  );
  return { instanceId, messageId: messageIdFromBytes(digest) };
}

/** Address of content message `seq` on the single chain of a SINGLE channel. */
export function deriveChainAddress(suite: CipherSuite, instanceId: InstanceId, seq: number): Link {
  const digest = suite.keyedHash(instanceIdBytes(instanceId), concatBytes(CHAIN_LABEL, u32be(seq)), MESSAGE_ID_LENGTH);
  return { instanceId, messageId: messageIdFromBytes(digest) };
}

// ─── Text Form ─────────────────────────────────────────────────────

export function linkToString(link: Link): string {
  return `${link.instanceId}:${link.messageId}`;
}

/**
 * @throws {ChannelError} code=MALFORMED_ADDRESS on wrong arity, wrong
 * component length or non-hex characters.
 */
export function parseLink(text: string): Link {
  const parts = text.split(":");
  if (parts.length !== 2) {
    throw new ChannelError(
      `Expected "<instance>:<message>", got ${parts.length} component(s)`,
      "MALFORMED_ADDRESS"
    );
  }
  const [instance = "", message = ""] = parts;
  return {
    instanceId: instanceIdFromBytes(requireHex(instance, INSTANCE_ID_LENGTH, "instance id")),
    messageId: messageIdFromBytes(requireHex(message, MESSAGE_ID_LENGTH, "message id")),
  };
}

export function linkEquals(a: Link, b: Link): boolean {
  return a.instanceId === b.instanceId && a.messageId === b.messageId;
}
