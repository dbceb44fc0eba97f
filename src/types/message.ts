/**
 * @module types/message
 * @description Envelope and decoded message types.
 *
 * The envelope is the wire form of every message. Once a message has been
 * verified and opened, the engine hands callers an {@link UnwrappedMessage}
 * whose body is a closed union over the message types.
 */

import type {
  ExchangeKey,
  InstanceId,
  MessageId,
  PublicKey,
  PublisherId,
  Signature,
  PskId,
} from "./branded.js";
import type { BranchingMode, Link } from "./link.js";

// ─── Wire ───────────────────────────────────────────────────────────

export type MsgType =
  | "ANNOUNCE"
  | "KEYLOAD"
  | "SIGNED_PACKET"
  | "TAGGED_PACKET"
  | "SUBSCRIBE"
  | "UNSUBSCRIBE"
  | "SEQUENCE";

/** A session key wrapped for one subscriber's exchange key. */
export interface PublicKeyWrap {
  readonly kind: "PUBLIC_KEY";
  readonly recipient: PublicKey;
  readonly ephemeral: ExchangeKey;
  readonly nonce: Uint8Array;
  readonly wrapped: Uint8Array;
}

/** A session key wrapped under a pre-shared key. */
export interface PskWrap {
  readonly kind: "PSK";
  readonly pskId: PskId;
  readonly nonce: Uint8Array;
  readonly wrapped: Uint8Array;
}

export type KeyWrapBlock = PublicKeyWrap | PskWrap;

/**
 * The decoded form of one message as it sits on the transport.
 * `maskedPayload` is always ciphertext here.
 */
export interface Envelope {
  readonly msgType: MsgType;
  readonly instanceId: InstanceId;
  readonly messageId: MessageId;
  readonly publisher: PublicKey;
  /** Counter the message id was derived from. */
  readonly seq: number;
  /** Message id of the keyload (or announcement) that opened the branch. */
  readonly branchId: MessageId;
  readonly previous: readonly MessageId[];
  readonly publicPayload: Uint8Array;
  readonly nonce: Uint8Array;
  readonly maskedPayload: Uint8Array;
  readonly signature?: Signature;
  readonly keyWraps?: readonly KeyWrapBlock[];
}

// ─── Decoded bodies ─────────────────────────────────────────────────

export interface AnnounceBody {
  readonly type: "ANNOUNCE";
  readonly mode: BranchingMode;
}

export interface SubscribeBody {
  readonly type: "SUBSCRIBE";
  readonly subscriber: PublisherId;
  readonly exchangeKey: ExchangeKey;
}

export interface UnsubscribeBody {
  readonly type: "UNSUBSCRIBE";
  readonly subscriber: PublisherId;
}

export interface KeyloadBody {
  readonly type: "KEYLOAD";
  readonly branch: Link;
  readonly recipients: readonly PublisherId[];
  readonly pskIds: readonly PskId[];
}

export interface PacketBody {
  readonly type: "SIGNED_PACKET" | "TAGGED_PACKET";
  readonly publicPayload: Uint8Array;
  readonly maskedPayload: Uint8Array;
}

export interface SequenceBody {
  readonly type: "SEQUENCE";
  readonly references: readonly Link[];
}

/** The message is valid but sits in a branch this user holds no key for. */
export interface SkippedBody {
  readonly type: "SKIPPED";
  readonly msgType: MsgType;
}

export type MessageBody =
  | AnnounceBody
  | SubscribeBody
  | UnsubscribeBody
  | KeyloadBody
  | PacketBody
  | SequenceBody
  | SkippedBody;

export interface UnwrappedMessage<B extends MessageBody = MessageBody> {
  readonly link: Link;
  readonly publisher: PublisherId;
  readonly seq: number;
  readonly branch: Link;
  readonly previous: readonly Link[];
  readonly body: B;
}
