/**
 * @module interfaces/channel
 * @description IChannelUser — the operation set every binding sees.
 *
 * Authors and Subscribers share sending, receiving and fetching. The
 * Author additionally owns the channel: it announces it, registers
 * subscribers and is the only publisher allowed to hand out branch keys.
 *
 * An instance's state is single-owner. One send or fetch may be in flight
 * at a time; starting a second one fails with OPERATION_IN_PROGRESS.
 */

import type { Psk, PskId, PublicKey, PublisherId, ExchangeKey } from "../types/branded.js";
import type { Link } from "../types/link.js";
import type {
  KeyloadBody,
  PacketBody,
  UnwrappedMessage,
  SkippedBody,
} from "../types/message.js";
import type { KeyloadRecipients, SubscriberRecord, UserState } from "../types/channel.js";

export type ChannelErrorCode =
  | "MALFORMED_ADDRESS"
  | "TRUNCATED_ENVELOPE"
  | "UNKNOWN_MSG_TYPE"
  | "SIGNATURE_INVALID"
  | "DECRYPTION_FAILED"
  | "EMPTY_KEYLOAD"
  | "CHANNEL_ALREADY_ANNOUNCED"
  | "ADDRESS_CONFLICT"
  | "TRANSPORT_UNAVAILABLE"
  | "NOT_ANNOUNCED"
  | "WRONG_INSTANCE"
  | "WRONG_MSG_TYPE"
  | "UNKNOWN_LINK"
  | "UNKNOWN_BRANCH"
  | "UNKNOWN_SUBSCRIBER"
  | "UNAUTHORIZED_PUBLISHER"
  | "OPERATION_IN_PROGRESS";

/**
 * Errors that may be thrown by channel operations.
 *
 * Decode-time codes (MALFORMED_ADDRESS, TRUNCATED_ENVELOPE, UNKNOWN_MSG_TYPE)
 * are local and never worth retrying. TRANSPORT_UNAVAILABLE is the only code
 * where repeating the whole call can succeed.
 */
export class ChannelError extends Error {
  constructor(
    message: string,
    public readonly code: ChannelErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ChannelError";
  }
}

export type PacketMessage = UnwrappedMessage<PacketBody>;
export type SkippedMessage = UnwrappedMessage<SkippedBody>;

/**
 * @interface IChannelUser
 */
export interface IChannelUser {
  // ─── Commands ───────────────────────────────────────────────────

  /** @command Publishes an unsigned packet into the branch of `linkTo`. */
  sendTaggedPacket(linkTo: Link, publicPayload: Uint8Array, maskedPayload: Uint8Array): Promise<Link>;

  /** @command Publishes a signed packet into the branch of `linkTo`. */
  sendSignedPacket(linkTo: Link, publicPayload: Uint8Array, maskedPayload: Uint8Array): Promise<Link>;

  /** @command Publishes a checkpoint referencing the current publisher heads. */
  sendSequence(): Promise<Link>;

  /**
   * @command
   * @description Reads one message by link and folds it into local state.
   * @throws {ChannelError} code=WRONG_MSG_TYPE if the message is no tagged packet.
   */
  receiveTaggedPacket(link: Link): Promise<PacketMessage | SkippedMessage>;

  /**
   * @command
   * @throws {ChannelError} code=SIGNATURE_INVALID on a tampered packet.
   */
  receiveSignedPacket(link: Link): Promise<PacketMessage | SkippedMessage>;

  /** @command Generic receive, dispatching on the message type. */
  receiveMessage(link: Link): Promise<UnwrappedMessage>;

  /**
   * @command
   * @description One forward pass over every known publisher.
   * Per-message failures are emitted as FETCH_FAILED and stop only the
   * publisher they occurred on.
   */
  fetchNextMsgs(): Promise<UnwrappedMessage[]>;

  /** @command Repeats {@link fetchNextMsgs} until nothing new arrives. */
  syncState(): Promise<UnwrappedMessage[]>;

  /**
   * @command Rewinds every cursor to the announcement and forgets accepted
   * messages. Keys stay; the next {@link syncState} reads the channel again.
   */
  resetState(): void;

  storePsk(psk: Psk): PskId;
  removePsk(pskId: PskId): boolean;

  /** @command Zeroes key material. The instance is unusable afterwards. */
  destroy(): void;

  // ─── Queries ────────────────────────────────────────────────────

  /** @query The message `link` points back to, without touching local state. */
  fetchPrevMsg(link: Link): Promise<UnwrappedMessage | null>;

  /** @query Up to `count` predecessors of `link`, newest first. */
  fetchPrevMsgs(link: Link, count: number): Promise<UnwrappedMessage[]>;

  getPublicKey(): PublicKey;
  getPublisherId(): PublisherId;
  getState(): UserState;

  /** @query Link of the announcement, or null before the channel is known. */
  channelAddress(): Link | null;
}

/**
 * @interface IAuthor
 */
export interface IAuthor extends IChannelUser {
  /**
   * @command
   * @throws {ChannelError} code=CHANNEL_ALREADY_ANNOUNCED on a second call.
   */
  sendAnnounce(): Promise<Link>;

  /**
   * @command Re-attaches to a channel this Author announced earlier and
   * syncs everything published on it since.
   * @throws {ChannelError} code=UNAUTHORIZED_PUBLISHER for someone else's announcement.
   */
  recover(announcement: Link): Promise<UnwrappedMessage[]>;

  /** @command Verifies a subscribe message and registers its sender. */
  receiveSubscribe(link: Link): Promise<PublisherId>;

  addSubscriber(publicKey: PublicKey, exchangeKey: ExchangeKey): PublisherId;
  removeSubscriber(publisher: PublisherId): boolean;

  /**
   * @command
   * @throws {ChannelError} code=EMPTY_KEYLOAD with no recipients.
   * @throws {ChannelError} code=UNKNOWN_SUBSCRIBER for a key that is not registered.
   */
  sendKeyload(linkTo: Link, recipients: KeyloadRecipients): Promise<Link>;

  /** @command Keyload for every active subscriber and every stored PSK. */
  sendKeyloadForEveryone(linkTo: Link): Promise<Link>;

  /** @query */
  subscribers(): readonly SubscriberRecord[];
}

/**
 * @interface ISubscriber
 */
export interface ISubscriber extends IChannelUser {
  /** @command Reads the announcement and adopts the channel. */
  receiveAnnouncement(link: Link): Promise<void>;

  sendSubscribe(announcement: Link): Promise<Link>;
  sendUnsubscribe(linkTo: Link): Promise<Link>;

  /** @command Processes one keyload, unwrapping its session key if addressed to us. */
  receiveKeyload(link: Link): Promise<UnwrappedMessage<KeyloadBody> | SkippedMessage>;

  /** @command Forgets the channel locally. */
  unregister(): void;

  /** @query */
  isRegistered(): boolean;
}
