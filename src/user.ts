/**
 * @module user
 * @description ChannelUser — the part of the protocol engine Authors and
 * Subscribers share.
 *
 * A user holds one identity, at most one channel, and the state it has
 * learned about that channel: known messages, branches and their keys,
 * cursors over every publisher. Everything it learns goes through one
 * pipeline:
 *
 * 1. address checks (instance, link, derived address)
 * 2. reference checks (no previous link this user has not accepted)
 * 3. signature check
 * 4. interpretation (unwrap keyloads, open payloads), pure
 * 5. apply, the only step that mutates state
 *
 * Backward fetches run steps 1, 3 and 4 only.
 *
 * Forward fetches poll lanes: the single chain of a SINGLE channel, or one
 * lane per known publisher of a MULTI channel. A user that tracks entry
 * messages also reads the subscribe message of every publisher it learns
 * of before reading further, which is how a recovering Author rebuilds its
 * subscriber list.
 */

import { ChannelEmitter } from "./primitives/base-emitter.js";
import { BranchStore } from "./primitives/branch-store.js";
import { KeyloadManager } from "./primitives/keyload-manager.js";
import { PskStore } from "./primitives/psk-store.js";
import { SequencingState, type LinkReservation, type SequencingSnapshot } from "./primitives/sequencing-state.js";
import { openEnvelope, sealEnvelope, verifyEnvelope, type Signer } from "./primitives/envelope-sealer.js";
import { SeedIdentity } from "./backends/seed-identity.js";
import {
  asExchangeKey,
  bytesEqual,
  publisherIdOf,
  PUBLIC_KEY_LENGTH,
} from "./backends/crypto-utils.js";
import { ENTRY_SEQ, deriveNextAddress, linkEquals, linkToString } from "./codec/address.js";
import { decodeEnvelope, encodeEnvelope, type EnvelopeHeader } from "./codec/envelope.js";
import { ChannelError, type IChannelUser, type PacketMessage, type SkippedMessage } from "./interfaces/channel.js";
import type { CipherSuite } from "./interfaces/cipher-suite.js";
import { TransportError, type ITransport } from "./interfaces/transport.js";
import { resolveConfig, type ChannelUserConfig, type ResolvedConfig } from "./config.js";
import type { Logger } from "./logging.js";
import type {
  ExchangeKey,
  InstanceId,
  MessageId,
  Psk,
  PskId,
  PublicKey,
  PublisherId,
  SessionKey,
} from "./types/branded.js";
import type { BranchingMode, Link } from "./types/link.js";
import type {
  Envelope,
  KeyloadBody,
  MessageBody,
  MsgType,
  UnwrappedMessage,
} from "./types/message.js";
import type { Branch, UserState } from "./types/channel.js";

// ─── Channel Context ───────────────────────────────────────────────

/** Everything a user knows once it is attached to a channel. */
export interface ChannelContext {
  readonly instanceId: InstanceId;
  readonly mode: BranchingMode;
  readonly author: PublicKey;
  readonly announcement: Link;
  readonly sequencing: SequencingState;
}

interface Interpretation {
  readonly message: UnwrappedMessage;
  /** Set when a keyload unwrapped for this user. */
  readonly opened?: Branch;
}

/** Bookkeeping of one forward pass. */
interface FetchPass {
  readonly collected: UnwrappedMessage[];
  readonly deferred: Map<PublisherId, { link: Link; error: ChannelError }>;
  readonly failed: Set<PublisherId>;
  readonly absentEntries: Set<PublisherId>;
}

type PullOutcome = "ACCEPTED" | "ABSENT" | "STOPPED";

/** A verified announcement and the mode it declares. */
export interface VerifiedAnnouncement {
  readonly envelope: Envelope;
  readonly mode: BranchingMode;
}

const MODE_CODES: Record<BranchingMode, number> = { SINGLE: 0, MULTI: 1 };

export function encodeBranchingMode(mode: BranchingMode): Uint8Array {
  return Uint8Array.of(MODE_CODES[mode]);
}

/**
 * @throws {ChannelError} code=UNKNOWN_MSG_TYPE for anything but one known mode byte.
 */
export function decodeBranchingMode(payload: Uint8Array): BranchingMode {
  if (payload.length === 1 && payload[0] === MODE_CODES.SINGLE) return "SINGLE";
  if (payload.length === 1 && payload[0] === MODE_CODES.MULTI) return "MULTI";
  throw new ChannelError("Announcement carries no valid branching mode", "UNKNOWN_MSG_TYPE");
}

// ─── Message Guards ────────────────────────────────────────────────

export function isPacketMessage(message: UnwrappedMessage): message is PacketMessage {
  return message.body.type === "SIGNED_PACKET" || message.body.type === "TAGGED_PACKET";
}

export function isSkippedMessage(message: UnwrappedMessage): message is SkippedMessage {
  return message.body.type === "SKIPPED";
}

export function isKeyloadMessage(message: UnwrappedMessage): message is UnwrappedMessage<KeyloadBody> {
  return message.body.type === "KEYLOAD";
}

function linkOf(envelope: Envelope): Link {
  return { instanceId: envelope.instanceId, messageId: envelope.messageId };
}

// ─── ChannelUser ───────────────────────────────────────────────────

export abstract class ChannelUser extends ChannelEmitter implements IChannelUser {
  protected readonly config: ResolvedConfig;
  protected readonly suite: CipherSuite;
  protected readonly transport: ITransport;
  protected readonly identity: SeedIdentity;
  protected readonly logger: Logger;
  protected readonly keyloads: KeyloadManager;
  protected readonly branches = new BranchStore();
  protected readonly psks: PskStore;

  protected channel: ChannelContext | null = null;
  protected state: UserState = "CREATED";

  protected readonly signer: Signer = (message) => this.identity.sign(message);
  /** Read the entry message of every publisher learned during a forward fetch. */
  protected readonly tracksEntries: boolean = false;
  private busy = false;

  protected constructor(config: ChannelUserConfig, role: "author" | "subscriber") {
    super();
    this.config = resolveConfig(config);
    this.suite = this.config.suite;
    this.transport = this.config.transport;
    this.identity = SeedIdentity.fromSeed(this.suite, this.config.seed);
    this.keyloads = new KeyloadManager(this.suite);
    this.psks = new PskStore(this.suite);
    this.logger = this.config.logger.child({
      role,
      publisher: this.identity.publisherId.slice(0, 16),
    });
  }

  // ─── Commands ───────────────────────────────────────────────────

  async sendTaggedPacket(linkTo: Link, publicPayload: Uint8Array, maskedPayload: Uint8Array): Promise<Link> {
    return this.exclusive("send a tagged packet", () =>
      this.sendPacket("TAGGED_PACKET", linkTo, publicPayload, maskedPayload)
    );
  }

  async sendSignedPacket(linkTo: Link, publicPayload: Uint8Array, maskedPayload: Uint8Array): Promise<Link> {
    return this.exclusive("send a signed packet", () =>
      this.sendPacket("SIGNED_PACKET", linkTo, publicPayload, maskedPayload)
    );
  }

  async sendSequence(): Promise<Link> {
    return this.exclusive("send a sequence message", async () => {
      const channel = this.requireChannel();
      const previous =
        channel.mode === "SINGLE"
          ? [channel.sequencing.resolveLinkTo(channel.announcement)]
          : channel.sequencing.heads();
      return this.sendInDefaultBranch("SEQUENCE", previous, new Uint8Array(0));
    });
  }

  async receiveTaggedPacket(link: Link): Promise<PacketMessage | SkippedMessage> {
    return this.exclusive("receive a tagged packet", () => this.receivePacket("TAGGED_PACKET", link));
  }

  async receiveSignedPacket(link: Link): Promise<PacketMessage | SkippedMessage> {
    return this.exclusive("receive a signed packet", () => this.receivePacket("SIGNED_PACKET", link));
  }

  async receiveMessage(link: Link): Promise<UnwrappedMessage> {
    return this.exclusive("receive a message", async () => this.accept(await this.readRequired(link), link));
  }

  async fetchNextMsgs(): Promise<UnwrappedMessage[]> {
    return this.exclusive("fetch messages", () => this.forwardPass());
  }

  async syncState(): Promise<UnwrappedMessage[]> {
    return this.exclusive("sync state", () => this.syncAll());
  }

  resetState(): void {
    this.ensureIdle("reset state");
    const channel = this.requireChannel();
    channel.sequencing.rewind();
    this.branches.forgetMessages();
    this.rememberAnnouncement(channel.announcement, channel.author);
    this.logger.info({ link: linkToString(channel.announcement) }, "state rewound to the announcement");
  }

  storePsk(psk: Psk): PskId {
    const id = this.psks.store(psk);
    this.logger.debug({ pskId: id }, "psk stored");
    return id;
  }

  removePsk(pskId: PskId): boolean {
    return this.psks.remove(pskId);
  }

  destroy(): void {
    this.identity.destroy();
    this.branches.clear();
    this.psks.clear();
    this.channel = null;
    this.state = "CREATED";
  }

  // ─── Queries ────────────────────────────────────────────────────

  async fetchPrevMsg(link: Link): Promise<UnwrappedMessage | null> {
    const [previous] = await this.fetchPrevMsgs(link, 1);
    return previous ?? null;
  }

  async fetchPrevMsgs(link: Link, count: number): Promise<UnwrappedMessage[]> {
    return this.exclusive("fetch previous messages", async () => {
      const found: UnwrappedMessage[] = [];
      let current = await this.readRequired(link);
      while (found.length < count) {
        const [previousId] = current.previous;
        if (previousId === undefined) break;
        const previousLink: Link = { instanceId: current.instanceId, messageId: previousId };
        const envelope = await this.readEnvelope(previousLink);
        if (!envelope) {
          this.logger.warn({ link: linkToString(previousLink) }, "previous message missing from transport");
          break;
        }
        found.push(this.inspect(envelope, previousLink));
        if (envelope.msgType === "ANNOUNCE") break;
        current = envelope;
      }
      return found;
    });
  }

  getPublicKey(): PublicKey {
    return this.identity.publicKey;
  }

  getPublisherId(): PublisherId {
    return this.identity.publisherId;
  }

  getExchangeKey(): ExchangeKey {
    return this.identity.exchangeKey;
  }

  getState(): UserState {
    return this.state;
  }

  channelAddress(): Link | null {
    return this.channel?.announcement ?? null;
  }

  branchingMode(): BranchingMode | null {
    return this.channel?.mode ?? null;
  }

  /** Cursor state, for diagnostics and tests. */
  sequencingSnapshot(): SequencingSnapshot | null {
    return this.channel?.sequencing.snapshot() ?? null;
  }

  // ─── Guarding ───────────────────────────────────────────────────

  /**
   * Runs `operation` as the only in-flight operation on this instance.
   * @throws {ChannelError} code=OPERATION_IN_PROGRESS when one is already running.
   */
  protected async exclusive<T>(what: string, operation: () => Promise<T>): Promise<T> {
    this.ensureIdle(what);
    this.busy = true;
    try {
      return await operation();
    } finally {
      this.busy = false;
    }
  }

  private ensureIdle(what: string): void {
    if (this.busy) {
      throw new ChannelError(`Cannot ${what} while another operation is in flight`, "OPERATION_IN_PROGRESS");
    }
  }

  protected requireChannel(): ChannelContext {
    if (!this.channel) {
      throw new ChannelError("No channel: announce or receive an announcement first", "NOT_ANNOUNCED");
    }
    return this.channel;
  }

  // ─── Channel Setup ──────────────────────────────────────────────

  /**
   * Read the announcement at `link` and check it belongs there.
   * @throws {ChannelError} code=WRONG_MSG_TYPE, ADDRESS_CONFLICT or SIGNATURE_INVALID.
   */
  protected async readAnnouncement(link: Link): Promise<VerifiedAnnouncement> {
    const envelope = await this.readRequired(link);
    if (envelope.msgType !== "ANNOUNCE") {
      throw new ChannelError(`Expected ANNOUNCE at ${linkToString(link)}, found ${envelope.msgType}`, "WRONG_MSG_TYPE");
    }
    const derived = deriveNextAddress(this.suite, envelope.instanceId, envelope.publisher, ENTRY_SEQ);
    if (
      envelope.seq !== ENTRY_SEQ ||
      envelope.branchId !== envelope.messageId ||
      !linkEquals(derived, link) ||
      envelope.messageId !== link.messageId
    ) {
      throw new ChannelError(`Announcement does not belong at ${linkToString(link)}`, "ADDRESS_CONFLICT");
    }
    this.checkSignature(envelope, link);
    return { envelope, mode: decodeBranchingMode(envelope.publicPayload) };
  }

  /** Attach to a channel whose announcement has been published or verified. */
  protected adoptChannel(announcement: Envelope, mode: BranchingMode): ChannelContext {
    const link = linkOf(announcement);
    const context: ChannelContext = {
      instanceId: announcement.instanceId,
      mode,
      author: announcement.publisher,
      announcement: link,
      sequencing: new SequencingState({
        suite: this.suite,
        instanceId: announcement.instanceId,
        mode,
        announcement: link,
        author: announcement.publisher,
        logger: this.logger,
      }),
    };
    this.branches.open({
      root: link,
      sessionKey: this.keyloads.defaultBranchKey(announcement.instanceId),
      recipients: new Set(),
      pskIds: new Set(),
    });
    this.rememberAnnouncement(link, announcement.publisher);
    this.channel = context;
    return context;
  }

  private rememberAnnouncement(link: Link, author: PublicKey): void {
    this.branches.record({
      link,
      publisher: publisherIdOf(author),
      seq: ENTRY_SEQ,
      msgType: "ANNOUNCE",
      branchId: link.messageId,
    });
  }

  // ─── Sending ────────────────────────────────────────────────────

  protected header(
    msgType: MsgType,
    link: Link,
    seq: number,
    branchId: MessageId,
    previous: readonly Link[],
    publicPayload: Uint8Array
  ): EnvelopeHeader {
    return {
      msgType,
      instanceId: link.instanceId,
      messageId: link.messageId,
      publisher: this.identity.publicKey,
      seq,
      branchId,
      previous: previous.map((prev) => prev.messageId),
      publicPayload,
    };
  }

  /**
   * Seal and sign a message for the unrestricted branch and publish it at
   * the sender's next address.
   */
  protected async sendInDefaultBranch(
    msgType: MsgType,
    previous: readonly Link[],
    publicPayload: Uint8Array
  ): Promise<Link> {
    const channel = this.requireChannel();
    const reservation = channel.sequencing.nextLinkForSend(this.identity.publicKey);
    const envelope = sealEnvelope({
      suite: this.suite,
      header: this.header(
        msgType,
        reservation.link,
        reservation.seq,
        channel.announcement.messageId,
        previous,
        publicPayload
      ),
      sessionKey: this.defaultBranch(channel).sessionKey,
      masked: new Uint8Array(0),
      signer: this.signer,
    });
    return this.commitEnvelope(envelope, reservation);
  }

  /** Entry messages (announce, subscribe) sit at a fixed counter outside sequencing. */
  protected sealEntry(
    msgType: "ANNOUNCE" | "SUBSCRIBE",
    link: Link,
    branchId: MessageId,
    previous: readonly Link[],
    publicPayload: Uint8Array,
    sessionKey: SessionKey
  ): Envelope {
    return sealEnvelope({
      suite: this.suite,
      header: this.header(msgType, link, ENTRY_SEQ, branchId, previous, publicPayload),
      sessionKey,
      masked: new Uint8Array(0),
      signer: this.signer,
    });
  }

  /** A keyload roots the branch it opens, so its branch id is its own message id. */
  protected keyloadHeader(reservation: LinkReservation, previous: Link): EnvelopeHeader {
    return this.header("KEYLOAD", reservation.link, reservation.seq, reservation.link.messageId, [previous], new Uint8Array(0));
  }

  private async sendPacket(
    msgType: "SIGNED_PACKET" | "TAGGED_PACKET",
    linkTo: Link,
    publicPayload: Uint8Array,
    maskedPayload: Uint8Array
  ): Promise<Link> {
    const channel = this.requireChannel();
    const rootId = this.branchRootOf(linkTo);
    const branch = this.branches.get(rootId);
    if (!branch) {
      throw new ChannelError(`No session key for branch ${rootId}`, "UNKNOWN_BRANCH");
    }
    const reservation = channel.sequencing.nextLinkForSend(this.identity.publicKey);
    const previous = channel.sequencing.resolveLinkTo(branch.root);
    const envelope = sealEnvelope({
      suite: this.suite,
      header: this.header(msgType, reservation.link, reservation.seq, rootId, [previous], publicPayload),
      sessionKey: branch.sessionKey,
      masked: maskedPayload,
      ...(msgType === "SIGNED_PACKET" ? { signer: this.signer } : {}),
    });
    return this.commitEnvelope(envelope, reservation);
  }

  /**
   * Publish, then commit the counter and remember the message. Nothing
   * changes locally if the transport rejects the message.
   */
  protected async commitEnvelope(envelope: Envelope, reservation: LinkReservation | null): Promise<Link> {
    const link = linkOf(envelope);
    await this.publishBytes(link, encodeEnvelope(envelope));
    reservation?.commit();
    this.branches.record({
      link,
      publisher: this.identity.publisherId,
      seq: envelope.seq,
      msgType: envelope.msgType,
      branchId: envelope.branchId,
    });
    this.logger.debug({ link: linkToString(link), msgType: envelope.msgType, seq: envelope.seq }, "message sent");
    this.emit({ type: "MESSAGE_SENT", link, msgType: envelope.msgType });
    return link;
  }

  // ─── Transport ──────────────────────────────────────────────────

  private async publishBytes(link: Link, bytes: Uint8Array): Promise<void> {
    try {
      await this.transport.publish(link, bytes);
    } catch (err) {
      throw this.transportFailure(err, link);
    }
  }

  protected async readEnvelope(link: Link): Promise<Envelope | null> {
    let bytes: Uint8Array | null;
    try {
      bytes = await this.transport.fetch(link);
    } catch (err) {
      throw this.transportFailure(err, link);
    }
    return bytes ? decodeEnvelope(bytes) : null;
  }

  /**
   * @throws {ChannelError} code=UNKNOWN_LINK when nothing is stored at `link`.
   */
  protected async readRequired(link: Link): Promise<Envelope> {
    const envelope = await this.readEnvelope(link);
    if (!envelope) {
      throw new ChannelError(`No message at ${linkToString(link)}`, "UNKNOWN_LINK");
    }
    return envelope;
  }

  private transportFailure(err: unknown, link: Link): unknown {
    if (!(err instanceof TransportError)) return err;
    if (err.code === "CONFLICT") {
      return new ChannelError(`Address ${linkToString(link)} is already taken`, "ADDRESS_CONFLICT", { cause: err });
    }
    return new ChannelError(`Transport unavailable at ${linkToString(link)}`, "TRANSPORT_UNAVAILABLE", { cause: err });
  }

  // ─── Receiving ──────────────────────────────────────────────────

  private async receivePacket(
    msgType: "SIGNED_PACKET" | "TAGGED_PACKET",
    link: Link
  ): Promise<PacketMessage | SkippedMessage> {
    const envelope = await this.readRequired(link);
    if (envelope.msgType !== msgType) {
      throw new ChannelError(`Expected ${msgType} at ${linkToString(link)}, found ${envelope.msgType}`, "WRONG_MSG_TYPE");
    }
    const message = this.accept(envelope, link);
    if (isPacketMessage(message)) return message;
    if (isSkippedMessage(message)) return message;
    throw new ChannelError(`Expected ${msgType}, decoded ${message.body.type}`, "WRONG_MSG_TYPE");
  }

  /** Full pipeline: validate, interpret, then apply. */
  protected accept(envelope: Envelope, link: Link): UnwrappedMessage {
    const channel = this.requireChannel();
    this.checkAddress(channel, envelope, link);
    this.checkReferences(envelope);
    this.checkSignature(envelope, link);
    const interpretation = this.interpret(channel, envelope, link);
    this.apply(channel, envelope, interpretation);
    return interpretation.message;
  }

  /** Read-only pipeline for backward fetches. */
  private inspect(envelope: Envelope, link: Link): UnwrappedMessage {
    const channel = this.requireChannel();
    this.checkAddress(channel, envelope, link);
    this.checkSignature(envelope, link);
    return this.interpret(channel, envelope, link).message;
  }

  private checkAddress(channel: ChannelContext, envelope: Envelope, link: Link): void {
    if (envelope.instanceId !== channel.instanceId || link.instanceId !== channel.instanceId) {
      throw new ChannelError(`Message ${linkToString(link)} belongs to another channel`, "WRONG_INSTANCE");
    }
    const derived = channel.sequencing.addressFor(envelope.publisher, envelope.seq);
    if (!linkEquals(linkOf(envelope), link) || !linkEquals(derived, link)) {
      throw new ChannelError(`Content at ${linkToString(link)} does not belong at that address`, "ADDRESS_CONFLICT");
    }
    const isEntry = envelope.msgType === "ANNOUNCE" || envelope.msgType === "SUBSCRIBE";
    if (isEntry !== (envelope.seq === ENTRY_SEQ)) {
      throw new ChannelError(`${envelope.msgType} cannot use counter ${envelope.seq}`, "ADDRESS_CONFLICT");
    }
    const opensBranch = envelope.msgType === "ANNOUNCE" || envelope.msgType === "KEYLOAD";
    if (opensBranch && envelope.branchId !== envelope.messageId) {
      throw new ChannelError(`${envelope.msgType} must root its own branch`, "ADDRESS_CONFLICT");
    }
  }

  private checkReferences(envelope: Envelope): void {
    for (const previous of envelope.previous) {
      if (!this.branches.isKnown(previous)) {
        throw new ChannelError(`Previous message ${previous} is not known yet`, "UNKNOWN_LINK");
      }
    }
    const opensBranch = envelope.msgType === "ANNOUNCE" || envelope.msgType === "KEYLOAD";
    if (!opensBranch && !this.branches.knows(envelope.branchId)) {
      throw new ChannelError(`Branch ${envelope.branchId} is not known yet`, "UNKNOWN_LINK");
    }
  }

  protected checkSignature(envelope: Envelope, link: Link): void {
    if (!verifyEnvelope(this.suite, envelope)) {
      throw new ChannelError(`Bad signature on ${linkToString(link)}`, "SIGNATURE_INVALID");
    }
  }

  private interpret(channel: ChannelContext, envelope: Envelope, link: Link): Interpretation {
    const wrap = (body: MessageBody): UnwrappedMessage => ({
      link,
      publisher: publisherIdOf(envelope.publisher),
      seq: envelope.seq,
      branch: { instanceId: envelope.instanceId, messageId: envelope.branchId },
      previous: envelope.previous.map((messageId) => ({ instanceId: envelope.instanceId, messageId })),
      body,
    });
    const skipped = (): Interpretation => ({ message: wrap({ type: "SKIPPED", msgType: envelope.msgType }) });

    switch (envelope.msgType) {
      case "ANNOUNCE":
        if (!linkEquals(link, channel.announcement)) {
          throw new ChannelError(`Only ${linkToString(channel.announcement)} announces this channel`, "UNAUTHORIZED_PUBLISHER");
        }
        return { message: wrap({ type: "ANNOUNCE", mode: decodeBranchingMode(envelope.publicPayload) }) };

      case "SUBSCRIBE":
        if (envelope.publicPayload.length !== PUBLIC_KEY_LENGTH) {
          throw new ChannelError("Subscribe message carries no exchange key", "TRUNCATED_ENVELOPE");
        }
        return {
          message: wrap({
            type: "SUBSCRIBE",
            subscriber: publisherIdOf(envelope.publisher),
            exchangeKey: asExchangeKey(envelope.publicPayload),
          }),
        };

      case "UNSUBSCRIBE":
        return { message: wrap({ type: "UNSUBSCRIBE", subscriber: publisherIdOf(envelope.publisher) }) };

      case "SEQUENCE":
        return {
          message: wrap({
            type: "SEQUENCE",
            references: envelope.previous.map((messageId) => ({ instanceId: envelope.instanceId, messageId })),
          }),
        };

      case "KEYLOAD": {
        if (!bytesEqual(envelope.publisher, channel.author)) {
          throw new ChannelError("Only the channel author may publish keyloads", "UNAUTHORIZED_PUBLISHER");
        }
        const outcome = this.keyloads.processKeyload(envelope, this.identity, this.psks);
        if (outcome === "SKIPPED") return skipped();
        // The author's own wrap is not a recipient.
        const authorId = publisherIdOf(channel.author);
        const recipients = [...outcome.recipients].filter((publisher) => publisher !== authorId);
        return {
          message: wrap({
            type: "KEYLOAD",
            branch: outcome.root,
            recipients,
            pskIds: [...outcome.pskIds],
          }),
          opened: { ...outcome, recipients: new Set(recipients) },
        };
      }

      case "SIGNED_PACKET":
      case "TAGGED_PACKET": {
        const branch = this.branches.get(envelope.branchId);
        if (!branch) return skipped();
        const masked = openEnvelope(this.suite, envelope, branch.sessionKey);
        if (masked === null) {
          throw new ChannelError(`Payload of ${linkToString(link)} does not open under its branch key`, "DECRYPTION_FAILED");
        }
        return {
          message: wrap({ type: envelope.msgType, publicPayload: envelope.publicPayload, maskedPayload: masked }),
        };
      }

      default: {
        const unreachable: never = envelope.msgType;
        throw new ChannelError(`Unhandled message type ${String(unreachable)}`, "UNKNOWN_MSG_TYPE");
      }
    }
  }

  private apply(channel: ChannelContext, envelope: Envelope, interpretation: Interpretation): void {
    const { message } = interpretation;
    this.branches.record({
      link: message.link,
      publisher: message.publisher,
      seq: envelope.seq,
      msgType: envelope.msgType,
      branchId: envelope.branchId,
    });
    if (envelope.seq === ENTRY_SEQ) {
      channel.sequencing.addPublisher(envelope.publisher);
    } else {
      channel.sequencing.advanceHead(envelope.publisher, message.link, envelope.seq);
    }

    if (envelope.msgType === "KEYLOAD") {
      for (const wrap of envelope.keyWraps ?? []) {
        if (wrap.kind === "PUBLIC_KEY") channel.sequencing.addPublisher(wrap.recipient);
      }
      if (interpretation.opened) {
        this.branches.open(interpretation.opened);
        this.state = "ACTIVE";
        this.emit({ type: "BRANCH_OPENED", root: interpretation.opened.root });
      } else {
        this.branches.lock(envelope.messageId);
      }
    }

    const { body } = message;
    if (body.type === "SUBSCRIBE") this.onSubscribe(message, body.exchangeKey);
    if (body.type === "UNSUBSCRIBE") this.onUnsubscribe(message);

    if (body.type === "SKIPPED") {
      this.logger.debug({ link: linkToString(message.link), msgType: body.msgType }, "message outside readable branches");
      this.emit({ type: "MESSAGE_SKIPPED", link: message.link, msgType: body.msgType });
    } else {
      this.logger.debug({ link: linkToString(message.link), msgType: body.type, seq: envelope.seq }, "message received");
      this.emit({ type: "MESSAGE_RECEIVED", message });
    }
  }

  /** Author hook: a subscribe message was accepted. */
  protected onSubscribe(_message: UnwrappedMessage, _exchangeKey: ExchangeKey): void {}

  /** Author hook: an unsubscribe message was accepted. */
  protected onUnsubscribe(_message: UnwrappedMessage): void {}

  // ─── Branch Resolution ──────────────────────────────────────────

  protected defaultBranch(channel: ChannelContext): Branch {
    const branch = this.branches.get(channel.announcement.messageId);
    if (!branch) {
      throw new ChannelError("Default branch is missing", "UNKNOWN_BRANCH");
    }
    return branch;
  }

  /**
   * The root of the branch `linkTo` belongs to: the link itself when it
   * roots a branch, otherwise the branch of the message it points at.
   */
  protected branchRootOf(linkTo: Link): MessageId {
    const channel = this.requireChannel();
    if (linkTo.instanceId !== channel.instanceId) {
      throw new ChannelError(`${linkToString(linkTo)} belongs to another channel`, "WRONG_INSTANCE");
    }
    if (this.branches.knows(linkTo.messageId)) return linkTo.messageId;
    const known = this.branches.message(linkTo.messageId);
    if (!known) {
      throw new ChannelError(`${linkToString(linkTo)} is not known`, "UNKNOWN_LINK");
    }
    return known.branchId;
  }

  // ─── Forward Fetch ──────────────────────────────────────────────

  /**
   * Poll every lane at its next address until nothing new turns up. A
   * message referring to something not yet seen is retried in the next
   * round; anything else that fails stops that lane for this pass.
   */
  protected async syncAll(): Promise<UnwrappedMessage[]> {
    const collected: UnwrappedMessage[] = [];
    for (;;) {
      const batch = await this.forwardPass();
      if (batch.length === 0) return collected;
      collected.push(...batch);
    }
  }

  private async forwardPass(): Promise<UnwrappedMessage[]> {
    const channel = this.requireChannel();
    const pass: FetchPass = {
      collected: [],
      deferred: new Map(),
      failed: new Set(),
      absentEntries: new Set(),
    };

    let progressed = true;
    while (progressed) {
      progressed = false;
      if (this.tracksEntries && (await this.pullEntries(channel, pass))) progressed = true;

      for (const publicKey of this.lanes(channel)) {
        const lane = publisherIdOf(publicKey);
        if (pass.failed.has(lane)) continue;
        for (;;) {
          const known = channel.sequencing.publishers().length;
          const outcome = await this.pull(lane, channel.sequencing.candidate(publicKey).link, pass);
          if (outcome !== "ACCEPTED") break;
          progressed = true;
          // New publishers: read their entries before going further.
          if (this.tracksEntries && channel.sequencing.publishers().length > known) break;
        }
      }
    }

    for (const [publisher, { link, error }] of pass.deferred) {
      this.reportFailure(publisher, link, error);
    }
    return pass.collected;
  }

  /** The chain of a SINGLE channel is one lane, reported under the author. */
  private lanes(channel: ChannelContext): PublicKey[] {
    return channel.mode === "SINGLE" ? [channel.author] : channel.sequencing.publishers();
  }

  /** @returns true when at least one entry message was accepted. */
  private async pullEntries(channel: ChannelContext, pass: FetchPass): Promise<boolean> {
    let accepted = false;
    for (const publicKey of channel.sequencing.publishers()) {
      const publisher = publisherIdOf(publicKey);
      if (publisher === this.identity.publisherId) continue;
      if (pass.absentEntries.has(publisher) || pass.failed.has(publisher)) continue;
      const link = channel.sequencing.addressFor(publicKey, ENTRY_SEQ);
      if (this.branches.isKnown(link.messageId)) continue;
      const outcome = await this.pull(publisher, link, pass);
      if (outcome === "ABSENT") pass.absentEntries.add(publisher);
      if (outcome === "ACCEPTED") accepted = true;
    }
    return accepted;
  }

  private async pull(lane: PublisherId, link: Link, pass: FetchPass): Promise<PullOutcome> {
    try {
      const envelope = await this.readEnvelope(link);
      if (!envelope) return "ABSENT";
      const message = this.accept(envelope, link);
      pass.deferred.delete(lane);
      if (!isSkippedMessage(message)) pass.collected.push(message);
      return "ACCEPTED";
    } catch (err) {
      if (!(err instanceof ChannelError) || err.code === "TRANSPORT_UNAVAILABLE") throw err;
      if (err.code === "UNKNOWN_LINK") {
        pass.deferred.set(lane, { link, error: err });
      } else {
        pass.failed.add(lane);
        this.reportFailure(lane, link, err);
      }
      return "STOPPED";
    }
  }

  private reportFailure(publisher: PublisherId, link: Link, error: ChannelError): void {
    this.logger.warn({ publisher, link: linkToString(link), code: error.code }, error.message);
    this.emit({ type: "FETCH_FAILED", publisher, link, code: error.code, reason: error.message });
  }
}
