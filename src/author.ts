/**
 * @module author
 * @description Author — creator and owner of a channel.
 *
 * The Author announces the channel, registers subscribers from their
 * subscribe messages and is the only publisher whose keyloads readers
 * accept. It holds every session key it ever issued, and wraps each one
 * for itself too, so an Author restarted from its seed can `recover` the
 * channel from its announcement.
 *
 * @example
 * ```ts
 * const author = new Author({ seed: "author seed", transport });
 * const announcement = await author.sendAnnounce();
 * // share linkToString(announcement) out of band, then:
 * await author.receiveSubscribe(subscribeLink);
 * const keyload = await author.sendKeyloadForEveryone(announcement);
 * await author.sendSignedPacket(keyload, utf8("public"), utf8("masked"));
 * ```
 */

import { ChannelUser, encodeBranchingMode } from "./user.js";
import { SubscriberRegistry } from "./primitives/subscriber-registry.js";
import type { KeyloadPsk, KeyloadRecipient } from "./primitives/keyload-manager.js";
import { ChannelError, type IAuthor } from "./interfaces/channel.js";
import {
  ENTRY_SEQ,
  deriveChannelInstance,
  deriveNextAddress,
  linkToString,
} from "./codec/address.js";
import { bytesEqual, publicKeyFromId, publisherIdOf } from "./backends/crypto-utils.js";
import type { ChannelUserConfig } from "./config.js";
import type { ExchangeKey, PskId, PublicKey, PublisherId } from "./types/branded.js";
import type { Link } from "./types/link.js";
import type { UnwrappedMessage } from "./types/message.js";
import type { KeyloadRecipients, SubscriberRecord } from "./types/channel.js";

export class Author extends ChannelUser implements IAuthor {
  private readonly registry = new SubscriberRegistry();
  protected override readonly tracksEntries = true;

  constructor(config: ChannelUserConfig) {
    super(config, "author");
  }

  // ─── Channel ────────────────────────────────────────────────────

  /**
   * Publish the announcement at the Author's entry address. The channel is
   * adopted only once the transport accepted it.
   *
   * @throws {ChannelError} code=CHANNEL_ALREADY_ANNOUNCED on a second call.
   */
  async sendAnnounce(): Promise<Link> {
    return this.exclusive("announce the channel", async () => {
      if (this.channel) {
        throw new ChannelError(
          `Channel already announced at ${linkToString(this.channel.announcement)}`,
          "CHANNEL_ALREADY_ANNOUNCED"
        );
      }
      const mode = this.config.branching;
      const instanceId = deriveChannelInstance(this.suite, this.identity.publicKey, this.config.channelNonce);
      const link = deriveNextAddress(this.suite, instanceId, this.identity.publicKey, ENTRY_SEQ);
      const envelope = this.sealEntry(
        "ANNOUNCE",
        link,
        link.messageId,
        [],
        encodeBranchingMode(mode),
        this.keyloads.defaultBranchKey(instanceId)
      );
      await this.commitEnvelope(envelope, null);
      this.adoptChannel(envelope, mode);
      this.state = "ANNOUNCED";
      this.logger.info({ link: linkToString(link), mode }, "channel announced");
      this.emit({ type: "CHANNEL_ANNOUNCED", link, mode });
      return link;
    });
  }

  /**
   * Re-attach to a channel this Author announced, then sync it. Branch keys
   * come back through the Author's own wrap in every keyload, subscribers
   * through the subscribe messages of keyload recipients.
   *
   * @throws {ChannelError} code=CHANNEL_ALREADY_ANNOUNCED when a channel is attached already.
   * @throws {ChannelError} code=UNAUTHORIZED_PUBLISHER for another author's announcement.
   */
  async recover(announcement: Link): Promise<UnwrappedMessage[]> {
    return this.exclusive("recover the channel", async () => {
      if (this.channel) {
        throw new ChannelError(
          `Channel already attached at ${linkToString(this.channel.announcement)}`,
          "CHANNEL_ALREADY_ANNOUNCED"
        );
      }
      const { envelope, mode } = await this.readAnnouncement(announcement);
      if (!bytesEqual(envelope.publisher, this.identity.publicKey)) {
        throw new ChannelError(`${linkToString(announcement)} was announced by another author`, "UNAUTHORIZED_PUBLISHER");
      }
      this.adoptChannel(envelope, mode);
      this.state = "ANNOUNCED";
      const recovered = await this.syncAll();
      this.logger.info(
        { link: linkToString(announcement), mode, messages: recovered.length, subscribers: this.registry.active().length },
        "channel recovered"
      );
      return recovered;
    });
  }

  // ─── Subscribers ────────────────────────────────────────────────

  async receiveSubscribe(link: Link): Promise<PublisherId> {
    return this.exclusive("receive a subscription", async () => {
      const envelope = await this.readRequired(link);
      if (envelope.msgType !== "SUBSCRIBE") {
        throw new ChannelError(`Expected SUBSCRIBE at ${linkToString(link)}, found ${envelope.msgType}`, "WRONG_MSG_TYPE");
      }
      return this.accept(envelope, link).publisher;
    });
  }

  /** Register a subscriber whose keys arrived out of band. */
  addSubscriber(publicKey: PublicKey, exchangeKey: ExchangeKey): PublisherId {
    const channel = this.requireChannel();
    const publisher = publisherIdOf(publicKey);
    this.registry.register(publisher, exchangeKey);
    this.registry.activate(publisher);
    channel.sequencing.addPublisher(publicKey);
    this.logger.info({ subscriber: publisher }, "subscriber added");
    this.emit({ type: "SUBSCRIBER_REGISTERED", subscriber: publisher });
    return publisher;
  }

  removeSubscriber(publisher: PublisherId): boolean {
    if (!this.registry.unregister(publisher)) return false;
    this.logger.info({ subscriber: publisher }, "subscriber removed");
    this.emit({ type: "SUBSCRIBER_REMOVED", subscriber: publisher });
    return true;
  }

  subscribers(): readonly SubscriberRecord[] {
    return this.registry.all();
  }

  protected override onSubscribe(message: UnwrappedMessage, exchangeKey: ExchangeKey): void {
    this.registry.register(message.publisher, exchangeKey, message.link);
    this.registry.activate(message.publisher);
    this.logger.info({ subscriber: message.publisher }, "subscriber registered");
    this.emit({ type: "SUBSCRIBER_REGISTERED", subscriber: message.publisher });
  }

  protected override onUnsubscribe(message: UnwrappedMessage): void {
    this.removeSubscriber(message.publisher);
  }

  // ─── Keyloads ───────────────────────────────────────────────────

  /**
   * Open a new branch readable by the given subscribers and PSK holders.
   *
   * @throws {ChannelError} code=EMPTY_KEYLOAD with no recipients; nothing is sent.
   * @throws {ChannelError} code=UNKNOWN_SUBSCRIBER for an inactive key or unstored PSK.
   */
  async sendKeyload(linkTo: Link, recipients: KeyloadRecipients): Promise<Link> {
    return this.exclusive("send a keyload", () =>
      this.publishKeyload(
        linkTo,
        this.resolveRecipients(recipients.publicKeys ?? []),
        this.resolvePsks(recipients.pskIds ?? [])
      )
    );
  }

  /** Keyload for every ACTIVE subscriber and every stored PSK. */
  async sendKeyloadForEveryone(linkTo: Link): Promise<Link> {
    return this.exclusive("send a keyload", () =>
      this.publishKeyload(
        linkTo,
        this.resolveRecipients(this.registry.active().map((record) => record.publisher)),
        this.resolvePsks(this.psks.ids())
      )
    );
  }

  private async publishKeyload(
    linkTo: Link,
    recipients: readonly KeyloadRecipient[],
    psks: readonly KeyloadPsk[]
  ): Promise<Link> {
    const channel = this.requireChannel();
    const parentRoot = this.branchRootOf(linkTo);
    if (recipients.length === 0 && psks.length === 0) {
      throw new ChannelError("Keyload needs at least one subscriber or PSK", "EMPTY_KEYLOAD");
    }
    const reservation = channel.sequencing.nextLinkForSend(this.identity.publicKey);
    const previous = channel.sequencing.resolveLinkTo({ instanceId: channel.instanceId, messageId: parentRoot });
    const self: KeyloadRecipient = { publicKey: this.identity.publicKey, exchangeKey: this.identity.exchangeKey };

    const { envelope, sessionKey } = this.keyloads.buildKeyload({
      header: this.keyloadHeader(reservation, previous),
      recipients: [self, ...recipients],
      psks,
      signer: this.signer,
    });
    const link = await this.commitEnvelope(envelope, reservation);

    this.branches.open({
      root: link,
      sessionKey,
      recipients: new Set(recipients.map((recipient) => publisherIdOf(recipient.publicKey))),
      pskIds: new Set(psks.map((psk) => psk.id)),
    });
    this.state = "ACTIVE";
    this.logger.info(
      { link: linkToString(link), recipients: recipients.length, psks: psks.length },
      "branch opened"
    );
    this.emit({ type: "BRANCH_OPENED", root: link });
    return link;
  }

  private resolveRecipients(publishers: readonly PublisherId[]): KeyloadRecipient[] {
    const recipients: KeyloadRecipient[] = [];
    for (const publisher of new Set(publishers)) {
      const record = this.registry.get(publisher);
      const publicKey = publicKeyFromId(publisher);
      if (!record || record.state !== "ACTIVE" || !publicKey) {
        throw new ChannelError(`Subscriber ${publisher} is not registered`, "UNKNOWN_SUBSCRIBER");
      }
      recipients.push({ publicKey, exchangeKey: record.exchangeKey });
    }
    return recipients;
  }

  private resolvePsks(ids: readonly PskId[]): KeyloadPsk[] {
    const psks: KeyloadPsk[] = [];
    for (const id of new Set(ids)) {
      const key = this.psks.get(id);
      if (!key) {
        throw new ChannelError(`PSK ${id} is not stored`, "UNKNOWN_SUBSCRIBER");
      }
      psks.push({ id, key });
    }
    return psks;
  }
}
