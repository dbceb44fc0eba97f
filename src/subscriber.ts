/**
 * @module subscriber
 * @description Subscriber — a reader, and possibly a publisher, on someone
 * else's channel.
 *
 * A Subscriber attaches to a channel by reading its announcement, asks to
 * be let in with a subscribe message, and reads whatever branches its keys
 * or PSKs open. It may publish packets into any branch it holds a key for.
 */

import { ChannelUser, isKeyloadMessage, isSkippedMessage } from "./user.js";
import { ChannelError, type ISubscriber, type SkippedMessage } from "./interfaces/channel.js";
import {
  ENTRY_SEQ,
  deriveNextAddress,
  linkEquals,
  linkToString,
} from "./codec/address.js";
import type { ChannelUserConfig } from "./config.js";
import type { Link } from "./types/link.js";
import type { KeyloadBody, UnwrappedMessage } from "./types/message.js";

export class Subscriber extends ChannelUser implements ISubscriber {
  private subscription: Link | null = null;

  constructor(config: ChannelUserConfig) {
    super(config, "subscriber");
  }

  // ─── Channel ────────────────────────────────────────────────────

  /**
   * Verify the announcement at `link` and attach to its channel. Reading the
   * same announcement again is a no-op.
   *
   * @throws {ChannelError} code=CHANNEL_ALREADY_ANNOUNCED when attached to another channel.
   */
  async receiveAnnouncement(link: Link): Promise<void> {
    return this.exclusive("receive the announcement", async () => {
      if (this.channel) {
        if (linkEquals(this.channel.announcement, link)) return;
        throw new ChannelError(
          `Already attached to ${linkToString(this.channel.announcement)}`,
          "CHANNEL_ALREADY_ANNOUNCED"
        );
      }
      const { envelope, mode } = await this.readAnnouncement(link);
      this.adoptChannel(envelope, mode);
      this.state = "AWAITING_SUBSCRIPTION";
      this.logger.info({ link: linkToString(link), mode }, "attached to channel");
    });
  }

  /**
   * Publish the subscribe message carrying this user's exchange key. It
   * sits at the subscriber's entry address, so it is sent at most once per
   * channel; later calls return the same link.
   */
  async sendSubscribe(announcement: Link): Promise<Link> {
    return this.exclusive("subscribe", async () => {
      const channel = this.requireChannel();
      if (!linkEquals(announcement, channel.announcement)) {
        throw new ChannelError(`${linkToString(announcement)} is not this channel's announcement`, "UNKNOWN_LINK");
      }
      if (this.subscription) return this.subscription;

      const link = deriveNextAddress(this.suite, channel.instanceId, this.identity.publicKey, ENTRY_SEQ);
      const envelope = this.sealEntry(
        "SUBSCRIBE",
        link,
        announcement.messageId,
        [announcement],
        this.identity.exchangeKey,
        this.defaultBranch(channel).sessionKey
      );
      await this.commitEnvelope(envelope, null);
      this.subscription = link;
      if (this.state !== "ACTIVE") this.state = "SUBSCRIBED";
      return link;
    });
  }

  /** Ask the Author to drop this subscriber from future keyloads. */
  async sendUnsubscribe(linkTo: Link): Promise<Link> {
    return this.exclusive("unsubscribe", async () => {
      const channel = this.requireChannel();
      this.branchRootOf(linkTo);
      const previous = channel.sequencing.resolveLinkTo(channel.announcement);
      const link = await this.sendInDefaultBranch("UNSUBSCRIBE", [previous], new Uint8Array(0));
      this.state = "AWAITING_SUBSCRIPTION";
      return link;
    });
  }

  async receiveKeyload(link: Link): Promise<UnwrappedMessage<KeyloadBody> | SkippedMessage> {
    return this.exclusive("receive a keyload", async () => {
      const envelope = await this.readRequired(link);
      if (envelope.msgType !== "KEYLOAD") {
        throw new ChannelError(`Expected KEYLOAD at ${linkToString(link)}, found ${envelope.msgType}`, "WRONG_MSG_TYPE");
      }
      const message = this.accept(envelope, link);
      if (isKeyloadMessage(message)) return message;
      if (isSkippedMessage(message)) return message;
      throw new ChannelError(`Expected KEYLOAD, decoded ${message.body.type}`, "WRONG_MSG_TYPE");
    });
  }

  /** Forget the channel and every key learned on it. PSKs stay stored. */
  unregister(): void {
    this.channel = null;
    this.subscription = null;
    this.branches.clear();
    this.state = "CREATED";
    this.logger.info("left channel");
  }

  isRegistered(): boolean {
    return this.channel !== null;
  }

  /** Link of this user's subscribe message, once sent. */
  subscriptionLink(): Link | null {
    return this.subscription;
  }
}
