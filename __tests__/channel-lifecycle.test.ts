import { describe, it, expect } from "vitest";

import { Author } from "../src/author.js";
import { ChannelError } from "../src/interfaces/channel.js";
import { TransportError } from "../src/interfaces/transport.js";
import { InMemoryTransport } from "../src/transports/memory.js";
import { deriveChainAddress, deriveNextAddress, linkEquals, parseLink, linkToString } from "../src/codec/address.js";
import { nobleSuite } from "../src/backends/noble-suite.js";
import { isPacketMessage } from "../src/user.js";
import {
  TamperingTransport,
  describeMessage,
  join,
  makeAuthor,
  makeSubscriber,
  recordEvents,
  silent,
  text,
  utf8,
} from "./fixtures.js";

// ─── Announce & Subscribe ──────────────────────────────────────────

describe("Author / Subscriber (SINGLE branch)", () => {
  describe("sendAnnounce()", () => {
    it("publishes the announcement at the author's entry address", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const events = recordEvents(author, "CHANNEL_ANNOUNCED");

      const announcement = await author.sendAnnounce();

      expect(author.getState()).toBe("ANNOUNCED");
      expect(author.channelAddress()).toEqual(announcement);
      expect(announcement).toEqual(deriveNextAddress(nobleSuite, announcement.instanceId, author.getPublicKey(), 0));
      expect(transport.size).toBe(1);
      expect(events).toEqual([{ type: "CHANNEL_ANNOUNCED", link: announcement, mode: "SINGLE" }]);
    });

    it("refuses a second announcement", async () => {
      const author = makeAuthor(new InMemoryTransport());
      await author.sendAnnounce();
      await expect(author.sendAnnounce()).rejects.toMatchObject({ code: "CHANNEL_ALREADY_ANNOUNCED" });
    });

    it("gives different nonces different channels", async () => {
      const transport = new InMemoryTransport();
      const first = await makeAuthor(transport).sendAnnounce();
      const second = await new Author({ seed: "author-seed", transport, channelNonce: 1, logger: silent }).sendAnnounce();
      expect(first.instanceId).not.toBe(second.instanceId);
    });

    it("reports a taken address as ADDRESS_CONFLICT", async () => {
      const transport = new InMemoryTransport();
      await makeAuthor(transport).sendAnnounce();
      // Same seed and nonce: same address, fresh nonce so different bytes.
      await expect(makeAuthor(transport).sendAnnounce()).rejects.toMatchObject({ code: "ADDRESS_CONFLICT" });
    });
  });

  describe("receiveAnnouncement()", () => {
    it("attaches the subscriber to the channel", async () => {
      const transport = new InMemoryTransport();
      const announcement = await makeAuthor(transport).sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");

      await subscriber.receiveAnnouncement(parseLink(linkToString(announcement)));

      expect(subscriber.isRegistered()).toBe(true);
      expect(subscriber.getState()).toBe("AWAITING_SUBSCRIPTION");
      expect(subscriber.branchingMode()).toBe("SINGLE");
      expect(subscriber.channelAddress()).toEqual(announcement);
    });

    it("accepts the same announcement twice", async () => {
      const transport = new InMemoryTransport();
      const announcement = await makeAuthor(transport).sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");
      await subscriber.receiveAnnouncement(announcement);
      await expect(subscriber.receiveAnnouncement(announcement)).resolves.toBeUndefined();
    });

    it("refuses to switch channels", async () => {
      const transport = new InMemoryTransport();
      const announcement = await makeAuthor(transport).sendAnnounce();
      const other = await new Author({ seed: "other-author", transport, logger: silent }).sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");
      await subscriber.receiveAnnouncement(announcement);
      await expect(subscriber.receiveAnnouncement(other)).rejects.toMatchObject({ code: "CHANNEL_ALREADY_ANNOUNCED" });
    });

    it("fails on an empty address or a message of another type", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();
      const subscription = await join(author, makeSubscriber(transport, "subscriber-a"), announcement);

      const stranger = makeSubscriber(transport, "subscriber-b");
      const empty = deriveNextAddress(nobleSuite, announcement.instanceId, author.getPublicKey(), 9);
      await expect(stranger.receiveAnnouncement(empty)).rejects.toMatchObject({ code: "UNKNOWN_LINK" });
      await expect(stranger.receiveAnnouncement(subscription)).rejects.toMatchObject({ code: "WRONG_MSG_TYPE" });
      expect(stranger.isRegistered()).toBe(false);
    });
  });

  describe("sendSubscribe() / receiveSubscribe()", () => {
    it("registers the subscriber as ACTIVE", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const events = recordEvents(author, "SUBSCRIBER_REGISTERED");
      const announcement = await author.sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");

      const subscription = await join(author, subscriber, announcement);

      expect(subscriber.getState()).toBe("SUBSCRIBED");
      expect(subscriber.subscriptionLink()).toEqual(subscription);
      expect(author.subscribers()).toEqual([
        {
          publisher: subscriber.getPublisherId(),
          exchangeKey: subscriber.getExchangeKey(),
          state: "ACTIVE",
          link: subscription,
        },
      ]);
      expect(events).toEqual([{ type: "SUBSCRIBER_REGISTERED", subscriber: subscriber.getPublisherId() }]);
    });

    it("subscribes only once per channel", async () => {
      const transport = new InMemoryTransport();
      const announcement = await makeAuthor(transport).sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");
      await subscriber.receiveAnnouncement(announcement);
      const first = await subscriber.sendSubscribe(announcement);
      const second = await subscriber.sendSubscribe(announcement);
      expect(second).toEqual(first);
      expect(transport.size).toBe(2);
    });

    it("needs the announcement first", async () => {
      const transport = new InMemoryTransport();
      const announcement = await makeAuthor(transport).sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");
      await expect(subscriber.sendSubscribe(announcement)).rejects.toMatchObject({ code: "NOT_ANNOUNCED" });
    });

    it("rejects a receive of the wrong message type", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();
      await expect(author.receiveSubscribe(announcement)).rejects.toMatchObject({ code: "WRONG_MSG_TYPE" });
    });
  });

  // ─── Keyload & Packets ───────────────────────────────────────────

  describe("publishing and reading", () => {
    it("delivers public and masked payloads to a subscriber", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");
      await join(author, subscriber, announcement);
      const opened = recordEvents(subscriber, "BRANCH_OPENED");

      const keyload = await author.sendKeyloadForEveryone(announcement);
      const packet = await author.sendSignedPacket(keyload, utf8("p"), utf8("m"));
      const messages = await subscriber.fetchNextMsgs();

      expect(messages.map(describeMessage)).toEqual(["KEYLOAD", "SIGNED_PACKET:p:m"]);
      expect(messages.map((message) => message.link)).toEqual([keyload, packet]);
      expect(messages[1]?.branch).toEqual(keyload);
      expect(messages[1]?.previous).toEqual([keyload]);
      expect(subscriber.getState()).toBe("ACTIVE");
      expect(author.getState()).toBe("ACTIVE");
      expect(opened).toEqual([{ type: "BRANCH_OPENED", root: keyload }]);
    });

    it("lets a subscriber publish back to the author", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");
      await join(author, subscriber, announcement);
      const keyload = await author.sendKeyloadForEveryone(announcement);
      const packet = await author.sendSignedPacket(keyload, utf8("p"), utf8("m"));
      await subscriber.fetchNextMsgs();

      const reply = await subscriber.sendTaggedPacket(packet, utf8("reply"), utf8("secret"));
      const received = await author.fetchNextMsgs();

      expect(received.map(describeMessage)).toEqual(["TAGGED_PACKET:reply:secret"]);
      expect(received[0]?.link).toEqual(reply);
      expect(received[0]?.publisher).toBe(subscriber.getPublisherId());
      expect(received[0]?.previous).toEqual([packet]);
    });

    it("reads a packet directly by link", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");
      await join(author, subscriber, announcement);
      const keyload = await author.sendKeyloadForEveryone(announcement);
      const packet = await author.sendSignedPacket(keyload, utf8("p"), utf8("m"));

      const received = await subscriber.receiveKeyload(keyload);
      expect(received.body.type).toBe("KEYLOAD");
      const message = await subscriber.receiveSignedPacket(packet);
      expect(isPacketMessage(message) && text(message.body.maskedPayload)).toBe("m");
      await expect(subscriber.receiveTaggedPacket(packet)).rejects.toMatchObject({ code: "WRONG_MSG_TYPE" });
    });

    it("refuses keyloads nobody can read", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();
      const before = author.sequencingSnapshot();
      await expect(author.sendKeyloadForEveryone(announcement)).rejects.toMatchObject({ code: "EMPTY_KEYLOAD" });
      await expect(author.sendKeyload(announcement, {})).rejects.toMatchObject({ code: "EMPTY_KEYLOAD" });
      expect(author.sequencingSnapshot()).toEqual(before);
      expect(transport.size).toBe(1);
    });

    it("refuses keyloads for unknown subscribers", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();
      const stranger = makeSubscriber(transport, "subscriber-z");
      await expect(
        author.sendKeyload(announcement, { publicKeys: [stranger.getPublisherId()] })
      ).rejects.toMatchObject({ code: "UNKNOWN_SUBSCRIBER" });
    });

    it("rejects packets linked to an unknown message", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");
      await subscriber.receiveAnnouncement(announcement);
      const elsewhere = deriveNextAddress(nobleSuite, announcement.instanceId, author.getPublicKey(), 5);
      await expect(subscriber.sendSignedPacket(elsewhere, utf8("p"), utf8("m"))).rejects.toMatchObject({
        code: "UNKNOWN_LINK",
      });
    });

    it("sends packets in the public default branch", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");
      await subscriber.receiveAnnouncement(announcement);

      await author.sendSignedPacket(announcement, utf8("open"), utf8("to all"));
      const messages = await subscriber.fetchNextMsgs();

      expect(messages.map(describeMessage)).toEqual(["SIGNED_PACKET:open:to all"]);
      expect(messages[0]?.branch).toEqual(announcement);
    });
  });

  // ─── Ordering & Idempotence ──────────────────────────────────────

  describe("syncState()", () => {
    it("returns every message in publication order", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");
      await join(author, subscriber, announcement);
      const keyload = await author.sendKeyloadForEveryone(announcement);
      let last = keyload;
      for (let i = 0; i < 5; i++) {
        last = await author.sendSignedPacket(last, utf8(`p${i}`), utf8(`m${i}`));
      }

      const messages = await subscriber.syncState();

      expect(messages.map((message) => message.seq)).toEqual([1, 2, 3, 4, 5, 6]);
      expect(messages.slice(1).map(describeMessage)).toEqual([
        "SIGNED_PACKET:p0:m0",
        "SIGNED_PACKET:p1:m1",
        "SIGNED_PACKET:p2:m2",
        "SIGNED_PACKET:p3:m3",
        "SIGNED_PACKET:p4:m4",
      ]);
      expect(linkEquals(subscriber.sequencingSnapshot()?.channelHead ?? announcement, last)).toBe(true);
    });

    it("gives the author a subscriber's signed packet", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");
      await join(author, subscriber, announcement);
      const keyload = await author.sendKeyloadForEveryone(announcement);
      await subscriber.syncState();

      const link = await subscriber.sendSignedPacket(keyload, utf8("p"), utf8("m"));
      const messages = await author.syncState();

      expect(messages).toHaveLength(1);
      expect(messages[0]?.link).toEqual(link);
      expect(messages[0]?.publisher).toBe(subscriber.getPublisherId());
      expect(messages.map(describeMessage)).toEqual(["SIGNED_PACKET:p:m"]);
    });

    it("returns nothing and changes nothing once caught up", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");
      await join(author, subscriber, announcement);
      const keyload = await author.sendKeyloadForEveryone(announcement);
      await author.sendSignedPacket(keyload, utf8("p"), utf8("m"));
      await subscriber.syncState();

      const snapshot = subscriber.sequencingSnapshot();
      expect(await subscriber.fetchNextMsgs()).toEqual([]);
      expect(await subscriber.syncState()).toEqual([]);
      expect(subscriber.sequencingSnapshot()).toEqual(snapshot);
    });
  });

  // ─── Tampering ───────────────────────────────────────────────────

  describe("tamper detection", () => {
    async function tamperedChannel() {
      const transport = new TamperingTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");
      await join(author, subscriber, announcement);
      const keyload = await author.sendKeyloadForEveryone(announcement);
      await subscriber.fetchNextMsgs();
      return { transport, author, subscriber, keyload };
    }

    it("rejects a flipped signature byte without moving the head", async () => {
      const { transport, author, subscriber, keyload } = await tamperedChannel();
      const packet = await author.sendSignedPacket(keyload, utf8("p"), utf8("m"));
      transport.corrupt(packet, 1);
      const failures = recordEvents(subscriber, "FETCH_FAILED");

      expect(await subscriber.fetchNextMsgs()).toEqual([]);
      expect(subscriber.sequencingSnapshot()?.channelSeq).toBe(2);
      expect(failures).toHaveLength(1);
      expect(failures[0]).toMatchObject({ type: "FETCH_FAILED", code: "SIGNATURE_INVALID", link: packet });
      await expect(subscriber.receiveSignedPacket(packet)).rejects.toMatchObject({ code: "SIGNATURE_INVALID" });
      expect(subscriber.sequencingSnapshot()?.channelSeq).toBe(2);
    });

    it("rejects a flipped ciphertext byte in a signed packet", async () => {
      const { transport, author, subscriber, keyload } = await tamperedChannel();
      const packet = await author.sendSignedPacket(keyload, utf8("p"), utf8("m"));
      transport.corrupt(packet, 65);
      await expect(subscriber.receiveSignedPacket(packet)).rejects.toMatchObject({ code: "SIGNATURE_INVALID" });
      expect(subscriber.sequencingSnapshot()?.channelSeq).toBe(2);
    });

    it("rejects a tagged packet whose ciphertext no longer opens", async () => {
      const { transport, author, subscriber, keyload } = await tamperedChannel();
      const packet = await author.sendTaggedPacket(keyload, utf8("p"), utf8("m"));
      transport.corrupt(packet, 1);
      await expect(subscriber.receiveTaggedPacket(packet)).rejects.toMatchObject({ code: "DECRYPTION_FAILED" });
      expect(subscriber.sequencingSnapshot()?.channelSeq).toBe(2);
    });
  });

  // ─── Operation Discipline ────────────────────────────────────────

  describe("concurrency and transport failures", () => {
    it("rejects a second operation while one is in flight", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();

      const first = author.sendSignedPacket(announcement, utf8("a"), utf8("a"));
      await expect(author.sendSignedPacket(announcement, utf8("b"), utf8("b"))).rejects.toMatchObject({
        code: "OPERATION_IN_PROGRESS",
      });
      await expect(first).resolves.toMatchObject({ instanceId: announcement.instanceId });
      await expect(author.sendSignedPacket(announcement, utf8("c"), utf8("c"))).resolves.toBeDefined();
    });

    it("leaves the counter alone when the transport is down", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();
      const before = author.sequencingSnapshot();

      transport.setAvailable(false);
      try {
        await author.sendSignedPacket(announcement, utf8("p"), utf8("m"));
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ChannelError);
        expect(err instanceof ChannelError && err.code).toBe("TRANSPORT_UNAVAILABLE");
        expect(err instanceof Error && err.cause).toBeInstanceOf(TransportError);
      }
      expect(author.sequencingSnapshot()).toEqual(before);

      transport.setAvailable(true);
      const link = await author.sendSignedPacket(announcement, utf8("p"), utf8("m"));
      expect(link).toEqual(deriveChainAddress(nobleSuite, announcement.instanceId, 1));
    });

    it("lets only one of two publishers racing for a counter win", async () => {
      const transport = new InMemoryTransport();
      const author = makeAuthor(transport);
      const announcement = await author.sendAnnounce();
      const alice = makeSubscriber(transport, "subscriber-a");
      const bob = makeSubscriber(transport, "subscriber-b");
      await join(author, alice, announcement);
      await join(author, bob, announcement);
      const keyload = await author.sendKeyloadForEveryone(announcement);
      await alice.syncState();
      await bob.syncState();
      const failures = recordEvents(bob, "FETCH_FAILED");
      const before = bob.sequencingSnapshot();

      const fromAlice = await alice.sendSignedPacket(keyload, utf8("a"), utf8("1"));
      expect(fromAlice).toEqual(deriveChainAddress(nobleSuite, announcement.instanceId, 2));
      await expect(bob.sendSignedPacket(keyload, utf8("b"), utf8("2"))).rejects.toMatchObject({
        code: "ADDRESS_CONFLICT",
      });
      expect(bob.sequencingSnapshot()).toEqual(before);

      expect((await bob.syncState()).map(describeMessage)).toEqual(["SIGNED_PACKET:a:1"]);
      const fromBob = await bob.sendSignedPacket(keyload, utf8("b"), utf8("2"));
      expect(fromBob).toEqual(deriveChainAddress(nobleSuite, announcement.instanceId, 3));

      const received = await author.syncState();
      expect(received.map(describeMessage)).toEqual(["SIGNED_PACKET:a:1", "SIGNED_PACKET:b:2"]);
      expect(received.map((message) => message.publisher)).toEqual([alice.getPublisherId(), bob.getPublisherId()]);
      expect(received[1]?.previous).toEqual([fromAlice]);
      expect(failures).toEqual([]);
    });

    it("propagates an unavailable transport out of a fetch", async () => {
      const transport = new InMemoryTransport();
      const announcement = await makeAuthor(transport).sendAnnounce();
      const subscriber = makeSubscriber(transport, "subscriber-a");
      await subscriber.receiveAnnouncement(announcement);
      transport.setAvailable(false);
      await expect(subscriber.fetchNextMsgs()).rejects.toMatchObject({ code: "TRANSPORT_UNAVAILABLE" });
    });
  });
});
