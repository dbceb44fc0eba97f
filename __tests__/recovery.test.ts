import { describe, it, expect } from "vitest";

import { Author } from "../src/author.js";
import { ChannelError } from "../src/interfaces/channel.js";
import { InMemoryTransport } from "../src/transports/memory.js";
import { describeMessage, join, makeAuthor, makeSubscriber, silent, utf8 } from "./fixtures.js";

function codeOf(fn: () => void): string | null {
  try {
    fn();
  } catch (err) {
    if (err instanceof ChannelError) return err.code;
    throw err;
  }
  return null;
}

// ─── Author.recover() ──────────────────────────────────────────────

describe("Author.recover()", () => {
  it("rebuilds keys, subscribers and counters from the transport", async () => {
    const transport = new InMemoryTransport();
    const author = makeAuthor(transport);
    const announcement = await author.sendAnnounce();
    const alice = makeSubscriber(transport, "subscriber-a");
    const subscription = await join(author, alice, announcement);
    const keyload = await author.sendKeyloadForEveryone(announcement);
    const packet = await author.sendSignedPacket(keyload, utf8("p"), utf8("m"));
    await alice.syncState();
    const reply = await alice.sendSignedPacket(packet, utf8("r"), utf8("s"));

    const restored = makeAuthor(transport);
    const recovered = await restored.recover(announcement);

    expect(recovered.map(describeMessage)).toEqual([
      "KEYLOAD",
      "SUBSCRIBE",
      "SIGNED_PACKET:p:m",
      "SIGNED_PACKET:r:s",
    ]);
    expect(restored.subscribers()).toEqual([
      { publisher: alice.getPublisherId(), exchangeKey: alice.getExchangeKey(), state: "ACTIVE", link: subscription },
    ]);
    expect(restored.getState()).toBe("ACTIVE");
    expect(restored.channelAddress()).toEqual(announcement);
    expect(restored.sequencingSnapshot()?.channelSeq).toBe(4);

    await restored.sendSignedPacket(reply, utf8("after"), utf8("restart"));
    expect((await alice.fetchNextMsgs()).map(describeMessage)).toEqual(["SIGNED_PACKET:after:restart"]);
  });

  it("replays unsubscribes after the subscriptions they undo", async () => {
    const transport = new InMemoryTransport();
    const author = makeAuthor(transport);
    const announcement = await author.sendAnnounce();
    const alice = makeSubscriber(transport, "subscriber-a");
    const bob = makeSubscriber(transport, "subscriber-b");
    await join(author, alice, announcement);
    await join(author, bob, announcement);
    const keyload = await author.sendKeyloadForEveryone(announcement);
    await alice.syncState();
    await alice.sendUnsubscribe(keyload);

    const restored = makeAuthor(transport);
    await restored.recover(announcement);

    const states = new Map(restored.subscribers().map((record) => [record.publisher, record.state]));
    expect(states.get(alice.getPublisherId())).toBe("UNREGISTERED");
    expect(states.get(bob.getPublisherId())).toBe("ACTIVE");
  });

  it("reads every publisher's lane in a MULTI channel", async () => {
    const transport = new InMemoryTransport();
    const author = makeAuthor(transport, "MULTI");
    const announcement = await author.sendAnnounce();
    const alice = makeSubscriber(transport, "subscriber-a");
    await join(author, alice, announcement);
    const keyload = await author.sendKeyloadForEveryone(announcement);
    await author.sendSignedPacket(keyload, utf8("p"), utf8("m"));
    await alice.syncState();
    await alice.sendSignedPacket(keyload, utf8("r"), utf8("s"));

    const restored = makeAuthor(transport, "MULTI");
    const recovered = (await restored.recover(announcement)).map(describeMessage);

    expect(recovered.slice(0, 2)).toEqual(["KEYLOAD", "SUBSCRIBE"]);
    expect(recovered.slice(2).sort()).toEqual(["SIGNED_PACKET:p:m", "SIGNED_PACKET:r:s"]);
    expect(restored.branchingMode()).toBe("MULTI");

    await restored.sendSignedPacket(keyload, utf8("after"), utf8("restart"));
    expect((await alice.fetchNextMsgs()).map(describeMessage)).toEqual(["SIGNED_PACKET:after:restart"]);
  });

  it("refuses another author's announcement", async () => {
    const transport = new InMemoryTransport();
    const announcement = await makeAuthor(transport).sendAnnounce();
    const other = new Author({ seed: "other-author", transport, logger: silent });

    await expect(other.recover(announcement)).rejects.toMatchObject({ code: "UNAUTHORIZED_PUBLISHER" });
    expect(other.channelAddress()).toBeNull();
    expect(other.getState()).toBe("CREATED");
  });

  it("refuses to replace an attached channel", async () => {
    const transport = new InMemoryTransport();
    const author = makeAuthor(transport);
    const announcement = await author.sendAnnounce();
    await expect(author.recover(announcement)).rejects.toMatchObject({ code: "CHANNEL_ALREADY_ANNOUNCED" });
  });

  it("needs an announcement at the link", async () => {
    const transport = new InMemoryTransport();
    const author = makeAuthor(transport);
    const announcement = await author.sendAnnounce();
    const subscriber = makeSubscriber(transport, "subscriber-a");
    const subscription = await join(author, subscriber, announcement);

    await expect(makeAuthor(transport).recover(subscription)).rejects.toMatchObject({ code: "WRONG_MSG_TYPE" });
  });
});

// ─── resetState() ──────────────────────────────────────────────────

describe("resetState()", () => {
  async function syncedSubscriber() {
    const transport = new InMemoryTransport();
    const author = makeAuthor(transport);
    const announcement = await author.sendAnnounce();
    const subscriber = makeSubscriber(transport, "subscriber-a");
    await join(author, subscriber, announcement);
    let last = await author.sendKeyloadForEveryone(announcement);
    for (let i = 0; i < 3; i++) {
      last = await author.sendSignedPacket(last, utf8(`p${i}`), utf8(`m${i}`));
    }
    const messages = await subscriber.syncState();
    return { announcement, subscriber, messages };
  }

  it("rewinds to the announcement and replays the same history", async () => {
    const { announcement, subscriber, messages } = await syncedSubscriber();
    expect(messages).toHaveLength(4);
    const snapshot = subscriber.sequencingSnapshot();

    subscriber.resetState();

    expect(subscriber.sequencingSnapshot()?.channelSeq).toBe(1);
    expect(subscriber.sequencingSnapshot()?.channelHead).toEqual(announcement);
    const replayed = await subscriber.syncState();
    expect(replayed.map(describeMessage)).toEqual(messages.map(describeMessage));
    expect(subscriber.sequencingSnapshot()).toEqual(snapshot);
  });

  it("refuses to run during another operation", async () => {
    const { subscriber } = await syncedSubscriber();
    const pending = subscriber.syncState();
    expect(codeOf(() => subscriber.resetState())).toBe("OPERATION_IN_PROGRESS");
    await pending;
  });

  it("needs a channel", () => {
    const subscriber = makeSubscriber(new InMemoryTransport(), "subscriber-a");
    expect(codeOf(() => subscriber.resetState())).toBe("NOT_ANNOUNCED");
  });
});
