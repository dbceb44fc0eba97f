import { pino } from "pino";

import { Author } from "../src/author.js";
import { Subscriber } from "../src/subscriber.js";
import { InMemoryTransport } from "../src/transports/memory.js";
import { linkToString } from "../src/codec/address.js";
import { utf8 } from "../src/backends/crypto-utils.js";
import type { ITransport } from "../src/interfaces/transport.js";
import type { IChannelEmitter } from "../src/interfaces/event-emitter.js";
import type { ChannelEvent, ChannelEventType } from "../src/types/events.js";
import type { BranchingMode, Link } from "../src/types/link.js";
import type { UnwrappedMessage } from "../src/types/message.js";

export const silent = pino({ level: "silent" });

export function makeAuthor(transport: ITransport, branching: BranchingMode = "SINGLE"): Author {
  return new Author({ seed: "author-seed", transport, branching, logger: silent });
}

export function makeSubscriber(transport: ITransport, seed: string): Subscriber {
  return new Subscriber({ seed, transport, logger: silent });
}

/** Announcement, subscribe and its registration by the Author. */
export async function join(author: Author, subscriber: Subscriber, announcement: Link): Promise<Link> {
  await subscriber.receiveAnnouncement(announcement);
  const subscription = await subscriber.sendSubscribe(announcement);
  await author.receiveSubscribe(subscription);
  return subscription;
}

export function text(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}

export { utf8 };

/** Readable summary of a fetched message. */
export function describeMessage(message: UnwrappedMessage): string {
  const { body } = message;
  switch (body.type) {
    case "SIGNED_PACKET":
    case "TAGGED_PACKET":
      return `${body.type}:${text(body.publicPayload)}:${text(body.maskedPayload)}`;
    case "SKIPPED":
      return `SKIPPED:${body.msgType}`;
    default:
      return body.type;
  }
}

export function recordEvents(source: IChannelEmitter, ...types: ChannelEventType[]): ChannelEvent[] {
  const events: ChannelEvent[] = [];
  for (const type of types) source.on(type, (event) => events.push(event));
  return events;
}

/**
 * Transport wrapper that corrupts one byte of selected messages on the way
 * out of the store, counted from the end of the encoding.
 */
export class TamperingTransport implements ITransport {
  readonly inner = new InMemoryTransport();
  private readonly edits = new Map<string, number>();

  corrupt(link: Link, offsetFromEnd: number): void {
    this.edits.set(linkToString(link), offsetFromEnd);
  }

  publish(link: Link, data: Uint8Array): Promise<void> {
    return this.inner.publish(link, data);
  }

  async fetch(link: Link): Promise<Uint8Array | null> {
    const bytes = await this.inner.fetch(link);
    const offset = this.edits.get(linkToString(link));
    if (bytes && offset !== undefined) {
      const index = bytes.length - offset;
      bytes[index] = (bytes[index] ?? 0) ^ 0x01;
    }
    return bytes;
  }
}
