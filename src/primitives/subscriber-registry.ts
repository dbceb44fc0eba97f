/**
 * @module primitives/subscriber-registry
 * @description Author-side registry of subscribers.
 *
 * A subscriber enters PENDING when its subscribe message is read and
 * becomes ACTIVE once the message checks out. Only ACTIVE subscribers are
 * eligible for keyloads. UNREGISTERED records are kept so a later
 * subscribe from the same key starts over from PENDING.
 */

import type { ExchangeKey, PublisherId } from "../types/branded.js";
import type { Link } from "../types/link.js";
import type { SubscriberRecord, SubscriptionState } from "../types/channel.js";

export class SubscriberRegistry {
  private readonly records = new Map<PublisherId, SubscriberRecord>();

  // ─── Commands ───────────────────────────────────────────────────

  register(publisher: PublisherId, exchangeKey: ExchangeKey, link?: Link): SubscriberRecord {
    const record: SubscriberRecord = {
      publisher,
      exchangeKey,
      state: "PENDING",
      ...(link ? { link } : {}),
    };
    this.records.set(publisher, record);
    return record;
  }

  activate(publisher: PublisherId): SubscriberRecord | undefined {
    return this.transition(publisher, "ACTIVE");
  }

  /** @returns false when the subscriber was unknown or already unregistered. */
  unregister(publisher: PublisherId): boolean {
    const record = this.records.get(publisher);
    if (!record || record.state === "UNREGISTERED") return false;
    this.transition(publisher, "UNREGISTERED");
    return true;
  }

  private transition(publisher: PublisherId, state: SubscriptionState): SubscriberRecord | undefined {
    const record = this.records.get(publisher);
    if (!record) return undefined;
    const next = { ...record, state };
    this.records.set(publisher, next);
    return next;
  }

  // ─── Queries ────────────────────────────────────────────────────

  get(publisher: PublisherId): SubscriberRecord | undefined {
    return this.records.get(publisher);
  }

  isActive(publisher: PublisherId): boolean {
    return this.records.get(publisher)?.state === "ACTIVE";
  }

  active(): SubscriberRecord[] {
    return this.all().filter((record) => record.state === "ACTIVE");
  }

  all(): SubscriberRecord[] {
    return [...this.records.values()].sort((a, b) => a.publisher.localeCompare(b.publisher));
  }
}
