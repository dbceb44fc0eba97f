/**
 * @module primitives/sequencing-state
 * @description Per-user cursors over every known publisher.
 *
 * SINGLE-branch channels share one linear chain: each message takes the
 * next channel-wide number, lives at `deriveChainAddress(instance, n)` and
 * points at the channel head. MULTI-branch channels give each publisher its
 * own counter, and message `n` of publisher `p` lives at
 * `deriveNextAddress(instance, p, n)`. Readers compute the same addresses
 * to poll.
 *
 * Heads only move forward. Counters move in exactly two places: a
 * committed send reservation and an accepted incoming message.
 */

import type { CipherSuite } from "../interfaces/cipher-suite.js";
import type { InstanceId, PublicKey, PublisherId } from "../types/branded.js";
import type { BranchingMode, Link } from "../types/link.js";
import type { Logger } from "../logging.js";
import { FIRST_CONTENT_SEQ, deriveChainAddress, deriveNextAddress, linkToString } from "../codec/address.js";
import { publisherIdOf } from "../backends/crypto-utils.js";

interface Cursor {
  readonly publicKey: PublicKey;
  head: Link | null;
  nextSeq: number;
}

/**
 * An address handed out for a send. Nothing moves until `commit`, which
 * the caller invokes once the transport accepted the message.
 */
export interface LinkReservation {
  readonly link: Link;
  readonly seq: number;
  commit(): void;
}

export interface PublisherSnapshot {
  readonly publisher: PublisherId;
  readonly head: Link | null;
  readonly nextSeq: number;
}

export interface SequencingSnapshot {
  readonly mode: BranchingMode;
  readonly channelHead: Link;
  readonly channelSeq: number;
  readonly publishers: readonly PublisherSnapshot[];
}

export interface SequencingStateOptions {
  readonly suite: CipherSuite;
  readonly instanceId: InstanceId;
  readonly mode: BranchingMode;
  readonly announcement: Link;
  readonly author: PublicKey;
  readonly logger: Logger;
}

export class SequencingState {
  readonly mode: BranchingMode;

  private readonly suite: CipherSuite;
  private readonly instanceId: InstanceId;
  private readonly logger: Logger;
  private readonly announcement: Link;
  private readonly author: PublisherId;
  private readonly cursors = new Map<PublisherId, Cursor>();
  private channelHead: Link;
  private channelSeq = FIRST_CONTENT_SEQ;

  constructor(options: SequencingStateOptions) {
    this.suite = options.suite;
    this.instanceId = options.instanceId;
    this.mode = options.mode;
    this.logger = options.logger;
    this.announcement = options.announcement;
    this.author = publisherIdOf(options.author);
    this.channelHead = options.announcement;
    this.cursors.set(publisherIdOf(options.author), {
      publicKey: options.author,
      head: options.announcement,
      nextSeq: FIRST_CONTENT_SEQ,
    });
  }

  // ─── Commands ───────────────────────────────────────────────────

  /**
   * Start tracking a publisher.
   * @returns false when it was already tracked.
   */
  addPublisher(publicKey: PublicKey, head: Link | null = null): boolean {
    const id = publisherIdOf(publicKey);
    if (this.cursors.has(id)) return false;
    this.cursors.set(id, { publicKey, head, nextSeq: FIRST_CONTENT_SEQ });
    return true;
  }

  /**
   * Reserve the next address `publisher` sends to.
   * Two reservations without a commit in between return the same link.
   */
  nextLinkForSend(publicKey: PublicKey): LinkReservation {
    const seq = this.nextSeq(publicKey);
    const link = this.addressFor(publicKey, seq);
    return {
      link,
      seq,
      commit: () => {
        if (!this.move(publicKey, link, seq)) {
          throw new Error(`Reservation ${linkToString(link)} (seq ${seq}) is stale`);
        }
      },
    };
  }

  /**
   * Monotonic head update for an accepted incoming message.
   * @returns false, after logging, for an update that does not move forward.
   */
  advanceHead(publicKey: PublicKey, link: Link, seq: number): boolean {
    this.addPublisher(publicKey);
    if (this.move(publicKey, link, seq)) return true;
    this.logger.warn(
      { publisher: publisherIdOf(publicKey), link: linkToString(link), seq, expected: this.nextSeq(publicKey) },
      "ignoring backward head update"
    );
    return false;
  }

  /** Every publisher back to its first content message; the author's head back to the announcement. */
  rewind(): void {
    for (const [publisher, cursor] of this.cursors) {
      cursor.head = publisher === this.author ? this.announcement : null;
      cursor.nextSeq = FIRST_CONTENT_SEQ;
    }
    this.channelHead = this.announcement;
    this.channelSeq = FIRST_CONTENT_SEQ;
  }

  private move(publicKey: PublicKey, link: Link, seq: number): boolean {
    const cursor = this.cursor(publicKey);
    if (seq < this.nextSeq(publicKey)) return false;
    cursor.head = link;
    cursor.nextSeq = seq + 1;
    if (this.mode === "SINGLE") {
      this.channelHead = link;
      this.channelSeq = seq + 1;
    }
    return true;
  }

  // ─── Queries ────────────────────────────────────────────────────

  /** The next address a reader polls for `publisher`. In SINGLE mode every publisher polls the chain. */
  candidate(publicKey: PublicKey): { link: Link; seq: number } {
    const seq = this.nextSeq(publicKey);
    return { link: this.addressFor(publicKey, seq), seq };
  }

  /** Where message `seq` of `publisher` belongs. */
  addressFor(publicKey: PublicKey, seq: number): Link {
    if (this.mode === "SINGLE" && seq >= FIRST_CONTENT_SEQ) {
      return deriveChainAddress(this.suite, this.instanceId, seq);
    }
    return deriveNextAddress(this.suite, this.instanceId, publicKey, seq);
  }

  nextSeq(publicKey: PublicKey): number {
    if (this.mode === "SINGLE") return this.channelSeq;
    return this.cursors.get(publisherIdOf(publicKey))?.nextSeq ?? FIRST_CONTENT_SEQ;
  }

  /**
   * The link a new message in the branch rooted at `branchRoot` points back to.
   * SINGLE: the channel head. MULTI: the branch root.
   */
  resolveLinkTo(branchRoot: Link): Link {
    return this.mode === "SINGLE" ? this.channelHead : branchRoot;
  }

  head(publisher: PublisherId): Link | null {
    return this.cursors.get(publisher)?.head ?? null;
  }

  /** Tracked publishers in ascending id order. */
  publishers(): PublicKey[] {
    return [...this.cursors.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, cursor]) => cursor.publicKey);
  }

  /** Latest heads of every publisher that has one, ascending by id. */
  heads(): Link[] {
    const links: Link[] = [];
    for (const publicKey of this.publishers()) {
      const head = this.head(publisherIdOf(publicKey));
      if (head) links.push(head);
    }
    return links;
  }

  snapshot(): SequencingSnapshot {
    return {
      mode: this.mode,
      channelHead: this.channelHead,
      channelSeq: this.channelSeq,
      publishers: [...this.cursors.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([publisher, cursor]) => ({ publisher, head: cursor.head, nextSeq: cursor.nextSeq })),
    };
  }

  private cursor(publicKey: PublicKey): Cursor {
    const id = publisherIdOf(publicKey);
    let cursor = this.cursors.get(id);
    if (!cursor) {
      cursor = { publicKey, head: null, nextSeq: FIRST_CONTENT_SEQ };
      this.cursors.set(id, cursor);
    }
    return cursor;
  }
}
