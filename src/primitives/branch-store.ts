/**
 * @module primitives/branch-store
 * @description Branch table and index of known messages for one user.
 *
 * Branches are keyed by the message id of their root. A keyload that was
 * not addressed to this user still registers its branch as locked, so
 * packets inside it are recognised and skipped rather than treated as
 * references to something unseen.
 */

import type { MessageId, PublisherId } from "../types/branded.js";
import type { Link } from "../types/link.js";
import type { MsgType } from "../types/message.js";
import type { Branch } from "../types/channel.js";
import { wipe } from "../backends/crypto-utils.js";

/** What the store remembers about every message it accepted. */
export interface KnownMessage {
  readonly link: Link;
  readonly publisher: PublisherId;
  readonly seq: number;
  readonly msgType: MsgType;
  readonly branchId: MessageId;
}

export class BranchStore {
  private readonly branches = new Map<MessageId, Branch>();
  private readonly locked = new Set<MessageId>();
  private readonly messages = new Map<MessageId, KnownMessage>();

  // ─── Commands ───────────────────────────────────────────────────

  open(branch: Branch): void {
    this.locked.delete(branch.root.messageId);
    this.branches.set(branch.root.messageId, branch);
  }

  lock(root: MessageId): void {
    if (!this.branches.has(root)) {
      this.locked.add(root);
    }
  }

  record(message: KnownMessage): void {
    this.messages.set(message.link.messageId, message);
  }

  /** Forget every message but keep branch keys and locks. */
  forgetMessages(): void {
    this.messages.clear();
  }

  /** Wipes every session key and forgets all messages. */
  clear(): void {
    for (const branch of this.branches.values()) {
      wipe(branch.sessionKey);
    }
    this.branches.clear();
    this.locked.clear();
    this.messages.clear();
  }

  // ─── Queries ────────────────────────────────────────────────────

  get(root: MessageId): Branch | undefined {
    return this.branches.get(root);
  }

  isLocked(root: MessageId): boolean {
    return this.locked.has(root);
  }

  /** True when the branch is open or locked. */
  knows(root: MessageId): boolean {
    return this.branches.has(root) || this.locked.has(root);
  }

  isKnown(messageId: MessageId): boolean {
    return this.messages.has(messageId);
  }

  message(messageId: MessageId): KnownMessage | undefined {
    return this.messages.get(messageId);
  }
}
