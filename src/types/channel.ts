/**
 * @module types/channel
 * @description Per-user channel state: branches, registrations, lifecycle.
 */

import type {
  ExchangeKey,
  PublisherId,
  PskId,
  SessionKey,
} from "./branded.js";
import type { Link } from "./link.js";

/**
 * Lifecycle of a local user.
 *
 * - CREATED: no channel yet.
 * - ANNOUNCED: Author published the announcement.
 * - AWAITING_SUBSCRIPTION: Subscriber read the announcement.
 * - SUBSCRIBED: Subscriber published its subscribe message.
 * - ACTIVE: a restricted branch key is held.
 */
export type UserState =
  | "CREATED"
  | "ANNOUNCED"
  | "AWAITING_SUBSCRIPTION"
  | "SUBSCRIBED"
  | "ACTIVE";

/** A set of messages sharing one session key. */
export interface Branch {
  /** Link of the keyload, or of the announcement for the default branch. */
  readonly root: Link;
  readonly sessionKey: SessionKey;
  readonly recipients: ReadonlySet<PublisherId>;
  readonly pskIds: ReadonlySet<PskId>;
}

export type SubscriptionState = "PENDING" | "ACTIVE" | "UNREGISTERED";

/** Author-side view of one subscriber. */
export interface SubscriberRecord {
  readonly publisher: PublisherId;
  readonly exchangeKey: ExchangeKey;
  readonly state: SubscriptionState;
  /** Link of the subscribe message, absent for subscribers added by hand. */
  readonly link?: Link;
}

/** Recipients of a keyload, by public key and by pre-shared key. */
export interface KeyloadRecipients {
  readonly publicKeys?: readonly PublisherId[];
  readonly pskIds?: readonly PskId[];
}
