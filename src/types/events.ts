/**
 * @module types/events
 * @description Event catalog for channel users.
 *
 * Users emit typed events so callers can follow a channel without polling
 * return values. Fetch failures in particular are reported here: a failing
 * publisher stops its own loop but never aborts the whole fetch.
 */

import type { PublisherId } from "./branded.js";
import type { BranchingMode, Link } from "./link.js";
import type { MsgType, UnwrappedMessage } from "./message.js";
import type { ChannelErrorCode } from "../interfaces/channel.js";

// ─── Channel Events ─────────────────────────────────────────────────

/** Emitted by the Author once the announcement is on the transport. */
export interface ChannelAnnouncedEvent {
  readonly type: "CHANNEL_ANNOUNCED";
  readonly link: Link;
  readonly mode: BranchingMode;
}

/** Emitted when a subscriber becomes eligible for keyloads. */
export interface SubscriberRegisteredEvent {
  readonly type: "SUBSCRIBER_REGISTERED";
  readonly subscriber: PublisherId;
}

/** Emitted when a subscriber is unregistered, by either side. */
export interface SubscriberRemovedEvent {
  readonly type: "SUBSCRIBER_REMOVED";
  readonly subscriber: PublisherId;
}

/** Emitted when a session key is obtained, by building or unwrapping a keyload. */
export interface BranchOpenedEvent {
  readonly type: "BRANCH_OPENED";
  readonly root: Link;
}

// ─── Message Events ─────────────────────────────────────────────────

export interface MessageSentEvent {
  readonly type: "MESSAGE_SENT";
  readonly link: Link;
  readonly msgType: MsgType;
}

export interface MessageReceivedEvent {
  readonly type: "MESSAGE_RECEIVED";
  readonly message: UnwrappedMessage;
}

/** A message outside every branch this user can read. Not a failure. */
export interface MessageSkippedEvent {
  readonly type: "MESSAGE_SKIPPED";
  readonly link: Link;
  readonly msgType: MsgType;
}

/** A message at a polled address could not be accepted. */
export interface FetchFailedEvent {
  readonly type: "FETCH_FAILED";
  readonly link: Link;
  readonly publisher: PublisherId;
  readonly code: ChannelErrorCode;
  readonly reason: string;
}

// ─── Event Map ──────────────────────────────────────────────────────

export interface ChannelEventMap {
  CHANNEL_ANNOUNCED: ChannelAnnouncedEvent;
  SUBSCRIBER_REGISTERED: SubscriberRegisteredEvent;
  SUBSCRIBER_REMOVED: SubscriberRemovedEvent;
  BRANCH_OPENED: BranchOpenedEvent;
  MESSAGE_SENT: MessageSentEvent;
  MESSAGE_RECEIVED: MessageReceivedEvent;
  MESSAGE_SKIPPED: MessageSkippedEvent;
  FETCH_FAILED: FetchFailedEvent;
}

export type ChannelEventType = keyof ChannelEventMap;
export type ChannelEvent = ChannelEventMap[ChannelEventType];
