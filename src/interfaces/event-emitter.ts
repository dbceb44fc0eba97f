/**
 * @module interfaces/event-emitter
 * @description Typed event emitter interface for channel users.
 */

import type { ChannelEventMap, ChannelEventType } from "../types/events.js";

export type EventListener<T extends ChannelEventType> = (
  event: ChannelEventMap[T]
) => void;

/**
 * @interface IChannelEmitter
 * @description Compile-time checked event names and payloads.
 */
export interface IChannelEmitter {
  on<T extends ChannelEventType>(eventType: T, listener: EventListener<T>): void;

  /** Register a listener that removes itself after the first invocation. */
  once<T extends ChannelEventType>(eventType: T, listener: EventListener<T>): void;

  off<T extends ChannelEventType>(eventType: T, listener: EventListener<T>): void;

  /** Invokes every registered listener synchronously. */
  emit<T extends ChannelEventType>(event: ChannelEventMap[T]): void;
}
