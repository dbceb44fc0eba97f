/**
 * @module primitives/base-emitter
 * @description Base implementation of the typed event emitter.
 * Channel users extend this to gain event capabilities.
 */

import type {
  IChannelEmitter,
  EventListener,
} from "../interfaces/event-emitter.js";
import type {
  ChannelEvent,
  ChannelEventMap,
  ChannelEventType,
} from "../types/events.js";

type AnyListener = (event: ChannelEvent) => void;

function isEventOf<T extends ChannelEventType>(
  event: ChannelEvent,
  eventType: T
): event is ChannelEventMap[T] {
  return event.type === eventType;
}

/**
 * Typed event emitter keyed by event type. Each registered listener is
 * stored behind a narrowing wrapper so `off` can find it again.
 */
export class ChannelEmitter implements IChannelEmitter {
  private readonly listeners = new Map<
    ChannelEventType,
    Map<unknown, AnyListener>
  >();

  on<T extends ChannelEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    let registered = this.listeners.get(eventType);
    if (!registered) {
      registered = new Map();
      this.listeners.set(eventType, registered);
    }
    registered.set(listener, (event) => {
      if (isEventOf(event, eventType)) {
        listener(event);
      }
    });
  }

  once<T extends ChannelEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const wrapper: EventListener<T> = (event) => {
      this.off(eventType, wrapper);
      listener(event);
    };
    this.on(eventType, wrapper);
  }

  off<T extends ChannelEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const registered = this.listeners.get(eventType);
    if (registered) {
      registered.delete(listener);
      if (registered.size === 0) {
        this.listeners.delete(eventType);
      }
    }
  }

  emit<T extends ChannelEventType>(event: ChannelEventMap[T]): void {
    const registered = this.listeners.get(event.type);
    if (registered) {
      // Snapshot: `once` listeners remove themselves mid-dispatch.
      for (const listener of [...registered.values()]) {
        listener(event);
      }
    }
  }
}
