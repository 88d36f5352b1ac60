/**
 * @fileoverview EventEmitter with generic type safety for event names and payloads.
 *
 * An event map type lists each event name with its argument tuple; listeners and emit()
 * calls are checked against it at compile time. A throwing listener is logged and does
 * not prevent the remaining listeners from running. Listeners are iterated over a copy,
 * so a listener may remove itself (once()) while an event is being emitted.
 *
 * Event maps must be declared with `type`, not `interface`, so they satisfy the
 * Record constraint.
 */

import { logError } from './logging';

export type EventMap = Record<string, unknown[]>;

export type EventListener<TEventMap extends EventMap, TEventName extends keyof TEventMap> = (
  ...args: TEventMap[TEventName]
) => void;

type ListenerTable<TEventMap extends EventMap> = {
  [TEventName in keyof TEventMap]?: Array<EventListener<TEventMap, TEventName>>;
};

export class EventEmitter<TEventMap extends EventMap> {
  private listeners: ListenerTable<TEventMap> = {};

  on<TEventName extends keyof TEventMap>(
    event: TEventName,
    listener: EventListener<TEventMap, TEventName>
  ): this {
    const registered: Array<EventListener<TEventMap, TEventName>> = this.listeners[event] ?? [];
    registered.push(listener);
    this.listeners[event] = registered;
    return this;
  }

  once<TEventName extends keyof TEventMap>(
    event: TEventName,
    listener: EventListener<TEventMap, TEventName>
  ): this {
    const onceWrapper: EventListener<TEventMap, TEventName> = (...args) => {
      this.off(event, onceWrapper);
      listener(...args);
    };
    return this.on(event, onceWrapper);
  }

  off<TEventName extends keyof TEventMap>(
    event: TEventName,
    listener: EventListener<TEventMap, TEventName>
  ): this {
    const registered = this.listeners[event];
    if (registered) {
      const index = registered.indexOf(listener);
      if (index !== -1) {
        registered.splice(index, 1);
      }
      if (registered.length === 0) {
        delete this.listeners[event];
      }
    }
    return this;
  }

  emit<TEventName extends keyof TEventMap>(
    event: TEventName,
    ...args: TEventMap[TEventName]
  ): boolean {
    const registered = this.listeners[event];
    if (!registered || registered.length === 0) {
      return false;
    }

    for (const listener of [...registered]) {
      try {
        listener(...args);
      } catch (error) {
        logError('EventEmitter', `Error in event listener for "${String(event)}":`, error);
      }
    }
    return true;
  }

  removeAllListeners<TEventName extends keyof TEventMap>(event?: TEventName): this {
    if (event !== undefined) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
    return this;
  }

  listenerCount<TEventName extends keyof TEventMap>(event: TEventName): number {
    return this.listeners[event]?.length ?? 0;
  }
}
