/**
 * Type-safe EventEmitter for dispatch events
 *
 * Lets audit, metrics and logging components observe dispatch outcomes
 * without the dispatcher knowing about them.
 */

import type { DispatchEvent, EventName } from "./events.js";

/**
 * Event listener callback type
 */
export type EventListener<T extends DispatchEvent = DispatchEvent> = (
  event: T
) => void | Promise<void>;

/**
 * Listener entry with optional once flag
 */
interface ListenerEntry {
  listener: EventListener;
  once: boolean;
}

/**
 * Type-safe EventEmitter for dispatch events
 *
 * Features:
 * - Strongly typed events matching the DispatchEvent union
 * - Support for one-time listeners (once)
 * - Async listener support
 * - Wildcard listeners for all events
 */
export class DispatchEmitter {
  private listeners: Map<EventName | "*", ListenerEntry[]> = new Map();
  /** Typed listener -> per event type, the wrapper stored in `listeners` */
  private wrappers = new WeakMap<object, Map<EventName, EventListener>>();

  /**
   * Subscribe to events of a specific type
   */
  on<T extends DispatchEvent["type"]>(
    eventType: T,
    listener: EventListener<Extract<DispatchEvent, { type: T }>>
  ): () => void {
    return this.addListener(eventType, this.narrow(eventType, listener), false);
  }

  /**
   * Subscribe to all events
   */
  onAll(listener: EventListener<DispatchEvent>): () => void {
    return this.addListener("*", listener, false);
  }

  /**
   * Subscribe to an event once (auto-unsubscribe after first emit)
   */
  once<T extends DispatchEvent["type"]>(
    eventType: T,
    listener: EventListener<Extract<DispatchEvent, { type: T }>>
  ): () => void {
    return this.addListener(eventType, this.narrow(eventType, listener), true);
  }

  /**
   * Unsubscribe from an event
   */
  off<T extends DispatchEvent["type"]>(
    eventType: T,
    listener: EventListener<Extract<DispatchEvent, { type: T }>>
  ): void {
    const byType = this.wrappers.get(listener);
    const wrapped = byType?.get(eventType);
    if (byType && wrapped) {
      byType.delete(eventType);
      this.removeListener(eventType, wrapped);
    }
  }

  /**
   * Unsubscribe a wildcard listener
   */
  offAll(listener: EventListener<DispatchEvent>): void {
    this.removeListener("*", listener);
  }

  /**
   * Emit an event to all subscribed listeners
   *
   * Listeners are called in order of subscription.
   * Errors in listeners are caught and logged but don't stop other listeners.
   */
  async emit(event: DispatchEvent): Promise<void> {
    const specificListeners = this.listeners.get(event.type) || [];
    const wildcardListeners = this.listeners.get("*") || [];
    const allListeners = [...specificListeners, ...wildcardListeners];

    const toRemove: Array<{ type: EventName | "*"; listener: EventListener }> =
      [];

    for (const entry of allListeners) {
      if (entry.once) {
        const listenerType = specificListeners.includes(entry)
          ? event.type
          : "*";
        toRemove.push({ type: listenerType, listener: entry.listener });
      }

      try {
        await entry.listener(event);
      } catch (error) {
        console.error(
          `[DispatchEmitter] Error in listener for ${event.type}:`,
          error
        );
      }
    }

    for (const { type, listener } of toRemove) {
      this.removeListener(type, listener);
    }
  }

  /**
   * Fire-and-forget emit, for synchronous callers such as the dispatcher
   */
  emitSync(event: DispatchEvent): void {
    void this.emit(event);
  }

  /**
   * Get the number of listeners for an event type (wildcards included)
   */
  listenerCount(eventType?: EventName): number {
    if (eventType) {
      return (this.listeners.get(eventType)?.length || 0) +
        (this.listeners.get("*")?.length || 0);
    }
    let count = 0;
    for (const listeners of this.listeners.values()) {
      count += listeners.length;
    }
    return count;
  }

  /**
   * Remove all listeners (optionally for a specific event type)
   */
  removeAllListeners(eventType?: EventName): void {
    if (eventType) {
      this.listeners.delete(eventType);
    } else {
      this.listeners.clear();
    }
  }

  /**
   * Wrap a typed listener so it only ever sees its own event type
   */
  private narrow<T extends DispatchEvent["type"]>(
    eventType: T,
    listener: EventListener<Extract<DispatchEvent, { type: T }>>
  ): EventListener {
    const wrapped: EventListener = (event) => {
      if (isEventOfType(event, eventType)) {
        return listener(event);
      }
    };
    const byType = this.wrappers.get(listener) ?? new Map<EventName, EventListener>();
    byType.set(eventType, wrapped);
    this.wrappers.set(listener, byType);
    return wrapped;
  }

  private addListener(
    eventType: EventName | "*",
    listener: EventListener,
    once: boolean
  ): () => void {
    const listeners = this.listeners.get(eventType) || [];
    listeners.push({ listener, once });
    this.listeners.set(eventType, listeners);

    return () => this.removeListener(eventType, listener);
  }

  private removeListener(
    eventType: EventName | "*",
    listener: EventListener
  ): void {
    const listeners = this.listeners.get(eventType);
    if (!listeners) return;

    const index = listeners.findIndex((e) => e.listener === listener);
    if (index !== -1) {
      listeners.splice(index, 1);
    }

    if (listeners.length === 0) {
      this.listeners.delete(eventType);
    }
  }
}

function isEventOfType<T extends DispatchEvent["type"]>(
  event: DispatchEvent,
  type: T
): event is Extract<DispatchEvent, { type: T }> {
  return event.type === type;
}

/**
 * Create a new isolated emitter instance
 */
export function createEmitter(): DispatchEmitter {
  return new DispatchEmitter();
}
