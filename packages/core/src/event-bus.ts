/**
 * @module event-bus
 * Type-safe pub/sub for editor notifications (commits, layer and history changes).
 *
 * @see {@link @layerpaint/types#EventBus} for the interface contract
 * @see {@link @layerpaint/types#EventMap} for the event catalogue
 */

import type { EventBus, EventCallback, EventMap } from '@layerpaint/types';

/** Callback shape used internally once the payload type is erased. */
type Callback = (...args: unknown[]) => void;

interface Listener {
  callback: Callback;
  once: boolean;
}

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Listeners are kept per event in subscription order. A `once` listener is
 * removed before it is invoked, so re-emitting from inside it cannot call it
 * twice.
 */
export class EventBusImpl implements EventBus {
  private listeners = new Map<keyof EventMap, Listener[]>();

  /** @inheritdoc */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    this.add(event, callback as Callback, false);
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    this.add(event, callback as Callback, true);
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void {
    const list = this.listeners.get(event);
    if (!list) return;

    const target: unknown = callback;
    const index = list.findIndex((listener) => listener.callback === target);
    if (index >= 0) {
      list.splice(index, 1);
    }
    if (list.length === 0) {
      this.listeners.delete(event);
    }
  }

  /** @inheritdoc */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void {
    const list = this.listeners.get(event);
    if (!list) return;

    // Snapshot: listeners may subscribe or unsubscribe while we iterate.
    for (const listener of [...list]) {
      if (listener.once) {
        this.remove(event, listener);
      }
      listener.callback(...args);
    }
  }

  /** @inheritdoc */
  clear(): void {
    this.listeners.clear();
  }

  /** Number of listeners registered for `event`. */
  listenerCount(event: keyof EventMap): number {
    return this.listeners.get(event)?.length ?? 0;
  }

  // ── helpers ──────────────────────────────────────────────────────────

  private add(event: keyof EventMap, callback: Callback, once: boolean): void {
    const list = this.listeners.get(event);
    if (list) {
      list.push({ callback, once });
    } else {
      this.listeners.set(event, [{ callback, once }]);
    }
  }

  private remove(event: keyof EventMap, listener: Listener): void {
    const list = this.listeners.get(event);
    if (!list) return;
    const index = list.indexOf(listener);
    if (index >= 0) {
      list.splice(index, 1);
    }
    if (list.length === 0) {
      this.listeners.delete(event);
    }
  }
}
