/**
 * @module events
 * Type-safe event bus definitions for cross-module communication.
 */

import type { Rect } from './common';

/** Map of event names to their payload types. */
export interface EventMap {
  /**
   * Fired by an explicit commit once per layer written since the last commit.
   * The display side re-uploads `bounds` of that layer.
   */
  'layer:committed': { layer: number; bounds: Rect };
  /** Fired when layers are added, deleted, shown or hidden. */
  'layers:changed': undefined;
  /** Fired when the active layer changes. */
  'layer:activated': { layer: number };
  /** Fired when the whole canvas is replaced (new, open, resize). */
  'image:replaced': { width: number; height: number };
  /** Fired when an entry is pushed to history. */
  'history:pushed': { description: string };
  /** Fired when a stroke is merged into one entry. */
  'history:merged': { description: string };
  /** Fired when an entry is undone. */
  'history:undone': { description: string };
  /** Fired when an entry is redone. */
  'history:redone': { description: string };
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof EventMap> = EventMap[K] extends undefined
  ? () => void
  : (payload: EventMap[K]) => void;

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Subscribe to an event for a single emission. */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe a specific callback from an event. */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event with an optional payload. */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
