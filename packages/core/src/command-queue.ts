/**
 * @module command-queue
 * FIFO buffer between input handling and the editor.
 */

import type { CommandQueue } from '@layerpaint/types';

/** Array-backed {@link CommandQueue}. */
export class CommandQueueImpl<T> implements CommandQueue<T> {
  private pending: T[] = [];

  /** @inheritdoc */
  get size(): number {
    return this.pending.length;
  }

  /** @inheritdoc */
  push(item: T): void {
    this.pending.push(item);
  }

  /** @inheritdoc */
  drain(): T[] {
    const items = this.pending;
    this.pending = [];
    return items;
  }
}
