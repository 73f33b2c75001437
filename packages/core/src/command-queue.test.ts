import { describe, it, expect } from 'vitest';
import { CommandQueueImpl } from './command-queue';

describe('CommandQueueImpl', () => {
  it('starts empty', () => {
    const queue = new CommandQueueImpl<string>();
    expect(queue.size).toBe(0);
    expect(queue.drain()).toEqual([]);
  });

  it('drains in FIFO order and empties itself', () => {
    const queue = new CommandQueueImpl<number>();
    queue.push(1);
    queue.push(2);
    queue.push(3);
    expect(queue.size).toBe(3);

    expect(queue.drain()).toEqual([1, 2, 3]);
    expect(queue.size).toBe(0);
    expect(queue.drain()).toEqual([]);
  });

  it('keeps items pushed while a drained batch is processed for the next drain', () => {
    const queue = new CommandQueueImpl<string>();
    queue.push('a');
    for (const item of queue.drain()) {
      queue.push(`${item}-followup`);
    }
    expect(queue.drain()).toEqual(['a-followup']);
  });
});
