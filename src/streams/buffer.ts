/**
 * Bounded sample buffer between a stream's producer and its consumers.
 *
 * The producer never blocks: when the buffer is full either the oldest
 * buffered item or the incoming one is discarded, and the drop is counted.
 */

import type { DropPolicy } from '../core/config/schema.js';

interface Waiter<T> {
  resolve: (item: T | null) => void;
  timer: NodeJS.Timeout | null;
}

export class SampleBuffer<T> {
  private readonly capacity: number;
  private readonly policy: DropPolicy;
  private items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private droppedCount = 0;
  private closed = false;

  constructor(capacity: number, policy: DropPolicy = 'drop-oldest') {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Buffer capacity must be a positive integer, got ${String(capacity)}`);
    }
    this.capacity = capacity;
    this.policy = policy;
  }

  /**
   * Offer an item.
   *
   * @returns false if the item itself was discarded
   */
  push(item: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(item);
      return true;
    }

    if (this.items.length >= this.capacity) {
      this.droppedCount++;
      if (this.policy === 'drop-newest') {
        return false;
      }
      this.items.shift();
    }
    this.items.push(item);
    return true;
  }

  /**
   * Oldest buffered item, waiting up to `timeoutMs` for one to arrive.
   *
   * @returns null on timeout or once the buffer is closed
   */
  next(timeoutMs?: number): Promise<T | null> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift() ?? null);
    }
    if (this.closed || timeoutMs === 0) {
      return Promise.resolve(null);
    }

    return new Promise((resolve) => {
      const waiter: Waiter<T> = { resolve, timer: null };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          resolve(null);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Newest buffered item, discarding older ones, or the next to arrive
   * within `timeoutMs`.
   *
   * @returns null on timeout or once the buffer is closed
   */
  nextNewest(timeoutMs?: number): Promise<T | null> {
    const pending = this.drain();
    const newest = pending[pending.length - 1];
    if (newest !== undefined) return Promise.resolve(newest);
    return this.next(timeoutMs);
  }

  /**
   * Newest buffered item, without removing it.
   */
  peekLatest(): T | null {
    return this.items[this.items.length - 1] ?? null;
  }

  /**
   * Remove and return everything buffered, oldest first.
   */
  drain(): T[] {
    const items = this.items;
    this.items = [];
    return items;
  }

  size(): number {
    return this.items.length;
  }

  dropped(): number {
    return this.droppedCount;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Discard buffered items and release every waiter with null.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.items = [];
    for (const waiter of this.waiters.splice(0)) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }
}
