/**
 * Bounded queue with drop-oldest backpressure and awaitable pop.
 * Uses a circular buffer for O(1) push/pop regardless of queue state.
 *
 * push() never waits: when full, the oldest element is evicted to make room.
 * pop() parks the caller while the queue is empty and the run flag is still
 * up, and resolves CLOSED once the flag is down and nothing is left.
 */

import type { RunningFlag } from "./utils/running-flag.js";

export const MAX_QUEUE_SIZE = 200;

/** Returned by pop() once the run has stopped and the queue is drained. */
export const CLOSED: unique symbol = Symbol("queue-closed");
export type Closed = typeof CLOSED;

// Items are never undefined: an empty slot marks a free buffer position.
export class BoundedDropQueue<T extends NonNullable<unknown>> {
  private buffer: (T | undefined)[];
  private head: number; // index of the oldest element
  private tail: number; // index of the next write position
  private count: number;
  private readonly maxSize: number;
  private dropped: number;
  private waiters: Array<() => void>; // parked pop() calls, oldest first

  constructor(
    private readonly running: RunningFlag,
    maxSize: number = MAX_QUEUE_SIZE,
  ) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${maxSize}`);
    }
    this.maxSize = maxSize;
    this.buffer = new Array<T | undefined>(maxSize).fill(undefined);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    this.dropped = 0;
    this.waiters = [];
  }

  /**
   * Append an item. If the queue is full, drop the oldest item first and
   * increment the backpressure counter. Wakes one parked consumer.
   */
  push(item: T): void {
    if (this.count === this.maxSize) {
      // Full — drop oldest (at head) before writing the new tail
      this.dropped++;
      this.buffer[this.head] = undefined;
      this.head = (this.head + 1) % this.maxSize;
      this.count--;
    }

    this.buffer[this.tail] = item;
    this.tail = (this.tail + 1) % this.maxSize;
    this.count++;

    this.waiters.shift()?.();
  }

  /**
   * Remove and return the oldest item, waiting while the queue is empty and
   * the run is still active. The predicate is re-checked after every wake-up,
   * so a broadcast or a stolen item simply parks the caller again.
   */
  async pop(): Promise<T | Closed> {
    while (this.count === 0) {
      if (!this.running.isRunning) {
        return CLOSED;
      }
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }
    return this.takeHead();
  }

  /** Remove and return the oldest item, or null if empty. Never waits. */
  tryPop(): T | null {
    if (this.count === 0) {
      return null;
    }
    return this.takeHead();
  }

  /** Wake every parked pop() so each re-evaluates its exit condition. */
  wakeAll(): void {
    const parked = this.waiters;
    this.waiters = [];
    for (const wake of parked) {
      wake();
    }
  }

  /** Items dropped because the queue was full at push time. Cumulative. */
  get droppedByBackpressure(): number {
    return this.dropped;
  }

  /** Current queue depth. */
  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.maxSize;
  }

  /** Number of pop() calls currently parked. */
  get waiting(): number {
    return this.waiters.length;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  /** Clear all queued items and reset queue pointers. Parked consumers stay parked. */
  clear(): void {
    this.buffer.fill(undefined);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
  }

  private takeHead(): T {
    const item = this.buffer[this.head];
    this.buffer[this.head] = undefined; // release reference
    this.head = (this.head + 1) % this.maxSize;
    this.count--;
    if (item === undefined) {
      throw new Error("BoundedDropQueue invariant violated: empty slot at head");
    }
    return item;
  }
}
