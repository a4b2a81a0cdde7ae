/**
 * Unit tests for frame-queue.ts
 */

import { describe, it, expect } from "vitest";
import { BoundedDropQueue, CLOSED, MAX_QUEUE_SIZE } from "./frame-queue.js";
import { RunningFlag } from "./utils/running-flag.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function makeQueue(maxSize?: number): { q: BoundedDropQueue<number>; running: RunningFlag } {
  const running = new RunningFlag();
  return { q: new BoundedDropQueue<number>(running, maxSize), running };
}

function pushAll(q: BoundedDropQueue<number>, from: number, to: number): void {
  for (let i = from; i <= to; i++) {
    q.push(i);
  }
}

function drain(q: BoundedDropQueue<number>): number[] {
  const out: number[] = [];
  let item = q.tryPop();
  while (item !== null) {
    out.push(item);
    item = q.tryPop();
  }
  return out;
}

/** Let pending promise callbacks and one timer turn run. */
function settle(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

// ─── Basic FIFO Behavior ────────────────────────────────────────────────────────

describe("BoundedDropQueue", () => {
  describe("basic push/pop FIFO behavior", () => {
    it("pops items in the order they were pushed", async () => {
      const { q } = makeQueue(5);
      pushAll(q, 0, 2);

      expect(await q.pop()).toBe(0);
      expect(await q.pop()).toBe(1);
      expect(await q.pop()).toBe(2);
    });

    it("returns the same object reference that was pushed", async () => {
      const running = new RunningFlag();
      const q = new BoundedDropQueue<{ id: number }>(running, 2);
      const item = { id: 7 };
      q.push(item);

      expect(await q.pop()).toBe(item);
    });
  });

  // ─── Backpressure: Drops Oldest When Full ───────────────────────────────────

  describe("backpressure: drops oldest when full", () => {
    it("keeps the last five of ten pushes with capacity 5", () => {
      const { q } = makeQueue(5);
      pushAll(q, 1, 10);

      expect(q.size).toBe(5);
      expect(drain(q)).toEqual([6, 7, 8, 9, 10]);
    });

    it("drops the oldest item when pushing into a full queue", () => {
      const { q } = makeQueue(3);
      pushAll(q, 0, 3);

      expect(q.size).toBe(3);
      expect(drain(q)).toEqual([1, 2, 3]);
    });

    it("counts one drop per overflowing push", () => {
      const { q } = makeQueue(2);
      q.push(0);
      q.push(1);
      expect(q.droppedByBackpressure).toBe(0);

      q.push(2);
      expect(q.droppedByBackpressure).toBe(1);

      q.push(3);
      expect(q.droppedByBackpressure).toBe(2);
    });

    it("drop counter persists across clear()", () => {
      const { q } = makeQueue(1);
      q.push(0);
      q.push(1);
      q.clear();

      expect(q.droppedByBackpressure).toBe(1);
      expect(q.size).toBe(0);
    });

    it("default capacity is 200", () => {
      const { q } = makeQueue();
      expect(q.capacity).toBe(MAX_QUEUE_SIZE);
      pushAll(q, 1, 200);
      expect(q.droppedByBackpressure).toBe(0);

      q.push(201);
      expect(q.size).toBe(200);
      expect(q.droppedByBackpressure).toBe(1);
      expect(q.tryPop()).toBe(2);
    });

    it("keeps FIFO order across wrap-around of the ring", () => {
      const { q } = makeQueue(3);
      pushAll(q, 1, 3);
      expect(q.tryPop()).toBe(1);
      expect(q.tryPop()).toBe(2);
      pushAll(q, 4, 6); // 3,4,5 then 6 evicts 3

      expect(drain(q)).toEqual([4, 5, 6]);
    });
  });

  // ─── Construction ─────────────────────────────────────────────────────────

  describe("constructor", () => {
    it("rejects a zero capacity", () => {
      expect(() => new BoundedDropQueue<number>(new RunningFlag(), 0)).toThrow(RangeError);
    });

    it("rejects a fractional capacity", () => {
      expect(() => new BoundedDropQueue<number>(new RunningFlag(), 2.5)).toThrow(RangeError);
    });
  });

  // ─── Blocking pop ─────────────────────────────────────────────────────────

  describe("pop() on an empty queue", () => {
    it("waits until an item is pushed", async () => {
      const { q } = makeQueue(5);
      let result: number | typeof CLOSED | undefined;
      const pending = q.pop().then((value) => {
        result = value;
      });

      await settle();
      expect(result).toBeUndefined();
      expect(q.waiting).toBe(1);

      q.push(42);
      await pending;
      expect(result).toBe(42);
      expect(q.size).toBe(0);
    });

    it("stays parked after wakeAll() while the run is still active", async () => {
      const { q } = makeQueue(5);
      let resolved = false;
      const pending = q.pop().then(() => {
        resolved = true;
      });

      await settle();
      q.wakeAll();
      await settle();

      expect(resolved).toBe(false);
      expect(q.waiting).toBe(1);

      q.push(1);
      await pending;
      expect(resolved).toBe(true);
    });

    it("returns CLOSED to every parked consumer after stop + wakeAll", async () => {
      const { q, running } = makeQueue(5);
      const pops = [q.pop(), q.pop(), q.pop()];
      await settle();
      expect(q.waiting).toBe(3);

      running.stop();
      q.wakeAll();

      expect(await Promise.all(pops)).toEqual([CLOSED, CLOSED, CLOSED]);
      expect(q.waiting).toBe(0);
    });

    it("returns CLOSED immediately when stopped and empty", async () => {
      const { q, running } = makeQueue(5);
      running.stop();

      expect(await q.pop()).toBe(CLOSED);
    });

    it("still hands out remaining items after stop, then CLOSED", async () => {
      const { q, running } = makeQueue(5);
      pushAll(q, 1, 2);
      running.stop();

      expect(await q.pop()).toBe(1);
      expect(await q.pop()).toBe(2);
      expect(await q.pop()).toBe(CLOSED);
    });

    it("wakes one parked consumer per push", async () => {
      const { q } = makeQueue(5);
      const results: number[] = [];
      const pops = [q.pop(), q.pop()].map((p) =>
        p.then((value) => {
          if (value !== CLOSED) results.push(value);
        }),
      );
      await settle();

      q.push(10);
      await settle();
      expect(results).toEqual([10]);
      expect(q.waiting).toBe(1);

      q.push(11);
      await Promise.all(pops);
      expect(results).toEqual([10, 11]);
    });
  });

  // ─── Snapshot reads ───────────────────────────────────────────────────────

  describe("size and isEmpty()", () => {
    it("tracks push and pop accurately", () => {
      const { q } = makeQueue(10);
      expect(q.isEmpty()).toBe(true);

      q.push(0);
      q.push(1);
      expect(q.size).toBe(2);
      expect(q.isEmpty()).toBe(false);

      q.tryPop();
      q.tryPop();
      expect(q.size).toBe(0);
      expect(q.isEmpty()).toBe(true);
    });

    it("tryPop() on an empty queue returns null", () => {
      const { q } = makeQueue(3);
      expect(q.tryPop()).toBeNull();
    });
  });

  // ─── O(1) push Performance ────────────────────────────────────────────────

  describe("O(1) push performance (circular buffer)", () => {
    it("push time does not degrade under sustained overflow", () => {
      const { q } = makeQueue(10);
      pushAll(q, 0, 9);

      const iterations = 1000;
      const start = performance.now();
      pushAll(q, 10, 10 + iterations - 1);
      const elapsed = performance.now() - start;
      const avgMicroseconds = (elapsed / iterations) * 1000;

      // Sanity check, not a benchmark
      expect(avgMicroseconds).toBeLessThan(100);
      expect(q.size).toBe(10);
      expect(q.droppedByBackpressure).toBe(iterations);
    });
  });
});
