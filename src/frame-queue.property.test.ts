// Property-Based Tests: bounded drop-oldest queue
// Capacity bound, oldest-evicted law, and exactly-once delivery to concurrent consumers

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { BoundedDropQueue, CLOSED } from "./frame-queue.js";
import { RunningFlag } from "./utils/running-flag.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

const arbitraryCapacity = (): fc.Arbitrary<number> => fc.integer({ min: 1, max: 50 });

/** Interleaved operations: push a fresh id, or try to pop one. */
type Op = { kind: "push" } | { kind: "pop" };
const arbitraryOps = (): fc.Arbitrary<Op[]> =>
  fc.array(
    fc.oneof(
      fc.constant<Op>({ kind: "push" }),
      fc.constant<Op>({ kind: "pop" }),
    ),
    { maxLength: 300 },
  );

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("BoundedDropQueue properties", () => {
  it("never holds more than its capacity", () => {
    fc.assert(
      fc.property(arbitraryCapacity(), arbitraryOps(), (capacity, ops) => {
        const q = new BoundedDropQueue<number>(new RunningFlag(), capacity);
        let next = 0;
        for (const op of ops) {
          if (op.kind === "push") q.push(next++);
          else q.tryPop();
          expect(q.size).toBeLessThanOrEqual(capacity);
        }
      }),
    );
  });

  it("keeps exactly the last `capacity` pushes, in push order", () => {
    fc.assert(
      fc.property(
        arbitraryCapacity(),
        fc.array(fc.integer(), { maxLength: 200 }),
        (capacity, values) => {
          const q = new BoundedDropQueue<number>(new RunningFlag(), capacity);
          for (const v of values) q.push(v);

          const survivors: number[] = [];
          let item = q.tryPop();
          while (item !== null) {
            survivors.push(item);
            item = q.tryPop();
          }

          expect(survivors).toEqual(values.slice(Math.max(0, values.length - capacity)));
          expect(q.droppedByBackpressure).toBe(Math.max(0, values.length - capacity));
        },
      ),
    );
  });

  it("matches a reference FIFO-with-eviction model under interleaved push/pop", () => {
    fc.assert(
      fc.property(arbitraryCapacity(), arbitraryOps(), (capacity, ops) => {
        const q = new BoundedDropQueue<number>(new RunningFlag(), capacity);
        const model: number[] = [];
        let next = 0;
        for (const op of ops) {
          if (op.kind === "push") {
            if (model.length === capacity) model.shift();
            model.push(next);
            q.push(next++);
          } else {
            expect(q.tryPop()).toBe(model.length > 0 ? model.shift() : null);
          }
        }
        expect(q.size).toBe(model.length);
      }),
    );
  });

  it("delivers every surviving item exactly once across concurrent consumers", async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.integer({ min: 1, max: 6 }),
        fc.integer({ min: 1, max: 20 }),
        fc.array(fc.integer({ min: 1, max: 10 }), { minLength: 1, maxLength: 20 }),
        async (consumerCount, capacity, bursts) => {
          const running = new RunningFlag();
          const q = new BoundedDropQueue<number>(running, capacity);
          const received: number[] = [];

          const consumers = Array.from({ length: consumerCount }, async () => {
            for (;;) {
              const item = await q.pop();
              if (item === CLOSED) return;
              received.push(item);
            }
          });

          // Push in bursts, yielding between them so consumers interleave
          let next = 0;
          for (const burst of bursts) {
            for (let i = 0; i < burst; i++) q.push(next++);
            await Promise.resolve();
          }

          running.stop();
          q.wakeAll();
          await Promise.all(consumers);

          const total = next;
          const dropped = q.droppedByBackpressure;
          expect(new Set(received).size).toBe(received.length);
          expect(received.length + dropped).toBe(total);
          expect(q.size).toBe(0);
        },
      ),
      { numRuns: 50 },
    );
  });
});
