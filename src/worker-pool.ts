/**
 * Pool of interchangeable consumers draining the shared frame queue.
 *
 * Every worker runs the same loop: pop, take a save slot, persist. A failed
 * persist is counted, reported and skipped; the worker keeps going, even
 * when the failure hook itself throws. A worker
 * exits only when pop() reports CLOSED, i.e. the run has stopped and the
 * queue is empty.
 */

import { CLOSED } from "./frame-queue.js";
import type { BoundedDropQueue } from "./frame-queue.js";
import type { PipelineCounters } from "./pipeline-counters.js";
import type { Frame, FrameSink, PersistFailure, WorkerResult } from "./types.js";
import type { Logger } from "./logger.js";
import { createSilentLogger, errorMessage } from "./logger.js";

export interface WorkerPoolDeps {
  queue: BoundedDropQueue<Frame>;
  counters: PipelineCounters;
  sink: FrameSink;
  workerCount: number;
  logger?: Logger;
  onPersistFailure?: (failure: PersistFailure) => void;
}

export class WorkerPool {
  private readonly logger: Logger;
  private started = false;

  constructor(private readonly deps: WorkerPoolDeps) {
    if (!Number.isInteger(deps.workerCount) || deps.workerCount <= 0) {
      throw new RangeError(`workerCount must be a positive integer, got ${deps.workerCount}`);
    }
    this.logger = deps.logger ?? createSilentLogger();
  }

  get size(): number {
    return this.deps.workerCount;
  }

  /** Launch every worker. Resolves once all of them have exited. */
  start(): Promise<WorkerResult[]> {
    if (this.started) {
      throw new Error("WorkerPool already started");
    }
    this.started = true;

    const workers: Promise<WorkerResult>[] = [];
    for (let id = 0; id < this.deps.workerCount; id++) {
      workers.push(this.runWorker(id));
    }
    return Promise.all(workers);
  }

  private async runWorker(workerId: number): Promise<WorkerResult> {
    const { queue, counters, sink } = this.deps;
    const result: WorkerResult = { workerId, saved: 0, failed: 0, bytes: 0 };

    for (;;) {
      const frame = await queue.pop();
      if (frame === CLOSED) {
        break;
      }

      const sequence = counters.nextSequence();
      try {
        const bytes = await sink.persist(frame, sequence);
        counters.recordSaved(bytes);
        result.saved++;
        result.bytes += bytes;
      } catch (err) {
        counters.recordFailure();
        result.failed++;
        this.logger.warn(`[WORKER ${workerId}] failed to save frame #${sequence}: ${errorMessage(err)}`);
        this.notifyFailure({ workerId, sequence, error: err });
      }
    }

    return result;
  }

  private notifyFailure(failure: PersistFailure): void {
    try {
      this.deps.onPersistFailure?.(failure);
    } catch (err) {
      this.logger.error(`[WORKER ${failure.workerId}] persist failure hook threw: ${errorMessage(err)}`);
    }
  }
}
