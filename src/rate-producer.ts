/**
 * Rate-paced producer: generates one frame per tick and pushes it into the
 * shared queue.
 *
 * Each cycle sleeps until an absolute deadline (cycle start + interval), so
 * generation latency never accumulates as drift. A cycle that overruns its
 * interval is followed immediately by the next one.
 */

import type { BoundedDropQueue } from "./frame-queue.js";
import type { PipelineCounters } from "./pipeline-counters.js";
import type { Frame, FrameGenerator, RateSample } from "./types.js";
import type { Logger } from "./logger.js";
import { createSilentLogger, errorMessage } from "./logger.js";
import type { Clock } from "./utils/clock.js";
import { systemClock } from "./utils/clock.js";
import type { RunningFlag } from "./utils/running-flag.js";

/** Observed-rate samples are emitted once per window of this length. */
export const RATE_SAMPLE_WINDOW_MS = 1000;

export interface RateProducerDeps {
  queue: BoundedDropQueue<Frame>;
  running: RunningFlag;
  counters: PipelineCounters;
  generator: FrameGenerator;
  /** Frames per second. */
  targetRate: number;
  logger?: Logger;
  clock?: Clock;
  onRateSample?: (sample: RateSample) => void;
}

export class RateProducer {
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly samples: RateSample[] = [];

  constructor(private readonly deps: RateProducerDeps) {
    if (!Number.isInteger(deps.targetRate) || deps.targetRate <= 0) {
      throw new RangeError(`targetRate must be a positive integer, got ${deps.targetRate}`);
    }
    this.intervalMs = 1000 / deps.targetRate;
    this.logger = deps.logger ?? createSilentLogger();
    this.clock = deps.clock ?? systemClock;
  }

  get interval(): number {
    return this.intervalMs;
  }

  /** Rate samples emitted so far, oldest first. */
  get rateSamples(): readonly RateSample[] {
    return this.samples;
  }

  /**
   * Run the production loop until the running flag drops. Wakes every parked
   * consumer on exit. A throwing generator is fatal and rejects this promise.
   */
  async run(): Promise<void> {
    const { queue, running, counters, generator } = this.deps;
    let windowStart = this.clock.now();
    let windowCount = 0;

    try {
      while (running.isRunning) {
        const start = this.clock.now();

        queue.push(generator.generate());
        counters.recordGenerated();
        windowCount++;

        const now = this.clock.now();
        if (now - windowStart >= RATE_SAMPLE_WINDOW_MS) {
          this.emitSample(windowCount, now - windowStart);
          windowCount = 0;
          windowStart = now;
        }

        await this.clock.sleepUntil(start + this.intervalMs);
      }
    } finally {
      queue.wakeAll();
    }
  }

  private emitSample(count: number, windowMs: number): void {
    const sample: RateSample = { itemsPerSecond: count, windowMs, at: Date.now() };
    this.samples.push(sample);
    this.logger.info(`[PRODUCER] rate: ${count} frames/s`);
    try {
      this.deps.onRateSample?.(sample);
    } catch (err) {
      this.logger.error(`[PRODUCER] rate sample hook threw: ${errorMessage(err)}`);
    }
  }
}
