// Frame Pipeline - Lifecycle Controller
// Sole owner of the run flag: starts the producer and the worker pool,
// waits out the configured duration, stops the run, joins every actor and
// aggregates the final report.
//
// States: IDLE → RUNNING → STOPPING → DONE (linear; one run per instance).

import { v4 as uuidv4 } from "uuid";
import { LifecycleState } from "./types.js";
import type {
  CounterSnapshot,
  Frame,
  FrameGenerator,
  FrameSink,
  OutputLocation,
  PersistFailure,
  PipelineConfig,
  RateSample,
  RunReport,
  StatsSource,
  WorkerResult,
} from "./types.js";
import { validateConfig } from "./config.js";
import { BoundedDropQueue } from "./frame-queue.js";
import { PipelineCounters } from "./pipeline-counters.js";
import { RateProducer } from "./rate-producer.js";
import { WorkerPool } from "./worker-pool.js";
import type { Logger } from "./logger.js";
import { createSilentLogger, errorMessage } from "./logger.js";
import type { Clock } from "./utils/clock.js";
import { systemClock } from "./utils/clock.js";
import { RunningFlag } from "./utils/running-flag.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface LifecycleControllerDeps {
  generator: FrameGenerator;
  sink: FrameSink;
  outputLocation: OutputLocation;
  logger?: Logger;
  clock?: Clock;
  onRateSample?: (sample: RateSample) => void;
  onPersistFailure?: (failure: PersistFailure) => void;
  onStateChange?: (state: LifecycleState) => void;
}

/** Allowed transitions; anything else is a programming error. */
const NEXT_STATE: Record<LifecycleState, LifecycleState | null> = {
  [LifecycleState.IDLE]: LifecycleState.RUNNING,
  [LifecycleState.RUNNING]: LifecycleState.STOPPING,
  [LifecycleState.STOPPING]: LifecycleState.DONE,
  [LifecycleState.DONE]: null,
};

export class LifecycleController implements StatsSource {
  private state: LifecycleState = LifecycleState.IDLE;
  private runRequested = false;
  private readonly running = new RunningFlag();
  private readonly counters = new PipelineCounters();
  private readonly queue: BoundedDropQueue<Frame>;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(
    private readonly config: PipelineConfig,
    private readonly deps: LifecycleControllerDeps,
  ) {
    validateConfig(config);
    this.queue = new BoundedDropQueue<Frame>(this.running, config.maxQueueSize);
    this.logger = deps.logger ?? createSilentLogger();
    this.clock = deps.clock ?? systemClock;
  }

  // ─── StatsSource ──────────────────────────────────────────────────────────

  getState(): LifecycleState {
    return this.state;
  }

  getCounters(): CounterSnapshot {
    return this.counters.snapshot();
  }

  getQueueDepth(): number {
    return this.queue.size;
  }

  // ─── Run ──────────────────────────────────────────────────────────────────

  /**
   * Execute one run and resolve with the aggregated report once every actor
   * has exited. Aborting `signal` ends the duration wait early; the shutdown
   * sequence is the same either way.
   *
   * A generator failure stops the run early and rejects after the workers
   * have been joined. Persist failures never reject.
   */
  async run(signal?: AbortSignal): Promise<RunReport> {
    if (this.runRequested) {
      throw new Error(`LifecycleController already ${this.state === LifecycleState.IDLE ? "starting" : this.state}`);
    }
    this.runRequested = true;

    const runId = uuidv4();
    await this.deps.outputLocation.prepare();
    this.logger.info(`[LIFECYCLE] Output location ready (run ${runId})`);

    const producer = new RateProducer({
      queue: this.queue,
      running: this.running,
      counters: this.counters,
      generator: this.deps.generator,
      targetRate: this.config.targetRate,
      logger: this.logger,
      clock: this.clock,
      onRateSample: this.deps.onRateSample,
    });
    const pool = new WorkerPool({
      queue: this.queue,
      counters: this.counters,
      sink: this.deps.sink,
      workerCount: this.config.workerCount,
      logger: this.logger,
      onPersistFailure: this.deps.onPersistFailure,
    });

    const startedAt = this.clock.now();
    this.transition(LifecycleState.RUNNING);

    const producerOutcome: { failed: boolean; error?: unknown } = { failed: false };

    const workersDone = pool.start();
    const producerDone = producer.run().catch((err: unknown) => {
      producerOutcome.failed = true;
      producerOutcome.error = err;
      this.logger.error(`[PRODUCER] generation failed: ${errorMessage(err)}`);
    });

    // The producer only settles before the flag drops when generation fails
    await this.waitForDuration(this.config.durationSeconds * 1000, producerDone, signal);

    this.transition(LifecycleState.STOPPING);
    this.running.stop();
    this.queue.wakeAll();

    await producerDone;
    const workers: WorkerResult[] = await workersDone;

    const elapsedMs = this.clock.now() - startedAt;
    this.transition(LifecycleState.DONE);

    if (producerOutcome.failed) {
      throw producerOutcome.error;
    }

    const counters = this.counters.snapshot();
    return {
      runId,
      ...counters,
      elapsedMs,
      averageRate: elapsedMs > 0 ? (counters.generated * 1000) / elapsedMs : 0,
      pendingInQueue: this.queue.size,
      droppedByBackpressure: this.queue.droppedByBackpressure,
      workers,
    };
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private transition(next: LifecycleState): void {
    if (NEXT_STATE[this.state] !== next) {
      throw new Error(`Invalid lifecycle transition ${this.state} → ${next}`);
    }
    this.logger.info(`[LIFECYCLE] ${this.state} → ${next}`);
    this.state = next;
    try {
      this.deps.onStateChange?.(next);
    } catch (err) {
      this.logger.error(`[LIFECYCLE] state change hook threw: ${errorMessage(err)}`);
    }
  }

  /** Resolves after `ms`, or sooner when the producer settles or `signal` aborts. */
  private waitForDuration(ms: number, producerDone: Promise<void>, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      this.logger.info("[LIFECYCLE] Stop requested before start");
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const finish = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      const onAbort = (): void => {
        this.logger.info("[LIFECYCLE] Stop requested");
        finish();
      };
      const timer = setTimeout(finish, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
      void producerDone.then(finish);
    });
  }
}
