// Frame Pipeline - Shared TypeScript interfaces and types
// Runtime code lives elsewhere; this module only declares shapes shared
// between the queue, the actors, the controller and the CLI.

// ─── Lifecycle State Machine ────────────────────────────────────────────────────

export enum LifecycleState {
  IDLE = "idle",
  RUNNING = "running",
  STOPPING = "stopping",
  DONE = "done",
}

// ─── Frames ─────────────────────────────────────────────────────────────────────

/** Raw interleaved RGB frame. Owned by exactly one actor at a time. */
export interface Frame {
  width: number;
  height: number;
  channels: 3;
  data: Buffer;
  /** Date.now() at generation, for staleness diagnostics. */
  generatedAt: number;
}

// ─── Collaborators ──────────────────────────────────────────────────────────────

export interface FrameGenerator {
  /** Synchronous; must return promptly since it bounds producer cadence. */
  generate(): Frame;
}

export interface FrameSink {
  /** Encodes and stores the frame under a name derived from `sequence`. Resolves to bytes written. */
  persist(frame: Frame, sequence: number): Promise<number>;
}

export interface OutputLocation {
  /** Clears and recreates the destination. Called once before any actor starts. */
  prepare(): Promise<void>;
}

// ─── Configuration ──────────────────────────────────────────────────────────────

export interface PipelineConfig {
  durationSeconds: number;
  /** Target generation rate in frames per second. */
  targetRate: number;
  workerCount: number;
  /** Upper bound on workerCount. Default: 7. */
  maxWorkers: number;
  /** Queue capacity before drop-oldest eviction. Default: 200. */
  maxQueueSize: number;
  outputDir: string;
  frameWidth: number;
  frameHeight: number;
  /** JPEG quality, 1-100. Default: 85. */
  jpegQuality: number;
  /** Port for the live stats server; null disables it. */
  statsPort: number | null;
}

// ─── Statistics ─────────────────────────────────────────────────────────────────

export interface CounterSnapshot {
  generated: number;
  saved: number;
  failed: number;
  bytesWritten: number;
}

export interface RateSample {
  /** Frames produced during the window. */
  itemsPerSecond: number;
  windowMs: number;
  /** Date.now() when the sample was taken. */
  at: number;
}

export interface WorkerResult {
  workerId: number;
  saved: number;
  failed: number;
  bytes: number;
}

export interface PersistFailure {
  workerId: number;
  sequence: number;
  error: unknown;
}

export interface RunReport extends CounterSnapshot {
  runId: string;
  elapsedMs: number;
  /** generated * 1000 / elapsedMs */
  averageRate: number;
  pendingInQueue: number;
  droppedByBackpressure: number;
  workers: WorkerResult[];
}

/** Live view of a run, served by the stats server. */
export interface StatsSource {
  getState(): LifecycleState;
  getCounters(): CounterSnapshot;
  getQueueDepth(): number;
}

// ─── Stats Server Messages ──────────────────────────────────────────────────────

export interface StatsSnapshot {
  state: LifecycleState;
  counters: CounterSnapshot;
  queueDepth: number;
}

export type StatsMessage =
  | ({ type: "stats" } & StatsSnapshot)
  | ({ type: "rate_sample" } & RateSample)
  | { type: "state_change"; state: LifecycleState };
