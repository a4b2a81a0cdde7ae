// Shared run counters. Increments happen synchronously between awaits, so
// each one is atomic with respect to every other actor on the event loop.

import type { CounterSnapshot } from "./types.js";

export class PipelineCounters {
  private generatedCount = 0;
  private savedCount = 0;
  private failedCount = 0;
  private bytes = 0;
  private assigned = 0;

  recordGenerated(): void {
    this.generatedCount++;
  }

  /**
   * Allocate the next save slot. Unique and increasing per call; under
   * several workers it does not track generation order.
   */
  nextSequence(): number {
    return this.assigned++;
  }

  recordSaved(bytesWritten: number): void {
    this.savedCount++;
    this.bytes += bytesWritten;
  }

  recordFailure(): void {
    this.failedCount++;
  }

  get generated(): number {
    return this.generatedCount;
  }

  get saved(): number {
    return this.savedCount;
  }

  get failed(): number {
    return this.failedCount;
  }

  get bytesWritten(): number {
    return this.bytes;
  }

  snapshot(): CounterSnapshot {
    return Object.freeze({
      generated: this.generatedCount,
      saved: this.savedCount,
      failed: this.failedCount,
      bytesWritten: this.bytes,
    });
  }
}
