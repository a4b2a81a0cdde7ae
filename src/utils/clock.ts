// Monotonic time source for pacing. Injectable so tests can observe sleeps.

export interface Clock {
  /** Milliseconds from an arbitrary fixed origin; never goes backwards. */
  now(): number;
  /** Resolves at or after `deadline` (same origin as now()); immediately if already past. */
  sleepUntil(deadline: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleepUntil(deadline: number): Promise<void> {
    const remaining = deadline - performance.now();
    if (remaining <= 0) {
      // Overrun: start the next cycle now, after one turn of the event loop
      return new Promise((resolve) => setImmediate(resolve));
    }
    return new Promise((resolve) => setTimeout(resolve, remaining));
  },
};
