// Monotonic run flag shared by every actor: true from construction, flipped
// to false exactly once, never reset. A new run needs a new flag.

export class RunningFlag {
  private running = true;

  get isRunning(): boolean {
    return this.running;
  }

  /** Returns true only for the call that performed the transition. */
  stop(): boolean {
    if (!this.running) return false;
    this.running = false;
    return true;
  }
}
