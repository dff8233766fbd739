/**
 * RunningFlag — process-wide "keep going" switch.
 *
 * Set once by `exit` (or a termination signal). Loops poll it; `wait()`
 * resolves within one poll interval of `stop()`.
 */

export const RUNNING_POLL_MS = 50;

export class RunningFlag {
  private running = true;
  private reason: string | null = null;

  get isRunning(): boolean {
    return this.running;
  }

  /** Why the flag was cleared, if it was */
  get stopReason(): string | null {
    return this.reason;
  }

  /** Returns false when the flag was already cleared. */
  stop(reason: string): boolean {
    if (!this.running) return false;
    this.running = false;
    this.reason = reason;
    return true;
  }

  wait(pollMs: number = RUNNING_POLL_MS): Promise<void> {
    return new Promise((resolve) => {
      const check = (): void => {
        if (!this.running) {
          resolve();
          return;
        }
        setTimeout(check, pollMs);
      };
      check();
    });
  }
}
