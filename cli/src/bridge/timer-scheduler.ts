/**
 * One-shot timer facility used by the output poller.
 */

/**
 * Opaque handle returned by {@link IScheduler.schedule}.
 */
export type TimerHandle = { readonly id: number };

export interface IScheduler {
  /**
   * Run the callback once after the delay, on the event loop.
   */
  schedule(delayMs: number, callback: () => void): TimerHandle;

  /**
   * Cancel a callback that has not run yet. Unknown handles are ignored.
   */
  cancel(handle: TimerHandle): void;
}

/**
 * Scheduler backed by setTimeout.
 */
export class NodeTimerScheduler implements IScheduler {
  private nextId = 1;
  private readonly timers = new Map<number, NodeJS.Timeout>();

  schedule(delayMs: number, callback: () => void): TimerHandle {
    const handle: TimerHandle = { id: this.nextId++ };
    const timeout = setTimeout(() => {
      this.timers.delete(handle.id);
      callback();
    }, delayMs);
    this.timers.set(handle.id, timeout);
    return handle;
  }

  cancel(handle: TimerHandle): void {
    const timeout = this.timers.get(handle.id);
    if (timeout !== undefined) {
      clearTimeout(timeout);
      this.timers.delete(handle.id);
    }
  }
}
