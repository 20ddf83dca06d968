/**
 * Recurring timer on the UI event loop that drains the mailbox.
 *
 * This is the only consumer of the mailbox and the only place where a
 * background result reaches the output view. Each firing takes at most one
 * message and then schedules the next firing, until stopped.
 */

import { debug } from '../utils/logger.js';
import type { BridgeContext } from './bridge-context.js';
import {
  NodeTimerScheduler,
  type IScheduler,
  type TimerHandle,
} from './timer-scheduler.js';

export type PollerState = 'stopped' | 'scheduled' | 'firing';

export class OutputPoller {
  private timer: TimerHandle | null = null;
  private running = false;
  private firing = false;
  private lastDisplayedEpoch = 0;

  constructor(
    private readonly context: BridgeContext,
    private readonly scheduler: IScheduler = new NodeTimerScheduler()
  ) {}

  get state(): PollerState {
    if (this.firing) return 'firing';
    return this.running ? 'scheduled' : 'stopped';
  }

  /**
   * Schedule the first firing. Does nothing if already running.
   */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.scheduleNext();
  }

  /**
   * Cancel the pending firing. A message still in the mailbox stays there.
   */
  stop(): void {
    this.running = false;
    if (this.timer !== null) {
      this.scheduler.cancel(this.timer);
      this.timer = null;
    }
  }

  /**
   * Drain the mailbox once.
   *
   * @returns true if a message was rendered
   */
  tick(): boolean {
    const message = this.context.mailbox.tryTake();
    if (message === null) {
      return false;
    }

    if (
      this.context.config.discardStaleResults &&
      message.epoch < this.lastDisplayedEpoch
    ) {
      debug(`Discarding stale ${message.kind} #${message.epoch}`, {
        lastDisplayed: this.lastDisplayedEpoch,
      });
      return false;
    }

    this.lastDisplayedEpoch = Math.max(this.lastDisplayedEpoch, message.epoch);
    this.context.display.showOutput(message.text);
    return true;
  }

  private scheduleNext(): void {
    this.timer = this.scheduler.schedule(
      this.context.config.pollInterval,
      this.fire
    );
  }

  private readonly fire = (): void => {
    this.timer = null;
    this.firing = true;
    try {
      this.tick();
    } finally {
      this.firing = false;
      if (this.running) {
        this.scheduleNext();
      }
    }
  };
}
