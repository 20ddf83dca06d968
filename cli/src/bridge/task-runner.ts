/**
 * Starts build and run tasks without blocking the event loop.
 *
 * The synchronous part of a request (precondition check, save, placeholder)
 * runs on the UI side. The toolchain itself runs as a background task whose
 * only way back to the UI is the mailbox; the output poller picks the result
 * up from there.
 */

import { placeholderFor, STATUS_MESSAGE } from '../constants/status-messages.js';
import {
  createCommandRequest,
  failedOutcome,
  type CommandOutcome,
  type CommandRequest,
} from '../process/i-process-invoker.js';
import { formatOutcome } from '../process/result-formatter.js';
import { debug, warn } from '../utils/logger.js';
import type { BridgeContext, OutputMessage } from './bridge-context.js';
import type { TaskKind } from './task-kind.js';

/**
 * Summary of a finished background task, resolved once its message has
 * been offered to the mailbox.
 */
export interface TaskReport {
  readonly epoch: number;
  readonly kind: TaskKind;
  readonly outcome: CommandOutcome;
  readonly message: OutputMessage;
}

export class TaskRunner {
  private epoch = 0;
  private readonly inFlight = new Set<Promise<TaskReport>>();

  constructor(private readonly context: BridgeContext) {}

  /**
   * Start the configured build command for the current file.
   *
   * @returns Promise for the background task, or null if it was not started
   */
  build(): Promise<TaskReport> | null {
    return this.start('build');
  }

  /**
   * Start the configured run command for the current file.
   *
   * @returns Promise for the background task, or null if it was not started
   */
  run(): Promise<TaskReport> | null {
    return this.start('run');
  }

  /**
   * Validate, save, build the request, show the placeholder and launch one
   * background task.
   *
   * Every step before the launch happens before this method returns.
   * Errors found here are shown through `display.showError` and no task is
   * started; the placeholder is only shown once nothing can fail anymore.
   * The returned promise never rejects.
   *
   * @param kind - Which toolchain action to launch
   * @returns Promise for the background task, or null if it was not started
   */
  start(kind: TaskKind): Promise<TaskReport> | null {
    const { config, display, editor } = this.context;

    const directory = editor.currentDirectory();
    if (directory === null) {
      display.showError(STATUS_MESSAGE.NO_FILE);
      return null;
    }

    if (editor.isModified()) {
      try {
        editor.save();
      } catch (error) {
        display.showError(
          `Error saving file: ${error instanceof Error ? error.message : String(error)}`
        );
        return null;
      }
    }

    let request: CommandRequest;
    try {
      request = createCommandRequest(
        config.toolchain.command,
        config.toolchain[kind],
        directory
      );
    } catch (error) {
      display.showError(error instanceof Error ? error.message : String(error));
      return null;
    }

    display.showOutput(placeholderFor(kind));

    const epoch = ++this.epoch;
    debug(`Starting ${kind} #${epoch}`, {
      command: request.command,
      args: request.args,
      cwd: request.cwd,
    });

    const task: Promise<TaskReport> = this.execute(epoch, kind, request).finally(
      () => {
        this.inFlight.delete(task);
      }
    );
    this.inFlight.add(task);
    return task;
  }

  /**
   * Resolve once every task started so far has offered its result.
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  /**
   * Background part of a task: invoke, format, offer.
   */
  private async execute(
    epoch: number,
    kind: TaskKind,
    request: CommandRequest
  ): Promise<TaskReport> {
    let outcome: CommandOutcome;
    try {
      outcome = await this.context.invoker.invoke(request);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      warn(`${kind} #${epoch}: invoker failed: ${reason}`);
      outcome = failedOutcome(reason);
    }

    const message: OutputMessage = {
      epoch,
      kind,
      text: formatOutcome(outcome, kind),
    };
    const result = this.context.mailbox.offer(message);
    debug(`Finished ${kind} #${epoch}`, {
      succeeded: outcome.succeeded,
      mailbox: result,
    });

    return { epoch, kind, outcome, message };
  }
}
