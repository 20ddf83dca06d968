/**
 * Child process implementation of the process invoker.
 *
 * Spawns the requested program without a shell, captures stdout and stderr
 * into a single buffer, and maps launch errors, non-zero exits and signals
 * to failed outcomes.
 *
 * The two streams are separate pipes, so chunks are kept in the order the
 * event loop receives them. That is close to, but not guaranteed to be,
 * the order in which the program wrote them. There is no timeout: a hanging program keeps its
 * invocation pending.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import {
  failedOutcome,
  type CommandOutcome,
  type CommandRequest,
  type IProcessInvoker,
} from './i-process-invoker.js';

/**
 * Describe why a terminated process counts as failed, or null on success.
 */
export function describeExit(
  code: number | null,
  signal: NodeJS.Signals | null
): string | null {
  if (signal !== null) {
    return `signal: ${signal}`;
  }
  if (code === 0) {
    return null;
  }
  return `exit status ${code ?? 'unknown'}`;
}

/**
 * Default process invoker backed by node:child_process.
 */
export class ProcessInvoker implements IProcessInvoker {
  /**
   * Launch the program and collect its combined output.
   *
   * @param request - Program, arguments and working directory
   * @returns Promise resolving to the outcome; never rejects
   */
  invoke(request: CommandRequest): Promise<CommandOutcome> {
    return new Promise<CommandOutcome>((resolve) => {
      const chunks: Buffer[] = [];
      let settled = false;

      const settle = (outcome: CommandOutcome): void => {
        if (settled) return;
        settled = true;
        resolve(outcome);
      };

      let childProcess: ChildProcess;
      try {
        childProcess = spawn(request.command, [...request.args], {
          ...(request.cwd === undefined ? {} : { cwd: request.cwd }),
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        // spawn throws synchronously for malformed arguments (e.g. NUL bytes)
        settle(
          failedOutcome(error instanceof Error ? error.message : String(error))
        );
        return;
      }

      const collect = (data: Buffer | string): void => {
        chunks.push(typeof data === 'string' ? Buffer.from(data) : data);
      };

      childProcess.stdout?.on('data', collect);
      childProcess.stderr?.on('data', collect);

      // A launch failure may be followed by 'close'; the first event wins
      childProcess.on('error', (error: Error) => {
        settle(failedOutcome(error.message, Buffer.concat(chunks)));
      });

      childProcess.on(
        'close',
        (code: number | null, signal: NodeJS.Signals | null) => {
          const failure = describeExit(code, signal);
          const output = Buffer.concat(chunks);
          settle(
            failure === null
              ? { succeeded: true, output }
              : { succeeded: false, output, error: failure }
          );
        }
      );
    });
  }
}
