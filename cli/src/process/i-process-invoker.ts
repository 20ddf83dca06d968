/**
 * Contract for launching an external program and capturing its outcome.
 */

/**
 * One invocation of an external program. Frozen once created.
 */
export interface CommandRequest {
  /** Program to launch, resolved through PATH */
  readonly command: string;

  /** Arguments passed to the program */
  readonly args: readonly string[];

  /** Working directory; the current directory is inherited when absent */
  readonly cwd?: string;
}

/**
 * Captured result of a finished invocation.
 *
 * `output` holds stdout and stderr combined in arrival order. `error` is
 * present exactly when `succeeded` is false.
 */
export interface CommandOutcome {
  readonly succeeded: boolean;
  readonly output: Buffer;
  readonly error?: string;
}

/**
 * Launches external programs.
 *
 * Implementations resolve once the program terminated and never reject:
 * launch failures and non-zero exits are reported as failed outcomes.
 */
export interface IProcessInvoker {
  /**
   * Launch the program and wait for it to terminate.
   *
   * @param request - Program, arguments and working directory
   * @returns Promise resolving to the captured outcome
   */
  invoke(request: CommandRequest): Promise<CommandOutcome>;
}

/**
 * Build a frozen {@link CommandRequest}.
 *
 * @throws Error if command is empty
 */
export function createCommandRequest(
  command: string,
  args: readonly string[],
  cwd?: string
): CommandRequest {
  if (command.trim() === '') {
    throw new Error('Command cannot be empty');
  }
  return Object.freeze({
    command,
    args: Object.freeze([...args]),
    ...(cwd === undefined ? {} : { cwd }),
  });
}

/**
 * Failed outcome with no captured output.
 */
export function failedOutcome(error: string, output?: Buffer): CommandOutcome {
  return { succeeded: false, output: output ?? Buffer.alloc(0), error };
}
