/**
 * Build and run command implementation.
 *
 * Opens the file, wires a bridge context around it, starts the output
 * poller and requests one build or run. The command finishes once the
 * background task has offered its result and the poller has rendered it.
 */

import { createBridgeContext } from '../bridge/bridge-context.js';
import { OutputPoller } from '../bridge/output-poller.js';
import type { TaskKind } from '../bridge/task-kind.js';
import { TaskRunner, type TaskReport } from '../bridge/task-runner.js';
import type { IScheduler } from '../bridge/timer-scheduler.js';
import type { IConfigLoader } from '../config/i-config-loader.js';
import { EXIT_CODE, type ExitCode } from '../constants/exit-codes.js';
import type { IDisplay } from '../display/i-display.js';
import { FileEditorState } from '../editor/file-editor-state.js';
import type { IProcessInvoker } from '../process/i-process-invoker.js';

/**
 * Options accepted by the build and run subcommands.
 */
export interface ToolchainOptions {
  /** Path to configuration file */
  config?: string;

  /** Print the resolved command line before running it */
  verbose?: boolean;
}

/**
 * Collaborators injected by the CLI entry point.
 */
export interface ToolchainDependencies {
  configLoader: IConfigLoader;
  display: IDisplay;
  /** Defaults to the child process invoker */
  invoker?: IProcessInvoker;
  /** Defaults to Node timers */
  scheduler?: IScheduler;
}

/**
 * Core toolchain logic (extracted for testability).
 *
 * @param kind - Which action to request
 * @param filePath - File whose directory the toolchain runs in; omitted
 *   for an untitled document
 * @param options - Command options
 * @param dependencies - Injected collaborators
 * @returns Report of the finished task, or null if no task was started
 * @throws Error if configuration or the file cannot be loaded
 */
export async function toolchainCore(
  kind: TaskKind,
  filePath: string | undefined,
  options: ToolchainOptions,
  dependencies: ToolchainDependencies
): Promise<TaskReport | null> {
  const { configLoader, display } = dependencies;

  const config = await configLoader.load(options.config);

  const editor =
    filePath === undefined
      ? FileEditorState.untitled()
      : FileEditorState.open(filePath);

  if (options.verbose) {
    display.showMessage(
      `Command: ${[config.toolchain.command, ...config.toolchain[kind]].join(' ')}`
    );
    display.showMessage(
      `Directory: ${editor.currentDirectory() ?? '(no file)'}`
    );
  }

  const context = createBridgeContext({
    config,
    editor,
    display,
    invoker: dependencies.invoker,
  });
  const runner = new TaskRunner(context);
  const poller = new OutputPoller(context, dependencies.scheduler);

  poller.start();
  try {
    const task = runner.start(kind);
    if (task === null) {
      return null;
    }
    const report = await task;
    await runner.whenIdle();
    return report;
  } finally {
    poller.stop();
    // Render a result that arrived after the last firing
    poller.tick();
  }
}

/**
 * Execute the build or run command.
 * This is the entry point called by Commander.js.
 *
 * @returns EXIT_CODE.SUCCESS if the toolchain succeeded, EXIT_CODE.ERROR otherwise
 */
export async function toolchainCommand(
  kind: TaskKind,
  filePath: string | undefined,
  options: ToolchainOptions,
  dependencies: ToolchainDependencies
): Promise<ExitCode> {
  try {
    const report = await toolchainCore(kind, filePath, options, dependencies);
    if (report === null) {
      return EXIT_CODE.ERROR;
    }
    return report.outcome.succeeded ? EXIT_CODE.SUCCESS : EXIT_CODE.ERROR;
  } catch (error) {
    dependencies.display.showError(
      error instanceof Error ? error.message : String(error)
    );
    return EXIT_CODE.ERROR;
  }
}
