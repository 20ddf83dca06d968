#!/usr/bin/env node
/**
 * Main entry point for the runbridge CLI.
 *
 * Sets up Commander.js with the two editor actions, build and run, each
 * executing the configured toolchain in the directory of the given file.
 */

/* eslint-disable unicorn/no-process-exit, n/no-process-exit */
// This is a CLI entry point - process.exit() is appropriate here

import { Command } from 'commander';
import { TASK_KINDS } from './bridge/task-kind.js';
import { toolchainCommand, type ToolchainOptions } from './commands/toolchain.js';
import { CONFIG_FILE_NAME, ConfigLoader } from './config/config-loader.js';
import { EXIT_CODE } from './constants/exit-codes.js';
import { TerminalDisplay } from './display/terminal-display.js';
import { setVerbose } from './utils/logger.js';

const program = new Command();

program
  .name('runbridge')
  .description(
    "Run an editor's build and run commands without blocking its UI loop"
  )
  .version('0.1.0');

const descriptions = {
  build: 'Build the project containing a file',
  run: 'Run the program containing a file',
} as const;

for (const kind of TASK_KINDS) {
  program
    .command(kind)
    .description(descriptions[kind])
    .argument('[file]', 'File open in the editor (omit for an unsaved document)')
    .option(
      '--config <path>',
      `Path to configuration file (default: ./${CONFIG_FILE_NAME})`
    )
    .option('--verbose', 'Enable verbose output')
    .action(async (file: string | undefined, options: ToolchainOptions) => {
      try {
        // Instantiate dependencies (ONLY place with 'new')
        const display = new TerminalDisplay();
        const configLoader = new ConfigLoader();
        setVerbose(Boolean(options.verbose));

        const exitCode = await toolchainCommand(kind, file, options, {
          configLoader,
          display,
        });
        if (exitCode !== EXIT_CODE.SUCCESS) {
          process.exit(exitCode);
        }
      } catch (error) {
        // Unexpected error (commands should return exit codes, not throw)
        const errorDisplay = new TerminalDisplay();
        errorDisplay.showError(
          `Unexpected error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODE.ERROR);
      }
    });
}

program.parseAsync(process.argv).catch((error: unknown) => {
  new TerminalDisplay().showError(
    error instanceof Error ? error.message : String(error)
  );
  process.exit(EXIT_CODE.ERROR);
});
