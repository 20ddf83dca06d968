/**
 * Diagnostic logging to stderr.
 *
 * Debug lines are written only when RUNBRIDGE_DEBUG is set or verbose
 * mode was switched on (--verbose). Stdout stays reserved for command output.
 */

import chalk from 'chalk';

let verbose = false;

/**
 * Enable or disable debug output for the rest of the process.
 */
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function isDebugEnabled(): boolean {
  return verbose || Boolean(process.env.RUNBRIDGE_DEBUG);
}

export function debug(message: string, data?: unknown): void {
  if (!isDebugEnabled()) return;
  const suffix = data === undefined ? '' : ' ' + JSON.stringify(data);
  process.stderr.write(
    chalk.dim(`[runbridge] ${new Date().toISOString()} ${message}${suffix}`) +
      '\n'
  );
}

export function warn(message: string): void {
  process.stderr.write(chalk.yellow(`[runbridge] ${message}`) + '\n');
}
