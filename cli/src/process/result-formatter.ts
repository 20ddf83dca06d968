/**
 * Turns a captured command outcome into the text shown in the output view.
 */

import type { CommandOutcome } from './i-process-invoker.js';

/**
 * Upper-case the first character of a label ("build" -> "Build").
 */
export function capitalize(label: string): string {
  return label.charAt(0).toUpperCase() + label.slice(1);
}

/**
 * Format an outcome for display.
 *
 * Rules, first match wins:
 * 1. failed, no output: `<label> failed: <error>\n`
 * 2. failed with output: `<Label> failed:\n<output>`
 * 3. succeeded, no output: `<Label> successful\n`
 * 4. succeeded with output: `<Label> output:\n<output>`
 *
 * Captured output is decoded as UTF-8 and appended verbatim.
 *
 * @param outcome - Outcome produced by the process invoker
 * @param label - Operation label, e.g. "build" or "run"
 */
export function formatOutcome(outcome: CommandOutcome, label: string): string {
  const hasOutput = outcome.output.length > 0;
  const title = capitalize(label);

  if (!outcome.succeeded) {
    if (!hasOutput) {
      return `${label} failed: ${outcome.error ?? 'unknown error'}\n`;
    }
    return `${title} failed:\n${outcome.output.toString('utf8')}`;
  }

  if (!hasOutput) {
    return `${title} successful\n`;
  }
  return `${title} output:\n${outcome.output.toString('utf8')}`;
}
