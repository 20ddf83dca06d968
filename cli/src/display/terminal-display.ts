/**
 * Terminal display implementation.
 *
 * The output view is stdout: each replacement is written after a rule so
 * successive results stay apart. Everything else goes through the console
 * with chalk colours.
 */

import chalk from 'chalk';
import type { IDisplay } from './i-display.js';

/**
 * Width of the rule printed before each output replacement.
 */
const RULE_WIDTH = 40;

export class TerminalDisplay implements IDisplay {
  private hasOutput = false;

  constructor(
    private readonly stdout: NodeJS.WritableStream = process.stdout
  ) {}

  /**
   * Replace the output view. A terminal cannot erase what it printed, so
   * replacements after the first are preceded by a dim rule.
   */
  public showOutput(text: string): void {
    if (this.hasOutput) {
      this.stdout.write(chalk.dim('─'.repeat(RULE_WIDTH)) + '\n');
    }
    this.hasOutput = true;
    this.stdout.write(text);
  }

  /**
   * Display an error message.
   */
  public showError(message: string): void {
    console.error(chalk.red('Error: ') + message);
  }

  /**
   * Display a simple message.
   */
  public showMessage(message: string): void {
    console.log(message);
  }
}
