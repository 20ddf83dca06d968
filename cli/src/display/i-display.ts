/**
 * Display interfaces for the output view and terminal messages.
 *
 * Commands and the bridge inject these rather than writing to the console
 * directly, so they can be driven by a mock in tests.
 */

/**
 * Status/output sink written by the task runner and the output poller.
 *
 * Implementations only render; they make no decisions of their own.
 */
export interface IOutputSink {
  /**
   * Replace the displayed output with the given text.
   *
   * @param text - Full text for the output view, newline-terminated
   */
  showOutput(text: string): void;

  /**
   * Report an error the user must acknowledge.
   *
   * @param message - Error message to display
   */
  showError(message: string): void;
}

/**
 * Display interface used by CLI commands.
 */
export interface IDisplay extends IOutputSink {
  /**
   * Display a simple message.
   *
   * @param message - Message to display
   */
  showMessage(message: string): void;
}
