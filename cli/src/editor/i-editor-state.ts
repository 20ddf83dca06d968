/**
 * Interface for the editor state consulted before a build or run.
 */

/**
 * Editor-state provider.
 *
 * Implementations expose the document being edited: whether it has unsaved
 * changes, how to persist it, and where it lives on disk.
 */
export interface IEditorState {
  /**
   * Whether the document has modifications not yet written to disk.
   */
  isModified(): boolean;

  /**
   * Write the document to its current path.
   *
   * @throws Error if the document has no path or the write fails
   */
  save(): void;

  /**
   * Directory containing the current file.
   *
   * @returns Absolute directory path, or null when no file is open
   */
  currentDirectory(): string | null;
}
