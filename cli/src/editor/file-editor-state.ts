/**
 * Document backed by a file on disk.
 *
 * Holds the text in memory, tracks whether it diverged from the file, and
 * writes it back synchronously so that a build started right after saving
 * sees the new content.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import type { IEditorState } from './i-editor-state.js';

/**
 * Permissions for files written by the editor (-rw-r--r--).
 */
export const DEFAULT_FILE_MODE = 0o644;

/**
 * Extension appended by {@link FileEditorState.saveAs} to bare file names.
 */
export const DEFAULT_FILE_EXTENSION = '.go';

export class FileEditorState implements IEditorState {
  private constructor(
    private filePath: string | null,
    private text: string,
    private modified: boolean
  ) {}

  /**
   * Open an existing file.
   *
   * @param filePath - Path to the file, resolved against the current directory
   * @throws Error if the file cannot be read
   */
  static open(filePath: string): FileEditorState {
    const absolutePath = path.resolve(filePath);
    let text: string;
    try {
      text = readFileSync(absolutePath, 'utf8');
    } catch (error) {
      throw new Error(
        `Error opening file: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return new FileEditorState(absolutePath, text, false);
  }

  /**
   * A new document not associated with any file yet.
   */
  static untitled(text: string = ''): FileEditorState {
    return new FileEditorState(null, text, text.length > 0);
  }

  get path(): string | null {
    return this.filePath;
  }

  getText(): string {
    return this.text;
  }

  /**
   * Replace the document text and mark it modified.
   */
  setText(text: string): void {
    this.text = text;
    this.modified = true;
  }

  isModified(): boolean {
    return this.modified;
  }

  save(): void {
    if (this.filePath === null) {
      throw new Error('Document has no file path. Use saveAs first.');
    }
    writeFileSync(this.filePath, this.text, {
      encoding: 'utf8',
      mode: DEFAULT_FILE_MODE,
    });
    this.modified = false;
  }

  /**
   * Associate the document with a new path and save it there.
   *
   * Paths without an extension get {@link DEFAULT_FILE_EXTENSION}.
   */
  saveAs(filePath: string): void {
    let target = path.resolve(filePath);
    if (path.extname(target) === '') {
      target += DEFAULT_FILE_EXTENSION;
    }
    this.filePath = target;
    this.save();
  }

  currentDirectory(): string | null {
    return this.filePath === null ? null : path.dirname(this.filePath);
  }
}
