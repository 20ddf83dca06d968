/**
 * Configuration loader for runbridge.
 *
 * Loads and validates user configuration from a JSON file.
 */

import { existsSync, statSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { validateAndMerge } from './config-validator.js';
import type { IConfigLoader } from './i-config-loader.js';
import type { IConfig } from './i-config.js';

/**
 * File name looked up in the current directory when no path is given.
 */
export const CONFIG_FILE_NAME = 'runbridge.config.json';

/**
 * Configuration loader class.
 */
export class ConfigLoader implements IConfigLoader {
  /**
   * @param cwd - Directory searched for {@link CONFIG_FILE_NAME}
   */
  constructor(private readonly cwd: string = process.cwd()) {}

  /**
   * Load configuration from a file path.
   *
   * Searches for configuration in the following order:
   * 1. Provided configPath parameter
   * 2. runbridge.config.json in the working directory
   * 3. Default configuration
   *
   * @param configPath - Optional path to configuration file
   * @returns Validated configuration object
   * @throws Error if config file is missing, malformed or validation fails
   */
  async load(configPath?: string): Promise<IConfig> {
    let resolvedPath: string | null = null;

    if (configPath === undefined) {
      // Auto-discovery: a missing file just means defaults
      const defaultPath = path.resolve(this.cwd, CONFIG_FILE_NAME);
      if (existsSync(defaultPath)) {
        resolvedPath = defaultPath;
      }
    } else {
      resolvedPath = this.validateConfigPath(configPath);
    }

    if (!resolvedPath) {
      return validateAndMerge({});
    }

    const content = await readFile(resolvedPath, 'utf8');

    let userConfig: unknown;
    try {
      userConfig = JSON.parse(content);
    } catch (error) {
      throw new Error(
        [
          'Config file is not valid JSON.',
          '',
          `Config file: ${resolvedPath}`,
          '',
          'Technical details:',
          error instanceof Error ? error.message : String(error),
        ].join('\n')
      );
    }

    try {
      return validateAndMerge(userConfig);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`${message}\n\nConfig file: ${resolvedPath}`);
    }
  }

  /**
   * Resolve an explicit config path and check that it names a file.
   */
  private validateConfigPath(configPath: string): string {
    // Reject empty strings at the API boundary
    if (configPath.trim() === '') {
      throw new Error(
        'Config file path cannot be empty.\n' +
          'Please provide a valid config file path.'
      );
    }

    const absolutePath = path.resolve(this.cwd, configPath);
    if (!existsSync(absolutePath)) {
      throw new Error(
        `Config file not found: ${absolutePath}\n` +
          'Please check the path and try again.'
      );
    }
    if (!statSync(absolutePath).isFile()) {
      throw new Error(
        `Config path is not a file: ${absolutePath}\n` +
          'Please provide a path to a JSON config file.'
      );
    }
    return absolutePath;
  }
}
