/**
 * Interface for configuration loading.
 */

import type { IConfig } from './i-config.js';

/**
 * Configuration loader interface.
 */
export interface IConfigLoader {
  /**
   * Load configuration from a file path.
   *
   * @param configPath - Optional path to configuration file
   * @returns Validated configuration object
   * @throws Error if config file is malformed or validation fails
   */
  load(configPath?: string): Promise<IConfig>;
}
