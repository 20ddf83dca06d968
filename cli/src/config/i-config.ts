/**
 * Configuration interface for runbridge.
 *
 * Configuration is read from a JSON file (runbridge.config.json by default)
 * and merged over {@link defaultConfig}.
 */

/**
 * Toolchain invoked by the build and run actions.
 */
export interface IToolchainConfig {
  /**
   * Program to launch, resolved through PATH.
   */
  command: string;

  /**
   * Arguments for the build action.
   */
  build: string[];

  /**
   * Arguments for the run action.
   */
  run: string[];
}

/**
 * Main configuration interface.
 */
export interface IConfig {
  /**
   * Interval in milliseconds between two firings of the output poller.
   */
  pollInterval: number;

  /**
   * Command line used by the build and run actions.
   */
  toolchain: IToolchainConfig;

  /**
   * Tag every result with its request number and never display a result
   * older than the last one displayed.
   *
   * Off by default: a slow earlier request may then overwrite the result
   * of a later one that has not been displayed yet.
   */
  discardStaleResults: boolean;
}

/**
 * Shape accepted from a configuration file before merging.
 */
export type IUserConfig = Partial<
  Omit<IConfig, 'toolchain'> & { toolchain: Partial<IToolchainConfig> }
>;

/**
 * Default configuration values.
 */
export const defaultConfig: IConfig = {
  pollInterval: 100,
  toolchain: {
    command: 'go',
    build: ['build', './...'],
    run: ['run', '.'],
  },
  discardStaleResults: false,
};
