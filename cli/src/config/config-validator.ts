/**
 * Configuration validation functions.
 *
 * Pure functions for validating and merging user configuration with defaults.
 * Separated from ConfigLoader to enable testing without file I/O.
 */

import { z } from 'zod';
import type { IConfig, IUserConfig } from './i-config.js';
import { defaultConfig } from './i-config.js';

/**
 * Poll intervals above this value make results feel laggy.
 */
const SLOW_POLL_INTERVAL_MS = 1000;

/**
 * Schema for a user configuration file. Every field is optional; unknown
 * fields are rejected so that typos surface instead of being ignored.
 */
export const UserConfigSchema = z
  .object({
    pollInterval: z.number().int().min(1).max(60_000),
    toolchain: z
      .object({
        command: z.string().trim().min(1, 'must be a non-empty string'),
        build: z.array(z.string()),
        run: z.array(z.string()),
      })
      .strict()
      .partial(),
    discardStaleResults: z.boolean(),
  })
  .strict()
  .partial();

/**
 * Render a zod error as one line per offending field.
 *
 * @param error - Validation error raised by {@link UserConfigSchema}
 * @returns Multi-line message listing each field and its problem
 */
export function formatValidationError(error: z.ZodError): string {
  const issues = error.issues;

  if (issues.length === 0) {
    return 'Invalid configuration: Unknown validation error';
  }

  const fieldErrors = issues.map((issue) => {
    const path = issue.path.join('.');
    const pathDisplay = path || 'root';
    return `  - ${pathDisplay}: ${issue.message}`;
  });

  return 'Invalid configuration:\n' + fieldErrors.join('\n');
}

/**
 * Validate user configuration and merge with defaults.
 *
 * @param userConfig - User-provided configuration (any parsed JSON value)
 * @returns Validated and merged configuration
 * @throws Error if validation fails
 */
export function validateAndMerge(userConfig: unknown): IConfig {
  const result = UserConfigSchema.safeParse(userConfig);
  if (!result.success) {
    throw new Error(formatValidationError(result.error));
  }

  const validated: IUserConfig = result.data;

  if (
    validated.pollInterval !== undefined &&
    validated.pollInterval > SLOW_POLL_INTERVAL_MS
  ) {
    console.warn(
      `Warning: pollInterval (${validated.pollInterval}ms) is very high. ` +
        `Results will appear up to ${validated.pollInterval}ms after the command finishes. ` +
        `Recommended range: 50-${SLOW_POLL_INTERVAL_MS}ms.`
    );
  }

  // Merge with defaults
  return {
    pollInterval: validated.pollInterval ?? defaultConfig.pollInterval,
    toolchain: {
      command: validated.toolchain?.command ?? defaultConfig.toolchain.command,
      build: [...(validated.toolchain?.build ?? defaultConfig.toolchain.build)],
      run: [...(validated.toolchain?.run ?? defaultConfig.toolchain.run)],
    },
    discardStaleResults:
      validated.discardStaleResults ?? defaultConfig.discardStaleResults,
  };
}
