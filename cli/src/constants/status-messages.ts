/**
 * Status texts shown in the output view while a task is in flight or
 * when a task cannot start.
 */

import type { TaskKind } from '../bridge/task-kind.js';

export const STATUS_MESSAGE = {
  BUILDING: 'Building...\n',
  RUNNING: 'Running...\n',
  NO_FILE: 'No file open. Please save first.',
} as const;

/**
 * Placeholder rendered before any background result exists.
 */
export function placeholderFor(kind: TaskKind): string {
  return kind === 'build' ? STATUS_MESSAGE.BUILDING : STATUS_MESSAGE.RUNNING;
}
