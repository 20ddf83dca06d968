/**
 * The two user actions that launch the toolchain.
 */
export type TaskKind = 'build' | 'run';

export const TASK_KINDS: readonly TaskKind[] = ['build', 'run'];
