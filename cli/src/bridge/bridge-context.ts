/**
 * Context object shared by the task runner and the output poller.
 *
 * Owns the mailbox and holds the collaborators the bridge talks to, so the
 * bridge can be assembled and tested without a full editor.
 */

import type { IConfig } from '../config/i-config.js';
import type { IOutputSink } from '../display/i-display.js';
import type { IEditorState } from '../editor/i-editor-state.js';
import type { IProcessInvoker } from '../process/i-process-invoker.js';
import { ProcessInvoker } from '../process/process-invoker.js';
import { LatestMailbox, type AcceptPolicy } from './mailbox.js';
import type { TaskKind } from './task-kind.js';

/**
 * Formatted result travelling from a background task to the UI.
 */
export interface OutputMessage {
  /** Request number, increasing with every started task */
  readonly epoch: number;
  readonly kind: TaskKind;
  readonly text: string;
}

export interface BridgeContext {
  readonly config: IConfig;
  readonly editor: IEditorState;
  readonly display: IOutputSink;
  readonly invoker: IProcessInvoker;
  readonly mailbox: LatestMailbox<OutputMessage>;
}

export interface BridgeContextOptions {
  config: IConfig;
  editor: IEditorState;
  display: IOutputSink;
  /** Defaults to a {@link ProcessInvoker} */
  invoker?: IProcessInvoker;
}

/**
 * Accept policy for ordered delivery: a result never replaces a pending
 * result from a later request.
 */
export const keepNewestEpoch: AcceptPolicy<OutputMessage> = (
  pending,
  incoming
) => incoming.epoch >= pending.epoch;

/**
 * Assemble a context with a fresh mailbox.
 *
 * The mailbox replaces pending messages unconditionally unless
 * `config.discardStaleResults` is set.
 */
export function createBridgeContext(
  options: BridgeContextOptions
): BridgeContext {
  const { config, editor, display } = options;
  return {
    config,
    editor,
    display,
    invoker: options.invoker ?? new ProcessInvoker(),
    mailbox: new LatestMailbox<OutputMessage>(
      config.discardStaleResults ? keepNewestEpoch : undefined
    ),
  };
}
