import type { ActionData, ActionName, ActionPayload } from '../commands/types.js';
import type { ErrorKind } from '../utils/errors.js';

/**
 * Publish one action to the bus. Resolves once the transport has accepted
 * the message; rejects on any transport or server error.
 */
export type SendCapability = (
  channel: string,
  domain: string,
  action: ActionName,
  data: ActionData
) => Promise<void>;

/** The outcome of one invocation, produced exactly once. */
export type DispatchResult =
  | { ok: true; summary: string; payload: ActionPayload }
  | { ok: false; summary: string; errorKind: ErrorKind; payload?: ActionPayload };
