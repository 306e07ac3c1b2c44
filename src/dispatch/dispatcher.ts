/**
 * Kryten CLI: Dispatcher
 *
 * Validates a parsed Command, builds its ActionPayload, and calls the send
 * capability at most once. Every outcome, including a thrown send, comes
 * back as a DispatchResult.
 */

import type {
  ActionDataMap,
  ActionName,
  ActionPayload,
  Command,
  QueuePosition,
} from '../commands/types.js';
import type { EffectiveConfig } from '../config/types.js';
import { resolveMedia } from '../media/resolver.js';
import { CliError, errorMessage, type ErrorKind } from '../utils/errors.js';
import { FAILURE_MARK, SUCCESS_MARK } from '../utils/output.js';
import { createLogger } from '../utils/logger.js';
import type { DispatchResult, SendCapability } from './types.js';

const log = createLogger('Dispatcher');

// ============================================================================
// DISPATCH
// ============================================================================

export async function dispatch(
  command: Command,
  config: EffectiveConfig,
  send: SendCapability
): Promise<DispatchResult> {
  let prepared: PreparedAction;
  try {
    prepared = prepareAction(command, config.channel);
  } catch (error) {
    if (error instanceof CliError) return failureResult(error.message, error.kind);
    throw error;
  }

  const payload: ActionPayload = {
    action: prepared.action,
    channel: config.channel,
    domain: config.domain,
    data: prepared.data,
  };

  log.debug('Sending action', { action: payload.action, channel: payload.channel, domain: payload.domain });

  try {
    await send(payload.channel, payload.domain, payload.action, payload.data);
  } catch (error) {
    log.debug('Send failed', { action: payload.action, reason: errorMessage(error) });
    return {
      ok: false,
      summary: `${FAILURE_MARK} Failed to ${prepared.attempt}: ${errorMessage(error)}`,
      errorKind: 'TransportFailure',
      payload,
    };
  }

  return { ok: true, summary: `${SUCCESS_MARK} ${prepared.done}`, payload };
}

/** A failed result for errors raised before anything was sent. */
export function failureResult(message: string, kind: ErrorKind): DispatchResult {
  return { ok: false, summary: `${FAILURE_MARK} ${message}`, errorKind: kind };
}

// ============================================================================
// COMMAND -> ACTION
// ============================================================================

interface PreparedAction {
  action: ActionName;
  data: ActionDataMap[ActionName];
  /** Past tense, for the success line. */
  done: string;
  /** Infinitive, for "Failed to ..." */
  attempt: string;
}

function prepared<A extends ActionName>(
  action: A,
  data: ActionDataMap[A],
  done: string,
  attempt: string
): PreparedAction {
  return { action, data, done, attempt };
}

/**
 * Map a Command to its action and data. Throws CliError('InvalidArgument')
 * for values that parsed but cannot be sent.
 */
export function prepareAction(command: Command, channel: string): PreparedAction {
  switch (command.kind) {
    case 'say':
      requireText(command.message, 'Message');
      return prepared('chat', { message: command.message },
        `Sent chat message to ${channel}`, `send chat message to ${channel}`);

    case 'pm':
      requireText(command.username, 'Username');
      requireText(command.message, 'Message');
      return prepared('pm', { username: command.username, message: command.message },
        `Sent PM to ${command.username} in ${channel}`, `send PM to ${command.username} in ${channel}`);

    case 'playlistAdd':
      return queue(command.media, 'end', channel);

    case 'playlistAddNext':
      return queue(command.media, 'next', channel);

    case 'playlistDelete':
      return prepared('delete', { uid: command.uid },
        `Deleted media ${command.uid} from ${channel}`, `delete media ${command.uid} from ${channel}`);

    case 'playlistMove':
      return prepared('move', { uid: command.uid, afterUid: command.afterUid },
        `Moved media ${command.uid} after ${command.afterUid} in ${channel}`,
        `move media ${command.uid} after ${command.afterUid} in ${channel}`);

    case 'playlistJump':
      return prepared('jump', { uid: command.uid },
        `Jumped to media ${command.uid} in ${channel}`, `jump to media ${command.uid} in ${channel}`);

    case 'playlistClear':
      return prepared('clear', {}, `Cleared playlist in ${channel}`, `clear playlist in ${channel}`);

    case 'playlistShuffle':
      return prepared('shuffle', {}, `Shuffled playlist in ${channel}`, `shuffle playlist in ${channel}`);

    case 'playlistSetTemp':
      return prepared('setTemp', { uid: command.uid, temp: command.temp },
        `Set temp=${command.temp} for media ${command.uid} in ${channel}`,
        `set temp=${command.temp} for media ${command.uid} in ${channel}`);

    case 'pause':
      return prepared('pause', {}, `Paused playback in ${channel}`, `pause playback in ${channel}`);

    case 'play':
      return prepared('play', {}, `Resumed playback in ${channel}`, `resume playback in ${channel}`);

    case 'seek':
      if (!Number.isFinite(command.time) || command.time < 0) {
        throw new CliError(
          `Seek time must be a non-negative number of seconds (got ${command.time})`,
          'InvalidArgument'
        );
      }
      return prepared('seek', { time: command.time },
        `Seeked to ${command.time}s in ${channel}`, `seek to ${command.time}s in ${channel}`);

    case 'kick':
      requireText(command.username, 'Username');
      return prepared('kick', withReason(command.username, command.reason),
        `Kicked ${command.username} from ${channel}`, `kick ${command.username} from ${channel}`);

    case 'ban':
      requireText(command.username, 'Username');
      return prepared('ban', withReason(command.username, command.reason),
        `Banned ${command.username} from ${channel}`, `ban ${command.username} from ${channel}`);

    case 'voteskip':
      return prepared('voteskip', {}, `Voted to skip in ${channel}`, `vote to skip in ${channel}`);

    default: {
      const unhandled: never = command;
      throw new Error(`Unhandled command: ${JSON.stringify(unhandled)}`);
    }
  }
}

function queue(media: string, position: QueuePosition, channel: string): PreparedAction {
  requireText(media, 'Media URL or ID');

  const ref = resolveMedia(media);
  if (/\s/.test(ref.id)) {
    throw new CliError(`Media ID must not contain whitespace: "${ref.id}"`, 'InvalidArgument');
  }

  const where = position === 'end' ? 'to end of playlist' : 'to play next';
  return prepared('queue', { type: ref.provider, id: ref.id, position },
    `Added ${ref.provider}:${ref.id} ${where} in ${channel}`,
    `add ${ref.provider}:${ref.id} ${where} in ${channel}`);
}

/** The bridge supplies its own default reason, so an absent one is omitted. */
function withReason(username: string, reason: string | undefined): { username: string; reason?: string } {
  return reason === undefined ? { username } : { username, reason };
}

function requireText(value: string, field: string): void {
  if (value.trim() === '') {
    throw new CliError(`${field} must not be empty`, 'InvalidArgument');
  }
}
