/**
 * A Command is what the user asked for, parsed from argv. An ActionPayload
 * is what goes on the bus. Every command kind maps to exactly one action.
 */

import type { MediaProvider } from '../media/resolver.js';

// ============================================================================
// COMMANDS
// ============================================================================

export type Command =
  | { readonly kind: 'say'; readonly message: string }
  | { readonly kind: 'pm'; readonly username: string; readonly message: string }
  | { readonly kind: 'playlistAdd'; readonly media: string }
  | { readonly kind: 'playlistAddNext'; readonly media: string }
  | { readonly kind: 'playlistDelete'; readonly uid: number }
  | { readonly kind: 'playlistMove'; readonly uid: number; readonly afterUid: number }
  | { readonly kind: 'playlistJump'; readonly uid: number }
  | { readonly kind: 'playlistClear' }
  | { readonly kind: 'playlistShuffle' }
  | { readonly kind: 'playlistSetTemp'; readonly uid: number; readonly temp: boolean }
  | { readonly kind: 'pause' }
  | { readonly kind: 'play' }
  | { readonly kind: 'seek'; readonly time: number }
  | { readonly kind: 'kick'; readonly username: string; readonly reason?: string }
  | { readonly kind: 'ban'; readonly username: string; readonly reason?: string }
  | { readonly kind: 'voteskip' };

export type CommandKind = Command['kind'];

// ============================================================================
// ACTIONS
// ============================================================================

export type QueuePosition = 'end' | 'next';

/** Data fields per action, exactly as the bridge reads them. */
export interface ActionDataMap {
  chat: { message: string };
  pm: { username: string; message: string };
  queue: { type: MediaProvider; id: string; position: QueuePosition };
  delete: { uid: number };
  move: { uid: number; afterUid: number };
  jump: { uid: number };
  clear: Record<string, never>;
  shuffle: Record<string, never>;
  setTemp: { uid: number; temp: boolean };
  pause: Record<string, never>;
  play: Record<string, never>;
  seek: { time: number };
  kick: { username: string; reason?: string };
  ban: { username: string; reason?: string };
  voteskip: Record<string, never>;
}

export type ActionName = keyof ActionDataMap;

export type ActionData = ActionDataMap[ActionName];

export const ACTION_NAMES: readonly ActionName[] = [
  'chat', 'pm', 'queue', 'delete', 'move', 'jump', 'clear', 'shuffle',
  'setTemp', 'pause', 'play', 'seek', 'kick', 'ban', 'voteskip',
];

/** One message for the bus, addressed to a channel on a domain. */
export interface ActionPayload<A extends ActionName = ActionName> {
  action: A;
  channel: string;
  domain: string;
  data: ActionDataMap[A];
}
