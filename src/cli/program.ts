/**
 * Kryten CLI: Program Definition
 *
 * Commander program with one subcommand per bus action. Actions do not talk
 * to the network: each one hands the parsed Command to `onCommand` and the
 * caller decides what to do with it.
 */

import { Command } from 'commander';
import { CLI_NAME, VERSION_STRING } from '../config/defaults.js';
import type { Command as KrytenCommand } from '../commands/types.js';
import {
  expectKeyword,
  parseBoolean,
  parseSeconds,
  parseUid,
} from '../commands/arguments.js';
import { registerGlobalOptions } from './global-options.js';

export interface ProgramOutput {
  writeOut(str: string): void;
  writeErr(str: string): void;
  outputError(str: string): void;
}

export function createProgram(
  onCommand: (command: KrytenCommand) => void,
  output: ProgramOutput
): Command {
  const program = new Command();

  // Settings below are copied to every subcommand created afterwards.
  program
    .name(CLI_NAME)
    .description('Send chat, playlist, playback and moderation commands to a CyTube channel over NATS')
    .version(VERSION_STRING, '-V, --version', 'Show version information')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => output.writeOut(str),
      writeErr: (str) => output.writeErr(str),
      outputError: (str) => output.outputError(str),
    })
    .showHelpAfterError()
    .allowExcessArguments(false);

  // ── Global Options ────────────────────────────────────────────────────

  registerGlobalOptions(program);

  // ── Chat ──────────────────────────────────────────────────────────────

  program
    .command('say')
    .description('Send a chat message')
    .argument('<message>', 'Message text')
    .action((message: string) => onCommand({ kind: 'say', message }));

  program
    .command('pm')
    .description('Send a private message')
    .argument('<username>', 'Target username')
    .argument('<message>', 'Message text')
    .action((username: string, message: string) => onCommand({ kind: 'pm', username, message }));

  // ── Playlist ──────────────────────────────────────────────────────────

  registerPlaylistCommands(program, onCommand);

  // ── Playback ──────────────────────────────────────────────────────────

  program
    .command('pause')
    .description('Pause playback')
    .action(() => onCommand({ kind: 'pause' }));

  program
    .command('play')
    .description('Resume playback')
    .action(() => onCommand({ kind: 'play' }));

  program
    .command('seek')
    .description('Seek to a timestamp')
    .argument('<seconds>', 'Time in seconds', parseSeconds)
    // Lets a negative value such as `-5` through as the argument.
    .allowUnknownOption()
    .action((time: number) => onCommand({ kind: 'seek', time }));

  // ── Moderation ────────────────────────────────────────────────────────

  program
    .command('kick')
    .description('Kick a user from the channel')
    .argument('<username>', 'Username to kick')
    .argument('[reason]', 'Kick reason')
    .action((username: string, reason: string | undefined) =>
      onCommand(reason === undefined ? { kind: 'kick', username } : { kind: 'kick', username, reason })
    );

  program
    .command('ban')
    .description('Ban a user from the channel')
    .argument('<username>', 'Username to ban')
    .argument('[reason]', 'Ban reason')
    .action((username: string, reason: string | undefined) =>
      onCommand(reason === undefined ? { kind: 'ban', username } : { kind: 'ban', username, reason })
    );

  program
    .command('voteskip')
    .description('Vote to skip the current video')
    .action(() => onCommand({ kind: 'voteskip' }));

  return program;
}

function registerPlaylistCommands(
  program: Command,
  onCommand: (command: KrytenCommand) => void
): void {
  const playlist = program
    .command('playlist')
    .description('Playlist management');

  playlist
    .command('add')
    .description('Add a video to the end of the playlist')
    .argument('<url>', 'Video URL, provider:id, or ID')
    .action((media: string) => onCommand({ kind: 'playlistAdd', media }));

  playlist
    .command('addnext')
    .description('Add a video to play next')
    .argument('<url>', 'Video URL, provider:id, or ID')
    .action((media: string) => onCommand({ kind: 'playlistAddNext', media }));

  playlist
    .command('del')
    .alias('delete')
    .description('Delete a video from the playlist')
    .argument('<uid>', 'Playlist entry UID', parseUid)
    .action((uid: number) => onCommand({ kind: 'playlistDelete', uid }));

  playlist
    .command('move')
    .description('Move a video after another one')
    .argument('<uid>', 'UID of the entry to move', parseUid)
    .argument('<after>', 'The literal word "after"', expectKeyword('after'))
    .argument('<afterUid>', 'UID to place it after', parseUid)
    .action((uid: number, _after: string, afterUid: number) =>
      onCommand({ kind: 'playlistMove', uid, afterUid })
    );

  playlist
    .command('jump')
    .description('Jump to a video')
    .argument('<uid>', 'Playlist entry UID', parseUid)
    .action((uid: number) => onCommand({ kind: 'playlistJump', uid }));

  playlist
    .command('clear')
    .description('Clear the playlist')
    .action(() => onCommand({ kind: 'playlistClear' }));

  playlist
    .command('shuffle')
    .description('Shuffle the playlist')
    .action(() => onCommand({ kind: 'playlistShuffle' }));

  playlist
    .command('settemp')
    .description('Mark a video as temporary (removed after it plays) or permanent')
    .argument('<uid>', 'Playlist entry UID', parseUid)
    .argument('<temp>', 'true or false', parseBoolean)
    .action((uid: number, temp: boolean) => onCommand({ kind: 'playlistSetTemp', uid, temp }));
}
