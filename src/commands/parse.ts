/**
 * Kryten CLI: Command Parser
 *
 * argv -> Command. Runs the commander program with exits overridden so that
 * every shape problem comes back as a UsageError instead of process.exit().
 */

import { CommanderError } from 'commander';
import type { Command } from './types.js';
import { createProgram } from '../cli/program.js';
import type { GlobalOptions } from '../cli/global-options.js';
import { CliError } from '../utils/errors.js';

export type ParseOutcome =
  | { kind: 'command'; command: Command; options: GlobalOptions }
  /** --help or --version: print `text` and exit successfully. */
  | { kind: 'info'; text: string };

/**
 * Parse user arguments (without the node executable and script path).
 * Throws CliError('UsageError') carrying the relevant help text.
 */
export function parseCommand(argv: readonly string[]): ParseOutcome {
  let out = '';
  let err = '';
  let errorText = '';
  let parsed: Command | undefined;

  const program = createProgram(
    (command) => {
      parsed = command;
    },
    {
      writeOut: (str) => { out += str; },
      writeErr: (str) => { err += str; },
      outputError: (str) => { errorText += str; },
    }
  );

  rejectTempFlag(argv, () => findHelp(program, ['playlist', 'settemp']));

  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (!(error instanceof CommanderError)) throw error;

    if (error.exitCode === 0) {
      return { kind: 'info', text: out };
    }

    // Missing subcommand: commander prints help instead of an error line.
    if (error.code === 'commander.help') {
      throw new CliError('No command given', 'UsageError', err.trim());
    }

    throw new CliError(cleanMessage(errorText || error.message), 'UsageError', err.trim());
  }

  if (!parsed) {
    throw new CliError('No command given', 'UsageError', program.helpInformation().trim());
  }

  return { kind: 'command', command: parsed, options: program.opts<GlobalOptions>() };
}

/**
 * `--temp` on `playlist add|addnext` is refused whatever else is on the
 * line. Temporary status is set after queueing, with `playlist settemp`.
 */
function rejectTempFlag(argv: readonly string[], settempHelp: () => string): void {
  const [command, subcommand] = positionals(argv);
  if (command !== 'playlist' || (subcommand !== 'add' && subcommand !== 'addnext')) return;

  if (argv.some((token) => token === '--temp' || token.startsWith('--temp='))) {
    throw new CliError(
      `--temp is not supported on "playlist ${subcommand}"; add the video, then run "playlist settemp <uid> true"`,
      'UsageError',
      settempHelp()
    );
  }
}

/** Global options that consume the following token. */
const VALUE_OPTIONS = new Set(['-c', '--config', '--channel', '--domain']);

function positionals(argv: readonly string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (VALUE_OPTIONS.has(token)) {
      i++;
    } else if (!token.startsWith('-')) {
      result.push(token);
    }
  }
  return result;
}

function findHelp(program: ReturnType<typeof createProgram>, path: readonly string[]): string {
  let current = program;
  for (const name of path) {
    const next = current.commands.find((c) => c.name() === name);
    if (!next) break;
    current = next;
  }
  return current.helpInformation().trim();
}

/** "error: unknown command 'sya'\n(Did you mean say?)" -> one line, no prefix. */
function cleanMessage(message: string): string {
  return message
    .replace(/^error:\s*/i, '')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join(' ');
}
