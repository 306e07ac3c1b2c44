/**
 * Kryten CLI: Global Options
 *
 * Flags accepted before or after any command, and how they configure the
 * logger and output mode for the rest of the invocation.
 */

import { Option, type Command } from 'commander';
import { CONFIG_PATH_ENV, DEFAULT_CONFIG_PATH } from '../config/defaults.js';
import { parseNonEmpty } from '../commands/arguments.js';
import { setLogLevel } from '../utils/logger.js';
import { setOutputMode } from '../utils/output.js';

export interface GlobalOptions {
  config: string;
  channel?: string;
  domain?: string;
  /** False when --no-color was given. */
  color: boolean;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  debug?: boolean;
}

export function registerGlobalOptions(program: Command): void {
  program
    .addOption(
      new Option('-c, --config <path>', 'Path to configuration file')
        .env(CONFIG_PATH_ENV)
        .default(DEFAULT_CONFIG_PATH)
    )
    .addOption(
      new Option('--channel <name>', 'Override the channel from the config file').argParser(parseNonEmpty)
    )
    .addOption(
      new Option('--domain <domain>', 'Override the channel domain from the config file').argParser(parseNonEmpty)
    )
    .option('--no-color', 'Disable colored output')
    .option('--json', 'Output the result as JSON')
    .option('-q, --quiet', 'Print nothing on success')
    .option('--verbose', 'Show informational log output')
    .option('--debug', 'Show debug-level diagnostics');
}

/**
 * Apply parsed global flags to the process-wide logger and output mode.
 */
export function applyGlobalOptions(opts: GlobalOptions): void {
  if (!opts.color || isColorDisabled()) {
    process.env.NO_COLOR = '1';
  }

  if (opts.json) {
    setOutputMode('json');
    process.env.NO_COLOR = '1';
  } else if (opts.quiet) {
    setOutputMode('quiet');
  } else {
    setOutputMode('human');
  }

  if (opts.debug) {
    setLogLevel('debug');
  } else if (opts.verbose) {
    setLogLevel('info');
  }
}

/**
 * Apply the output flags found in raw argv. Used when parsing failed and
 * commander produced no options. Tokens after `--` are operands.
 */
export function applyOutputFlags(argv: readonly string[]): void {
  const end = argv.indexOf('--');
  const flags = new Set(end === -1 ? argv : argv.slice(0, end));

  applyGlobalOptions({
    config: DEFAULT_CONFIG_PATH,
    color: !flags.has('--no-color'),
    json: flags.has('--json'),
    quiet: flags.has('--quiet') || flags.has('-q'),
  });
}

/**
 * Check environment signals that indicate color should be disabled.
 */
function isColorDisabled(): boolean {
  // NO_COLOR standard (https://no-color.org)
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '') return true;
  if (process.env.TERM === 'dumb') return true;
  return !process.stdout.isTTY;
}
