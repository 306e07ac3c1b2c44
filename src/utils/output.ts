/**
 * Output mode, exit codes and the writers that respect them. Results go to
 * stdout (successes) or stderr (failures); logs always go to stderr.
 */

import type { ErrorKind } from './errors.js';

export type OutputMode = 'human' | 'json' | 'quiet';

let currentMode: OutputMode = 'human';

export function setOutputMode(mode: OutputMode): void {
  currentMode = mode;
}

export function getOutputMode(): OutputMode {
  return currentMode;
}

export const SUCCESS_MARK = '✓';
export const FAILURE_MARK = '✗';

// ============================================================================
// EXIT CODES
// ============================================================================

export const ExitCode = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  USAGE_ERROR: 2,
  CONFIG_ERROR: 3,
  SIGINT: 130,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

const EXIT_CODE_BY_KIND: Record<ErrorKind, ExitCodeValue> = {
  UsageError: ExitCode.USAGE_ERROR,
  InvalidArgument: ExitCode.USAGE_ERROR,
  ConfigNotFound: ExitCode.CONFIG_ERROR,
  ConfigMalformed: ExitCode.CONFIG_ERROR,
  ConfigInvalid: ExitCode.CONFIG_ERROR,
  TransportFailure: ExitCode.GENERAL_ERROR,
};

export function exitCodeFor(kind: ErrorKind | undefined): ExitCodeValue {
  return kind === undefined ? ExitCode.GENERAL_ERROR : EXIT_CODE_BY_KIND[kind];
}

// ============================================================================
// WRITERS
// ============================================================================

/**
 * Print a command result. In JSON mode, serializes `data` to stdout.
 * In quiet mode, prints nothing. In human mode, calls the formatter.
 */
export function printResult(data: unknown, formatter: () => void): void {
  if (currentMode === 'json') {
    process.stdout.write(JSON.stringify(data, null, 2) + '\n');
    return;
  }

  if (currentMode === 'human') {
    formatter();
  }
}

/**
 * Print a failure. In JSON mode the error object goes to stdout so that
 * scripts read one document either way; otherwise the formatter writes to
 * stderr, quiet mode included.
 */
export function printFailure(data: unknown, formatter: () => void): void {
  if (currentMode === 'json') {
    process.stdout.write(JSON.stringify(data, null, 2) + '\n');
    return;
  }

  formatter();
}

/**
 * Check if the current environment is interactive (TTY).
 */
export function isInteractive(): boolean {
  return Boolean(process.stderr.isTTY) && currentMode === 'human';
}
