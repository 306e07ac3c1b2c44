#!/usr/bin/env node
/**
 * Kryten CLI: Main Entry Point
 */

import { run } from './cli/run.js';
import { ExitCode } from './utils/output.js';

// ── EPIPE handler ─────────────────────────────────────────────────────────
// A downstream reader (`head`, `less -q`) may close the pipe before we
// finish writing. Exit cleanly instead of crashing.

function handlePipeError(err: NodeJS.ErrnoException): void {
  if (err.code === 'EPIPE') {
    process.exit(0);
  }
  throw err;
}

process.stdout.on('error', handlePipeError);
process.stderr.on('error', handlePipeError);

// ── Unhandled rejection safety net ──────────────────────────────────────────

process.on('unhandledRejection', (reason) => {
  const message = reason instanceof Error ? reason.message : String(reason);
  process.stderr.write(`\n  Fatal: ${message}\n\n`);
  process.exitCode = ExitCode.GENERAL_ERROR;
});

// ── SIGINT ──────────────────────────────────────────────────────────────────

process.on('SIGINT', () => {
  process.stderr.write('\nAborted.\n');
  process.exit(ExitCode.SIGINT);
});

// ── CLI ──────────────────────────────────────────────────────────────────────

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`\n  Fatal: ${message}\n\n`);
    process.exitCode = ExitCode.GENERAL_ERROR;
  }
);
