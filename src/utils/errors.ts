/**
 * Every failure the CLI reports is a CliError tagged with one of these kinds.
 * The kind decides the exit code (see utils/output.ts); the message is the
 * one-line diagnostic shown to the user.
 */

export type ErrorKind =
  | 'UsageError'
  | 'ConfigNotFound'
  | 'ConfigMalformed'
  | 'ConfigInvalid'
  | 'InvalidArgument'
  | 'TransportFailure';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    /** Usage text for the command that failed to parse. */
    public readonly help?: string
  ) {
    super(message);
    this.name = 'CliError';
  }
}

/** Extract a readable message from anything that was thrown. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
