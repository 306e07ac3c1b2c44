/**
 * Commander argParser callbacks. Each throws InvalidArgumentError, which
 * commander reports as a usage error naming the offending argument.
 */

import { InvalidArgumentError } from 'commander';

/** Playlist entry UIDs are assigned by the server as non-negative integers. */
export function parseUid(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a playlist UID (non-negative integer).');
  }
  const uid = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(uid)) {
    throw new InvalidArgumentError('Playlist UID is too large.');
  }
  return uid;
}

/**
 * Seconds as a float. Negative values parse here; the dispatcher rejects them.
 */
export function parseSeconds(value: string): number {
  const trimmed = value.trim();
  const seconds = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(seconds)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return seconds;
}

const TRUE_TOKENS = new Set(['true', '1', 'yes']);
const FALSE_TOKENS = new Set(['false', '0', 'no']);

export function parseBoolean(value: string): boolean {
  const token = value.trim().toLowerCase();
  if (TRUE_TOKENS.has(token)) return true;
  if (FALSE_TOKENS.has(token)) return false;
  throw new InvalidArgumentError('Expected true or false.');
}

/** Build a parser that only accepts the literal `keyword`. */
export function expectKeyword(keyword: string): (value: string) => string {
  return (value) => {
    if (value !== keyword) {
      throw new InvalidArgumentError(`Expected the word "${keyword}".`);
    }
    return value;
  };
}

export function parseNonEmpty(value: string): string {
  if (value.trim() === '') {
    throw new InvalidArgumentError('Must not be empty.');
  }
  return value;
}
