/**
 * Kryten CLI: Logger
 *
 * Scoped diagnostic logger. Always writes to stderr so stdout carries only
 * the command result. Respects NO_COLOR and non-TTY stderr.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',  // gray
  info: '\x1b[36m',   // cyan
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

const RESET = '\x1b[0m';
const DIM = '\x1b[90m';

export const LOG_LEVEL_ENV = 'KRYTEN_LOG_LEVEL';

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/** Initial level: KRYTEN_LOG_LEVEL if valid, otherwise warn. */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const value = env[LOG_LEVEL_ENV]?.toLowerCase();
  return isLogLevel(value) ? value : 'warn';
}

let globalLevel: LogLevel = levelFromEnv();

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

function isColorless(): boolean {
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '') return true;
  if (process.env.TERM === 'dumb') return true;
  return !process.stderr.isTTY;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown> | Error): void;
}

function formatData(data: Record<string, unknown>): string {
  return Object.entries(data)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
    .join(' ');
}

export function createLogger(scope: string): Logger {
  const log = (level: LogLevel, message: string, data?: Record<string, unknown> | Error) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const timestamp = new Date().toISOString().slice(11, 23);
    const levelTag = level.toUpperCase().padEnd(5);
    const noColor = isColorless();

    let line = noColor
      ? `${timestamp} ${levelTag} [${scope}] ${message}`
      : `${DIM}${timestamp}${RESET} ${LEVEL_COLORS[level]}${levelTag}${RESET} ${DIM}[${scope}]${RESET} ${message}`;

    if (data instanceof Error) {
      line += noColor ? ` ${data.message}` : ` ${LEVEL_COLORS.error}${data.message}${RESET}`;
      if (data.stack && globalLevel === 'debug') {
        line += `\n${data.stack}`;
      }
    } else if (data && Object.keys(data).length > 0) {
      const formatted = formatData(data);
      line += noColor ? ` ${formatted}` : ` ${DIM}${formatted}${RESET}`;
    }

    process.stderr.write(line + '\n');
  };

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
  };
}
