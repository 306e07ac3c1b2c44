/**
 * Kryten CLI: Configuration Loader
 *
 * Reads config.json and normalizes either accepted shape into one
 * EffectiveConfig:
 *
 *   current: { "nats": {...}, "channels": [{ "domain": "cytu.be", "channel": "name" }] }
 *   legacy:  { "nats": {...}, "cytube": { "channel": "name", "domain": "cytu.be" } }
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { z } from 'zod';
import {
  CurrentConfigSchema,
  LegacyConfigSchema,
  type ChannelEntry,
  type ConfigOverrides,
  type EffectiveConfig,
  type NatsConfig,
} from './types.js';
import { DEFAULT_DOMAIN } from './defaults.js';
import { CliError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Config');

export type ConfigShape = 'current' | 'legacy';

// ============================================================================
// LOAD
// ============================================================================

/**
 * Load and normalize the configuration file at `path`.
 * Throws CliError with ConfigNotFound, ConfigMalformed or ConfigInvalid.
 */
export function loadConfig(path: string, overrides: ConfigOverrides = {}): EffectiveConfig {
  const fullPath = resolve(path);

  if (!existsSync(fullPath)) {
    throw new CliError(`Configuration file not found: ${path}`, 'ConfigNotFound');
  }

  let text: string;
  try {
    text = readFileSync(fullPath, 'utf-8');
  } catch (error) {
    throw new CliError(`Cannot read configuration file ${path}: ${errorMessage(error)}`, 'ConfigNotFound');
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new CliError(`Invalid JSON in ${path}: ${errorMessage(error)}`, 'ConfigMalformed');
  }

  log.debug('Loaded configuration', { path: fullPath });
  return normalizeConfig(document, overrides);
}

// ============================================================================
// NORMALIZE
// ============================================================================

/**
 * Normalize a parsed configuration document. Pure; the same document and
 * overrides always give an equal EffectiveConfig.
 */
export function normalizeConfig(document: unknown, overrides: ConfigOverrides = {}): EffectiveConfig {
  if (!isPlainObject(document)) {
    throw new CliError('Configuration must be a JSON object', 'ConfigInvalid');
  }

  const shape = detectShape(document);
  let nats: NatsConfig;
  let entry: ChannelEntry;

  if (shape === 'current') {
    const parsed = CurrentConfigSchema.safeParse(document);
    if (!parsed.success) throw invalid(parsed.error);
    nats = parsed.data.nats;
    entry = parsed.data.channels[0];

    if (parsed.data.channels.length > 1) {
      log.warn('Multiple channels configured; only the first is used', {
        channel: entry.channel,
        ignored: parsed.data.channels.length - 1,
      });
    }
  } else if (shape === 'legacy') {
    const parsed = LegacyConfigSchema.safeParse(document);
    if (!parsed.success) throw invalid(parsed.error);
    nats = parsed.data.nats;
    entry = parsed.data.cytube;
  } else {
    throw new CliError(
      'No channel configured: expected a "channels" array or a "cytube" object',
      'ConfigInvalid'
    );
  }

  return buildEffectiveConfig(nats, entry, overrides);
}

/**
 * Pick the schema by the distinguishing field. An empty `channels` array
 * next to a `cytube` object defers to the legacy block.
 */
export function detectShape(document: Record<string, unknown>): ConfigShape | null {
  const { channels, cytube } = document;

  if (Array.isArray(channels) && channels.length === 0 && cytube !== undefined) return 'legacy';
  if (channels !== undefined) return 'current';
  if (cytube !== undefined) return 'legacy';
  return null;
}

function buildEffectiveConfig(
  nats: NatsConfig,
  entry: ChannelEntry,
  overrides: ConfigOverrides
): EffectiveConfig {
  const config: {
    -readonly [K in keyof EffectiveConfig]: EffectiveConfig[K];
  } = {
    transportServers: [...nats.servers],
    channel: overrides.channel ?? entry.channel,
    domain: overrides.domain ?? entry.domain ?? DEFAULT_DOMAIN,
  };

  if (nats.user !== undefined || nats.password !== undefined || nats.token !== undefined) {
    config.transportAuth = {
      ...(nats.user !== undefined && { user: nats.user }),
      ...(nats.password !== undefined && { password: nats.password }),
      ...(nats.token !== undefined && { token: nats.token }),
    };
  }

  if (nats.connect_timeout !== undefined) {
    config.connectTimeoutMs = Math.round(nats.connect_timeout * 1000);
  }

  return config;
}

// ============================================================================
// HELPERS
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(error: z.ZodError): CliError {
  const details = error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return new CliError(`Invalid configuration: ${details}`, 'ConfigInvalid');
}
