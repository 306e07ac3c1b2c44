import { z } from 'zod';

// ============================================================================
// ZOD SCHEMA
// ============================================================================

export const NatsConfigSchema = z.object({
  servers: z.array(z.string().min(1)).min(1),
  user: z.string().optional(),
  password: z.string().optional(),
  token: z.string().optional(),
  /** Seconds to wait for the initial connection. */
  connect_timeout: z.number().positive().optional(),
});

export const ChannelEntrySchema = z.object({
  channel: z.string().min(1),
  domain: z.string().min(1).optional(),
});

/** Current shape: `{ nats, channels: [{ domain, channel }, ...] }` */
export const CurrentConfigSchema = z.object({
  nats: NatsConfigSchema,
  channels: z.array(ChannelEntrySchema).min(1),
});

/** Legacy shape: `{ nats, cytube: { channel, domain } }` */
export const LegacyConfigSchema = z.object({
  nats: NatsConfigSchema,
  cytube: ChannelEntrySchema,
});

// ============================================================================
// INFERRED TYPES
// ============================================================================

export type NatsConfig = z.infer<typeof NatsConfigSchema>;
export type ChannelEntry = z.infer<typeof ChannelEntrySchema>;
export type CurrentConfig = z.infer<typeof CurrentConfigSchema>;
export type LegacyConfig = z.infer<typeof LegacyConfigSchema>;

// ============================================================================
// EFFECTIVE CONFIG
// ============================================================================

export interface TransportAuth {
  user?: string;
  password?: string;
  token?: string;
}

/**
 * The single configuration an invocation runs with, whichever file shape
 * it came from. Exactly one channel and one domain are active.
 */
export interface EffectiveConfig {
  readonly transportServers: readonly string[];
  readonly channel: string;
  readonly domain: string;
  readonly transportAuth?: Readonly<TransportAuth>;
  readonly connectTimeoutMs?: number;
}

/** Command-line values that take precedence over the file. */
export interface ConfigOverrides {
  channel?: string;
  domain?: string;
}
