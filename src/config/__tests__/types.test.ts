import { describe, it, expect } from 'vitest';
import {
  ChannelEntrySchema,
  CurrentConfigSchema,
  LegacyConfigSchema,
  NatsConfigSchema,
} from '../types.js';

// ============================================================================
// NatsConfigSchema
// ============================================================================

describe('NatsConfigSchema', () => {
  it('accepts a server list alone', () => {
    expect(NatsConfigSchema.parse({ servers: ['nats://localhost:4222'] })).toEqual({
      servers: ['nats://localhost:4222'],
    });
  });

  it('accepts optional credentials and timeout', () => {
    const config = NatsConfigSchema.parse({
      servers: ['nats://localhost:4222'],
      user: 'bot',
      password: 'test-secret',
      connect_timeout: 5,
    });

    expect(config.user).toBe('bot');
    expect(config.connect_timeout).toBe(5);
  });

  it('rejects an empty server list', () => {
    expect(NatsConfigSchema.safeParse({ servers: [] }).success).toBe(false);
  });

  it('rejects an empty server string', () => {
    expect(NatsConfigSchema.safeParse({ servers: [''] }).success).toBe(false);
  });

  it('rejects a zero or negative connect_timeout', () => {
    expect(NatsConfigSchema.safeParse({ servers: ['nats://a'], connect_timeout: 0 }).success).toBe(false);
    expect(NatsConfigSchema.safeParse({ servers: ['nats://a'], connect_timeout: -1 }).success).toBe(false);
  });

  it('strips unknown keys', () => {
    const config = NatsConfigSchema.parse({ servers: ['nats://a'], extra: true });
    expect(config).not.toHaveProperty('extra');
  });
});

// ============================================================================
// ChannelEntrySchema
// ============================================================================

describe('ChannelEntrySchema', () => {
  it('makes the domain optional', () => {
    expect(ChannelEntrySchema.parse({ channel: 'demo' })).toEqual({ channel: 'demo' });
  });

  it('rejects an empty domain', () => {
    expect(ChannelEntrySchema.safeParse({ channel: 'demo', domain: '' }).success).toBe(false);
  });
});

// ============================================================================
// Document shapes
// ============================================================================

describe('CurrentConfigSchema', () => {
  it('requires at least one channel', () => {
    const result = CurrentConfigSchema.safeParse({ nats: { servers: ['nats://a'] }, channels: [] });
    expect(result.success).toBe(false);
  });

  it('keeps channel order', () => {
    const config = CurrentConfigSchema.parse({
      nats: { servers: ['nats://a'] },
      channels: [{ channel: 'one' }, { channel: 'two' }],
    });

    expect(config.channels.map((entry) => entry.channel)).toEqual(['one', 'two']);
  });
});

describe('LegacyConfigSchema', () => {
  it('accepts a cytube block', () => {
    const config = LegacyConfigSchema.parse({
      nats: { servers: ['nats://a'] },
      cytube: { domain: 'cytu.be', channel: 'demo' },
    });

    expect(config.cytube).toEqual({ domain: 'cytu.be', channel: 'demo' });
  });

  it('requires the nats block', () => {
    expect(LegacyConfigSchema.safeParse({ cytube: { channel: 'demo' } }).success).toBe(false);
  });
});
