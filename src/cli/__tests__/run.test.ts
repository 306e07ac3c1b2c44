import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';

// ── Mock node:fs BEFORE importing run ────────────────────────────────────────

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import { existsSync, readFileSync } from 'node:fs';
import { run, type RunDependencies } from '../run.js';
import type { Transport } from '../../transport/nats.js';
import type { SendCapability } from '../../dispatch/types.js';
import type { EffectiveConfig } from '../../config/types.js';
import { setOutputMode } from '../../utils/output.js';
import { setLogLevel } from '../../utils/logger.js';

// ── Fixtures ─────────────────────────────────────────────────────────────────

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

const CONFIG_DOCUMENT = {
  nats: { servers: ['nats://localhost:4222'] },
  channels: [{ domain: 'cytu.be', channel: 'demo' }],
};

function fakeTransport() {
  const send = vi.fn<SendCapability>().mockResolvedValue(undefined);
  const close = vi.fn<Transport['close']>().mockResolvedValue(undefined);
  const transport: Transport = { send, close };
  return { transport, send, close };
}

let fake: ReturnType<typeof fakeTransport>;
let opened: EffectiveConfig[];
let deps: RunDependencies;
let stdoutSpy: MockInstance;
let stderrSpy: MockInstance;
const savedEnv = { NO_COLOR: process.env.NO_COLOR, KRYTEN_CONFIG: process.env.KRYTEN_CONFIG };

function written(spy: MockInstance): string {
  return spy.mock.calls.map((c) => String(c[0])).join('');
}

function restoreEnv(name: keyof typeof savedEnv): void {
  const value = savedEnv[name];
  if (value === undefined) {
    delete process.env[name];
  } else {
    process.env[name] = value;
  }
}

beforeEach(() => {
  process.env.NO_COLOR = '1';
  delete process.env.KRYTEN_CONFIG;

  mockExistsSync.mockReset().mockReturnValue(true);
  mockReadFileSync.mockReset().mockReturnValue(JSON.stringify(CONFIG_DOCUMENT));

  fake = fakeTransport();
  opened = [];
  deps = {
    openTransport: (config) => {
      opened.push(config);
      return fake.transport;
    },
  };

  stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

afterEach(() => {
  stdoutSpy.mockRestore();
  stderrSpy.mockRestore();
  setOutputMode('human');
  setLogLevel('warn');
  restoreEnv('NO_COLOR');
  restoreEnv('KRYTEN_CONFIG');
});

// ============================================================================
// SUCCESS
// ============================================================================

describe('run', () => {
  it('sends a chat message and exits 0', async () => {
    const code = await run(['say', 'Hello world'], deps);

    expect(code).toBe(0);
    expect(fake.send).toHaveBeenCalledWith('demo', 'cytu.be', 'chat', { message: 'Hello world' });
    expect(written(stdoutSpy)).toBe('✓ Sent chat message to demo\n');
    expect(fake.close).toHaveBeenCalledTimes(1);
  });

  it('queues a resolved video', async () => {
    const code = await run(['playlist', 'add', 'https://youtu.be/dQw4w9WgXcQ'], deps);

    expect(code).toBe(0);
    expect(fake.send).toHaveBeenCalledWith('demo', 'cytu.be', 'queue', {
      type: 'YouTube',
      id: 'dQw4w9WgXcQ',
      position: 'end',
    });
  });

  it('applies --channel to the loaded configuration', async () => {
    await run(['--channel', 'foo', 'pause'], deps);

    expect(opened[0].channel).toBe('foo');
    expect(fake.send).toHaveBeenCalledWith('foo', 'cytu.be', 'pause', {});
  });

  it('reads the file named by --config', async () => {
    await run(['--config', '/etc/kryten.json', 'voteskip'], deps);
    expect(mockExistsSync).toHaveBeenCalledWith(expect.stringMatching(/kryten\.json$/));
  });

  it('prints the result as JSON with --json', async () => {
    const code = await run(['--json', 'say', 'hi'], deps);

    expect(code).toBe(0);
    expect(JSON.parse(written(stdoutSpy))).toEqual({
      ok: true,
      summary: '✓ Sent chat message to demo',
      payload: { action: 'chat', channel: 'demo', domain: 'cytu.be', data: { message: 'hi' } },
    });
  });

  it('prints version information without loading config', async () => {
    const code = await run(['--version'], deps);

    expect(code).toBe(0);
    expect(written(stdoutSpy)).toMatch(/^kryten\/2\.0\.0 /);
    expect(mockExistsSync).not.toHaveBeenCalled();
  });

  // ==========================================================================
  // FAILURES
  // ==========================================================================

  it('exits 1 and closes the transport when the send fails', async () => {
    fake.send.mockRejectedValue(new Error('CONNECTION_REFUSED'));

    const code = await run(['pause'], deps);

    expect(code).toBe(1);
    expect(written(stderrSpy)).toBe('✗ Failed to pause playback in demo: CONNECTION_REFUSED\n');
    expect(fake.close).toHaveBeenCalledTimes(1);
  });

  it('exits 3 without opening a transport when the config file is missing', async () => {
    mockExistsSync.mockReturnValue(false);

    const code = await run(['say', 'hi'], deps);

    expect(code).toBe(3);
    expect(written(stderrSpy)).toBe('✗ Configuration file not found: config.json\n');
    expect(opened).toHaveLength(0);
  });

  it('exits 3 for an invalid config document', async () => {
    mockReadFileSync.mockReturnValue(JSON.stringify({ channels: [{ channel: 'demo' }] }));

    const code = await run(['play'], deps);

    expect(code).toBe(3);
    expect(written(stderrSpy)).toBe('✗ Invalid configuration: nats: Required\n');
  });

  it('exits 2 with help for a usage error', async () => {
    const code = await run([], deps);

    expect(code).toBe(2);
    expect(written(stderrSpy)).toMatch(/^✗ No command given\n\nUsage: kryten /);
    expect(mockExistsSync).not.toHaveBeenCalled();
    expect(opened).toHaveLength(0);
  });

  it('reports a usage error as JSON on stdout with --json', async () => {
    const code = await run(['--json', 'seek', 'abc'], deps);

    expect(code).toBe(2);
    expect(JSON.parse(written(stdoutSpy))).toEqual({
      ok: false,
      summary: expect.stringContaining('Not a number.'),
      errorKind: 'UsageError',
    });
    expect(written(stderrSpy)).toBe('');
  });

  it('reports a rejected --temp as JSON with --json', async () => {
    const code = await run(['--json', 'playlist', 'add', '--temp', 'x'], deps);

    expect(code).toBe(2);
    expect(JSON.parse(written(stdoutSpy))).toEqual({
      ok: false,
      summary: '✗ --temp is not supported on "playlist add"; add the video, then run "playlist settemp <uid> true"',
      errorKind: 'UsageError',
    });
    expect(written(stderrSpy)).toBe('');
  });

  it('keeps usage errors on stderr with --quiet', async () => {
    const code = await run(['--quiet', 'say'], deps);

    expect(code).toBe(2);
    expect(written(stderrSpy)).toMatch(/^✗ missing required argument 'message'\n/);
    expect(written(stdoutSpy)).toBe('');
  });

  it('exits 2 without sending for a negative seek', async () => {
    const code = await run(['seek', '-5'], deps);

    expect(code).toBe(2);
    expect(written(stderrSpy)).toBe('✗ Seek time must be a non-negative number of seconds (got -5)\n');
    expect(fake.send).not.toHaveBeenCalled();
  });

  it('keeps a successful result when closing the transport fails', async () => {
    fake.close.mockRejectedValue(new Error('already closed'));

    const code = await run(['play'], deps);

    expect(code).toBe(0);
    expect(written(stderrSpy)).toContain('Failed to close connection');
  });
});
