/**
 * Kryten CLI: NATS Transport
 *
 * The production SendCapability. Connects on the first send, publishes the
 * envelope `{ action, data }` and flushes so that the server has accepted
 * the message before send resolves.
 *
 * Subjects:
 *   cytube.commands.{domain}.{channel}.{action}
 */

import { connect, JSONCodec, type ConnectionOptions, type NatsConnection } from 'nats';
import type { ActionData, ActionName } from '../commands/types.js';
import type { EffectiveConfig } from '../config/types.js';
import { CLIENT_NAME, COMMAND_SUBJECT_PREFIX } from '../config/defaults.js';
import type { SendCapability } from '../dispatch/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('NATS');

export interface CommandEnvelope {
  action: ActionName;
  data: ActionData;
}

/** A send capability that owns a connection until closed. */
export interface Transport {
  readonly send: SendCapability;
  close(): Promise<void>;
}

/** The part of a NATS connection the transport uses. */
export type PublishingConnection = Pick<NatsConnection, 'publish' | 'flush' | 'close' | 'getServer'>;

export type Connector = (options: ConnectionOptions) => Promise<PublishingConnection>;

// ============================================================================
// SUBJECTS
// ============================================================================

/**
 * One subject token: lower-cased, with separators, wildcards and whitespace
 * replaced so that a channel name can never widen or split the subject.
 */
export function subjectToken(value: string): string {
  return value.trim().toLowerCase().replace(/[.*>\s]+/g, '_');
}

export function buildSubject(domain: string, channel: string, action: ActionName): string {
  return `${COMMAND_SUBJECT_PREFIX}.${subjectToken(domain)}.${subjectToken(channel)}.${action}`;
}

// ============================================================================
// CONNECTION
// ============================================================================

export function buildConnectionOptions(config: EffectiveConfig): ConnectionOptions {
  return {
    servers: [...config.transportServers],
    name: CLIENT_NAME,
    // One-shot process: fail instead of waiting through reconnect cycles.
    reconnect: false,
    ...(config.connectTimeoutMs !== undefined && { timeout: config.connectTimeoutMs }),
    ...(config.transportAuth?.user !== undefined && { user: config.transportAuth.user }),
    ...(config.transportAuth?.password !== undefined && { pass: config.transportAuth.password }),
    ...(config.transportAuth?.token !== undefined && { token: config.transportAuth.token }),
  };
}

export function createNatsTransport(config: EffectiveConfig, connector: Connector = connect): Transport {
  const codec = JSONCodec<CommandEnvelope>();
  let active: PublishingConnection | undefined;

  const open = async (): Promise<PublishingConnection> => {
    if (active) return active;
    log.debug('Connecting', { servers: config.transportServers.join(',') });
    active = await connector(buildConnectionOptions(config));
    log.info('Connected', { server: active.getServer() });
    return active;
  };

  return {
    send: async (channel, domain, action, data) => {
      const connection = await open();
      const subject = buildSubject(domain, channel, action);

      connection.publish(subject, codec.encode({ action, data }));
      await connection.flush();
      log.info('Published', { subject });
    },

    close: async () => {
      if (!active) return;
      const connection = active;
      active = undefined;
      await connection.close();
      log.debug('Connection closed');
    },
  };
}
