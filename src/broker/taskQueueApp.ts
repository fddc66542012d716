import { connect } from 'amqplib';
import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { UnsupportedBrokerError, UnsupportedInspectionError, serializeError } from '../errors.js';
import { PidboxInspector } from '../inspection/pidboxInspector.js';
import type { WorkerInspector } from '../inspection/types.js';
import type { AmqpConnection } from './amqp.js';
import { AmqpDeclareChannel } from './amqpChannel.js';
import type { BrokerChannel } from './channel.js';
import { RedisSizeChannel } from './redisChannel.js';

/**
 * Handle on one task-queue deployment: the broker channel used for counting
 * and, where available, the worker inspector. Inspection caches are keyed by
 * the identity of this object.
 */
export interface TaskQueueApp {
  readonly label: string;
  readonly channel: BrokerChannel;
  readonly supportsInspection: boolean;
  inspect(): WorkerInspector;
  close(): Promise<void>;
}

export interface TaskQueueAppOptions {
  brokerUrl: string;
  logger: Logger;
  inspectTimeoutMs?: number;
  redisKeyPrefix?: string;
  pidboxNamespace?: string;
  inspector?: WorkerInspector;
}

export const describeBrokerUrl = (brokerUrl: string): string => {
  const url = new URL(brokerUrl);
  return `${url.protocol}//${url.host}${url.pathname}`;
};

export const createTaskQueueApp = (options: TaskQueueAppOptions): TaskQueueApp => {
  const { protocol } = new URL(options.brokerUrl);

  switch (protocol) {
    case 'redis:':
    case 'rediss:':
      return createRedisApp(options);
    case 'amqp:':
    case 'amqps:':
      return createAmqpApp(options);
    default:
      throw new UnsupportedBrokerError(protocol);
  }
};

const createRedisApp = (options: TaskQueueAppOptions): TaskQueueApp => {
  const label = describeBrokerUrl(options.brokerUrl);
  const logger = options.logger.child({ component: 'broker', broker: label });
  const client = new Redis(options.brokerUrl, {
    lazyConnect: true,
    maxRetriesPerRequest: 1
  });
  client.on('error', (error: unknown) => {
    logger.warn({ err: serializeError(error) }, 'redis client error');
  });

  const inspector = options.inspector ?? null;

  return {
    label,
    channel: new RedisSizeChannel(client, options.redisKeyPrefix ?? ''),
    supportsInspection: inspector !== null,
    inspect: () => {
      if (!inspector) {
        throw new UnsupportedInspectionError(label);
      }
      return inspector;
    },
    close: async () => {
      if (client.status === 'ready') {
        await client.quit();
        return;
      }
      client.disconnect();
    }
  };
};

const createAmqpApp = (options: TaskQueueAppOptions): TaskQueueApp => {
  const label = describeBrokerUrl(options.brokerUrl);
  const logger = options.logger.child({ component: 'broker', broker: label });

  let connection: Promise<AmqpConnection> | null = null;

  const openConnection = (): Promise<AmqpConnection> => {
    if (!connection) {
      connection = establish().catch((error: unknown) => {
        connection = null;
        throw error;
      });
    }
    return connection;
  };

  const establish = async (): Promise<AmqpConnection> => {
    const established: AmqpConnection = await connect(options.brokerUrl);
    established.on('error', (error) => {
      logger.warn({ err: serializeError(error) }, 'amqp connection error');
    });
    established.on('close', () => {
      connection = null;
      logger.info('amqp connection closed');
    });
    logger.info('amqp connection established');
    return established;
  };

  const channel = new AmqpDeclareChannel({ connect: openConnection, logger });
  const inspector =
    options.inspector ??
    new PidboxInspector({
      openChannel: async () => (await openConnection()).createChannel(),
      logger: logger.child({ component: 'inspection' }),
      timeoutMs: options.inspectTimeoutMs,
      namespace: options.pidboxNamespace
    });

  return {
    label,
    channel,
    supportsInspection: true,
    inspect: () => inspector,
    close: async () => {
      const pending = connection;
      if (!pending) {
        return;
      }
      await channel.close();
      const established = await pending;
      connection = null;
      await established.close();
    }
  };
};
