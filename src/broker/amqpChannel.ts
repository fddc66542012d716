import type { Logger } from 'pino';
import { BrokerChannelError, serializeError } from '../errors.js';
import { isChannelCloseError, type AmqpChannel, type AmqpConnection } from './amqp.js';
import type { DeclareOnlyChannel, QueueDeclareResult } from './channel.js';

export interface AmqpDeclareChannelOptions {
  connect: () => Promise<AmqpConnection>;
  logger: Logger;
}

/**
 * Passive-declare counting over one reusable AMQP channel. The broker closes a
 * channel whose declare it refuses, so a refused declare drops the channel and
 * the next call opens a new one.
 */
export class AmqpDeclareChannel implements DeclareOnlyChannel {
  readonly kind = 'declare-only';

  private channel: Promise<AmqpChannel> | null = null;

  private current: AmqpChannel | null = null;

  constructor(private readonly options: AmqpDeclareChannelOptions) {}

  async declarePassive(queue: string): Promise<QueueDeclareResult> {
    const channel = await this.openChannel();
    try {
      const reply = await channel.checkQueue(queue);
      return {
        queue: reply.queue,
        messageCount: reply.messageCount,
        consumerCount: reply.consumerCount
      };
    } catch (error) {
      if (isChannelCloseError(error)) {
        this.discard(channel);
        throw new BrokerChannelError(queue, error.code, { cause: error });
      }
      throw error;
    }
  }

  async close(): Promise<void> {
    const pending = this.channel;
    if (!pending) {
      return;
    }
    this.channel = null;
    const channel = await pending;
    this.current = null;
    await channel.close();
  }

  private openChannel(): Promise<AmqpChannel> {
    if (!this.channel) {
      this.channel = this.createChannel().catch((error: unknown) => {
        this.channel = null;
        throw error;
      });
    }
    return this.channel;
  }

  private async createChannel(): Promise<AmqpChannel> {
    const connection = await this.options.connect();
    const channel = await connection.createChannel();

    channel.on('error', (error) => {
      this.options.logger.debug({ err: serializeError(error) }, 'broker closed declare channel');
    });
    channel.on('close', () => {
      this.discard(channel);
    });

    this.current = channel;
    return channel;
  }

  private discard(channel: AmqpChannel): void {
    if (this.current === channel) {
      this.current = null;
      this.channel = null;
    }
  }
}
