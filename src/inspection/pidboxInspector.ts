import { randomUUID } from 'node:crypto';
import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { AmqpChannel, AmqpMessage } from '../broker/amqp.js';
import { InspectionReplyError, serializeError } from '../errors.js';
import type { QueueBinding, TaskRecord, WorkerInspector, WorkerReplies } from './types.js';

const queueBindingSchema = z
  .object({
    name: z.string(),
    exchange: z.object({ name: z.string() }).passthrough(),
    routing_key: z.string()
  })
  .passthrough();

const taskRecordSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    delivery_info: z
      .object({
        exchange: z.string(),
        routing_key: z.string()
      })
      .passthrough()
  })
  .passthrough();

// Scheduled entries carry the task under `request`, next to its eta.
const scheduledEntrySchema = z
  .object({ request: taskRecordSchema })
  .passthrough()
  .transform((entry) => entry.request);

type ControlMethod = 'active_queues' | 'active' | 'reserved' | 'scheduled';

export interface PidboxInspectorOptions {
  openChannel: () => Promise<AmqpChannel>;
  logger: Logger;
  timeoutMs?: number;
  namespace?: string;
  createId?: () => string;
  now?: () => number;
}

/**
 * Worker remote control over the broadcast mailbox: publish a command on the
 * fanout exchange, then gather every worker's reply that arrives on a private
 * reply queue within the timeout.
 */
export class PidboxInspector implements WorkerInspector {
  private readonly timeoutMs: number;

  private readonly exchange: string;

  private readonly replyExchange: string;

  private readonly createId: () => string;

  private readonly now: () => number;

  constructor(private readonly options: PidboxInspectorOptions) {
    const namespace = options.namespace ?? 'celery';
    this.timeoutMs = options.timeoutMs ?? 1_000;
    this.exchange = `${namespace}.pidbox`;
    this.replyExchange = `reply.${namespace}.pidbox`;
    this.createId = options.createId ?? randomUUID;
    this.now = options.now ?? Date.now;
  }

  activeQueues(): Promise<WorkerReplies<QueueBinding>> {
    return this.request('active_queues', queueBindingSchema);
  }

  active(): Promise<WorkerReplies<TaskRecord>> {
    return this.request('active', taskRecordSchema);
  }

  reserved(): Promise<WorkerReplies<TaskRecord>> {
    return this.request('reserved', taskRecordSchema);
  }

  scheduled(): Promise<WorkerReplies<TaskRecord>> {
    return this.request('scheduled', scheduledEntrySchema);
  }

  private async request<TSchema extends z.ZodTypeAny>(
    method: ControlMethod,
    schema: TSchema
  ): Promise<WorkerReplies<z.output<TSchema>>> {
    const replies = await this.collect(method);
    const parsed = z.record(z.array(schema)).safeParse(replies);
    if (!parsed.success) {
      throw new InspectionReplyError(method, { cause: parsed.error });
    }
    return parsed.data;
  }

  private async collect(method: ControlMethod): Promise<Record<string, unknown>> {
    const channel = await this.options.openChannel();
    channel.on('error', (error) => {
      this.options.logger.debug({ err: serializeError(error), method }, 'broker closed inspection channel');
    });

    const ticket = this.createId();
    const oid = this.createId();
    const replies: Record<string, unknown> = {};
    const malformed: unknown[] = [];

    try {
      await channel.assertExchange(this.exchange, 'fanout', { durable: false, autoDelete: false });
      await channel.assertExchange(this.replyExchange, 'direct', { durable: false, autoDelete: false });
      const { queue } = await channel.assertQueue('', { exclusive: true, autoDelete: true, durable: false });
      await channel.bindQueue(queue, this.replyExchange, oid);

      await channel.consume(
        queue,
        (message) => {
          if (!message || message.properties.headers?.ticket !== ticket) {
            return;
          }
          try {
            Object.assign(replies, decodeReply(message));
          } catch (error) {
            malformed.push(error);
          }
        },
        { noAck: true }
      );

      const body = {
        method,
        arguments: {},
        destination: null,
        pattern: null,
        matcher: null,
        ticket,
        reply_to: { exchange: this.replyExchange, routing_key: oid }
      };

      channel.publish(this.exchange, '', Buffer.from(JSON.stringify(body)), {
        contentType: 'application/json',
        contentEncoding: 'utf-8',
        deliveryMode: 1,
        headers: {
          clock: 1,
          expires: (this.now() + this.timeoutMs) / 1000
        }
      });

      await delay(this.timeoutMs);
    } catch (error) {
      await this.release(channel, method);
      throw error;
    }
    await channel.close();

    if (malformed.length > 0) {
      throw new InspectionReplyError(method, {
        cause: malformed[0],
        metadata: { malformedReplies: malformed.length }
      });
    }

    this.options.logger.debug(
      { method, workers: Object.keys(replies).length },
      'collected worker replies'
    );
    return replies;
  }

  // The server may already have closed the channel that failed.
  private async release(channel: AmqpChannel, method: ControlMethod): Promise<void> {
    try {
      await channel.close();
    } catch (error) {
      this.options.logger.debug({ err: serializeError(error), method }, 'inspection channel already closed');
    }
  }
}

const decodeReply = (message: AmqpMessage): Record<string, unknown> => {
  const decoded: unknown = JSON.parse(message.content.toString('utf8'));
  const parsed = z.record(z.unknown()).safeParse(decoded);
  if (!parsed.success) {
    throw parsed.error;
  }
  return parsed.data;
};

