/**
 * The slice of an amqplib connection and channel the probe talks to. amqplib's
 * `ChannelModel` and `Channel` satisfy these structurally; tests pass fakes.
 */
export interface AmqpMessage {
  content: Buffer;
  properties: {
    headers?: Record<string, unknown>;
  };
}

export interface AmqpChannel {
  checkQueue(queue: string): Promise<{ queue: string; messageCount: number; consumerCount: number }>;
  assertExchange(
    exchange: string,
    type: string,
    options: { durable: boolean; autoDelete: boolean }
  ): Promise<unknown>;
  assertQueue(
    queue: string,
    options: { exclusive: boolean; autoDelete: boolean; durable: boolean }
  ): Promise<{ queue: string }>;
  bindQueue(queue: string, source: string, pattern: string): Promise<unknown>;
  consume(
    queue: string,
    onMessage: (message: AmqpMessage | null) => void,
    options: { noAck: boolean }
  ): Promise<unknown>;
  publish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options: {
      contentType: string;
      contentEncoding: string;
      deliveryMode: number;
      headers: Record<string, unknown>;
    }
  ): boolean;
  close(): Promise<void>;
  on(event: 'error' | 'close', listener: (error?: unknown) => void): unknown;
}

export interface AmqpConnection {
  createChannel(): Promise<AmqpChannel>;
  close(): Promise<void>;
  on(event: 'error' | 'close', listener: (error?: unknown) => void): unknown;
}

interface ChannelCloseError extends Error {
  code: number;
  classId: number;
  methodId: number;
}

/** True for the error amqplib rejects with when the server closes the channel. */
export const isChannelCloseError = (error: unknown): error is ChannelCloseError => {
  if (!(error instanceof Error)) {
    return false;
  }
  const fields: Record<string, unknown> = { ...error };
  return (
    typeof fields.code === 'number' &&
    typeof fields.classId === 'number' &&
    typeof fields.methodId === 'number'
  );
};
