export interface QueueDeclareResult {
  queue: string;
  messageCount: number;
  consumerCount: number;
}

/** Broker that can report a queue's length directly; missing queues read as 0. */
export interface DirectSizeChannel {
  readonly kind: 'direct-size';
  size(queue: string): Promise<number>;
}

/**
 * Broker that only reports a queue's length through a passive declare.
 * Implementations reject with `BrokerChannelError` when the broker refuses
 * the declare, e.g. because the queue does not exist yet.
 */
export interface DeclareOnlyChannel {
  readonly kind: 'declare-only';
  declarePassive(queue: string): Promise<QueueDeclareResult>;
}

export type BrokerChannel = DirectSizeChannel | DeclareOnlyChannel;
