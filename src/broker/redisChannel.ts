import type { DirectSizeChannel } from './channel.js';

// Priority lists the Redis transport writes next to the base list.
const PRIORITY_STEPS = [0, 3, 6, 9] as const;
const PRIORITY_SEPARATOR = '\x06\x16';

export interface RedisPipeline {
  llen(key: string): unknown;
  exec(): Promise<Array<[error: Error | null, result: unknown]> | null>;
}

export interface RedisPipelineClient {
  pipeline(): RedisPipeline;
}

export const priorityQueueKeys = (queue: string, keyPrefix = ''): string[] =>
  PRIORITY_STEPS.map((priority) =>
    priority === 0
      ? `${keyPrefix}${queue}`
      : `${keyPrefix}${queue}${PRIORITY_SEPARATOR}${priority}`
  );

export class RedisSizeChannel implements DirectSizeChannel {
  readonly kind = 'direct-size';

  constructor(
    private readonly client: RedisPipelineClient,
    private readonly keyPrefix = ''
  ) {}

  async size(queue: string): Promise<number> {
    const pipeline = this.client.pipeline();
    for (const key of priorityQueueKeys(queue, this.keyPrefix)) {
      pipeline.llen(key);
    }

    const results = await pipeline.exec();
    if (!results) {
      return 0;
    }

    let total = 0;
    for (const [error, value] of results) {
      if (error) {
        throw error;
      }
      if (typeof value === 'number' && Number.isInteger(value)) {
        total += value;
      }
    }
    return total;
  }
}
