import type { Logger } from 'pino';
import { BrokerChannelError } from '../errors.js';
import type { BrokerChannel, DeclareOnlyChannel, DirectSizeChannel } from '../broker/channel.js';

export interface QueueCounterOptions {
  logger?: Logger;
  onMissingQueue?: (queue: string) => void;
}

type CountStrategy = (queues: readonly string[]) => Promise<number>;

/**
 * Sums the messages waiting on the broker for a set of queues. The counting
 * strategy follows the channel's capability and is fixed at construction.
 */
export class QueueCounter {
  private readonly strategy: CountStrategy;

  constructor(channel: BrokerChannel, private readonly options: QueueCounterOptions = {}) {
    if (channel.kind === 'direct-size') {
      const direct = channel;
      this.strategy = (queues) => this.sumSizes(direct, queues);
    } else {
      const declareOnly = channel;
      this.strategy = (queues) => this.sumDeclared(declareOnly, queues);
    }
  }

  count(queues: readonly string[]): Promise<number> {
    return this.strategy(queues);
  }

  private async sumSizes(channel: DirectSizeChannel, queues: readonly string[]): Promise<number> {
    let total = 0;
    for (const queue of queues) {
      total += await channel.size(queue);
    }
    return total;
  }

  private async sumDeclared(channel: DeclareOnlyChannel, queues: readonly string[]): Promise<number> {
    let total = 0;
    for (const queue of queues) {
      try {
        const declared = await channel.declarePassive(queue);
        total += declared.messageCount;
      } catch (error) {
        if (!(error instanceof BrokerChannelError)) {
          throw error;
        }
        // Not created yet.
        this.options.logger?.debug({ queue, replyCode: error.replyCode }, 'queue not declared on broker');
        this.options.onMissingQueue?.(queue);
      }
    }
    return total;
  }
}
