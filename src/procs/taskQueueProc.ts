import type { Logger } from 'pino';
import type { TaskQueueApp } from '../broker/taskQueueApp.js';
import { ProcConfigurationError } from '../errors.js';
import type { ScalingCycleCache } from '../inspection/cycleCache.js';
import type { TaskStatus } from '../inspection/types.js';
import { DEFAULT_QUEUES, type Proc } from './proc.js';
import { QueueCounter } from './queueCounter.js';

export interface TaskQueueProcOptions {
  name: string;
  queues?: string | readonly string[];
  app: TaskQueueApp;
  inspectStatuses?: readonly TaskStatus[];
  logger?: Logger;
  onMissingQueue?: (queue: string) => void;
}

/**
 * Proc backed by a Celery-compatible task queue.
 *
 * ```ts
 * const app = createTaskQueueApp({ brokerUrl: 'amqp://localhost', logger });
 * const worker = new TaskQueueProc({ name: 'worker', queues: ['celery'], app });
 * await worker.quantity();
 * ```
 *
 * With `inspectStatuses` set and a cycle cache passed to `quantity`, tasks
 * the workers already hold in those states are added to the broker count.
 */
export class TaskQueueProc implements Proc {
  readonly name: string;

  readonly queues: readonly string[];

  readonly app: TaskQueueApp;

  readonly inspectStatuses: readonly TaskStatus[];

  private readonly counter: QueueCounter;

  constructor(options: TaskQueueProcOptions) {
    const name = options.name.trim();
    if (name.length === 0) {
      throw new ProcConfigurationError('proc name is required');
    }

    const queues = typeof options.queues === 'string' ? [options.queues] : options.queues ?? DEFAULT_QUEUES;
    if (queues.length === 0) {
      throw new ProcConfigurationError(`proc ${name} has no queues`, { metadata: { proc: name } });
    }

    this.name = name;
    this.queues = Object.freeze([...queues]);
    this.app = options.app;
    this.inspectStatuses = Object.freeze([...(options.inspectStatuses ?? [])]);
    this.counter = new QueueCounter(options.app.channel, {
      logger: options.logger,
      onMissingQueue: options.onMissingQueue
    });
  }

  async quantity(cache?: ScalingCycleCache): Promise<number> {
    let count = await this.counter.count(this.queues);

    if (cache && this.inspectStatuses.length > 0) {
      count += await this.inspectCount(cache);
    }

    return count;
  }

  async inspectCount(cache: ScalingCycleCache): Promise<number> {
    const inspection = cache.inspectorFor(this.app);
    let total = 0;

    for (const status of this.inspectStatuses) {
      const tally = await inspection.getStatusTaskCounts(status);
      for (const queue of this.queues) {
        total += tally.get(queue) ?? 0;
      }
    }

    return total;
  }
}
