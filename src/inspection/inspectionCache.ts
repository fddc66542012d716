import type { Logger } from 'pino';
import { InvalidTaskStatusError } from '../errors.js';
import { memoizeAsync, type KeyedMemo } from '../utils/keyedMemo.js';
import { RouteTable } from './routeTable.js';
import {
  flattenReplies,
  isTaskStatus,
  type TaskRecord,
  type TaskStatus,
  type WorkerInspector,
  type WorkerReplies
} from './types.js';

export type TaskTally = ReadonlyMap<string, number>;

export interface InspectionCacheOptions {
  logger?: Logger;
  onInspect?: (method: 'active_queues' | TaskStatus) => void;
}

/**
 * Per-application view of what the workers currently hold. The routing table
 * and each status tally are computed on first use and kept for the lifetime
 * of the instance; build a new instance to see fresh worker state.
 */
export class WorkerInspectionCache {
  private routeTable: Promise<RouteTable> | null = null;

  private readonly statusCounts: KeyedMemo<TaskStatus, Promise<TaskTally>>;

  constructor(
    private readonly inspector: WorkerInspector,
    private readonly options: InspectionCacheOptions = {}
  ) {
    this.statusCounts = memoizeAsync((status: TaskStatus) => this.countTasks(status));
  }

  getRouteQueues(): Promise<RouteTable> {
    if (!this.routeTable) {
      const pending = this.resolveRoutes();
      this.routeTable = pending;
      pending.catch(() => {
        if (this.routeTable === pending) {
          this.routeTable = null;
        }
      });
    }
    return this.routeTable;
  }

  getStatusTaskCounts(status: string): Promise<TaskTally> {
    if (!isTaskStatus(status)) {
      return Promise.reject(new InvalidTaskStatusError(status));
    }
    return this.statusCounts.get(status);
  }

  hasStatusTaskCounts(status: TaskStatus): boolean {
    return this.statusCounts.has(status);
  }

  private async resolveRoutes(): Promise<RouteTable> {
    this.options.onInspect?.('active_queues');
    const workerQueues = await this.inspector.activeQueues();
    const table = RouteTable.fromBindings(flattenReplies(workerQueues));
    this.options.logger?.debug(
      { workers: Object.keys(workerQueues).length, routes: table.size },
      'resolved worker routing table'
    );
    return table;
  }

  private async countTasks(status: TaskStatus): Promise<TaskTally> {
    const routes = await this.getRouteQueues();
    this.options.onInspect?.(status);
    const inspected = await this.queryWorkers(status);

    const tally = new Map<string, number>();
    for (const task of flattenReplies(inspected)) {
      const queue = routes.resolve(task.delivery_info.exchange, task.delivery_info.routing_key);
      tally.set(queue, (tally.get(queue) ?? 0) + 1);
    }

    this.options.logger?.debug({ status, tally: Object.fromEntries(tally) }, 'counted worker tasks');
    return tally;
  }

  private queryWorkers(status: TaskStatus): Promise<WorkerReplies<TaskRecord>> {
    switch (status) {
      case 'active':
        return this.inspector.active();
      case 'reserved':
        return this.inspector.reserved();
      case 'scheduled':
        return this.inspector.scheduled();
    }
  }
}
