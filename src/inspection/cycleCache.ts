import type { Logger } from 'pino';
import type { TaskQueueApp } from '../broker/taskQueueApp.js';
import { KeyedMemo } from '../utils/keyedMemo.js';
import { WorkerInspectionCache, type InspectionCacheOptions } from './inspectionCache.js';

export interface ScalingCycleCacheOptions {
  logger?: Logger;
  onInspect?: InspectionCacheOptions['onInspect'];
}

/**
 * Cache object for one scaling decision. Hand the same instance to every
 * proc evaluated in that decision so they share worker inspections, and drop
 * it afterwards.
 */
export class ScalingCycleCache {
  private registry: KeyedMemo<TaskQueueApp, WorkerInspectionCache> | null = null;

  constructor(private readonly options: ScalingCycleCacheOptions = {}) {}

  inspectorFor(app: TaskQueueApp): WorkerInspectionCache {
    return this.inspectors().get(app);
  }

  get inspectorCount(): number {
    return this.registry?.size ?? 0;
  }

  private inspectors(): KeyedMemo<TaskQueueApp, WorkerInspectionCache> {
    if (!this.registry) {
      this.registry = new KeyedMemo(
        (app: TaskQueueApp) =>
          new WorkerInspectionCache(app.inspect(), {
            logger: this.options.logger?.child({ component: 'inspection', broker: app.label }),
            onInspect: this.options.onInspect
          })
      );
    }
    return this.registry;
  }
}
