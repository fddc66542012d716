import type { ScalingCycleCache } from '../inspection/cycleCache.js';

/** A named group of queues whose depth drives one scalable worker type. */
export interface Proc {
  readonly name: string;
  readonly queues: readonly string[];
  quantity(cache?: ScalingCycleCache): Promise<number>;
}

export interface ProcQuantity {
  name: string;
  quantity: number;
}

export const DEFAULT_QUEUES: readonly string[] = Object.freeze(['celery']);
