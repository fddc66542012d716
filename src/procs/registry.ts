import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import { ProcConfigurationError, serializeError } from '../errors.js';
import { ScalingCycleCache } from '../inspection/cycleCache.js';
import {
  recordInspection,
  recordProcFailure,
  recordProcQuantity,
  type ProbeMetrics
} from '../telemetry/metrics.js';
import type { Proc, ProcQuantity } from './proc.js';

export interface ProcRegistryOptions {
  logger: Logger;
  metrics?: ProbeMetrics;
}

export class ProcRegistry {
  private readonly procs: readonly Proc[];

  constructor(procs: readonly Proc[], private readonly options: ProcRegistryOptions) {
    const seen = new Set<string>();
    for (const proc of procs) {
      if (seen.has(proc.name)) {
        throw new ProcConfigurationError(`duplicate proc name ${proc.name}`, { metadata: { proc: proc.name } });
      }
      seen.add(proc.name);
    }
    this.procs = Object.freeze([...procs]);
  }

  list(): readonly Proc[] {
    return this.procs;
  }

  get(name: string): Proc | undefined {
    return this.procs.find((proc) => proc.name === name);
  }

  createCycleCache(): ScalingCycleCache {
    const { metrics } = this.options;
    return new ScalingCycleCache({
      logger: this.options.logger,
      onInspect: metrics ? (method) => recordInspection(metrics, method) : undefined
    });
  }

  /** Evaluates every proc, in declaration order, against one shared cycle cache. */
  async collect(cache: ScalingCycleCache = this.createCycleCache()): Promise<ProcQuantity[]> {
    const results: ProcQuantity[] = [];

    for (const proc of this.procs) {
      const startedAt = performance.now();
      try {
        const quantity = await proc.quantity(cache);
        const durationSeconds = (performance.now() - startedAt) / 1000;
        if (this.options.metrics) {
          recordProcQuantity(this.options.metrics, proc.name, quantity, durationSeconds);
        }
        results.push({ name: proc.name, quantity });
      } catch (error) {
        const durationSeconds = (performance.now() - startedAt) / 1000;
        if (this.options.metrics) {
          recordProcFailure(this.options.metrics, proc.name, durationSeconds);
        }
        this.options.logger.error({ proc: proc.name, err: serializeError(error) }, 'failed to compute proc quantity');
        throw error;
      }
    }

    this.options.logger.debug({ procs: results }, 'collected proc quantities');
    return results;
  }
}
