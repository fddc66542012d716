import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from 'prom-client';

export interface MetricsOptions {
  prefix?: string;
  defaultLabels?: Record<string, string>;
  collectDefaults?: boolean;
}

export interface ProbeMetrics {
  registry: Registry;
  procQuantityGauge: Gauge<'proc'>;
  probeDuration: Histogram<'proc' | 'outcome'>;
  missingQueueCounter: Counter<'queue'>;
  inspectionCounter: Counter<'method'>;
}

export const createProbeMetrics = (options: MetricsOptions = {}): ProbeMetrics => {
  const prefix = options.prefix ?? 'autoscale_probe_';
  const registry = new Registry();

  if (options.defaultLabels) {
    registry.setDefaultLabels(options.defaultLabels);
  }

  if (options.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const procQuantityGauge = new Gauge({
    name: `${prefix}proc_quantity`,
    help: 'Last reported number of pending or in-flight tasks per proc',
    labelNames: ['proc'] as const,
    registers: [registry],
  });

  const probeDuration = new Histogram({
    name: `${prefix}proc_probe_duration_seconds`,
    help: 'Time spent computing a proc quantity in seconds',
    buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
    labelNames: ['proc', 'outcome'] as const,
    registers: [registry],
  });

  const missingQueueCounter = new Counter({
    name: `${prefix}missing_queue_total`,
    help: 'Passive declares answered with a channel error and counted as empty',
    labelNames: ['queue'] as const,
    registers: [registry],
  });

  const inspectionCounter = new Counter({
    name: `${prefix}worker_inspections_total`,
    help: 'Worker inspection broadcasts issued grouped by method',
    labelNames: ['method'] as const,
    registers: [registry],
  });

  return {
    registry,
    procQuantityGauge,
    probeDuration,
    missingQueueCounter,
    inspectionCounter,
  };
};

export const recordProcQuantity = (
  metrics: ProbeMetrics,
  proc: string,
  quantity: number,
  durationSeconds: number,
): void => {
  metrics.probeDuration.labels(proc, 'success').observe(durationSeconds);
  metrics.procQuantityGauge.labels(proc).set(quantity);
};

export const recordProcFailure = (
  metrics: ProbeMetrics,
  proc: string,
  durationSeconds: number,
): void => {
  metrics.probeDuration.labels(proc, 'failure').observe(durationSeconds);
};

export const recordMissingQueue = (metrics: ProbeMetrics, queue: string): void => {
  metrics.missingQueueCounter.labels(queue).inc();
};

export const recordInspection = (metrics: ProbeMetrics, method: string): void => {
  metrics.inspectionCounter.labels(method).inc();
};

export const serializeProbeMetrics = async (metrics: ProbeMetrics): Promise<string> =>
  metrics.registry.metrics();
