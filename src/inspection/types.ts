export const TASK_STATUSES = ['active', 'reserved', 'scheduled'] as const;

export type TaskStatus = (typeof TASK_STATUSES)[number];

export const isTaskStatus = (value: string): value is TaskStatus =>
  TASK_STATUSES.some((status) => status === value);

export interface QueueBinding {
  name: string;
  exchange: {
    name: string;
  };
  routing_key: string;
}

export interface TaskRecord {
  id?: string;
  name?: string;
  delivery_info: {
    exchange: string;
    routing_key: string;
  };
}

/** Replies keyed by worker hostname. */
export type WorkerReplies<TRecord> = Record<string, TRecord[]>;

/**
 * Remote-control view of the running workers. Each call is one broadcast
 * round-trip; nothing is cached at this level.
 */
export interface WorkerInspector {
  activeQueues(): Promise<WorkerReplies<QueueBinding>>;
  active(): Promise<WorkerReplies<TaskRecord>>;
  reserved(): Promise<WorkerReplies<TaskRecord>>;
  scheduled(): Promise<WorkerReplies<TaskRecord>>;
}

export const flattenReplies = <TRecord>(replies: WorkerReplies<TRecord>): TRecord[] =>
  Object.values(replies).flat();
