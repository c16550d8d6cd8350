export type JobState = 'waiting' | 'active' | 'completed' | 'failed' | 'delayed';

export interface QueueOptions {
  queue: string;
  jobId?: string;
  jobName?: string;
  priority?: number;
  delayMs?: number;
  maxRetries?: number;
}

export interface QueueRef {
  backend: string;
  jobId: string;
  queue: string;
  state: JobState;
  timestamp: string;
  priority?: number;
}

export interface QueueStatus {
  jobId: string;
  state: JobState;
  progress?: number;
  result?: unknown;
  error?: string;
  attemptsMade?: number;
  timestamp: string;
}

export interface JobContext {
  jobId: string;
  queue: string;
  name: string;
  attempt: number; // 1-based
}

export type JobHandler = (message: unknown, ctx: JobContext) => Promise<unknown>;

// Producer side: persists messages and reports on them. Delivery and retry belong to the backend.
export interface QueueSink {
  readonly backend: string;
  send(message: unknown, options: QueueOptions): Promise<QueueRef>;
  getStatus(ref: QueueRef): Promise<QueueStatus>;
  cancel(ref: QueueRef): Promise<void>;
  close(): Promise<void>;
}

// Consumer side: delivers messages of one queue to a handler; a rejected handler counts as a failed attempt
export interface QueueConsumer {
  consume(queue: string, handler: JobHandler): Promise<void>;
}
