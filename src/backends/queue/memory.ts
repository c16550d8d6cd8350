import { Codec } from '../../codec/types.js';
import { jsonCodec } from '../../codec/json.js';
import {
  JobHandler,
  JobState,
  QueueConsumer,
  QueueOptions,
  QueueRef,
  QueueSink,
  QueueStatus
} from '../types.js';

interface StoredJob {
  id: string;
  queue: string;
  name: string;
  body: Uint8Array; // encoded message, as a broker would persist it
  state: JobState;
  attemptsMade: number;
  maxAttempts: number;
  priority?: number;
  result?: unknown;
  error?: string;
  timestamp: number;
}

export interface InMemoryQueueOptions {
  codec?: Codec;
  attempts?: number;
  /** Completed or failed jobs kept for `getStatus`; older ones are removed. Default 1000. */
  keepFinished?: number;
}

/**
 * In-process queue. Messages are encoded on send and decoded on delivery,
 * so only what survives the codec reaches the handler. Nothing runs until
 * `drain()` is called.
 */
export class InMemoryQueueSink implements QueueSink, QueueConsumer {
  readonly backend = 'memory';
  private jobs = new Map<string, StoredJob>();
  private handlers = new Map<string, JobHandler>();
  private seq = 0;
  private codec: Codec;
  private attempts: number;
  private keepFinished: number;
  private finished: string[] = [];

  constructor(options: InMemoryQueueOptions = {}) {
    this.codec = options.codec ?? jsonCodec;
    this.attempts = options.attempts ?? 3;
    this.keepFinished = options.keepFinished ?? 1000;
  }

  async send(message: unknown, options: QueueOptions): Promise<QueueRef> {
    const id = options.jobId ?? `mem-${++this.seq}`;
    if (this.jobs.has(id)) {
      throw new Error(`Duplicate job id: ${id}`);
    }
    const job: StoredJob = {
      id,
      queue: options.queue,
      name: options.jobName || 'task',
      body: this.codec.encode(message),
      state: 'waiting',
      attemptsMade: 0,
      maxAttempts: options.maxRetries || this.attempts,
      priority: options.priority,
      timestamp: Date.now()
    };
    this.jobs.set(id, job);
    return {
      backend: this.backend,
      jobId: id,
      queue: job.queue,
      state: job.state,
      timestamp: new Date(job.timestamp).toISOString(),
      priority: job.priority
    };
  }

  async getStatus(ref: QueueRef): Promise<QueueStatus> {
    const job = this.jobs.get(ref.jobId);
    if (!job) {
      throw new Error(`Job not found: ${ref.jobId}`);
    }
    return {
      jobId: job.id,
      state: job.state,
      result: job.result,
      error: job.error,
      attemptsMade: job.attemptsMade,
      timestamp: new Date(job.timestamp).toISOString()
    };
  }

  async cancel(ref: QueueRef): Promise<void> {
    const job = this.jobs.get(ref.jobId);
    if (job && job.state === 'waiting') {
      this.jobs.delete(job.id);
    }
  }

  async consume(queue: string, handler: JobHandler): Promise<void> {
    this.handlers.set(queue, handler);
  }

  // Decoded message of a stored job, for inspection
  peek(jobId: string): unknown {
    const job = this.jobs.get(jobId);
    return job ? this.codec.decode(job.body) : undefined;
  }

  pending(queue?: string): number {
    let n = 0;
    for (const job of this.jobs.values()) {
      if (job.state === 'waiting' && (!queue || job.queue === queue)) n++;
    }
    return n;
  }

  /**
   * Delivers waiting jobs (by priority, then oldest first) to their
   * queue's handler until none are left; failed attempts are redelivered
   * until `maxAttempts`. Returns the number of deliveries made.
   */
  async drain(): Promise<number> {
    let deliveries = 0;
    for (;;) {
      const next = this.nextDeliverable();
      if (!next) return deliveries;
      const handler = this.handlers.get(next.queue);
      if (!handler) return deliveries;

      next.state = 'active';
      next.attemptsMade++;
      deliveries++;
      try {
        next.result = await handler(this.codec.decode(next.body), {
          jobId: next.id,
          queue: next.queue,
          name: next.name,
          attempt: next.attemptsMade
        });
        next.state = 'completed';
        next.error = undefined;
      } catch (err) {
        next.error = err instanceof Error ? err.message : String(err);
        next.state = next.attemptsMade < next.maxAttempts ? 'waiting' : 'failed';
        console.warn(
          `[Queue] Job ${next.id} on ${next.queue} failed (attempt ${next.attemptsMade}/${next.maxAttempts}): ${next.error}`
        );
      }
      if (next.state !== 'waiting') this.retire(next.id);
    }
  }

  // keeps at most `keepFinished` finished jobs, dropping the oldest
  private retire(jobId: string): void {
    this.finished.push(jobId);
    while (this.finished.length > this.keepFinished) {
      const oldest = this.finished.shift();
      if (oldest !== undefined) this.jobs.delete(oldest);
    }
  }

  private nextDeliverable(): StoredJob | undefined {
    let best: StoredJob | undefined;
    for (const job of this.jobs.values()) {
      if (job.state !== 'waiting' || !this.handlers.has(job.queue)) continue;
      // lower priority number runs first, as in BullMQ
      if (!best || (job.priority ?? Infinity) < (best.priority ?? Infinity)) best = job;
    }
    return best;
  }

  async close(): Promise<void> {
    this.handlers.clear();
  }
}
