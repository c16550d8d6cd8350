import { Queue, Worker } from 'bullmq';
import { Redis } from 'ioredis';
import {
  JobHandler,
  JobState,
  QueueConsumer,
  QueueOptions,
  QueueRef,
  QueueSink,
  QueueStatus
} from '../types.js';

export interface BullMQConfig {
  redisUrl: string;
  defaultPrefix?: string;
  attempts?: number;
  backoffMs?: number;
}

export class BullMQSink implements QueueSink, QueueConsumer {
  readonly backend = 'bullmq';
  private redis: Redis;
  private queues = new Map<string, Queue>();
  private workers: Worker[] = [];

  constructor(private config: BullMQConfig) {
    this.redis = new Redis(config.redisUrl, {
      maxRetriesPerRequest: null
    });
  }

  async send(message: unknown, options: QueueOptions): Promise<QueueRef> {
    const queue = this.getQueue(options.queue);

    const job = await queue.add(
      options.jobName || 'task',
      message,
      {
        jobId: options.jobId,
        priority: options.priority,
        delay: options.delayMs,
        attempts: options.maxRetries || this.config.attempts || 3,
        backoff: {
          type: 'exponential',
          delay: this.config.backoffMs || 1000
        }
      }
    );

    if (!job.id) {
      throw new Error(`BullMQ returned no job id for queue ${options.queue}`);
    }

    return {
      backend: this.backend,
      jobId: job.id,
      queue: options.queue,
      state: options.delayMs ? 'delayed' : 'waiting',
      timestamp: new Date().toISOString(),
      priority: options.priority
    };
  }

  async getStatus(ref: QueueRef): Promise<QueueStatus> {
    const queue = this.getQueue(ref.queue);
    const job = await queue.getJob(ref.jobId);

    if (!job) {
      throw new Error(`Job not found: ${ref.jobId}`);
    }

    const state = await job.getState();

    return {
      jobId: ref.jobId,
      state: this.mapState(state),
      progress: typeof job.progress === 'number' ? job.progress : undefined,
      result: job.returnvalue,
      error: job.failedReason,
      attemptsMade: job.attemptsMade,
      timestamp: new Date(job.timestamp).toISOString()
    };
  }

  async cancel(ref: QueueRef): Promise<void> {
    const queue = this.getQueue(ref.queue);
    const job = await queue.getJob(ref.jobId);

    if (job) {
      await job.remove();
    }
  }

  async consume(queueName: string, handler: JobHandler): Promise<void> {
    const worker = new Worker(
      queueName,
      async (job) => {
        if (!job.id) throw new Error(`Job without id on queue ${queueName}`);
        return handler(job.data, {
          jobId: job.id,
          queue: queueName,
          name: job.name,
          attempt: job.attemptsMade + 1
        });
      },
      {
        connection: this.redis,
        prefix: this.prefix()
      }
    );
    worker.on('failed', (job, err) => {
      console.warn(`[Queue] Job ${job?.id ?? '?'} on ${queueName} failed: ${err.message}`);
    });
    await worker.waitUntilReady();
    this.workers.push(worker);
  }

  private getQueue(queueName: string): Queue {
    let queue = this.queues.get(queueName);
    if (!queue) {
      queue = new Queue(queueName, {
        connection: this.redis,
        prefix: this.prefix()
      });
      this.queues.set(queueName, queue);
    }

    return queue;
  }

  private prefix(): string {
    return this.config.defaultPrefix || 'tessera';
  }

  private mapState(bullState: string): JobState {
    const stateMap: Record<string, JobState> = {
      'waiting': 'waiting',
      'waiting-children': 'waiting',
      'prioritized': 'waiting',
      'delayed': 'delayed',
      'active': 'active',
      'completed': 'completed',
      'failed': 'failed'
    };
    return stateMap[bullState] || 'waiting';
  }

  async close(): Promise<void> {
    for (const worker of this.workers) {
      await worker.close();
    }
    for (const queue of this.queues.values()) {
      await queue.close();
    }
    await this.redis.quit();
  }
}
