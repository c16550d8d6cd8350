import { TesseraConfig } from '../config/types.js';
import { resolveCodec } from '../codec/registry.js';
import { QueueConsumer, QueueSink } from './types.js';
import { BullMQSink } from './queue/bullmq.js';
import { InMemoryQueueSink } from './queue/memory.js';

export type QueueBackendSink = QueueSink & QueueConsumer;

export function createQueueSink(config: TesseraConfig): QueueBackendSink {
  const { queue } = config;
  switch (queue.backend) {
    case 'bullmq':
      if (!queue.redisUrl) {
        throw new Error('Queue backend bullmq requires a redis URL (TESSERA_REDIS_URL)');
      }
      console.log(`[Queue] Backend: bullmq (prefix=${queue.prefix})`);
      if (config.codec.name !== 'json') {
        console.warn(
          `[Queue] codec=${config.codec.name} applies to the memory backend only; BullMQ stores job data as JSON`
        );
      }
      return new BullMQSink({
        redisUrl: queue.redisUrl,
        defaultPrefix: queue.prefix,
        attempts: queue.attempts,
        backoffMs: queue.backoffMs
      });
    case 'memory':
      console.log(`[Queue] Backend: memory (codec=${config.codec.name})`);
      return new InMemoryQueueSink({ codec: resolveCodec(config.codec.name), attempts: queue.attempts });
  }
}
