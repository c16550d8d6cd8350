/**
 * In-memory queue backend and backend selection
 */

import { InMemoryQueueSink } from '../src/backends/queue/memory.js';
import { BullMQSink } from '../src/backends/queue/bullmq.js';
import { createQueueSink } from '../src/backends/factory.js';
import { JobContext } from '../src/backends/types.js';
import { msgpackCodec } from '../src/codec/msgpack.js';
import { DEFAULT_CONFIG } from '../src/config/loader.js';
import { rejected, silenceConsole, thrown } from './helpers.js';

jest.mock('bullmq', () => ({ Queue: jest.fn(), Worker: jest.fn() }));
jest.mock('ioredis', () => ({ Redis: jest.fn() }));

beforeAll(() => silenceConsole());

describe('InMemoryQueueSink', () => {
  it('stores jobs until drained', async () => {
    const queue = new InMemoryQueueSink();
    const ref = await queue.send({ hello: 'world' }, { queue: 'q', jobName: 'greet' });

    expect(ref).toEqual({
      backend: 'memory',
      jobId: 'mem-1',
      queue: 'q',
      state: 'waiting',
      timestamp: expect.any(String),
      priority: undefined
    });
    expect(queue.pending()).toBe(1);
    expect(queue.peek('mem-1')).toEqual({ hello: 'world' });
    expect(await queue.drain()).toBe(0);
  });

  it('delivers decoded messages with their context', async () => {
    const queue = new InMemoryQueueSink({ codec: msgpackCodec });
    const seen: Array<{ message: unknown; ctx: JobContext }> = [];
    await queue.consume('q', async (message, ctx) => {
      seen.push({ message, ctx });
      return 'done';
    });
    const ref = await queue.send({ list: [1, 2] }, { queue: 'q', jobName: 'greet', jobId: 'job-a' });

    expect(await queue.drain()).toBe(1);
    expect(seen).toEqual([{ message: { list: [1, 2] }, ctx: { jobId: 'job-a', queue: 'q', name: 'greet', attempt: 1 } }]);
    expect(await queue.getStatus(ref)).toMatchObject({ state: 'completed', result: 'done', attemptsMade: 1 });
  });

  it('delivers lower priority numbers first, then in order of arrival', async () => {
    const queue = new InMemoryQueueSink();
    const order: unknown[] = [];
    await queue.consume('q', async message => {
      order.push(message);
      return null;
    });
    await queue.send('a', { queue: 'q', priority: 5 });
    await queue.send('b', { queue: 'q' });
    await queue.send('c', { queue: 'q', priority: 1 });
    await queue.send('d', { queue: 'q', priority: 5 });

    await queue.drain();
    expect(order).toEqual(['c', 'a', 'd', 'b']);
  });

  it('redelivers failed jobs up to the attempt limit', async () => {
    const queue = new InMemoryQueueSink({ attempts: 3 });
    const attempts: number[] = [];
    await queue.consume('q', async (_message, ctx) => {
      attempts.push(ctx.attempt);
      throw new Error('unavailable');
    });
    const ref = await queue.send('x', { queue: 'q' });

    expect(await queue.drain()).toBe(3);
    expect(attempts).toEqual([1, 2, 3]);
    expect(await queue.getStatus(ref)).toMatchObject({ state: 'failed', error: 'unavailable', attemptsMade: 3 });
  });

  it('lets the job override the attempt limit', async () => {
    const queue = new InMemoryQueueSink({ attempts: 3 });
    await queue.consume('q', async () => {
      throw new Error('unavailable');
    });
    await queue.send('x', { queue: 'q', maxRetries: 1 });
    expect(await queue.drain()).toBe(1);
  });

  it('cancels waiting jobs', async () => {
    const queue = new InMemoryQueueSink();
    const ref = await queue.send('x', { queue: 'q' });
    await queue.cancel(ref);
    expect(queue.pending()).toBe(0);
    expect(await rejected(queue.getStatus(ref))).toMatchObject({ message: 'Job not found: mem-1' });
  });

  it('removes the oldest finished jobs beyond the retention count', async () => {
    const queue = new InMemoryQueueSink({ keepFinished: 1, attempts: 1 });
    await queue.consume('q', async message => {
      if (message === 'bad') throw new Error('unavailable');
      return message;
    });
    const first = await queue.send('ok', { queue: 'q' });
    const second = await queue.send('bad', { queue: 'q' });

    expect(await queue.drain()).toBe(2);
    expect(await rejected(queue.getStatus(first))).toMatchObject({ message: 'Job not found: mem-1' });
    expect(await queue.getStatus(second)).toMatchObject({ state: 'failed', error: 'unavailable' });
  });

  it('keeps waiting jobs regardless of the retention count', async () => {
    const queue = new InMemoryQueueSink({ keepFinished: 0 });
    const ref = await queue.send('x', { queue: 'q' });
    expect(await queue.drain()).toBe(0);
    expect(await queue.getStatus(ref)).toMatchObject({ state: 'waiting' });
  });

  it('refuses duplicate job ids', async () => {
    const queue = new InMemoryQueueSink();
    await queue.send('x', { queue: 'q', jobId: 'same' });
    expect(await rejected(queue.send('y', { queue: 'q', jobId: 'same' }))).toMatchObject({
      message: 'Duplicate job id: same'
    });
  });
});

describe('createQueueSink', () => {
  it('builds the memory backend by default', () => {
    expect(createQueueSink(DEFAULT_CONFIG)).toBeInstanceOf(InMemoryQueueSink);
  });

  it('builds the bullmq backend from a redis URL', () => {
    const config = {
      ...DEFAULT_CONFIG,
      queue: { ...DEFAULT_CONFIG.queue, backend: 'bullmq' as const, redisUrl: 'redis://localhost:6379' }
    };
    expect(createQueueSink(config)).toBeInstanceOf(BullMQSink);
  });

  it('warns that bullmq ignores a non-json codec', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    warn.mockClear();
    const config = {
      ...DEFAULT_CONFIG,
      queue: { ...DEFAULT_CONFIG.queue, backend: 'bullmq' as const, redisUrl: 'redis://localhost:6379' },
      codec: { ...DEFAULT_CONFIG.codec, name: 'msgpack' }
    };
    createQueueSink(config);
    expect(warn).toHaveBeenCalledWith(
      '[Queue] codec=msgpack applies to the memory backend only; BullMQ stores job data as JSON'
    );

    warn.mockClear();
    createQueueSink({ ...config, codec: DEFAULT_CONFIG.codec });
    expect(warn).not.toHaveBeenCalled();
  });

  it('needs a redis URL for bullmq', () => {
    const config = { ...DEFAULT_CONFIG, queue: { ...DEFAULT_CONFIG.queue, backend: 'bullmq' as const } };
    expect(thrown(() => createQueueSink(config))).toMatchObject({
      message: 'Queue backend bullmq requires a redis URL (TESSERA_REDIS_URL)'
    });
  });
});
