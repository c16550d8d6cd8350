import { JobContext, JobHandler, QueueConsumer } from '../backends/types.js';
import { DispatchLog } from '../logging/dispatch-log.js';
import { Container, SimpleContainer } from './container.js';
import { DispatchError, DispatchErrorCode } from './errors.js';
import { commandByName } from './registry.js';
import { parseJobPayload, unmarshalArgument } from './transport.js';
import { Command } from './types.js';

export interface JobProcessorOptions {
  container?: Container;
  log?: DispatchLog;
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Dequeue side of dispatch: turns a job payload back into a command call.
 * A failing job rejects, so the backend's retry policy applies.
 */
export class JobProcessor {
  private container: Container;
  private log: DispatchLog;

  constructor(options: JobProcessorOptions = {}) {
    this.container = options.container ?? new SimpleContainer();
    this.log = options.log ?? new DispatchLog();
  }

  async process(message: unknown, ctx?: JobContext): Promise<unknown> {
    const payload = parseJobPayload(message);
    const type = commandByName(payload.command);
    if (!type) {
      throw new DispatchError(DispatchErrorCode.UnknownCommand, `no command registered as "${payload.command}"`, {
        command: payload.command
      });
    }

    const entry = { command: payload.command, queue: payload.queue, jobId: ctx?.jobId, attempt: ctx?.attempt };
    const instance = this.container.construct(type);
    const args: unknown[] = [];
    const start = Date.now();
    this.log.write({ event: 'job_started', ...entry, args: payload.args.length });

    try {
      for (const wire of payload.args) {
        args.push(unmarshalArgument(wire));
      }
      const result: unknown = await instance.handle(...args);
      this.log.write({ event: 'job_completed', ...entry, durMs: Date.now() - start });
      return result;
    } catch (err) {
      const error = asError(err);
      console.error(`[Worker] ${payload.command} failed on ${payload.queue}: ${error.message}`);
      this.log.write({ event: 'job_failed', ...entry, durMs: Date.now() - start, error: error.message });
      await this.notifyFailed(instance, error, args);
      throw error;
    }
  }

  handler(): JobHandler {
    return (message, ctx) => this.process(message, ctx);
  }

  // Registers this processor as the handler of each queue
  async listen(consumer: QueueConsumer, queues: readonly string[]): Promise<void> {
    for (const queue of queues) {
      await consumer.consume(queue, this.handler());
      console.log(`[Worker] Listening on ${queue}`);
    }
  }

  private async notifyFailed(instance: Command, error: Error, args: unknown[]): Promise<void> {
    if (!instance.failed) return;
    try {
      await instance.failed(error, args);
    } catch (hookErr) {
      console.error(`[Worker] failed() hook of ${instance.constructor.name} threw: ${asError(hookErr).message}`);
    }
  }
}
