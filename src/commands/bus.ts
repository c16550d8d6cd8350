import { QueueRef, QueueSink } from '../backends/types.js';
import { checkDecodedPayload } from '../codec/guards.js';
import { DEFAULT_CONFIG } from '../config/loader.js';
import { TesseraConfig } from '../config/types.js';
import { DispatchLog } from '../logging/dispatch-log.js';
import { Container, SimpleContainer } from './container.js';
import { capabilitiesOf } from './decorators.js';
import { DispatchError, DispatchErrorCode } from './errors.js';
import { marshalArgument } from './transport.js';
import { Command, CommandType, JobPayload, PAYLOAD_VERSION } from './types.js';

export interface CommandBusOptions {
  container?: Container;
  queue?: QueueSink;
  config?: TesseraConfig;
  log?: DispatchLog;
}

// `run`/`dispatch`/`dispatchOn` bound to one command type
export interface CommandFacade<A extends unknown[], R> {
  run(...args: A): R;
  dispatch(...args: A): Promise<QueueRef>;
  dispatchOn(queue: string, ...args: A): Promise<QueueRef>;
}

/**
 * Invokes commands either in-process (`run`) or through the queue
 * (`dispatch`, `dispatchOn`). Holds no per-call state.
 */
export class CommandBus {
  private container: Container;
  private queue?: QueueSink;
  private config: TesseraConfig;
  private log: DispatchLog;

  constructor(options: CommandBusOptions = {}) {
    this.container = options.container ?? new SimpleContainer();
    this.queue = options.queue;
    this.config = options.config ?? DEFAULT_CONFIG;
    this.log = options.log ?? new DispatchLog();
  }

  /**
   * Executes the command now, in the caller's context. Arguments reach
   * `handle` as given; its result or error reaches the caller unchanged.
   */
  run<A extends unknown[], R>(type: CommandType<Command<A, R>>, ...args: A): R {
    if (!capabilitiesOf(type).runnable) {
      throw new DispatchError(DispatchErrorCode.NotRunnable, `${type.name} is not @Runnable`, { command: type.name });
    }
    const instance = this.container.construct(type);
    const start = Date.now();
    try {
      return instance.handle(...args);
    } finally {
      this.log.write({ event: 'command_run', command: type.name, args: args.length, durMs: Date.now() - start });
    }
  }

  /** Enqueues on the command's declared queue, or else the configured default queue. */
  async dispatch<A extends unknown[], R>(type: CommandType<Command<A, R>>, ...args: A): Promise<QueueRef> {
    const declared = capabilitiesOf(type).dispatchable?.queue;
    return this.dispatchOn(declared ?? this.config.queue.defaultQueue, type, ...args);
  }

  /**
   * Enqueues an execution on `queue`. Resolves once the queue accepted the
   * job; the command itself runs later on a worker.
   */
  async dispatchOn<A extends unknown[], R>(
    queue: string,
    type: CommandType<Command<A, R>>,
    ...args: A
  ): Promise<QueueRef> {
    const dispatchable = capabilitiesOf(type).dispatchable;
    if (!dispatchable) {
      throw new DispatchError(DispatchErrorCode.NotDispatchable, `${type.name} is not @Dispatchable`, {
        command: type.name
      });
    }
    if (!this.queue) {
      throw new DispatchError(DispatchErrorCode.NoQueue, `no queue sink configured to dispatch ${dispatchable.name}`, {
        command: dispatchable.name
      });
    }

    const payload: JobPayload = {
      version: PAYLOAD_VERSION,
      command: dispatchable.name,
      queue,
      args: args.map((arg, i) => marshalArgument(arg, i)),
      dispatchedAt: new Date().toISOString()
    };

    const guard = checkDecodedPayload(payload, {
      maxDecodedSize: this.config.codec.maxDecodedSize,
      maxDepth: this.config.codec.maxDepth
    });
    if (!guard.valid) {
      throw new DispatchError(
        DispatchErrorCode.PayloadTooLarge,
        `payload for ${dispatchable.name} rejected: ${guard.reason} (limit ${guard.limit}, actual ${guard.actual})`,
        { command: dispatchable.name, reason: guard.reason, limit: guard.limit, actual: guard.actual }
      );
    }

    const ref = await this.queue.send(payload, {
      queue,
      jobName: dispatchable.name,
      maxRetries: this.config.queue.attempts
    });
    this.log.write({
      event: 'command_dispatched',
      command: dispatchable.name,
      queue,
      jobId: ref.jobId,
      args: args.length
    });
    return ref;
  }

  of<A extends unknown[], R>(type: CommandType<Command<A, R>>): CommandFacade<A, R> {
    return {
      run: (...args: A) => this.run(type, ...args),
      dispatch: (...args: A) => this.dispatch(type, ...args),
      dispatchOn: (queue: string, ...args: A) => this.dispatchOn(queue, type, ...args)
    };
  }
}
