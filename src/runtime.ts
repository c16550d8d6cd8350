import { createQueueSink, QueueBackendSink } from './backends/factory.js';
import { loadConfig } from './config/loader.js';
import { TesseraConfig } from './config/types.js';
import { DispatchLog } from './logging/dispatch-log.js';
import { CommandBus } from './commands/bus.js';
import { Container, SimpleContainer } from './commands/container.js';
import { JobProcessor } from './commands/worker.js';

export interface Runtime {
  config: TesseraConfig;
  queue: QueueBackendSink;
  bus: CommandBus;
  processor: JobProcessor;
  log: DispatchLog;
  close(): Promise<void>;
}

export interface RuntimeOptions {
  config?: TesseraConfig;
  container?: Container;
}

// Wires config, queue backend, dispatch log, bus and processor together
export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const config = options.config ?? loadConfig();
  const container = options.container ?? new SimpleContainer();
  const log = new DispatchLog(config.log.path);
  const queue = createQueueSink(config);
  const bus = new CommandBus({ container, queue, config, log });
  const processor = new JobProcessor({ container, log });

  return {
    config,
    queue,
    bus,
    processor,
    log,
    async close() {
      await queue.close();
      await log.close();
    }
  };
}
