import 'reflect-metadata';

export * from './records/types.js';
export * from './records/errors.js';
export {
  Field,
  Integer,
  Rename,
  DateFormat,
  ListOf,
  Nested,
  Exclude,
  Optional,
  Serializable
} from './records/decorators.js';
export { describe, clearDescriptorCache, resolutionCount, isRecordType } from './records/resolver.js';
export { registerRecord, recordTypeByName, recordNameOf, listRecordNames } from './records/registry.js';
export { formatDate, parseDate } from './records/date-format.js';
export { toMap, fromMap, DataRecord } from './records/marshaler.js';

export { Command, CommandType, CommandCapabilities, JobPayload, WireArgument } from './commands/types.js';
export { Runnable, Dispatchable, DispatchableOptions, capabilitiesOf } from './commands/decorators.js';
export { Container, SimpleContainer } from './commands/container.js';
export { DispatchError, DispatchErrorCode } from './commands/errors.js';
export { commandByName, listCommands } from './commands/registry.js';
export { parseJobPayload } from './commands/transport.js';
export { CommandBus, CommandBusOptions, CommandFacade } from './commands/bus.js';
export { JobProcessor, JobProcessorOptions } from './commands/worker.js';

export * from './backends/types.js';
export { InMemoryQueueSink, InMemoryQueueOptions } from './backends/queue/memory.js';
export { BullMQSink, BullMQConfig } from './backends/queue/bullmq.js';
export { createQueueSink, QueueBackendSink } from './backends/factory.js';

export { Codec } from './codec/types.js';
export { registerCodec, getCodecByName, listCodecs, resolveCodec } from './codec/registry.js';
export { checkDecodedPayload, DecodedGuardrails, DEFAULT_GUARDRAILS } from './codec/guards.js';

export * from './config/types.js';
export { ConfigLoader, ConfigError, loadConfig, mergeConfig, DEFAULT_CONFIG, CONFIG_VERSION } from './config/loader.js';
export { DispatchLog, DispatchEvent, DispatchLogEntry } from './logging/dispatch-log.js';
export { formatDispatchEntry } from './logging/format.js';

export { createRuntime, Runtime, RuntimeOptions } from './runtime.js';
