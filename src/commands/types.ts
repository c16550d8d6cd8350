import { GenericMap, MapValue } from '../records/types.js';

/**
 * One unit of business logic. `handle` is the only entry point; `failed` is
 * called when a queued execution throws, before the queue decides on a retry.
 */
export abstract class Command<TArgs extends unknown[] = unknown[], TResult = unknown> {
  abstract handle(...args: TArgs): TResult;

  failed?(error: Error, args: TArgs): void | Promise<void>;
}

export type CommandType<C extends object = object> = new (...args: never[]) => C;

export interface CommandCapabilities {
  runnable: boolean;
  dispatchable?: {
    name: string;
    queue?: string;
  };
}

export type WireArgument =
  | { kind: 'value'; value: MapValue }
  | { kind: 'undefined' }
  | { kind: 'record'; type: string; data: GenericMap };

export const PAYLOAD_VERSION = 1;

// What crosses the queue boundary: command identity plus transport-safe arguments
export interface JobPayload {
  version: typeof PAYLOAD_VERSION;
  command: string;
  queue: string;
  args: WireArgument[];
  dispatchedAt: string;
}
