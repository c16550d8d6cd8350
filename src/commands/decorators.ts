import 'reflect-metadata';
import { Command, CommandCapabilities, CommandType } from './types.js';
import { registerCommand } from './registry.js';

const CAPABILITIES_KEY = Symbol('tessera:capabilities');

type CommandDecorator = <T extends CommandType<Command>>(target: T) => T;

// Inherited capabilities are copied before a subclass adds its own
function update(target: Function, patch: Partial<CommandCapabilities>): void {
  const current = capabilitiesOf(target);
  Reflect.defineMetadata(CAPABILITIES_KEY, { ...current, ...patch }, target);
}

export function capabilitiesOf(type: Function): CommandCapabilities {
  const stored: CommandCapabilities | undefined = Reflect.getMetadata(CAPABILITIES_KEY, type);
  return stored ?? { runnable: false };
}

/** Allows synchronous, in-process execution through `CommandBus.run`. */
export function Runnable(): CommandDecorator {
  return (target) => {
    update(target, { runnable: true });
    return target;
  };
}

export interface DispatchableOptions {
  /** Identity carried in job payloads. Defaults to the class name. */
  name?: string;
  /** Queue used by `dispatch`. Defaults to the configured default queue. */
  queue?: string;
}

/** Allows queued execution through `CommandBus.dispatch` and `dispatchOn`. */
export function Dispatchable(options: DispatchableOptions = {}): CommandDecorator {
  return (target) => {
    const name = options.name ?? target.name;
    registerCommand(name, target);
    update(target, { dispatchable: { name, queue: options.queue } });
    return target;
  };
}
