import { Command, CommandType } from './types.js';
import { DispatchError, DispatchErrorCode } from './errors.js';

// Dispatchable commands by their stable identity; the worker side resolves queued jobs here
const byName = new Map<string, CommandType<Command>>();

export function registerCommand(name: string, type: CommandType<Command>): void {
  const existing = byName.get(name);
  if (existing && existing !== type) {
    throw new DispatchError(
      DispatchErrorCode.DuplicateCommand,
      `command name "${name}" is already registered by ${existing.name}`,
      { command: name, type: type.name }
    );
  }
  byName.set(name, type);
}

export function commandByName(name: string): CommandType<Command> | undefined {
  return byName.get(name);
}

export function listCommands(): string[] {
  return Array.from(byName.keys());
}
