import { RecordType } from './types.js';
import { InvalidMetadataError } from './errors.js';

// Named record classes, for payloads that must name their type across a queue boundary
const byName = new Map<string, RecordType>();
const byType = new Map<Function, string>();

export function registerRecord(type: RecordType, name: string): void {
  const existing = byName.get(name);
  if (existing && existing !== type) {
    throw new InvalidMetadataError(type.name, `record name "${name}" is already registered by ${existing.name}`);
  }
  const previousName = byType.get(type);
  if (previousName && previousName !== name) byName.delete(previousName);
  byName.set(name, type);
  byType.set(type, name);
}

export function recordTypeByName(name: string): RecordType | undefined {
  return byName.get(name);
}

export function recordNameOf(type: Function): string | undefined {
  return byType.get(type);
}

export function listRecordNames(): string[] {
  return Array.from(byName.keys());
}
