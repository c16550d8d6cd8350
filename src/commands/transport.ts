import { GenericMap, MapValue, isPlainMap, kindOf } from '../records/types.js';
import { isRecordInstance } from '../records/resolver.js';
import { recordNameOf, recordTypeByName } from '../records/registry.js';
import { fromMap, toMap } from '../records/marshaler.js';
import { DispatchError, DispatchErrorCode } from './errors.js';
import { JobPayload, PAYLOAD_VERSION, WireArgument } from './types.js';

function unserializable(path: string, value: unknown): DispatchError {
  return new DispatchError(
    DispatchErrorCode.UnserializableArgument,
    `argument ${path} (${kindOf(value)}) cannot cross a queue boundary; pass a record or a plain JSON value`,
    { path, kind: kindOf(value) }
  );
}

function toTransportValue(value: unknown, path: string): MapValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw unserializable(path, value);
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => toTransportValue(item, `${path}.${i}`));
  }
  if (isPlainMap(value)) {
    // fromEntries keeps a "__proto__" key as an own property
    return Object.fromEntries(
      Object.entries(value).map(([key, item]): [string, MapValue] => [key, toTransportValue(item, `${path}.${key}`)])
    );
  }
  throw unserializable(path, value);
}

/**
 * Converts command arguments to their wire form: records through the
 * marshaler under their registered name, everything else as a plain value.
 */
export function marshalArgument(arg: unknown, index: number): WireArgument {
  if (arg === undefined) return { kind: 'undefined' };
  if (isRecordInstance(arg)) {
    const name = recordNameOf(arg.constructor);
    if (!name) {
      throw new DispatchError(
        DispatchErrorCode.UnregisteredRecord,
        `argument ${index} is a ${arg.constructor.name} record that is not @Serializable`,
        { index, type: arg.constructor.name }
      );
    }
    return { kind: 'record', type: name, data: toMap(arg) };
  }
  return { kind: 'value', value: toTransportValue(arg, String(index)) };
}

export function unmarshalArgument(wire: WireArgument): unknown {
  switch (wire.kind) {
    case 'undefined':
      return undefined;
    case 'value':
      return wire.value;
    case 'record': {
      const type = recordTypeByName(wire.type);
      if (!type) {
        throw new DispatchError(
          DispatchErrorCode.UnregisteredRecord,
          `no record registered as "${wire.type}"`,
          { type: wire.type }
        );
      }
      return fromMap(type, wire.data);
    }
  }
}

function invalid(reason: string): DispatchError {
  return new DispatchError(DispatchErrorCode.InvalidPayload, `invalid job payload: ${reason}`);
}

function parseWireArgument(raw: unknown, index: number): WireArgument {
  if (!isPlainMap(raw)) throw invalid(`args.${index} is not a map`);
  switch (raw.kind) {
    case 'undefined':
      return { kind: 'undefined' };
    case 'value':
      if (!('value' in raw)) throw invalid(`args.${index} has no value`);
      return { kind: 'value', value: toTransportValue(raw.value, String(index)) };
    case 'record':
      if (typeof raw.type !== 'string') throw invalid(`args.${index} has no record type`);
      if (!isPlainMap(raw.data)) throw invalid(`args.${index} has no record data`);
      return { kind: 'record', type: raw.type, data: toGenericMap(raw.data, index) };
    default:
      throw invalid(`args.${index} has unknown kind ${String(raw.kind)}`);
  }
}

function toGenericMap(data: Record<string, unknown>, index: number): GenericMap {
  return Object.fromEntries(
    Object.entries(data).map(([key, item]): [string, MapValue] => [key, toTransportValue(item, `${index}.${key}`)])
  );
}

// Validates a decoded queue message before anything is constructed from it
export function parseJobPayload(message: unknown): JobPayload {
  if (!isPlainMap(message)) throw invalid(`expected a map, got ${kindOf(message)}`);
  if (message.version !== PAYLOAD_VERSION) throw invalid(`unsupported version ${String(message.version)}`);
  if (typeof message.command !== 'string' || !message.command) throw invalid('missing command');
  if (typeof message.queue !== 'string') throw invalid('missing queue');
  if (typeof message.dispatchedAt !== 'string') throw invalid('missing dispatchedAt');
  if (!Array.isArray(message.args)) throw invalid('args is not a list');
  const args: unknown[] = message.args;
  return {
    version: PAYLOAD_VERSION,
    command: message.command,
    queue: message.queue,
    args: args.map((raw, i) => parseWireArgument(raw, i)),
    dispatchedAt: message.dispatchedAt
  };
}
