import { FieldDescriptor, GenericMap, MapValue, RecordType, isPlainMap, kindOf } from './types.js';
import {
  InvalidMetadataError,
  MarshalError,
  MissingFieldError,
  RecordValidationError,
  TypeCoercionError
} from './errors.js';
import { describe, isRecordType } from './resolver.js';
import { toExternal, toInternal } from './coercion.js';

const ROOT = '<root>';

function recordTypeOf(record: object): RecordType {
  const ctor: unknown = record.constructor;
  if (!isRecordType(ctor)) {
    const name = typeof ctor === 'function' ? ctor.name : 'Object';
    throw new InvalidMetadataError(name, 'declares no record fields');
  }
  return ctor;
}

function cloneDefault(value: unknown): unknown {
  return Array.isArray(value) || isPlainMap(value) || value instanceof Date ? structuredClone(value) : value;
}

function assign(instance: object, d: FieldDescriptor, value: unknown): void {
  if (!Reflect.set(instance, d.name, value)) {
    throw new TypeError(`Cannot assign field "${d.name}" of ${instance.constructor.name}`);
  }
}

/**
 * Renders a record as a generic map: every non-excluded field, under its
 * external key, in declaration order. `type` defaults to the record's class.
 */
export function toMap(record: object, type: RecordType = recordTypeOf(record)): GenericMap {
  const entries: Array<[string, MapValue]> = [];
  for (const d of describe(type)) {
    if (d.excluded) continue;
    entries.push([d.externalKey, toExternal(Reflect.get(record, d.name), d)]);
  }
  return Object.fromEntries(entries);
}

/**
 * Builds a record from a generic map. Keys that match no field are ignored.
 * Failures of independent fields are collected: one failure is thrown as is,
 * several are thrown together as a RecordValidationError.
 */
export function fromMap<T extends object>(type: RecordType<T>, map: unknown): T {
  const descriptors = describe(type);
  if (!isPlainMap(map)) {
    throw new TypeCoercionError(ROOT, ROOT, kindOf(map), type.name, map, []);
  }

  const instance = new type();
  const errors: MarshalError[] = [];

  for (const d of descriptors) {
    const raw: unknown = Object.prototype.hasOwnProperty.call(map, d.externalKey) ? map[d.externalKey] : undefined;
    try {
      if (raw !== undefined) {
        assign(instance, d, toInternal(raw, d));
      } else if (d.hasDefault) {
        // a fresh instance already carries its initializer value
        if (Reflect.get(instance, d.name) === undefined) assign(instance, d, cloneDefault(d.defaultValue));
      } else if (d.optional) {
        assign(instance, d, null);
      } else {
        throw new MissingFieldError(d.name, d.externalKey);
      }
    } catch (err) {
      if (err instanceof MarshalError && !(err instanceof InvalidMetadataError)) {
        errors.push(err);
        continue;
      }
      throw err;
    }
  }

  if (errors.length === 1) throw errors[0];
  if (errors.length > 1) throw new RecordValidationError(type.name, errors);
  return instance;
}

/**
 * Optional base class giving records `Type.fromMap(map)` and `record.toMap()`.
 */
export abstract class DataRecord {
  static fromMap<T extends DataRecord>(this: RecordType<T>, map: unknown): T {
    return fromMap(this, map);
  }

  toMap(): GenericMap {
    return toMap(this);
  }
}
