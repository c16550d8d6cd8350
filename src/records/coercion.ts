import {
  FieldDescriptor,
  GenericMap,
  MapValue,
  RecordType,
  ScalarKind,
  isPlainMap,
  kindOf
} from './types.js';
import { DateFormatError, MarshalError, TypeCoercionError } from './errors.js';
import { formatDate, parseDate } from './date-format.js';
import { fromMap, toMap } from './marshaler.js';
import { isRecordInstance } from './resolver.js';

const TRUTHY = new Set(['true', '1', 'yes', 'on']);
const FALSY = new Set(['false', '0', 'no', 'off']);

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function coerceScalar(value: unknown, kind: ScalarKind, d: FieldDescriptor, path: string[]): string | number | boolean {
  const fail = (): never => {
    throw new TypeCoercionError(d.name, d.externalKey, kindOf(value), kind, value, path);
  };

  switch (kind) {
    case 'string':
      if (typeof value === 'string') return value;
      if (typeof value === 'number' && Number.isFinite(value)) return String(value);
      if (typeof value === 'boolean' || typeof value === 'bigint') return String(value);
      return fail();
    case 'integer':
    case 'float': {
      let n: number | undefined;
      if (typeof value === 'number') n = value;
      else if (typeof value === 'string' && NUMERIC.test(value.trim())) n = Number(value.trim());
      if (n === undefined || !Number.isFinite(n)) return fail();
      // whole numbers beyond 2^53 would silently change value
      if (kind === 'integer' && !Number.isSafeInteger(n)) return fail();
      return n;
    }
    case 'boolean':
      if (typeof value === 'boolean') return value;
      if (value === 1 || value === 0) return value === 1;
      if (typeof value === 'string') {
        const s = value.trim().toLowerCase();
        if (TRUTHY.has(s)) return true;
        if (FALSY.has(s)) return false;
      }
      return fail();
  }
}

function withPath<T>(segments: string[], fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof MarshalError) throw err.prependPath(...segments);
    throw err;
  }
}

// Opaque values (mixed fields, untyped lists) only need to be JSON-safe on the way out
function toMapValue(value: unknown, d: FieldDescriptor, path: string[]): MapValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (Number.isFinite(value)) return value;
    throw new TypeCoercionError(d.name, d.externalKey, String(value), 'mixed', value, path);
  }
  if (typeof value === 'bigint') return String(value);
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((item, i) => toMapValue(item, d, [...path, String(i)]));
  if (isRecordInstance(value)) return withPath(path, () => toMap(value));
  if (isPlainMap(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]): [string, MapValue] => [key, toMapValue(item, d, [...path, key])])
    );
  }
  throw new TypeCoercionError(d.name, d.externalKey, kindOf(value), 'mixed', value, path);
}

function recordToExternal(value: unknown, type: RecordType, d: FieldDescriptor, path: string[]): GenericMap {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new TypeCoercionError(d.name, d.externalKey, kindOf(value), type.name, value, path);
  }
  return withPath(path, () => toMap(value, type));
}

function recordToInternal(value: unknown, type: RecordType, d: FieldDescriptor, path: string[]): object {
  if (!isPlainMap(value)) {
    throw new TypeCoercionError(d.name, d.externalKey, kindOf(value), type.name, value, path);
  }
  return withPath(path, () => fromMap(type, value));
}

/**
 * Converts a field's internal value to its external map form.
 * `null` and `undefined` always render as `null`.
 */
export function toExternal(value: unknown, d: FieldDescriptor): MapValue {
  if (value === null || value === undefined) return null;
  const path = [d.name];

  switch (d.kind) {
    case 'string':
    case 'integer':
    case 'float':
    case 'boolean':
      return coerceScalar(value, d.kind, d, path);
    case 'date': {
      if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
        throw new TypeCoercionError(d.name, d.externalKey, kindOf(value), 'date', value);
      }
      return formatDate(value, d.dateFormat ?? '');
    }
    case 'record':
      if (!d.recordType) return toMapValue(value, d, path);
      return recordToExternal(value, d.recordType, d, path);
    case 'list': {
      if (!Array.isArray(value)) {
        throw new TypeCoercionError(d.name, d.externalKey, kindOf(value), 'list', value);
      }
      const element = d.elementType;
      if (element === undefined) return toMapValue(value, d, path);
      return value.map((item, i) => {
        const itemPath = [d.name, String(i)];
        if (typeof element === 'string') return coerceScalar(item, element, d, itemPath);
        return recordToExternal(item, element, d, itemPath);
      });
    }
    case 'mixed':
      return toMapValue(value, d, path);
  }
}

/**
 * Converts an external map value into the field's declared type.
 * `null` is accepted only for optional fields.
 */
export function toInternal(value: unknown, d: FieldDescriptor): unknown {
  if (value === null || value === undefined) {
    if (d.optional) return null;
    throw new TypeCoercionError(d.name, d.externalKey, kindOf(value), d.kind, value);
  }
  const path = [d.name];

  switch (d.kind) {
    case 'string':
    case 'integer':
    case 'float':
    case 'boolean':
      return coerceScalar(value, d.kind, d, path);
    case 'date': {
      if (value instanceof Date) return value;
      if (typeof value !== 'string') {
        throw new TypeCoercionError(d.name, d.externalKey, kindOf(value), 'date', value);
      }
      const pattern = d.dateFormat ?? '';
      const parsed = parseDate(value, pattern);
      if (!parsed) throw new DateFormatError(d.name, d.externalKey, pattern, value);
      return parsed;
    }
    case 'record':
      if (!d.recordType) return value;
      return recordToInternal(value, d.recordType, d, path);
    case 'list': {
      if (!Array.isArray(value)) {
        throw new TypeCoercionError(d.name, d.externalKey, kindOf(value), 'list', value);
      }
      const element = d.elementType;
      if (element === undefined) return value;
      return value.map((item: unknown, i) => {
        const itemPath = [d.name, String(i)];
        if (typeof element === 'string') return coerceScalar(item, element, d, itemPath);
        return recordToInternal(item, element, d, itemPath);
      });
    }
    case 'mixed':
      return value;
  }
}
