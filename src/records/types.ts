// Record marshaling types

export type MapValue = string | number | boolean | null | MapValue[] | GenericMap;

export interface GenericMap {
  [key: string]: MapValue;
}

// Key-based construction: the marshaler builds the instance, then assigns fields by name.
export type RecordType<T extends object = object> = new () => T;

export type RecordThunk = () => RecordType;

export type ScalarKind = 'string' | 'integer' | 'float' | 'boolean';

export type FieldKind = ScalarKind | 'date' | 'record' | 'list' | 'mixed';

export type ElementType = ScalarKind | RecordType;

export interface FieldOptions {
  type?: FieldKind;
  optional?: boolean;
  default?: unknown;
}

// Raw per-property declaration collected by the decorators, before resolution
export interface FieldDeclaration {
  name: string;
  designType?: unknown;
  type?: FieldKind;
  externalKey?: string;
  dateFormat?: string;
  elementType?: ScalarKind | RecordType | RecordThunk;
  nested?: RecordThunk;
  excluded?: boolean;
  optional?: boolean;
  explicitDefault?: { value: unknown };
}

export interface FieldDescriptor {
  readonly name: string;
  readonly externalKey: string;
  readonly kind: FieldKind;
  readonly recordType?: RecordType;
  readonly elementType?: ElementType;
  readonly dateFormat?: string;
  readonly excluded: boolean;
  readonly optional: boolean;
  readonly hasDefault: boolean;
  readonly defaultValue?: unknown;
}

export const SCALAR_KINDS: readonly ScalarKind[] = ['string', 'integer', 'float', 'boolean'];

export function isScalarKind(value: unknown): value is ScalarKind {
  return SCALAR_KINDS.some(kind => kind === value);
}

export function isPlainMap(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// Names a value's runtime kind for diagnostics
export function kindOf(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Date) return 'date';
  if (typeof value === 'number') return Number.isSafeInteger(value) ? 'integer' : 'float';
  if (typeof value === 'object') return isPlainMap(value) ? 'map' : value.constructor.name;
  return typeof value;
}
