import 'reflect-metadata';
import {
  ElementType,
  FieldDeclaration,
  FieldDescriptor,
  FieldKind,
  RecordThunk,
  RecordType,
  isScalarKind
} from './types.js';
import { InvalidMetadataError } from './errors.js';
import { getOwnDeclarations } from './decorators.js';

// Descriptor Cache: record class -> frozen descriptor list, filled on first use
const cache = new Map<Function, readonly FieldDescriptor[]>();

let resolutions = 0;

export function clearDescriptorCache(): void {
  cache.clear();
}

// Number of introspections performed since start (cache misses)
export function resolutionCount(): number {
  return resolutions;
}

function prototypeChain(type: Function): object[] {
  const chain: object[] = [];
  let proto: unknown = type.prototype;
  while (proto && proto !== Object.prototype) {
    if (typeof proto === 'object') chain.unshift(proto);
    proto = Object.getPrototypeOf(proto);
  }
  return chain;
}

function collectDeclarations(type: Function): FieldDeclaration[] {
  const merged = new Map<string, FieldDeclaration>();
  for (const proto of prototypeChain(type)) {
    for (const decl of getOwnDeclarations(proto)) {
      const inherited = merged.get(decl.name);
      merged.set(decl.name, inherited ? { ...inherited, ...decl } : { ...decl });
    }
  }
  return Array.from(merged.values());
}

export function isRecordType(value: unknown): value is RecordType {
  return typeof value === 'function' && collectDeclarations(value).length > 0;
}

export function isRecordInstance(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isRecordType(value.constructor);
}

function isThunk(ref: RecordType | RecordThunk): ref is RecordThunk {
  return !('prototype' in ref) || ref.prototype === undefined;
}

function kindFromDesignType(designType: unknown): FieldKind {
  if (designType === String) return 'string';
  if (designType === Number) return 'float';
  if (designType === Boolean) return 'boolean';
  if (designType === Date) return 'date';
  if (designType === Array) return 'list';
  if (isRecordType(designType)) return 'record';
  return 'mixed';
}

function sampleInstance(type: RecordType): object {
  try {
    return new type();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidMetadataError(type.name, `cannot be constructed without arguments (${reason})`);
  }
}

function resolveField(type: RecordType, decl: FieldDeclaration, instance: object): FieldDescriptor {
  const recordName = type.name;
  const kind = decl.type ?? kindFromDesignType(decl.designType);

  if (decl.elementType !== undefined && decl.designType !== undefined && decl.designType !== Array) {
    throw new InvalidMetadataError(recordName, `@ListOf on "${decl.name}", which is not an array`, decl.name);
  }

  let elementType: ElementType | undefined;
  if (decl.elementType !== undefined) {
    if (isScalarKind(decl.elementType)) {
      elementType = decl.elementType;
    } else {
      const ref: unknown = isThunk(decl.elementType) ? decl.elementType() : decl.elementType;
      if (!isRecordType(ref)) {
        const label = typeof ref === 'function' ? ref.name : String(ref);
        throw new InvalidMetadataError(
          recordName,
          `list field "${decl.name}" needs a record element type, ${label} declares no fields`,
          decl.name
        );
      }
      elementType = ref;
    }
  }

  let recordType: RecordType | undefined;
  if (kind === 'record') {
    const ref: unknown = decl.nested ? decl.nested() : decl.designType;
    if (!isRecordType(ref)) {
      throw new InvalidMetadataError(recordName, `field "${decl.name}" refers to a class that declares no fields`, decl.name);
    }
    recordType = ref;
  }

  if (kind === 'date' && !decl.dateFormat) {
    throw new InvalidMetadataError(recordName, `date field "${decl.name}" has no @DateFormat`, decl.name);
  }
  if (kind !== 'date' && decl.dateFormat) {
    throw new InvalidMetadataError(recordName, `@DateFormat on "${decl.name}", which is not a date`, decl.name);
  }

  const initial: unknown = Reflect.get(instance, decl.name);
  const hasDefault = decl.explicitDefault !== undefined || initial !== undefined;
  const defaultValue = decl.explicitDefault ? decl.explicitDefault.value : initial;

  return Object.freeze({
    name: decl.name,
    externalKey: decl.externalKey ?? decl.name,
    kind,
    ...(recordType ? { recordType } : {}),
    ...(elementType ? { elementType } : {}),
    ...(decl.dateFormat ? { dateFormat: decl.dateFormat } : {}),
    excluded: decl.excluded ?? false,
    optional: decl.optional ?? false,
    hasDefault,
    ...(hasDefault ? { defaultValue } : {})
  });
}

/**
 * Field descriptors of a record class, in declaration order (parent class fields first).
 * Resolved once per class; later calls return the cached, frozen list.
 */
export function describe(type: RecordType): readonly FieldDescriptor[] {
  const cached = cache.get(type);
  if (cached) return cached;

  const declarations = collectDeclarations(type);
  const instance = sampleInstance(type);
  const descriptors = declarations.map(decl => resolveField(type, decl, instance));

  const seen = new Map<string, string>();
  for (const d of descriptors) {
    const other = seen.get(d.externalKey);
    if (other) {
      throw new InvalidMetadataError(
        type.name,
        `fields "${other}" and "${d.name}" both map to key "${d.externalKey}"`,
        d.name
      );
    }
    seen.set(d.externalKey, d.name);
  }

  // Publish only the complete list
  const frozen = Object.freeze(descriptors);
  resolutions++;
  cache.set(type, frozen);
  return frozen;
}
