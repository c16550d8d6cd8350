import 'reflect-metadata';
import {
  FieldDeclaration,
  FieldOptions,
  RecordThunk,
  RecordType,
  ScalarKind
} from './types.js';
import { registerRecord } from './registry.js';

const FIELDS_KEY = Symbol('tessera:fields');

type PropertyTarget = object;

// Own declarations of one class, in declaration order. Parent classes keep their own list.
export function getOwnDeclarations(proto: object): readonly FieldDeclaration[] {
  const list: FieldDeclaration[] | undefined = Reflect.getOwnMetadata(FIELDS_KEY, proto);
  return list ?? [];
}

function ownDeclarations(target: PropertyTarget): FieldDeclaration[] {
  const existing: FieldDeclaration[] | undefined = Reflect.getOwnMetadata(FIELDS_KEY, target);
  if (existing) return existing;
  const created: FieldDeclaration[] = [];
  Reflect.defineMetadata(FIELDS_KEY, created, target);
  return created;
}

function declare(target: PropertyTarget, propertyKey: string | symbol, patch: Partial<FieldDeclaration>): void {
  if (typeof propertyKey !== 'string') {
    throw new TypeError(`Record fields must have string names, got ${String(propertyKey)}`);
  }
  const declarations = ownDeclarations(target);
  let decl = declarations.find(d => d.name === propertyKey);
  if (!decl) {
    decl = { name: propertyKey, designType: Reflect.getMetadata('design:type', target, propertyKey) };
    declarations.push(decl);
  }
  Object.assign(decl, patch);
}

function fieldDecorator(patch: Partial<FieldDeclaration>): PropertyDecorator {
  return (target, propertyKey) => declare(target, propertyKey, patch);
}

/**
 * Declares a record field. The kind is taken from the property's declared type;
 * `number` maps to `float`, so whole numbers need `{ type: 'integer' }`.
 */
export function Field(options: FieldOptions = {}): PropertyDecorator {
  const patch: Partial<FieldDeclaration> = {};
  if (options.type) patch.type = options.type;
  if (options.optional !== undefined) patch.optional = options.optional;
  if ('default' in options) patch.explicitDefault = { value: options.default };
  return fieldDecorator(patch);
}

export function Integer(): PropertyDecorator {
  return fieldDecorator({ type: 'integer' });
}

export function Rename(externalKey: string): PropertyDecorator {
  return fieldDecorator({ externalKey });
}

export function DateFormat(pattern: string): PropertyDecorator {
  return fieldDecorator({ dateFormat: pattern });
}

/**
 * Element type of an array field. Array element types are erased at runtime,
 * so lists of records must name their element class here.
 */
export function ListOf(elementType: ScalarKind | RecordType | RecordThunk): PropertyDecorator {
  return fieldDecorator({ type: 'list', elementType });
}

// For record classes declared further down the file
export function Nested(type: RecordThunk): PropertyDecorator {
  return fieldDecorator({ type: 'record', nested: type });
}

export function Exclude(): PropertyDecorator {
  return fieldDecorator({ excluded: true });
}

export function Optional(): PropertyDecorator {
  return fieldDecorator({ optional: true });
}

/**
 * Registers a record class under a stable name, so job payloads can name it
 * and the worker can rebuild it.
 */
export function Serializable(name?: string): <T extends RecordType>(target: T) => T {
  return <T extends RecordType>(target: T): T => {
    registerRecord(target, name ?? target.name);
    return target;
  };
}
