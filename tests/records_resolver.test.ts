/**
 * Metadata resolution
 * - descriptors from decorators and design types, cached per class
 * - inherited fields, definition errors, record registry
 */

import { clearDescriptorCache, describe as describeRecord, isRecordType, resolutionCount } from '../src/records/resolver.js';
import { DateFormat, Field, ListOf, Rename, Serializable } from '../src/records/decorators.js';
import { recordNameOf, recordTypeByName } from '../src/records/registry.js';
import { InvalidMetadataError } from '../src/records/errors.js';
import { Customer, Order, OrderLine, Product } from './fixtures/records.js';
import { thrown } from './helpers.js';

describe('describe', () => {
  beforeEach(() => clearDescriptorCache());

  it('resolves each class once', () => {
    const before = resolutionCount();
    const first = describeRecord(Product);
    const second = describeRecord(Product);
    expect(second).toBe(first);
    expect(resolutionCount()).toBe(before + 1);
  });

  it('returns frozen descriptors', () => {
    const descriptors = describeRecord(Product);
    expect(Object.isFrozen(descriptors)).toBe(true);
    expect(Object.isFrozen(descriptors[0])).toBe(true);
  });

  it('derives kinds, keys and defaults', () => {
    expect(describeRecord(Product)).toEqual([
      { name: 'name', externalKey: 'name', kind: 'string', excluded: false, optional: false, hasDefault: false },
      {
        name: 'stock',
        externalKey: 'stock',
        kind: 'integer',
        excluded: false,
        optional: false,
        hasDefault: true,
        defaultValue: 0
      },
      { name: 'price', externalKey: 'price', kind: 'float', excluded: false, optional: false, hasDefault: false }
    ]);
  });

  it('records renames, exclusions and nested types', () => {
    const [email, , password] = describeRecord(Customer);
    expect(email.externalKey).toBe('customer_email');
    expect(password.excluded).toBe(true);

    const order = describeRecord(Order);
    expect(order.map(d => d.kind)).toEqual(['string', 'list', 'date', 'record', 'string']);
    expect(order[1].elementType).toBe(OrderLine);
    expect(order[2].dateFormat).toBe('Y-m-d');
    expect(order[3].recordType).toBe(Customer);
    expect(order[4].optional).toBe(true);
  });

  it('puts inherited fields first', () => {
    class Base {
      @Field() id!: string;
    }
    class Child extends Base {
      @Field() label!: string;
    }
    expect(describeRecord(Child).map(d => d.name)).toEqual(['id', 'label']);
    expect(describeRecord(Base).map(d => d.name)).toEqual(['id']);
  });

  it('rejects two fields on one key', () => {
    class Dup {
      @Field() a!: string;
      @Rename('a') @Field() b!: string;
    }
    const err = thrown(() => describeRecord(Dup));
    expect(err).toBeInstanceOf(InvalidMetadataError);
    expect(err).toMatchObject({ message: 'Dup: fields "a" and "b" both map to key "a"' });
  });

  it('rejects a date field without a pattern', () => {
    class NoPattern {
      @Field() at!: Date;
    }
    expect(thrown(() => describeRecord(NoPattern))).toMatchObject({
      message: 'NoPattern: date field "at" has no @DateFormat'
    });
  });

  it('rejects a pattern on a field that is not a date', () => {
    class StrayPattern {
      @DateFormat('Y') @Field() name!: string;
    }
    expect(thrown(() => describeRecord(StrayPattern))).toMatchObject({
      message: 'StrayPattern: @DateFormat on "name", which is not a date'
    });
  });

  it('rejects @ListOf on a scalar property', () => {
    class NotAList {
      @ListOf('string') tags!: string;
    }
    expect(thrown(() => describeRecord(NotAList))).toMatchObject({
      message: 'NotAList: @ListOf on "tags", which is not an array'
    });
  });

  it('rejects records that need constructor arguments', () => {
    class Needy {
      @Field() name: string;
      constructor(name: string) {
        if (name === undefined) throw new Error('name required');
        this.name = name;
      }
    }
    const type: unknown = Needy;
    expect(isRecordType(type)).toBe(true);
    if (!isRecordType(type)) return;
    expect(thrown(() => describeRecord(type))).toMatchObject({
      message: 'Needy: cannot be constructed without arguments (name required)'
    });
  });
});

describe('record registry', () => {
  it('names @Serializable records', () => {
    expect(recordNameOf(Order)).toBe('Order');
    expect(recordTypeByName('OrderLine')).toBe(OrderLine);
    expect(recordNameOf(Product)).toBeUndefined();
  });

  it('refuses a name held by another class', () => {
    class First {
      @Field() a!: string;
    }
    class Second {
      @Field() a!: string;
    }
    Serializable('shared')(First);
    expect(thrown(() => Serializable('shared')(Second))).toMatchObject({
      message: 'Second: record name "shared" is already registered by First'
    });
  });
});
