import { describe, test, expect } from 'vitest';
import { Abstract, Field, Transient, Transform } from '../../src/reflect/Decorators';
import {
  classHierarchy,
  cloneArray,
  convertNumeric,
  convertPrimitiveToWrapper,
  convertWrapperToPrimitive,
  createArray,
  enumerateFields,
  getClassTransforms,
  instantiateWithoutConstructor,
  isNativeBuiltin,
  isPrimitiveType,
  readField,
  setArrayItem,
  writeField
} from '../../src/reflect/ReflectionUtil';
import { arrayOf, elementTypeOf, isArrayTypeRef, typeName } from '../../src/reflect/TypeRef';
import type { Transformer } from '../../src/transformer/Transformer';
import type { GenericValue } from '../../src/value/GenericValue';
import { NoneValue } from '../../src/value/ScalarValues';
import {
  FieldAccessError,
  IndexOutOfRangeError,
  NotInstantiableError,
  TypeNotAllowedError
} from '../../src/errors/Errors';

class NoopTransformer implements Transformer {
  toGeneric(): GenericValue {
    return new NoneValue();
  }

  fromGeneric(): unknown {
    return null;
  }
}

class OtherTransformer extends NoopTransformer {}

class Base {
  @Field(Number) a = 1;
  @Field(String) b = 'base';
}

class Derived extends Base {
  @Field(Boolean) c = true;
  @Transient() cache: unknown = 'cached';
  @Field(Number) static counter = 0;
}

class Counted {
  static constructed = 0;
  @Field(Number) value = 42;
  @Field(String) label = 'initial';
  @Field(BigInt) big = 5n;
  @Field(Boolean) flag = true;
  @Field(Base) nested: Base | null = new Base();

  constructor() {
    Counted.constructed++;
  }
}

@Abstract()
class Shape {
  @Field(Number) sides = 0;
}

@Transform({ transformer: NoopTransformer, inheritable: true })
class Root {}

@Transform({ transformer: OtherTransformer })
class Leaf extends Root {}

describe('Field enumeration', () => {
  test('should list ancestor fields first in declaration order', () => {
    expect(enumerateFields(Derived).map(field => field.name)).toEqual(['a', 'b', 'c']);
  });

  test('should record the declaring class and declared type', () => {
    const [a, , c] = enumerateFields(Derived);
    expect(a.declaringClass).toBe(Base);
    expect(a.declaredType).toBe(Number);
    expect(c.declaringClass).toBe(Derived);
    expect(c.declaredType).toBe(Boolean);
  });

  test('should build the class chain without Object', () => {
    expect(classHierarchy(Derived)).toEqual([Base, Derived]);
  });
});

describe('Class transforms', () => {
  test('should put own transforms before inherited ones', () => {
    const transformers = getClassTransforms(Leaf).map(declaration => declaration.transformer);
    expect(transformers).toEqual([OtherTransformer, NoopTransformer]);
  });
});

describe('Field access', () => {
  test('should read and write fields', () => {
    const base = new Base();
    writeField(base, { name: 'a' }, 9);
    expect(readField(base, { name: 'a' })).toBe(9);
  });

  test('should wrap getter failures with class and field', () => {
    const broken = {
      get value(): number {
        throw new Error('boom');
      }
    };
    let caught: unknown;
    try {
      readField(broken, { name: 'value' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(FieldAccessError);
    expect(caught instanceof FieldAccessError ? caught.fieldName : '').toBe('value');
    expect(caught instanceof FieldAccessError ? caught.message : '').toBe(
      'Reading field failed: boom (Object.value)'
    );
  });

  test('should reject writes to frozen objects', () => {
    const frozen = Object.freeze(new Base());
    expect(() => writeField(frozen, { name: 'a' }, 2)).toThrow(FieldAccessError);
  });

  test('should reject non-objects', () => {
    expect(() => readField(42, { name: 'x' })).toThrow(FieldAccessError);
  });
});

describe('Instantiation', () => {
  test('should skip the constructor and set defaults', () => {
    const before = Counted.constructed;
    const instance = instantiateWithoutConstructor(Counted);

    expect(Counted.constructed).toBe(before);
    expect(instance).toBeInstanceOf(Counted);
    expect(instance.value).toBe(0);
    expect(instance.label).toBe('');
    expect(instance.big).toBe(0n);
    expect(instance.flag).toBe(false);
    expect(instance.nested).toBeNull();
  });

  test('should default transient fields but not static ones', () => {
    const instance = instantiateWithoutConstructor(Derived);

    expect(instance.a).toBe(0);
    expect(instance.b).toBe('');
    expect(instance.c).toBe(false);
    expect(Object.prototype.hasOwnProperty.call(instance, 'cache')).toBe(true);
    expect(instance.cache).toBeNull();
    expect(Object.prototype.hasOwnProperty.call(instance, 'counter')).toBe(false);
  });

  test('should refuse abstract and built-in classes', () => {
    expect(() => instantiateWithoutConstructor(Shape)).toThrow(NotInstantiableError);
    expect(() => instantiateWithoutConstructor(Map)).toThrow(NotInstantiableError);
  });

  test('should recognize built-ins', () => {
    expect(isNativeBuiltin(Date)).toBe(true);
    expect(isNativeBuiltin(Base)).toBe(false);
  });
});

describe('Primitive helpers', () => {
  test('should map primitives and wrappers', () => {
    expect(isPrimitiveType('bigint')).toBe(true);
    expect(isPrimitiveType('symbol')).toBe(false);
    expect(convertPrimitiveToWrapper('string')).toBe(String);
    expect(convertWrapperToPrimitive(Boolean)).toBe('boolean');
    expect(() => convertWrapperToPrimitive(Base)).toThrow(TypeNotAllowedError);
  });

  test('should convert between number and bigint', () => {
    expect(convertNumeric(3, 'bigint')).toBe(3n);
    expect(convertNumeric(3n, 'number')).toBe(3);
    expect(() => convertNumeric(1.5, 'bigint')).toThrow(TypeNotAllowedError);
  });
});

describe('Arrays', () => {
  test('should allocate arrays for declared types', () => {
    expect(createArray(arrayOf(Base), 2)).toEqual([null, null]);
    const typed = createArray(Float32Array, 3);
    expect(typed).toBeInstanceOf(Float32Array);
    expect(typed.length).toBe(3);
    expect(() => createArray(Base, 1)).toThrow(NotInstantiableError);
  });

  test('should check bounds and element kinds', () => {
    const ints = new Int32Array(2);
    setArrayItem(ints, 1, 7);
    expect(ints[1]).toBe(7);
    expect(() => setArrayItem(ints, 2, 1)).toThrow(IndexOutOfRangeError);
    expect(() => setArrayItem(ints, 0, 'x')).toThrow(TypeNotAllowedError);
    expect(() => setArrayItem(new BigInt64Array(1), 0, 1)).toThrow(TypeNotAllowedError);
  });

  test('should copy arrays keeping typed arrays typed', () => {
    const floats = new Float64Array([1.5, 2]);
    const copy = cloneArray(floats);
    expect(copy).toBeInstanceOf(Float64Array);
    expect(copy).not.toBe(floats);
    expect(Array.from(copy)).toEqual([1.5, 2]);

    const items = ['a', 1];
    expect(cloneArray(items)).toEqual(['a', 1]);
    expect(cloneArray(items)).not.toBe(items);
  });

  test('should describe array types', () => {
    expect(typeName(arrayOf(arrayOf(Number)))).toBe('Number[][]');
    expect(elementTypeOf(BigUint64Array)).toBe(BigInt);
    expect(elementTypeOf(Array)).toBe(Object);
    expect(isArrayTypeRef(Uint8Array)).toBe(true);
    expect(isArrayTypeRef(Base)).toBe(false);
  });
});
