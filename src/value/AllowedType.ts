import { GenericValue } from './GenericValue';
import { StringValue, NumberValue, BoolValue, NoneValue } from './ScalarValues';
import type { PrimitiveTypeName, TypeRef } from '../reflect/TypeRef';
import { typeName } from '../reflect/TypeRef';
import { isPrimitiveType, isWrapperType, unbox } from '../reflect/ReflectionUtil';
import { TypeNotAllowedError, describeType } from '../errors/Errors';

/**
 * Whether a type may appear as a payload in the value tree: primitives, their wrappers,
 * and generic value classes
 * 类型能否作为值树的载荷：原始类型、包装类型以及通用值类
 */
export function isAllowedType(type: TypeRef | PrimitiveTypeName): boolean {
  if (isPrimitiveType(type) || isWrapperType(type)) return true;
  if (typeof type !== 'function') return false;
  return type === GenericValue || type.prototype instanceof GenericValue;
}

/**
 * @throws TypeNotAllowedError unless {@link isAllowedType}
 */
export function assertAllowedType(type: TypeRef | PrimitiveTypeName): void {
  if (!isAllowedType(type)) {
    const name = typeof type === 'string' ? type : typeof type === 'function' ? type.name : typeName(type);
    throw new TypeNotAllowedError(
      `${name} is not an allowed type; only primitives, their wrappers and generic values are allowed`
    );
  }
}

/**
 * Wrap a raw scalar into its generic value. `null`/`undefined` become none; generic values
 * are returned unchanged.
 * 将原始标量包装为通用值
 *
 * @throws TypeNotAllowedError for any other payload
 */
export function toGenericValue(raw: unknown): GenericValue {
  if (raw instanceof GenericValue) return raw;
  const value = unbox(raw);
  if (value === null || value === undefined) return new NoneValue();
  switch (typeof value) {
    case 'string':
      return new StringValue(value);
    case 'number':
    case 'bigint':
      return new NumberValue(value);
    case 'boolean':
      return new BoolValue(value);
    default:
      throw new TypeNotAllowedError(`${describeType(value)} cannot be stored in a generic value`);
  }
}

/**
 * Raw scalar of a scalar value (`null` for none)
 * 标量值的原始值
 *
 * @throws TypeNotAllowedError for containers
 */
export function unwrapScalar(value: GenericValue): string | number | bigint | boolean | null {
  if (value instanceof StringValue || value instanceof NumberValue || value instanceof BoolValue) {
    return value.value;
  }
  if (value instanceof NoneValue) return null;
  throw new TypeNotAllowedError(`Expected a scalar value, got ${value.kind}`);
}
