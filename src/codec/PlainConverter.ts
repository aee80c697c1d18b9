/**
 * Conversion between generic value trees and plain JSON-compatible data
 * 通用值树与纯JSON兼容数据之间的转换
 */

import { GenericValue } from '../value/GenericValue';
import { ObjectValue } from '../value/ObjectValue';
import { ArrayValue } from '../value/ArrayValue';
import { BoolValue, NoneValue, NumberValue, StringValue } from '../value/ScalarValues';
import { TypeNotAllowedError, describeType } from '../errors/Errors';

/**
 * Plain data as produced by `JSON.parse` and MessagePack decoders
 * 纯数据
 */
export type PlainValue = null | boolean | number | string | PlainValue[] | { [key: string]: PlainValue };

/**
 * Convert a generic value into plain data
 * 将通用值转换为纯数据
 *
 * @throws TypeNotAllowedError for non-string object keys and bigint numbers
 */
export function toPlain(value: GenericValue): PlainValue {
  if (value instanceof NoneValue) return null;
  if (value instanceof StringValue || value instanceof BoolValue) return value.value;
  if (value instanceof NumberValue) {
    if (typeof value.value === 'bigint') {
      throw new TypeNotAllowedError(`bigint ${value.value} has no plain representation`);
    }
    return value.value;
  }
  if (value instanceof ArrayValue) {
    return Array.from(value.values(), toPlain);
  }
  if (value instanceof ObjectValue) {
    const result: { [key: string]: PlainValue } = {};
    for (const [key, item] of value.entries()) {
      if (!(key instanceof StringValue)) {
        throw new TypeNotAllowedError(`Plain objects only have string keys, got a ${key.kind} key`);
      }
      Object.defineProperty(result, key.value, {
        value: toPlain(item),
        enumerable: true,
        writable: true,
        configurable: true
      });
    }
    return result;
  }
  throw new TypeNotAllowedError(`Unknown generic value ${describeType(value)}`);
}

/**
 * Convert plain data into a generic value
 * 将纯数据转换为通用值
 *
 * @throws TypeNotAllowedError for anything but null, scalars, arrays and plain objects
 */
export function fromPlain(plain: unknown): GenericValue {
  if (plain === null || plain === undefined) return new NoneValue();
  switch (typeof plain) {
    case 'string':
      return new StringValue(plain);
    case 'number':
    case 'bigint':
      return new NumberValue(plain);
    case 'boolean':
      return new BoolValue(plain);
    case 'object':
      break;
    default:
      throw new TypeNotAllowedError(`${describeType(plain)} has no generic representation`);
  }

  if (Array.isArray(plain)) {
    const array = new ArrayValue();
    for (const item of plain) array.add(fromPlain(item));
    return array;
  }

  const prototype: unknown = Object.getPrototypeOf(plain);
  if (prototype !== Object.prototype && prototype !== null) {
    throw new TypeNotAllowedError(`${describeType(plain)} has no generic representation`);
  }
  const object = new ObjectValue();
  for (const [key, item] of Object.entries(plain)) {
    object.put(key, fromPlain(item));
  }
  return object;
}
