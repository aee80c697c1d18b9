import { describe, test, expect } from 'vitest';
import { JsonCodec } from '../../src/codec/JsonCodec';
import { ArrayValue, BoolValue, NoneValue, NumberValue, ObjectValue, StringValue } from '../../src/value';
import { TypeNotAllowedError } from '../../src/errors/Errors';

function sample(): ObjectValue {
  const list = new ArrayValue();
  list.add(new NumberValue(1));
  list.add(new BoolValue(true));
  list.add(new NoneValue());

  const object = new ObjectValue();
  object.put('name', new StringValue('a'));
  object.put('list', list);
  return object;
}

describe('JsonCodec', () => {
  test('should encode compact JSON by default', () => {
    expect(new JsonCodec().encode(sample())).toBe('{"name":"a","list":[1,true,null]}');
  });

  test('should pretty print when asked', () => {
    const object = new ObjectValue();
    object.put('a', new NumberValue(1));
    expect(new JsonCodec(true).encode(object)).toBe('{\n  "a": 1\n}');
  });

  test('should decode back into an equal tree', () => {
    const codec = new JsonCodec();
    const decoded = codec.decode(codec.encode(sample()));
    expect(decoded.equals(sample())).toBe(true);
  });

  test('should keep "__proto__" as an ordinary key', () => {
    const object = new ObjectValue();
    object.put('__proto__', new NumberValue(1));
    const codec = new JsonCodec();

    const text = codec.encode(object);

    expect(text).toBe('{"__proto__":1}');
    expect(codec.decode(text).equals(object)).toBe(true);
  });

  test('should reject values JSON cannot hold', () => {
    const codec = new JsonCodec();
    expect(() => codec.encode(new NumberValue(NaN))).toThrow('NaN cannot be represented in JSON');
    expect(() => codec.encode(new NumberValue(5n))).toThrow('bigint 5 has no plain representation');

    const numericKeys = new ObjectValue();
    numericKeys.put(1, new StringValue('one'));
    expect(() => codec.encode(numericKeys)).toThrow(TypeNotAllowedError);
    expect(() => codec.encode(numericKeys)).toThrow('Plain objects only have string keys, got a number key');
  });

  test('should expose its format name', () => {
    expect(new JsonCodec().name).toBe('json');
  });
});
