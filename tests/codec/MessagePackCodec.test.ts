import { describe, test, expect } from 'vitest';
import { encode } from '@msgpack/msgpack';
import { MessagePackCodec } from '../../src/codec/MessagePackCodec';
import { ArrayValue, NoneValue, NumberValue, ObjectValue, StringValue } from '../../src/value';

describe('MessagePackCodec', () => {
  const codec = new MessagePackCodec();

  test('should encode scalars as MessagePack bytes', () => {
    expect(Array.from(codec.encode(new StringValue('hi')))).toEqual([0xa2, 0x68, 0x69]);
    expect(Array.from(codec.encode(new NumberValue(1)))).toEqual([0x01]);
    expect(Array.from(codec.encode(new NoneValue()))).toEqual([0xc0]);
  });

  test('should round trip nested trees', () => {
    const points = new ArrayValue();
    for (const [x, y] of [[0, 0], [1.5, -2]]) {
      const point = new ObjectValue();
      point.put('x', new NumberValue(x));
      point.put('y', new NumberValue(y));
      points.add(point);
    }
    const shape = new ObjectValue();
    shape.put('name', new StringValue('line'));
    shape.put('points', points);

    expect(codec.decode(codec.encode(shape)).equals(shape)).toBe(true);
  });

  test('should decode data written by other MessagePack encoders', () => {
    const decoded = codec.decode(encode({ a: [1, 'x'] }));

    const expected = new ObjectValue();
    const list = new ArrayValue();
    list.add(new NumberValue(1));
    list.add(new StringValue('x'));
    expected.put('a', list);
    expect(decoded.equals(expected)).toBe(true);
  });

  test('should reject binary payloads', () => {
    expect(() => codec.decode(encode(new Uint8Array([1, 2])))).toThrow('Uint8Array has no generic representation');
  });

  test('should expose its format name', () => {
    expect(codec.name).toBe('msgpack');
  });
});
