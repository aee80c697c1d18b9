import { describe, test, expect, beforeEach } from 'vitest';
import { Abstract, Field, Transient, Transform } from '../src/reflect/Decorators';
import { arrayOf } from '../src/reflect/TypeRef';
import { TypeBaker } from '../src/bake/TypeBaker';
import { ObjectSerializer, serialize, deserialize, serializer as defaultSerializer } from '../src/Serializer';
import type { Transformer, TransformContext } from '../src/transformer/Transformer';
import { DateTransformer } from '../src/transformer/DateTransformer';
import { SuperjsonTransformer } from '../src/transformer/SuperjsonTransformer';
import { JsonCodec } from '../src/codec/JsonCodec';
import {
  ArrayValue,
  BoolValue,
  GenericValue,
  NoneValue,
  NumberValue,
  ObjectValue,
  StringValue
} from '../src/value';
import { silentLogger } from '../src/utils/Logger';
import { NotInstantiableError, TypeNotAllowedError } from '../src/errors/Errors';

class Point {
  @Field(Number) x = 0;
  @Field(Number) y = 0;
}

class Polygon {
  @Field(String) name = '';
  @Field(arrayOf(Point)) points: Point[] = [];
  @Field(arrayOf(arrayOf(Number))) grid: number[][] = [];
}

class Profile {
  static created = 0;

  @Field(String) name = 'anonymous';
  @Field(Number) age = 18;
  @Field(Boolean) active = true;
  @Field(BigInt) id = 0n;
  @Transient() session = 'transient';

  constructor() {
    Profile.created++;
  }
}

class Mesh {
  @Field(Float32Array) vertices = new Float32Array(0);
  @Field(BigInt64Array) ids = new BigInt64Array(0);
}

class Memo {
  @Field(Object) meta: unknown = null;
  @Field(ObjectValue) extra: ObjectValue | null = null;
  @Field(GenericValue) any: GenericValue | null = null;
}

class Session {
  @Transform({ transformer: DateTransformer, type: Date })
  @Field(Date)
  startedAt: Date | null = null;

  @Transform({ transformer: SuperjsonTransformer, type: Map })
  @Field(Map)
  counts = new Map<string, number>();
}

class Appointment {
  @Field(String) title = '';
  @Field(Date) when = new Date(0);
}

class CelsiusTransformer implements Transformer {
  toGeneric(value: unknown): GenericValue {
    const object = new ObjectValue();
    object.put('celsius', new NumberValue(value instanceof Temperature ? value.celsius : 0));
    return object;
  }

  fromGeneric(value: GenericValue): unknown {
    const temperature = new Temperature();
    const celsius = value instanceof ObjectValue ? value.get('celsius') : undefined;
    temperature.celsius = celsius instanceof NumberValue ? Number(celsius.value) : 0;
    return temperature;
  }
}

class EnvelopeTransformer implements Transformer {
  toGeneric(value: unknown): GenericValue {
    const envelope = new ObjectValue();
    envelope.put('payload', value instanceof GenericValue ? value : new NoneValue());
    return envelope;
  }

  fromGeneric(value: GenericValue): unknown {
    return value instanceof ObjectValue ? value.get('payload') ?? new NoneValue() : new NoneValue();
  }
}

class KelvinTransformer implements Transformer {
  toGeneric(value: unknown): GenericValue {
    return value instanceof Temperature ? new NumberValue(value.celsius + 273) : new NoneValue();
  }

  fromGeneric(value: GenericValue): unknown {
    const temperature = new Temperature();
    temperature.celsius = value instanceof NumberValue ? Number(value.value) - 273 : 0;
    return temperature;
  }
}

@Transform({ transformer: CelsiusTransformer })
@Transform({ transformer: EnvelopeTransformer })
class Temperature {
  celsius = 0;
}

class Reading {
  @Field(Temperature) indoor: Temperature | null = null;

  @Transform({ transformer: KelvinTransformer })
  @Field(Temperature)
  outdoor: Temperature | null = null;
}

class BoxTransformer implements Transformer {
  toGeneric(value: unknown, context: TransformContext): GenericValue {
    const items = new ArrayValue();
    items.add(context.serializer.serialize(value instanceof Box ? value.content : null));
    return items;
  }

  fromGeneric(value: GenericValue, context: TransformContext): unknown {
    const box = new Box();
    const first = value instanceof ArrayValue && value.length > 0 ? value.get(0) : new NoneValue();
    box.content = context.serializer.deserialize(first, Point);
    return box;
  }
}

@Transform({ transformer: BoxTransformer })
class Box {
  content: Point | null = null;
}

class WrongTransformer implements Transformer {
  toGeneric(): GenericValue {
    return new StringValue('wrong');
  }

  fromGeneric(): unknown {
    return 'not a Mislabeled';
  }
}

@Transform({ transformer: WrongTransformer })
class Mislabeled {}

@Abstract()
class Shape {
  @Field(Number) sides = 0;
}

function point(x: number, y: number): Point {
  return Object.assign(new Point(), { x, y });
}

describe('ObjectSerializer', () => {
  let serializer: ObjectSerializer;

  beforeEach(() => {
    serializer = new ObjectSerializer({ logger: silentLogger, baker: new TypeBaker(silentLogger) });
  });

  describe('serialize', () => {
    test('should produce an object value keyed by field names', () => {
      const value = serializer.serialize(point(3, 4));
      expect(new JsonCodec().encode(value)).toBe('{"x":3,"y":4}');
    });

    test('should write scalars, bigint and absent values', () => {
      const profile = new Profile();
      profile.name = 'Ada';
      profile.id = 7n;

      const value = serializer.serialize(profile);

      const expected = new ObjectValue();
      expected.put('name', new StringValue('Ada'));
      expected.put('age', new NumberValue(18));
      expected.put('active', new BoolValue(true));
      expected.put('id', new NumberValue(7n));
      expect(value.equals(expected)).toBe(true);
    });

    test('should serialize root scalars, arrays and plain objects', () => {
      expect(serializer.serialize(5).equals(new NumberValue(5))).toBe(true);
      expect(serializer.serialize(undefined)).toBeInstanceOf(NoneValue);

      const list = new ArrayValue();
      list.add(new NumberValue(1));
      list.add(new StringValue('a'));
      list.add(new NoneValue());
      expect(serializer.serialize([1, 'a', null]).equals(list)).toBe(true);

      expect(new JsonCodec().encode(serializer.serialize({ tags: ['x'], nested: { ok: true } }))).toBe(
        '{"tags":["x"],"nested":{"ok":true}}'
      );
    });

    test('should copy generic values instead of sharing them', () => {
      const leaf = new StringValue('leaf');
      const tree = new ArrayValue();
      tree.add(leaf);

      const value = serializer.serialize(tree);

      expect(value).not.toBe(tree);
      expect(value.equals(tree)).toBe(true);
    });

    test('should refuse built-in field values without a transformer', () => {
      expect(() => serializer.serialize(new Appointment())).toThrow(
        'Date is a built-in class; declare a transformer to serialize it (Appointment at Call#5)'
      );
    });

    test('should record run statistics', () => {
      serializer.serialize(point(1, 2));
      expect(serializer.lastStats).toEqual({ instructions: 7, frames: 1, maxDepth: 1 });
    });
  });

  describe('deserialize', () => {
    test('should round trip nested objects and arrays', () => {
      const polygon = new Polygon();
      polygon.name = 'triangle';
      polygon.points = [point(0, 0), point(4, 0), point(0, 3)];
      polygon.grid = [[1, 2], [3]];

      const copy = serializer.deserialize(serializer.serialize(polygon), Polygon);

      expect(copy).toBeInstanceOf(Polygon);
      expect(copy).toEqual(polygon);
      expect(copy?.points[1]).toBeInstanceOf(Point);
      expect(copy?.points[1]).not.toBe(polygon.points[1]);
    });

    test('should not run constructors', () => {
      const input = serializer.serialize(new Profile());
      const before = Profile.created;

      const profile = serializer.deserialize(input, Profile);

      expect(Profile.created).toBe(before);
      expect(profile?.name).toBe('anonymous');
      expect(profile?.session).toBeNull();
    });

    test('should keep defaults for missing keys and ignore unknown ones', () => {
      const input = new ObjectValue();
      input.put('age', new NumberValue(42));
      input.put('unknown', new StringValue('ignored'));

      const profile = serializer.deserialize(input, Profile);

      expect(profile).toEqual({
        name: '',
        age: 42,
        active: false,
        id: 0n,
        session: null
      });
    });

    test('should convert numbers to the declared numeric kind', () => {
      const input = new ObjectValue();
      input.put('id', new NumberValue(9));
      expect(serializer.deserialize(input, Profile)?.id).toBe(9n);
      expect(serializer.deserialize(new NumberValue(5), BigInt)).toBe(5n);
    });

    test('should reject scalars of the wrong kind with field context', () => {
      const input = new ObjectValue();
      input.put('age', new StringValue('old'));
      expect(() => serializer.deserialize(input, Profile)).toThrow(`Expected number, got string (${Profile.name} at Unwrap#4)`);
    });

    test('should map none to null', () => {
      const input = new ObjectValue();
      input.put('name', new NoneValue());

      expect(serializer.deserialize(input, Profile)?.name).toBeNull();
      expect(serializer.deserialize(new NoneValue(), Point)).toBeNull();
    });

    test('should round trip typed arrays', () => {
      const mesh = new Mesh();
      mesh.vertices = new Float32Array([0.5, 1, 2]);
      mesh.ids = new BigInt64Array([1n, 2n]);

      const copy = serializer.deserialize(serializer.serialize(mesh), Mesh);

      expect(copy?.vertices).toBeInstanceOf(Float32Array);
      expect(Array.from(copy?.vertices ?? [])).toEqual([0.5, 1, 2]);
      expect(Array.from(copy?.ids ?? [])).toEqual([1n, 2n]);
    });

    test('should rebuild dynamic fields as plain data', () => {
      const memo = new Memo();
      memo.meta = { tags: ['a', 'b'], count: 2, nested: { ok: true }, none: null };

      const copy = serializer.deserialize(serializer.serialize(memo), Memo);

      expect(copy?.meta).toEqual({ tags: ['a', 'b'], count: 2, nested: { ok: true }, none: null });
    });

    test('should copy generic value fields', () => {
      const memo = new Memo();
      memo.extra = new ObjectValue();
      memo.extra.put('k', new NumberValue(1));
      memo.any = new NoneValue();

      const copy = serializer.deserialize(serializer.serialize(memo), Memo);

      expect(copy?.extra).toBeInstanceOf(ObjectValue);
      expect(copy?.extra?.equals(memo.extra)).toBe(true);
      expect(copy?.extra).not.toBe(memo.extra);
      expect(copy?.any).toBeInstanceOf(NoneValue);
    });

    test('should reject mismatched generic value fields', () => {
      const input = new ObjectValue();
      input.put('extra', new StringValue('nope'));
      expect(() => serializer.deserialize(input, Memo)).toThrow(TypeNotAllowedError);
    });

    test('should look up numeric keys of dynamic objects by their number', () => {
      const input = new ObjectValue();
      input.put(1, new StringValue('one'));
      input.put('two', new NumberValue(2));

      expect(serializer.deserialize(input, Object)).toEqual({ '1': 'one', two: 2 });
    });

    test('should reject keys that name the same property', () => {
      const input = new ObjectValue();
      input.put(1, new StringValue('number'));
      input.put('1', new StringValue('string'));

      expect(() => serializer.deserialize(input, Object)).toThrow(TypeNotAllowedError);
    });

    test('should deserialize arrays of classes at the root', () => {
      const input = serializer.serialize([point(1, 1), null]);
      const points = serializer.deserialize(input, arrayOf(Point));

      expect(points).toEqual([point(1, 1), null]);
    });

    test('should reject results that are not instances of the class', () => {
      expect(() => serializer.deserialize(new StringValue('x'), Mislabeled)).toThrow(
        'Deserializing Mislabeled produced string'
      );
    });
  });

  describe('transformers', () => {
    test('should apply field transformers for dates and maps', () => {
      const session = new Session();
      session.startedAt = new Date(1000);
      session.counts = new Map([['a', 1], ['b', 2]]);

      const value = serializer.serialize(session);

      expect(value instanceof ObjectValue ? value.get('startedAt')?.equals(new NumberValue(1000)) : false).toBe(true);
      expect(value instanceof ObjectValue ? value.get('counts') : undefined).toBeInstanceOf(StringValue);

      const copy = serializer.deserialize(value, Session);
      expect(copy?.startedAt).toEqual(new Date(1000));
      expect(copy?.counts).toEqual(new Map([['a', 1], ['b', 2]]));
    });

    test('should keep null through field transformers', () => {
      const copy = serializer.clone(new Session(), Session);
      expect(copy?.startedAt).toBeNull();
    });

    test('should chain class transformers in order and revert in reverse', () => {
      const temperature = new Temperature();
      temperature.celsius = 21;

      const value = serializer.serialize(temperature);

      expect(new JsonCodec().encode(value)).toBe('{"payload":{"celsius":21}}');
      const copy = serializer.deserialize(value, Temperature);
      expect(copy).toBeInstanceOf(Temperature);
      expect(copy?.celsius).toBe(21);
    });

    test('should let field transformers replace class transformers', () => {
      const reading = new Reading();
      reading.indoor = Object.assign(new Temperature(), { celsius: 20 });
      reading.outdoor = Object.assign(new Temperature(), { celsius: 5 });

      const value = serializer.serialize(reading);

      expect(new JsonCodec().encode(value)).toBe('{"indoor":{"payload":{"celsius":20}},"outdoor":278}');
      const copy = serializer.deserialize(value, Reading);
      expect(copy?.indoor?.celsius).toBe(20);
      expect(copy?.outdoor?.celsius).toBe(5);
    });

    test('should skip class transformers for none values', () => {
      const copy = serializer.clone(new Reading(), Reading);
      expect(copy?.indoor).toBeNull();
    });

    test('should allow nested conversions from inside a transformer', () => {
      const box = new Box();
      box.content = point(2, 3);

      const value = serializer.serialize(box);
      expect(new JsonCodec().encode(value)).toBe('[{"x":2,"y":3}]');

      const copy = serializer.deserialize(value, Box);
      expect(copy?.content).toEqual(point(2, 3));
    });
  });

  describe('baking and cloning', () => {
    test('should bake once and compile both directions', () => {
      const first = serializer.bake(Point);
      const second = serializer.bake(Point);

      expect(second).toBe(first);
      expect(serializer.baker.bakeCount).toBe(1);
    });

    test('should refuse abstract classes', () => {
      expect(() => serializer.bake(Shape)).toThrow(NotInstantiableError);
      expect(() => serializer.deserialize(new ObjectValue(), Shape)).toThrow(NotInstantiableError);
    });

    test('should clone deeply using the runtime class', () => {
      const polygon = new Polygon();
      polygon.points = [point(1, 2)];

      const copy = serializer.clone(polygon);

      expect(copy).toBeInstanceOf(Polygon);
      expect(copy).toEqual(polygon);
      expect(copy).not.toBe(polygon);
    });

    test('should clone plain data and scalars', () => {
      expect(serializer.clone({ a: [1, 2] })).toEqual({ a: [1, 2] });
      expect(serializer.clone('text')).toBe('text');
      expect(serializer.clone(3n)).toBe(3n);
    });

    test('should validate the depth bound', () => {
      expect(() => new ObjectSerializer({ maxDepth: 0 })).toThrow(RangeError);
      expect(() => new ObjectSerializer({ maxDepth: Infinity, logger: silentLogger })).not.toThrow();
    });
  });
});

describe('default serializer', () => {
  test('should expose module level helpers', () => {
    const value = serialize(point(1, 1));
    expect(deserialize(value, Point)).toEqual(point(1, 1));
    expect(defaultSerializer).toBeInstanceOf(ObjectSerializer);
  });
});
