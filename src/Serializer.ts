import type { BakedType } from './bake/BakedType';
import type { TypeBaker } from './bake/TypeBaker';
import { typeBaker } from './bake/TypeBaker';
import { ProgramCompiler } from './bake/ProgramCompiler';
import type { RunStats } from './vm/VirtualMachine';
import { VirtualMachine } from './vm/VirtualMachine';
import type { Class, TypeRef } from './reflect/TypeRef';
import { isDynamicType, isTypedArray, typedArrayClassOf, typeName } from './reflect/TypeRef';
import { isClass, isWrapperType } from './reflect/ReflectionUtil';
import type { GenericValue } from './value/GenericValue';
import type { Logger } from './utils/Logger';
import { ConsoleLogger } from './utils/Logger';
import type { SerializerOptions } from './utils/SerializerTypes';
import { DEFAULT_SERIALIZER_OPTIONS } from './utils/SerializerTypes';
import { TypeNotAllowedError, describeType } from './errors/Errors';

/**
 * Converts live objects to generic value trees and back
 * 在原生对象与通用值树之间转换
 *
 * Every conversion runs on a virtual machine of its own; machines are reused once idle,
 * so conversions started from inside a transformer get a separate one.
 * 每次转换使用独立的虚拟机，空闲后复用；转换器内部发起的转换会获得另一台虚拟机。
 *
 * @example
 * ```typescript
 * class Point {
 *   @Field(Number) x = 0;
 *   @Field(Number) y = 0;
 * }
 *
 * const serializer = new ObjectSerializer({ maxDepth: 256 });
 * const value = serializer.serialize(Object.assign(new Point(), { x: 3, y: 4 }));
 * const point = serializer.deserialize(value, Point);
 * ```
 */
export class ObjectSerializer {
  readonly baker: TypeBaker;
  readonly compiler: ProgramCompiler;

  private readonly _options: Required<SerializerOptions>;
  private readonly _idle: VirtualMachine[] = [];
  private _lastStats: RunStats = { instructions: 0, frames: 0, maxDepth: 0 };

  constructor(options: SerializerOptions = {}) {
    this._options = { ...DEFAULT_SERIALIZER_OPTIONS, ...options };
    const { maxDepth } = this._options;
    if (!(maxDepth === Infinity || (Number.isInteger(maxDepth) && maxDepth >= 1))) {
      throw new RangeError(`maxDepth must be a positive integer or Infinity, got ${maxDepth}`);
    }

    this.baker = this._options.baker ?? typeBaker;
    this.compiler = new ProgramCompiler(this.baker, this.createLogger('ProgramCompiler'));
  }

  /**
   * Counters of the most recently finished conversion
   * 最近完成的转换的统计
   */
  get lastStats(): Readonly<RunStats> {
    return this._lastStats;
  }

  /**
   * Bake a class and compile its programs ahead of the first conversion
   * 预先烘焙类并编译其程序
   *
   * @throws NotInstantiableError for abstract classes and non-classes
   */
  bake(type: Function): BakedType {
    const baked = this.baker.bake(type);
    this.compiler.serializeProgramFor(type);
    this.compiler.deserializeProgramFor(type);
    return baked;
  }

  /**
   * Convert a live value into a generic value tree
   * 将原生值转换为通用值树
   */
  serialize(value: unknown): GenericValue {
    return this.withMachine(machine => machine.serialize(value));
  }

  /**
   * Convert a generic value tree into a native value of `type`. A none root
   * yields `null`.
   * 将通用值树转换为`type`类型的原生值；根为none时返回null
   */
  deserialize<T>(value: GenericValue, type: Class<T>): T | null;
  deserialize(value: GenericValue, type: TypeRef): unknown;
  deserialize(value: GenericValue, type: TypeRef): unknown {
    const result = this.withMachine(machine => machine.deserialize(value, type));
    if (result !== null && isClass(type) && !isWrapperType(type) && !isDynamicType(type) && !(result instanceof type)) {
      throw new TypeNotAllowedError(`Deserializing ${typeName(type)} produced ${describeType(result)}`);
    }
    return result;
  }

  /**
   * Deep copy through a serialize/deserialize round trip. `type` defaults to the
   * value's runtime class.
   * 通过序列化往返进行深拷贝，类型默认取值的运行时类
   */
  clone<T>(value: T, type: Class<T>): T | null;
  clone(value: unknown, type?: TypeRef): unknown;
  clone(value: unknown, type?: TypeRef): unknown {
    return this.deserialize(this.serialize(value), type ?? runtimeTypeOf(value));
  }

  private withMachine<R>(run: (machine: VirtualMachine) => R): R {
    const machine =
      this._idle.pop() ??
      new VirtualMachine(this.compiler, {
        maxDepth: this._options.maxDepth,
        logger: this.createLogger('VirtualMachine'),
        serializer: this
      });
    try {
      return run(machine);
    } finally {
      this._lastStats = { ...machine.stats };
      this._idle.push(machine);
    }
  }

  private createLogger(component: string): Logger {
    return this._options.logger ?? new ConsoleLogger(component, this._options.debug);
  }
}

/**
 * Type a value would deserialize back into
 */
function runtimeTypeOf(value: unknown): TypeRef {
  switch (typeof value) {
    case 'number':
      return Number;
    case 'bigint':
      return BigInt;
    case 'string':
      return String;
    case 'boolean':
      return Boolean;
  }
  if (isTypedArray(value)) return typedArrayClassOf(value);
  if (Array.isArray(value) || typeof value !== 'object' || value === null) return Object;
  const constructor: unknown = Reflect.get(value, 'constructor');
  return isClass(constructor) ? constructor : Object;
}

/**
 * Process-wide default serializer
 * 进程级默认序列化器
 */
export const serializer = new ObjectSerializer();

export function serialize(value: unknown): GenericValue {
  return serializer.serialize(value);
}

export function deserialize<T>(value: GenericValue, type: Class<T>): T | null;
export function deserialize(value: GenericValue, type: TypeRef): unknown;
export function deserialize(value: GenericValue, type: TypeRef): unknown {
  return serializer.deserialize(value, type);
}

export function bake(type: Function): BakedType {
  return serializer.bake(type);
}

export function clone<T>(value: T, type: Class<T>): T | null;
export function clone(value: unknown, type?: TypeRef): unknown;
export function clone(value: unknown, type?: TypeRef): unknown {
  return serializer.clone(value, type);
}
