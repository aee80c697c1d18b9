import type { BakedType, Property } from './BakedType';
import type { TypeBaker } from './TypeBaker';
import { typeBaker } from './TypeBaker';
import type { Transformer } from '../transformer/Transformer';
import type { TypeRef, TypedArray } from '../reflect/TypeRef';
import { isDynamicType, isTypedArray, isTypedArrayClass, typeName } from '../reflect/TypeRef';
import {
  isAbstractClass,
  isArrayLike,
  isClass,
  isNativeBuiltin,
  isWrapperType,
  runtimeElementType
} from '../reflect/ReflectionUtil';
import { GenericValue } from '../value/GenericValue';
import { ArrayValue } from '../value/ArrayValue';
import { ObjectValue } from '../value/ObjectValue';
import { NumberValue, StringValue } from '../value/ScalarValues';
import type { Instruction, UnwrapKind } from '../vm/Instruction';
import { OpCode } from '../vm/Instruction';
import type { Program } from '../vm/Program';
import { ProgramBuilder, createProgram } from '../vm/Program';
import type { ProgramResolver } from '../vm/VirtualMachine';
import type { Logger } from '../utils/Logger';
import { ConsoleLogger } from '../utils/Logger';
import { MalformedProgramError, TypeNotAllowedError, describeType } from '../errors/Errors';

const NONE_PROGRAM = createProgram('serialize none', [{ op: OpCode.CreateNone }]);
const STRING_PROGRAM = createProgram('serialize string', [{ op: OpCode.PushBound }, { op: OpCode.CreateString }]);
const NUMBER_PROGRAM = createProgram('serialize number', [{ op: OpCode.PushBound }, { op: OpCode.CreateNumber }]);
const BOOL_PROGRAM = createProgram('serialize boolean', [{ op: OpCode.PushBound }, { op: OpCode.CreateBool }]);
const VALUE_PROGRAM = createProgram('serialize value', [{ op: OpCode.PushBound }, { op: OpCode.PushValue }]);

const SCALAR_KINDS = new Map<unknown, UnwrapKind>([
  [Number, 'number'],
  [BigInt, 'bigint'],
  [String, 'string'],
  [Boolean, 'boolean']
]);

/**
 * Native kind a declared type unwraps to, or `null` when it needs a nested frame
 * 声明类型对应的原生种类；需要嵌套帧时返回null
 */
export function unwrapKindOf(type: TypeRef): UnwrapKind | null {
  const scalar = SCALAR_KINDS.get(type);
  if (scalar) return scalar;
  if (typeof type === 'function' && (type === GenericValue || type.prototype instanceof GenericValue)) {
    return 'value';
  }
  return null;
}

/**
 * Compiles baked descriptors into instruction programs
 * 将烘焙描述编译为指令程序
 *
 * Class programs are cached per direction for the lifetime of the compiler; programs for
 * arrays and plain objects depend on the runtime value and are built per call.
 * 类程序按方向缓存；数组与普通对象的程序依赖运行时值，每次构建。
 */
export class ProgramCompiler implements ProgramResolver {
  private readonly _serializePrograms = new Map<Function, Program>();
  private readonly _deserializePrograms = new Map<Function, Program>();
  private readonly _entryPrograms = new Map<Function, Program>();

  constructor(
    readonly baker: TypeBaker = typeBaker,
    private readonly _logger: Logger = new ConsoleLogger('ProgramCompiler')
  ) {}

  // ---------------------------------------------------------------------------
  // Serialize 序列化
  // ---------------------------------------------------------------------------

  /**
   * Program converting a live value into a generic value, chosen by its runtime type
   * 按运行时类型选择将值转换为通用值的程序
   *
   * @throws TypeNotAllowedError for functions, symbols and built-in classes without transformers
   */
  resolveSerializeProgram(value: unknown): Program {
    if (value === null || value === undefined) return NONE_PROGRAM;
    if (value instanceof GenericValue) return VALUE_PROGRAM;

    switch (typeof value) {
      case 'string':
        return STRING_PROGRAM;
      case 'number':
      case 'bigint':
        return NUMBER_PROGRAM;
      case 'boolean':
        return BOOL_PROGRAM;
      case 'object':
        break;
      default:
        throw new TypeNotAllowedError(`${describeType(value)} cannot be serialized`);
    }

    if (value instanceof String) return STRING_PROGRAM;
    if (value instanceof Number) return NUMBER_PROGRAM;
    if (value instanceof Boolean) return BOOL_PROGRAM;
    if (isArrayLike(value)) return this.compileArraySerializer(value);

    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype === null || prototype === Object.prototype) {
      return this.compilePlainSerializer(value);
    }

    const constructor: unknown = Reflect.get(value, 'constructor');
    if (typeof constructor !== 'function') {
      throw new TypeNotAllowedError(`${describeType(value)} has no class to serialize it with`);
    }
    if (isNativeBuiltin(constructor)) {
      throw new TypeNotAllowedError(`${constructor.name} is a built-in class; declare a transformer to serialize it`);
    }
    return this.serializeProgramFor(constructor);
  }

  /**
   * Cached serialize program of a class
   * 类的序列化程序（缓存）
   */
  serializeProgramFor(type: Function): Program {
    const cached = this._serializePrograms.get(type);
    if (cached) return cached;

    const baked = this.baker.bake(type);
    const program = baked.transformed ? this.compileTransformedSerializer(baked) : this.compileClassSerializer(baked);
    this._serializePrograms.set(type, program);
    this._logger.debug(`compiled ${program.label} (${program.instructions.length} instructions)`);
    return program;
  }

  private compileTransformedSerializer(baked: BakedType): Program {
    return createProgram(
      `serialize ${baked.name}`,
      [{ op: OpCode.PushBound }, { op: OpCode.Transform, transformers: baked.transformers, type: baked.type }],
      baked.name
    );
  }

  private compileClassSerializer(baked: BakedType): Program {
    const builder = new ProgramBuilder(`serialize ${baked.name}`, baked.name);
    builder.emit({ op: OpCode.CreateObject });
    for (const property of baked.properties) {
      builder.emit({ op: OpCode.PushField, field: property });
      builder.emit(this.serializeConversion(property));
      builder.emit({ op: OpCode.ModifyObjectWithConstKey, key: property.name });
    }
    return builder.build();
  }

  private serializeConversion(property: Property): Instruction {
    if (property.transformer) {
      return { op: OpCode.Transform, transformers: [property.transformer], type: property.type };
    }
    switch (unwrapKindOf(property.type)) {
      case 'number':
      case 'bigint':
        return { op: OpCode.CreateNumber };
      case 'string':
        return { op: OpCode.CreateString };
      case 'boolean':
        return { op: OpCode.CreateBool };
      default:
        return { op: OpCode.Call };
    }
  }

  private compileArraySerializer(array: unknown[] | TypedArray): Program {
    const typed = isTypedArray(array);
    const builder = new ProgramBuilder(`serialize ${describeType(array)}[${array.length}]`);
    builder.emit({ op: OpCode.CreateArray, length: array.length });
    for (let index = 0; index < array.length; index++) {
      builder.emit({ op: OpCode.PushItem, index });
      builder.emit(typed ? { op: OpCode.CreateNumber } : { op: OpCode.Call });
      builder.emit({ op: OpCode.ModifyArrayWithIndex, index });
    }
    return builder.build();
  }

  private compilePlainSerializer(object: object): Program {
    const builder = new ProgramBuilder('serialize Object');
    builder.emit({ op: OpCode.CreateObject });
    for (const key of Object.keys(object)) {
      builder.emit({ op: OpCode.PushField, field: { name: key } });
      builder.emit({ op: OpCode.Call });
      builder.emit({ op: OpCode.ModifyObjectWithConstKey, key });
    }
    return builder.build();
  }

  // ---------------------------------------------------------------------------
  // Deserialize 反序列化
  // ---------------------------------------------------------------------------

  /**
   * Program converting a root input value into a native value of `type`. It runs in a frame
   * bound to nothing and leaves the converted value on the scratch stack.
   * 将根输入值转换为`type`原生值的入口程序，结果留在暂存栈上
   */
  entryDeserializeProgram(type: TypeRef): Program {
    const cacheable = typeof type === 'function';
    const cached = cacheable ? this._entryPrograms.get(type) : undefined;
    if (cached) return cached;

    const builder = new ProgramBuilder(`deserialize ${typeName(type)}`);
    builder.emit({ op: OpCode.LoadInput });
    this.emitDeserializeConversion(builder, type, null, null);
    const program = builder.build();
    if (cacheable) this._entryPrograms.set(type, program);
    return program;
  }

  /**
   * Program populating an instantiated target from its input value
   * 用输入值填充已实例化目标的程序
   *
   * @throws TypeNotAllowedError when the input shape does not match the target
   */
  resolveDeserializeProgram(target: unknown, input: GenericValue, type: TypeRef): Program {
    if (isArrayLike(target)) {
      if (!(input instanceof ArrayValue)) {
        throw new TypeNotAllowedError(`Expected an array value for ${typeName(type)}, got ${input.kind}`);
      }
      return this.compileArrayDeserializer(target, input, type);
    }
    if (typeof target !== 'object' || target === null) {
      throw new MalformedProgramError(`Cannot populate ${describeType(target)}`);
    }
    const prototype: unknown = Object.getPrototypeOf(target);
    if (prototype === null || prototype === Object.prototype) {
      if (!(input instanceof ObjectValue)) {
        throw new TypeNotAllowedError(`Expected an object value for ${typeName(type)}, got ${input.kind}`);
      }
      return this.compilePlainDeserializer(input);
    }
    const constructor: unknown = Reflect.get(target, 'constructor');
    if (typeof constructor !== 'function') {
      throw new MalformedProgramError(`Cannot populate ${describeType(target)}`);
    }
    return this.deserializeProgramFor(constructor);
  }

  /**
   * Cached deserialize program of a class
   * 类的反序列化程序（缓存）
   */
  deserializeProgramFor(type: Function): Program {
    const cached = this._deserializePrograms.get(type);
    if (cached) return cached;

    const baked = this.baker.bake(type);
    const program = baked.transformed
      ? createProgram(
          `deserialize ${baked.name}`,
          [{ op: OpCode.LoadInput }, { op: OpCode.Revert, transformers: baked.transformers, type: baked.type }],
          baked.name
        )
      : this.compileClassDeserializer(baked);
    this._deserializePrograms.set(type, program);
    this._logger.debug(`compiled ${program.label} (${program.instructions.length} instructions)`);
    return program;
  }

  private compileClassDeserializer(baked: BakedType): Program {
    const builder = new ProgramBuilder(`deserialize ${baked.name}`, baked.name);
    for (const property of baked.properties) {
      const load = builder.reserve();
      this.emitDeserializeConversion(builder, property.type, property.transformer, {
        op: OpCode.StoreField,
        field: property
      });
      builder.patch(load, { op: OpCode.LoadEntry, key: property.name, skipTo: builder.position });
    }
    builder.emit({ op: OpCode.PushBound });
    return builder.build();
  }

  private compileArrayDeserializer(target: unknown[] | TypedArray, input: ArrayValue, type: TypeRef): Program {
    if (target.length !== input.length) {
      throw new MalformedProgramError(
        `Target array has ${target.length} slots but the input has ${input.length} items`
      );
    }
    const elementType = runtimeElementType(target, type);
    const builder = new ProgramBuilder(`deserialize ${typeName(type)}[${input.length}]`);
    for (let index = 0; index < input.length; index++) {
      builder.emit({ op: OpCode.LoadItem, index });
      this.emitDeserializeConversion(builder, elementType, null, { op: OpCode.StoreItem, index });
    }
    builder.emit({ op: OpCode.PushBound });
    return builder.build();
  }

  private compilePlainDeserializer(input: ObjectValue): Program {
    const builder = new ProgramBuilder('deserialize Object');
    const names = new Set<string>();
    for (const key of input.keys()) {
      const lookup = plainKeyOf(key);
      const name = String(lookup);
      if (names.has(name)) {
        throw new TypeNotAllowedError(`Object keys collide on property "${name}"`);
      }
      names.add(name);
      const load = builder.reserve();
      this.emitDeserializeConversion(builder, Object, null, { op: OpCode.StoreField, field: { name } });
      builder.patch(load, { op: OpCode.LoadEntry, key: lookup, skipTo: builder.position });
    }
    builder.emit({ op: OpCode.PushBound });
    return builder.build();
  }

  /**
   * Emit the conversion of the value on top of the result stack into a native of `type`,
   * followed by `store` when given. Jumps land on `store`, or past the conversion.
   * 发射将结果栈顶值转换为原生值的指令，随后是可选的存储指令
   */
  private emitDeserializeConversion(
    builder: ProgramBuilder,
    type: TypeRef,
    transformer: Transformer | null,
    store: Instruction | null
  ): void {
    let branch = -1;
    let branchOnScalars = false;

    const kind = transformer ? null : unwrapKindOf(type);
    if (transformer) {
      builder.emit({ op: OpCode.Revert, transformers: [transformer], type });
    } else if (kind) {
      builder.emit({ op: OpCode.Unwrap, kind, type });
    } else {
      const transformers = this.classTransformersOf(type);
      branch = builder.reserve();
      if (transformers.length > 0) {
        builder.emit({ op: OpCode.Revert, transformers, type });
      } else {
        branchOnScalars = true;
        builder.emit({ op: OpCode.Instantiate, type });
        builder.emit({ op: OpCode.CallPopulate, type });
      }
    }

    const target = builder.position;
    if (store) builder.emit(store);
    if (branch >= 0) {
      builder.patch(
        branch,
        branchOnScalars ? { op: OpCode.BranchScalar, type, target } : { op: OpCode.BranchNone, target }
      );
    }
  }

  /**
   * Class-level transformers of a declared type; empty for types that are not bakeable
   */
  private classTransformersOf(type: TypeRef): readonly Transformer[] {
    if (
      !isClass(type) ||
      isDynamicType(type) ||
      type === Array ||
      isTypedArrayClass(type) ||
      isWrapperType(type) ||
      isAbstractClass(type) ||
      isNativeBuiltin(type)
    ) {
      return [];
    }
    return this.baker.bake(type).transformers;
  }

  /**
   * Drop every cached program (the baker keeps its descriptors)
   */
  clear(): void {
    this._serializePrograms.clear();
    this._deserializePrograms.clear();
    this._entryPrograms.clear();
  }
}

/**
 * Key to look an input entry up with; its string form names the property
 */
function plainKeyOf(key: GenericValue): string | number {
  if (key instanceof NumberValue && typeof key.value === 'number') return key.value;
  if (!(key instanceof StringValue)) {
    throw new TypeNotAllowedError(`Object keys must be strings or numbers, got ${key.kind}`);
  }
  if (key.value === '__proto__') {
    throw new TypeNotAllowedError('"__proto__" cannot be used as an object key');
  }
  return key.value;
}
