import type { Instruction } from './Instruction';
import { OpCode } from './Instruction';
import type { Program } from './Program';
import { CallContext } from './CallContext';
import { Stack } from './Stack';
import type { TypeRef } from '../reflect/TypeRef';
import { isArrayTypeRef, isDynamicType, typeName } from '../reflect/TypeRef';
import {
  convertNumeric,
  createArray,
  getArrayItem,
  instantiateWithoutConstructor,
  isArrayLike,
  isClass,
  readField,
  setArrayItem,
  unbox,
  writeField
} from '../reflect/ReflectionUtil';
import { GenericValue } from '../value/GenericValue';
import { ObjectValue } from '../value/ObjectValue';
import { ArrayValue } from '../value/ArrayValue';
import { BoolValue, NoneValue, NumberValue, StringValue } from '../value/ScalarValues';
import { toGenericValue, unwrapScalar } from '../value/AllowedType';
import type { Transformer, TransformContext } from '../transformer/Transformer';
import type { ObjectSerializer } from '../Serializer';
import type { Logger } from '../utils/Logger';
import {
  DepthExceededError,
  MalformedProgramError,
  SerializationError,
  TypeNotAllowedError,
  describeType
} from '../errors/Errors';

/**
 * Source of programs for runtime values
 * 运行时值的程序来源
 */
export interface ProgramResolver {
  resolveSerializeProgram(value: unknown): Program;
  resolveDeserializeProgram(target: unknown, input: GenericValue, type: TypeRef): Program;
  entryDeserializeProgram(type: TypeRef): Program;
}

export interface VirtualMachineOptions {
  /** Maximum frame stack depth 最大帧栈深度 */
  maxDepth: number;
  logger: Logger;
  /** Serializer handed to transformers 传给转换器的序列化器 */
  serializer: ObjectSerializer;
}

/**
 * Counters of the last run
 * 最近一次运行的统计
 */
export interface RunStats {
  instructions: number;
  frames: number;
  maxDepth: number;
}

/**
 * Stack machine executing serialize and deserialize programs
 * 执行序列化与反序列化程序的栈式虚拟机
 *
 * A machine runs one conversion at a time; a conversion started while it is running
 * (for instance by a transformer) needs a machine of its own.
 * 一台虚拟机同一时间只执行一次转换，嵌套转换需要独立的虚拟机。
 */
export class VirtualMachine {
  private readonly _frames = new Stack<CallContext>('frame');
  private readonly _scratch = new Stack<unknown>('scratch');
  private readonly _results = new Stack<GenericValue>('result');
  private readonly _pool: CallContext[] = [];
  private _stats: RunStats = { instructions: 0, frames: 0, maxDepth: 0 };
  private _running = false;

  constructor(
    private readonly _resolver: ProgramResolver,
    private readonly _options: VirtualMachineOptions
  ) {}

  get stats(): Readonly<RunStats> {
    return this._stats;
  }

  get running(): boolean {
    return this._running;
  }

  /**
   * Convert a live value into a generic value
   * 将原生值转换为通用值
   */
  serialize(root: unknown): GenericValue {
    this.begin();
    try {
      this.pushFrame(root, this._resolver.resolveSerializeProgram(root), null);
      this.execute();
      if (this._results.size !== 1 || !this._scratch.isEmpty()) {
        throw new MalformedProgramError(
          `Serialization ended with ${this._results.size} results and ${this._scratch.size} scratch entries`
        );
      }
      const result = this._results.pop();
      this.logRun('serialize', describeType(root));
      return result;
    } finally {
      this.end();
    }
  }

  /**
   * Convert a generic value into a native value of `type`
   * 将通用值转换为`type`类型的原生值
   */
  deserialize(input: GenericValue, type: TypeRef): unknown {
    this.begin();
    try {
      this.pushFrame(null, this._resolver.entryDeserializeProgram(type), input);
      this.execute();
      if (this._scratch.size !== 1 || !this._results.isEmpty()) {
        throw new MalformedProgramError(
          `Deserialization ended with ${this._scratch.size} scratch entries and ${this._results.size} results`
        );
      }
      const result = this._scratch.pop();
      this.logRun('deserialize', typeName(type));
      return result;
    } finally {
      this.end();
    }
  }

  /**
   * Run a hand-assembled program bound to `object` and return what it leaves behind
   * 运行手工组装的程序并返回栈上剩余的值
   */
  run(program: Program, object: unknown, input: GenericValue | null = null): { results: GenericValue[]; scratch: unknown[] } {
    this.begin();
    try {
      this.pushFrame(object, program, input);
      this.execute();
      const results: GenericValue[] = [];
      while (!this._results.isEmpty()) results.unshift(this._results.pop());
      const scratch: unknown[] = [];
      while (!this._scratch.isEmpty()) scratch.unshift(this._scratch.pop());
      return { results, scratch };
    } finally {
      this.end();
    }
  }

  private begin(): void {
    if (this._running) {
      throw new MalformedProgramError('VirtualMachine is already running; nested conversions need their own machine');
    }
    this._running = true;
    this._stats = { instructions: 0, frames: 0, maxDepth: 0 };
  }

  private end(): void {
    while (!this._frames.isEmpty()) this.popFrame();
    this._scratch.clear();
    this._results.clear();
    this._running = false;
  }

  private logRun(direction: string, subject: string): void {
    const { instructions, frames, maxDepth } = this._stats;
    this._options.logger.debug(
      `${direction} ${subject}: ${instructions} instructions, ${frames} frames, depth ${maxDepth}`
    );
  }

  private pushFrame(object: unknown, program: Program, input: GenericValue | null): void {
    if (this._frames.size >= this._options.maxDepth) {
      throw new DepthExceededError(this._options.maxDepth);
    }
    const frame = (this._pool.pop() ?? new CallContext()).bind(object, program, input);
    this._frames.push(frame);
    this._stats.frames++;
    this._stats.maxDepth = Math.max(this._stats.maxDepth, this._frames.size);
  }

  private popFrame(): void {
    const frame = this._frames.pop();
    frame.release();
    this._pool.push(frame);
  }

  private execute(): void {
    while (!this._frames.isEmpty()) {
      const frame = this._frames.peek();
      const index = frame.cursor;
      const instruction = frame.take();
      if (!instruction) {
        this.popFrame();
        continue;
      }
      this._stats.instructions++;
      try {
        this.step(frame, instruction);
      } catch (error) {
        if (error instanceof SerializationError) {
          error.attachContext({
            className: frame.program?.owner,
            fieldName: fieldNameOf(instruction),
            opcode: instruction.op,
            instructionIndex: index,
            program: frame.program?.label
          });
        }
        throw error;
      }
    }
  }

  private step(frame: CallContext, instruction: Instruction): void {
    switch (instruction.op) {
      case OpCode.CreateObject:
        this._results.push(new ObjectValue());
        break;
      case OpCode.CreateArray:
        this._results.push(new ArrayValue(instruction.length));
        break;
      case OpCode.CreateNone:
        this._results.push(new NoneValue());
        break;
      case OpCode.CreateBool:
        this._results.push(this.createScalar('boolean'));
        break;
      case OpCode.CreateNumber:
        this._results.push(this.createScalar('number'));
        break;
      case OpCode.CreateString:
        this._results.push(this.createScalar('string'));
        break;
      case OpCode.ModifyObject: {
        const value = this._results.pop();
        const key = this._results.pop();
        this.peekObjectValue().put(key, value);
        break;
      }
      case OpCode.ModifyObjectWithConstKey: {
        const value = this._results.pop();
        this.peekObjectValue().put(instruction.key, value);
        break;
      }
      case OpCode.ModifyArray: {
        const index = this._scratch.pop();
        if (typeof index !== 'number') {
          throw new MalformedProgramError(`Array index must be a number, got ${describeType(index)}`);
        }
        const value = this._results.pop();
        this.peekArrayValue().set(index, value);
        break;
      }
      case OpCode.ModifyArrayWithIndex: {
        const value = this._results.pop();
        this.peekArrayValue().set(instruction.index, value);
        break;
      }
      case OpCode.PushConst:
        this._scratch.push(instruction.value);
        break;
      case OpCode.PushField:
        this._scratch.push(readField(frame.object, instruction.field));
        break;
      case OpCode.PushBound:
        this._scratch.push(frame.object);
        break;
      case OpCode.PushItem: {
        const array = frame.object;
        if (!isArrayLike(array)) {
          throw new MalformedProgramError(`PushItem needs a bound array, got ${describeType(array)}`);
        }
        this._scratch.push(getArrayItem(array, instruction.index));
        break;
      }
      case OpCode.PushValue: {
        const value = this._scratch.pop();
        if (!(value instanceof GenericValue)) {
          throw new TypeNotAllowedError(`Expected a generic value, got ${describeType(value)}`);
        }
        this._results.push(value.clone());
        break;
      }
      case OpCode.Transform:
        this._results.push(this.applyTransformers(instruction.transformers, instruction.type, this._scratch.pop()));
        break;
      case OpCode.Call: {
        const value = this._scratch.pop();
        this.pushFrame(value, this._resolver.resolveSerializeProgram(value), null);
        break;
      }
      case OpCode.LoadInput:
        this._results.push(this.frameInput(frame));
        break;
      case OpCode.LoadEntry: {
        const input = this.frameInput(frame);
        if (!(input instanceof ObjectValue)) {
          throw new TypeNotAllowedError(`Expected an object value, got ${input.kind}`);
        }
        const entry = input.get(instruction.key);
        if (entry) {
          this._results.push(entry);
        } else {
          frame.jump(instruction.skipTo);
        }
        break;
      }
      case OpCode.LoadItem: {
        const input = this.frameInput(frame);
        if (!(input instanceof ArrayValue)) {
          throw new TypeNotAllowedError(`Expected an array value, got ${input.kind}`);
        }
        this._results.push(input.get(instruction.index));
        break;
      }
      case OpCode.Unwrap:
        this._scratch.push(unwrapAs(this._results.pop(), instruction.kind, instruction.type));
        break;
      case OpCode.BranchNone:
        if (this._results.peek() instanceof NoneValue) {
          this._results.pop();
          this._scratch.push(null);
          frame.jump(instruction.target);
        }
        break;
      case OpCode.BranchScalar: {
        const value = this._results.peek();
        if (value.isContainer()) break;
        if (!(value instanceof NoneValue) && !isDynamicType(instruction.type)) {
          throw new TypeNotAllowedError(`Expected a container value for ${typeName(instruction.type)}, got ${value.kind}`);
        }
        this._results.pop();
        this._scratch.push(unwrapScalar(value));
        frame.jump(instruction.target);
        break;
      }
      case OpCode.Instantiate:
        this._scratch.push(instantiateFor(this._results.peek(), instruction.type));
        break;
      case OpCode.CallPopulate: {
        const target = this._scratch.pop();
        const input = this._results.pop();
        this.pushFrame(target, this._resolver.resolveDeserializeProgram(target, input, instruction.type), input);
        break;
      }
      case OpCode.Revert:
        this._scratch.push(this.revertTransformers(instruction.transformers, instruction.type, this._results.pop()));
        break;
      case OpCode.StoreField:
        writeField(frame.object, instruction.field, this._scratch.pop());
        break;
      case OpCode.StoreItem: {
        const array = frame.object;
        if (!isArrayLike(array)) {
          throw new MalformedProgramError(`StoreItem needs a bound array, got ${describeType(array)}`);
        }
        setArrayItem(array, instruction.index, this._scratch.pop());
        break;
      }
    }
  }

  private createScalar(kind: 'boolean' | 'number' | 'string'): GenericValue {
    const raw = unbox(this._scratch.pop());
    if (raw === null || raw === undefined) return new NoneValue();
    const actual = typeof raw === 'bigint' ? 'number' : typeof raw;
    if (actual !== kind) {
      throw new TypeNotAllowedError(`Expected ${kind}, got ${describeType(raw)}`);
    }
    return toGenericValue(raw);
  }

  private peekObjectValue(): ObjectValue {
    const top = this._results.peek();
    if (!(top instanceof ObjectValue)) {
      throw new MalformedProgramError(`Expected an object value on the result stack, got ${top.kind}`);
    }
    return top;
  }

  private peekArrayValue(): ArrayValue {
    const top = this._results.peek();
    if (!(top instanceof ArrayValue)) {
      throw new MalformedProgramError(`Expected an array value on the result stack, got ${top.kind}`);
    }
    return top;
  }

  private frameInput(frame: CallContext): GenericValue {
    const input = frame.input;
    if (!input) {
      throw new MalformedProgramError('Frame has no input value');
    }
    return input;
  }

  private context(type: TypeRef): TransformContext {
    return { type, serializer: this._options.serializer };
  }

  private applyTransformers(transformers: readonly Transformer[], type: TypeRef, raw: unknown): GenericValue {
    const context = this.context(type);
    let current: unknown = raw;
    for (const transformer of transformers) {
      current = transformer.toGeneric(current, context);
      if (!(current instanceof GenericValue)) {
        throw new TypeNotAllowedError(
          `${describeType(transformer)} returned ${describeType(current)} instead of a generic value`
        );
      }
    }
    if (!(current instanceof GenericValue)) {
      throw new MalformedProgramError('Transform needs at least one transformer');
    }
    return current;
  }

  private revertTransformers(transformers: readonly Transformer[], type: TypeRef, value: GenericValue): unknown {
    const context = this.context(type);
    let current: unknown = value;
    for (let i = transformers.length - 1; i >= 0; i--) {
      if (!(current instanceof GenericValue)) {
        throw new TypeNotAllowedError(
          `${describeType(transformers[i + 1])} returned ${describeType(current)} where a generic value was expected`
        );
      }
      current = transformers[i].fromGeneric(current, context);
    }
    return current;
  }
}

/**
 * Native scalar (or value) for a result of a declared scalar or generic value type
 */
function unwrapAs(value: GenericValue, kind: 'number' | 'bigint' | 'string' | 'boolean' | 'value', type: TypeRef): unknown {
  if (kind === 'value') {
    if (isClass(type) && value instanceof type) return value.clone();
    if (value instanceof NoneValue) return null;
    throw new TypeNotAllowedError(`Expected ${typeName(type)}, got ${value.kind}`);
  }
  if (value instanceof NoneValue) return null;
  switch (kind) {
    case 'number':
    case 'bigint':
      if (value instanceof NumberValue) return convertNumeric(value.value, kind);
      break;
    case 'string':
      if (value instanceof StringValue) return value.value;
      break;
    case 'boolean':
      if (value instanceof BoolValue) return value.value;
      break;
  }
  throw new TypeNotAllowedError(`Expected ${kind}, got ${value.kind}`);
}

/**
 * Empty native target for an input container
 */
function instantiateFor(input: GenericValue, type: TypeRef): unknown {
  if (isDynamicType(type)) {
    if (input instanceof ObjectValue) return {};
    if (input instanceof ArrayValue) return createArray(Object, input.length);
    throw new MalformedProgramError(`Cannot instantiate ${typeName(type)} from ${input.kind}`);
  }
  if (input instanceof ArrayValue) {
    if (!isArrayTypeRef(type)) {
      throw new TypeNotAllowedError(`Expected an object value for ${typeName(type)}, got ${input.kind}`);
    }
    return createArray(type, input.length);
  }
  if (!(input instanceof ObjectValue)) {
    throw new TypeNotAllowedError(`Expected an object value for ${typeName(type)}, got ${input.kind}`);
  }
  if (!isClass(type) || type === Array) {
    throw new TypeNotAllowedError(`Expected an array value for ${typeName(type)}, got ${input.kind}`);
  }
  return instantiateWithoutConstructor(type);
}

function fieldNameOf(instruction: Instruction): string | undefined {
  switch (instruction.op) {
    case OpCode.PushField:
    case OpCode.StoreField:
      return instruction.field.name;
    case OpCode.LoadEntry:
      return String(instruction.key);
    case OpCode.ModifyObjectWithConstKey:
      return instruction.key;
    default:
      return undefined;
  }
}
