/**
 * treepack - reflective object serialization through generic value trees
 * 基于通用值树的反射式对象序列化
 *
 * @packageDocumentation
 */

import 'reflect-metadata';

// Generic value tree
export {
  GenericValue,
  StringValue,
  NumberValue,
  BoolValue,
  NoneValue,
  ObjectValue,
  ArrayValue,
  isAllowedType,
  assertAllowedType,
  toGenericValue,
  unwrapScalar
} from './value';
export type { ValueKind, RawKey } from './value';

// Reflection
export { Field, Transient, Transform, Abstract } from './reflect/Decorators';
export type { FieldDeclaration, TransformOptions, TransformDeclaration } from './reflect/Decorators';
export { ArrayType, arrayOf, isTypedArray, isTypedArrayClass, typeName } from './reflect/TypeRef';
export type { Class, TypeRef, TypedArray, TypedArrayClass, PrimitiveTypeName } from './reflect/TypeRef';
export {
  isPrimitiveType,
  isWrapperType,
  convertPrimitiveToWrapper,
  convertWrapperToPrimitive,
  enumerateFields,
  instantiateWithoutConstructor,
  readField,
  writeField
} from './reflect/ReflectionUtil';
export type { FieldHandle } from './reflect/ReflectionUtil';

// Baking
export { BakedType, Property } from './bake/BakedType';
export { TypeBaker, typeBaker } from './bake/TypeBaker';
export { ProgramCompiler } from './bake/ProgramCompiler';

// Virtual machine
export { OpCode } from './vm/Instruction';
export type { Instruction, ConstScalar, UnwrapKind } from './vm/Instruction';
export { ProgramBuilder, createProgram } from './vm/Program';
export type { Program } from './vm/Program';
export { VirtualMachine } from './vm/VirtualMachine';
export type { ProgramResolver, RunStats, VirtualMachineOptions } from './vm/VirtualMachine';

// Serializer
export { ObjectSerializer, serializer, serialize, deserialize, bake, clone } from './Serializer';
export type { SerializerOptions } from './utils/SerializerTypes';
export { DEFAULT_SERIALIZER_OPTIONS } from './utils/SerializerTypes';

// Transformers
export { DateTransformer, SuperjsonTransformer } from './transformer';
export type { Transformer, TransformerClass, TransformContext } from './transformer';

// Codecs
export { JsonCodec, MessagePackCodec, toPlain, fromPlain } from './codec';
export type { ValueCodec, PlainValue } from './codec';

// Debugging
export { formatValue, formatScalar, disassemble, formatInstruction } from './debug';

// Errors and logging
export {
  SerializationError,
  TypeNotAllowedError,
  NotInstantiableError,
  FieldAccessError,
  IndexOutOfRangeError,
  MalformedProgramError,
  DepthExceededError
} from './errors/Errors';
export type { ErrorContext } from './errors/Errors';
export { ConsoleLogger, silentLogger } from './utils/Logger';
export type { Logger, LogLevel } from './utils/Logger';
