/**
 * Reflective helpers: field enumeration, field access, constructor-less instantiation,
 * primitive/wrapper classification and array access
 * 反射工具：字段枚举、字段访问、免构造实例化、原始/包装类型判断与数组访问
 */

import type { Class, PrimitiveTypeName, TypeRef, TypedArray } from './TypeRef';
import {
  ArrayType,
  createTypedArray,
  elementTypeOf,
  isTypedArray,
  isTypedArrayClass,
  typedArrayClassOf,
  typeName
} from './TypeRef';
import type { FieldDeclaration, TransformDeclaration } from './Decorators';
import { getOwnClassDeclarations } from './Decorators';
import {
  FieldAccessError,
  IndexOutOfRangeError,
  NotInstantiableError,
  TypeNotAllowedError,
  describeType
} from '../errors/Errors';

/**
 * Anything naming a field to read or write
 * 可用于读写的字段标识
 */
export interface FieldHandle {
  readonly name: string;
}

const PRIMITIVES_WRAPPERS = new Map<PrimitiveTypeName, TypeRef>([
  ['number', Number],
  ['bigint', BigInt],
  ['string', String],
  ['boolean', Boolean]
]);

const WRAPPERS_PRIMITIVES = new Map<unknown, PrimitiveTypeName>([
  [Number, 'number'],
  [BigInt, 'bigint'],
  [String, 'string'],
  [Boolean, 'boolean']
]);

const PRIMITIVE_NAMES: ReadonlySet<string> = new Set(PRIMITIVES_WRAPPERS.keys());

const NATIVE_CODE = /\{\s*\[native code\]\s*\}\s*$/;

// ---------------------------------------------------------------------------
// Classification 类型分类
// ---------------------------------------------------------------------------

export function isPrimitiveType(type: unknown): type is PrimitiveTypeName {
  return typeof type === 'string' && PRIMITIVE_NAMES.has(type);
}

export function isWrapperType(type: unknown): boolean {
  return WRAPPERS_PRIMITIVES.has(type);
}

/**
 * `'number'` → `Number`, `'bigint'` → `BigInt`, ...
 */
export function convertPrimitiveToWrapper(type: PrimitiveTypeName): TypeRef {
  const wrapper = PRIMITIVES_WRAPPERS.get(type);
  if (!wrapper) {
    throw new TypeNotAllowedError(`${String(type)} is not a primitive type`);
  }
  return wrapper;
}

/**
 * `Number` → `'number'`, `BigInt` → `'bigint'`, ...
 */
export function convertWrapperToPrimitive(type: TypeRef): PrimitiveTypeName {
  const primitive = WRAPPERS_PRIMITIVES.get(type);
  if (!primitive) {
    throw new TypeNotAllowedError(`${typeName(type)} is not a wrapper type`);
  }
  return primitive;
}

/**
 * Whether a value can be used as a constructor
 * 值是否可作为构造函数
 */
export function isClass(value: unknown): value is Class {
  return typeof value === 'function' && typeof value.prototype === 'object' && value.prototype !== null;
}

/**
 * Built-in runtime classes (`Map`, `Date`, `Promise`, ...) hold their state in internal
 * slots and cannot be traversed field by field.
 * 内置类的状态保存在内部槽中，无法按字段遍历
 */
export function isNativeBuiltin(type: Function): boolean {
  return NATIVE_CODE.test(Function.prototype.toString.call(type));
}

/**
 * Whether a class was marked `@Abstract()`
 */
export function isAbstractClass(type: Function): boolean {
  return getOwnClassDeclarations(type)?.abstract ?? false;
}

/**
 * Class chain from the most distant ancestor down to `type`, without `Object`
 * 从最远祖先到自身的类链（不含Object）
 */
export function classHierarchy(type: Function): Function[] {
  const chain: Function[] = [];
  let current: unknown = type;
  while (typeof current === 'function' && current !== Object && current !== Function.prototype) {
    chain.unshift(current);
    current = Object.getPrototypeOf(current);
  }
  return chain;
}

// ---------------------------------------------------------------------------
// Fields 字段
// ---------------------------------------------------------------------------

/**
 * Serialized fields of a class: ancestors first, each class in declaration order,
 * without static or transient fields. Same-named fields of different classes stay distinct.
 * 类的可序列化字段：祖先优先、按声明顺序，排除静态与瞬态字段
 */
export function enumerateFields(type: Function): FieldDeclaration[] {
  const fields: FieldDeclaration[] = [];
  for (const owner of classHierarchy(type)) {
    const declarations = getOwnClassDeclarations(owner);
    if (!declarations) continue;
    for (const field of declarations.fields) {
      if (field.isStatic || field.transient || fields.includes(field)) continue;
      fields.push(field);
    }
  }
  return fields;
}

/**
 * Class-level transformers: own declarations in source order, then inheritable ones of
 * ancestors, nearest first
 * 类级转换器：自身声明优先，然后是祖先中可继承的声明（由近及远）
 */
export function getClassTransforms(type: Function): TransformDeclaration[] {
  const chain = classHierarchy(type);
  const transforms: TransformDeclaration[] = [...(getOwnClassDeclarations(type)?.transforms ?? [])];
  for (let i = chain.length - 2; i >= 0; i--) {
    for (const declaration of getOwnClassDeclarations(chain[i])?.transforms ?? []) {
      if (declaration.inheritable) transforms.push(declaration);
    }
  }
  return transforms;
}

/**
 * Field-level transform declared for a field, if any
 */
export function getFieldTransform(field: FieldDeclaration): TransformDeclaration | undefined {
  return getOwnClassDeclarations(field.declaringClass)?.fieldTransforms.get(field.name);
}

/**
 * Read a field reflectively
 * 反射读取字段
 *
 * @throws FieldAccessError when the target is not an object or the getter throws
 */
export function readField(object: unknown, field: FieldHandle): unknown {
  if (typeof object !== 'object' || object === null) {
    throw new FieldAccessError(`Cannot read field of ${describeType(object)}`, describeType(object), field.name);
  }
  try {
    return Reflect.get(object, field.name);
  } catch (error) {
    throw new FieldAccessError(
      `Reading field failed: ${error instanceof Error ? error.message : String(error)}`,
      describeType(object),
      field.name,
      error
    );
  }
}

/**
 * Write a field reflectively
 * 反射写入字段
 *
 * @throws FieldAccessError when the target is not an object, the property rejects the write
 * (frozen object, read-only or getter-only property) or the setter throws
 */
export function writeField(object: unknown, field: FieldHandle, value: unknown): void {
  if (typeof object !== 'object' || object === null) {
    throw new FieldAccessError(`Cannot write field of ${describeType(object)}`, describeType(object), field.name);
  }
  let accepted: boolean;
  try {
    accepted = Reflect.set(object, field.name, value);
  } catch (error) {
    throw new FieldAccessError(
      `Writing field failed: ${error instanceof Error ? error.message : String(error)}`,
      describeType(object),
      field.name,
      error
    );
  }
  if (!accepted) {
    throw new FieldAccessError('Field rejected the write', describeType(object), field.name);
  }
}

// ---------------------------------------------------------------------------
// Instantiation 实例化
// ---------------------------------------------------------------------------

/**
 * Default value a field holds right after constructor-less instantiation
 * 免构造实例化后字段的默认值
 */
export function defaultValueOf(type: TypeRef): unknown {
  switch (type) {
    case Number:
      return 0;
    case BigInt:
      return 0n;
    case Boolean:
      return false;
    case String:
      return '';
    default:
      return null;
  }
}

/**
 * Create an instance without running its constructor or field initializers; every
 * declared instance field, transient ones included, is set to its type's default.
 * 不执行构造函数与字段初始化器创建实例，所有已声明的实例字段（含瞬态字段）设为默认值
 *
 * @throws NotInstantiableError for non-constructors, `@Abstract()` classes and built-ins
 */
export function instantiateWithoutConstructor<T>(type: Class<T>): T {
  if (!isClass(type)) {
    throw new NotInstantiableError(`${describeType(type)} is not a class`);
  }
  if (isAbstractClass(type)) {
    throw new NotInstantiableError(`${type.name} is abstract`);
  }
  if (isNativeBuiltin(type)) {
    throw new NotInstantiableError(`${type.name} is a built-in class and cannot be instantiated reflectively`);
  }

  const instance: T = Object.create(type.prototype);
  for (const owner of classHierarchy(type)) {
    for (const field of getOwnClassDeclarations(owner)?.fields ?? []) {
      if (!field.isStatic) writeField(instance, field, defaultValueOf(field.declaredType));
    }
  }
  return instance;
}

// ---------------------------------------------------------------------------
// Numbers 数字
// ---------------------------------------------------------------------------

/**
 * Unwrap boxed primitives (`new Number(1)`) to their primitive value
 * 拆箱包装对象
 */
export function unbox(value: unknown): unknown {
  if (value instanceof Number || value instanceof String || value instanceof Boolean) {
    return value.valueOf();
  }
  return value;
}

/**
 * Convert between `number` and `bigint` to match a declared kind
 * 按声明类型在number与bigint之间转换
 *
 * @throws TypeNotAllowedError when a non-integral number is asked to become a bigint
 */
export function convertNumeric(value: number | bigint, kind: 'number' | 'bigint'): number | bigint {
  if (kind === 'number') {
    return typeof value === 'bigint' ? Number(value) : value;
  }
  if (typeof value === 'bigint') return value;
  if (!Number.isInteger(value)) {
    throw new TypeNotAllowedError(`${value} cannot be converted to bigint`);
  }
  return BigInt(value);
}

// ---------------------------------------------------------------------------
// Arrays 数组
// ---------------------------------------------------------------------------

export function isArrayLike(value: unknown): value is unknown[] | TypedArray {
  return Array.isArray(value) || isTypedArray(value);
}

export function getArrayItem(array: unknown[] | TypedArray, index: number): unknown {
  if (!Number.isInteger(index) || index < 0 || index >= array.length) {
    throw new IndexOutOfRangeError(index, array.length);
  }
  return array[index];
}

/**
 * Write an array item; typed arrays only accept their element kind
 * 写入数组元素；类型化数组只接受对应元素类型
 */
export function setArrayItem(array: unknown[] | TypedArray, index: number, value: unknown): void {
  if (!Number.isInteger(index) || index < 0 || index >= array.length) {
    throw new IndexOutOfRangeError(index, array.length);
  }
  if (Array.isArray(array)) {
    array[index] = value;
  } else if (array instanceof BigInt64Array || array instanceof BigUint64Array) {
    if (typeof value !== 'bigint') {
      throw new TypeNotAllowedError(`${describeType(array)} items must be bigint, got ${describeType(value)}`);
    }
    array[index] = value;
  } else {
    if (typeof value !== 'number') {
      throw new TypeNotAllowedError(`${describeType(array)} items must be numbers, got ${describeType(value)}`);
    }
    array[index] = value;
  }
}

/**
 * Allocate an array for a declared array type
 * 按声明的数组类型分配数组
 */
export function createArray(type: TypeRef, length: number): unknown[] | TypedArray {
  if (isTypedArrayClass(type)) {
    return createTypedArray(type, length);
  }
  if (type instanceof ArrayType || type === Array || type === Object) {
    return new Array<unknown>(length).fill(null);
  }
  throw new NotInstantiableError(`${typeName(type)} is not an array type`);
}

/**
 * Shallow copy of an array, keeping typed arrays typed
 * 数组浅拷贝，保持类型化数组的类型
 */
export function cloneArray(array: unknown[] | TypedArray): unknown[] | TypedArray {
  if (Array.isArray(array)) {
    return array.slice();
  }
  const copy = createTypedArray(typedArrayClassOf(array), array.length);
  for (let i = 0; i < array.length; i++) {
    setArrayItem(copy, i, array[i]);
  }
  return copy;
}

/**
 * Element type to use for items of a runtime array value
 */
export function runtimeElementType(array: unknown[] | TypedArray, declared: TypeRef): TypeRef {
  return isTypedArray(array) ? elementTypeOf(typedArrayClassOf(array)) : elementTypeOf(declared);
}
