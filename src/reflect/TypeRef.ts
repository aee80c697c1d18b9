/**
 * Runtime type references
 * 运行时类型引用
 *
 * TypeScript erases declared types, so fields name their type with a runtime token:
 * a constructor (`Number`, `String`, `Point`, `Int32Array`, ...) or an {@link ArrayType}.
 * TypeScript会擦除类型，因此字段用运行时标记声明类型：构造函数或ArrayType。
 */

/**
 * Any constructor, including abstract ones
 * 任意构造函数（包括抽象类）
 */
export type Class<T = unknown> = abstract new (...args: never[]) => T;

/**
 * Names of primitive types
 * 原始类型名称
 */
export type PrimitiveTypeName = 'number' | 'bigint' | 'string' | 'boolean';

/**
 * Array of a declared element type
 * 声明了元素类型的数组
 */
export class ArrayType {
  constructor(readonly elementType: TypeRef) {}

  get name(): string {
    return `${typeName(this.elementType)}[]`;
  }
}

/**
 * Type reference accepted wherever a field or target type is expected.
 * `BigInt` is listed on its own because it has no construct signature.
 * 字段或目标类型引用
 */
export type TypeRef = Class | ArrayType | BigIntConstructor;

/**
 * Declare an array type
 * 声明数组类型
 *
 * @example
 * ```typescript
 * class Polygon {
 *   @Field(arrayOf(Point)) points: Point[] = [];
 * }
 * ```
 */
export function arrayOf(elementType: TypeRef): ArrayType {
  return new ArrayType(elementType);
}

/**
 * Typed array constructors and their element kind
 * 类型化数组构造函数及其元素类型
 */
export type TypedArrayClass =
  | Int8ArrayConstructor
  | Uint8ArrayConstructor
  | Uint8ClampedArrayConstructor
  | Int16ArrayConstructor
  | Uint16ArrayConstructor
  | Int32ArrayConstructor
  | Uint32ArrayConstructor
  | Float32ArrayConstructor
  | Float64ArrayConstructor
  | BigInt64ArrayConstructor
  | BigUint64ArrayConstructor;

export type TypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

const TYPED_ARRAY_FACTORIES: ReadonlyArray<[TypedArrayClass, (length: number) => TypedArray]> = [
  [Int8Array, length => new Int8Array(length)],
  [Uint8Array, length => new Uint8Array(length)],
  [Uint8ClampedArray, length => new Uint8ClampedArray(length)],
  [Int16Array, length => new Int16Array(length)],
  [Uint16Array, length => new Uint16Array(length)],
  [Int32Array, length => new Int32Array(length)],
  [Uint32Array, length => new Uint32Array(length)],
  [Float32Array, length => new Float32Array(length)],
  [Float64Array, length => new Float64Array(length)],
  [BigInt64Array, length => new BigInt64Array(length)],
  [BigUint64Array, length => new BigUint64Array(length)]
];

export function isTypedArrayClass(type: TypeRef): type is TypedArrayClass {
  return TYPED_ARRAY_FACTORIES.some(([candidate]) => candidate === type);
}

/**
 * Allocate a zero-filled typed array of the given class
 * 分配指定类型的类型化数组
 */
export function createTypedArray(type: TypedArrayClass, length: number): TypedArray {
  const entry = TYPED_ARRAY_FACTORIES.find(([candidate]) => candidate === type);
  if (!entry) {
    throw new RangeError(`${type.name} is not a typed array class`);
  }
  return entry[1](length);
}

/**
 * Class of a typed array instance
 */
export function typedArrayClassOf(value: TypedArray): TypedArrayClass {
  const entry = TYPED_ARRAY_FACTORIES.find(([candidate]) => value instanceof candidate);
  if (!entry) {
    throw new RangeError('Unknown typed array class');
  }
  return entry[0];
}

/**
 * Element kind of a typed array class
 */
export function typedArrayElementKind(type: TypedArrayClass): 'number' | 'bigint' {
  return type === BigInt64Array || type === BigUint64Array ? 'bigint' : 'number';
}

export function isTypedArray(value: unknown): value is TypedArray {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

/**
 * Whether a type reference means "decided by the runtime value"
 * 类型是否为动态类型
 */
export function isDynamicType(type: TypeRef): boolean {
  return type === Object;
}

/**
 * Whether a type reference describes an array (declared, bare `Array` or typed)
 * 类型是否描述数组
 */
export function isArrayTypeRef(type: TypeRef): boolean {
  return type instanceof ArrayType || type === Array || isTypedArrayClass(type);
}

/**
 * Element type of an array type reference
 */
export function elementTypeOf(type: TypeRef): TypeRef {
  if (type instanceof ArrayType) return type.elementType;
  if (isTypedArrayClass(type)) {
    return typedArrayElementKind(type) === 'bigint' ? BigInt : Number;
  }
  return Object;
}

/**
 * Readable name of a type reference
 * 类型引用的可读名称
 */
export function typeName(type: TypeRef): string {
  return type instanceof ArrayType ? type.name : type.name || 'anonymous';
}
