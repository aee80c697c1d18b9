import type { GenericValue } from '../value/GenericValue';
import type { TypeRef } from '../reflect/TypeRef';
import type { ObjectSerializer } from '../Serializer';

/**
 * Context handed to transformers
 * 传给转换器的上下文
 */
export interface TransformContext {
  /** Declared or effective type being converted 正在转换的声明/有效类型 */
  readonly type: TypeRef;
  /** Serializer running the conversion, usable for nested conversions 执行转换的序列化器 */
  readonly serializer: ObjectSerializer;
}

/**
 * Pluggable conversion strategy for a field or a class
 * 字段或类的可插拔转换策略
 *
 * Class-level transformers are chained: the first receives the native object and
 * each following one receives the previous generic value. Deserialization runs the
 * chain backwards.
 * 类级转换器串联执行：第一个接收原生对象，后续接收前一个的通用值；反序列化时逆序执行。
 *
 * @example
 * ```typescript
 * class UpperCaseTransformer implements Transformer {
 *   toGeneric(value: unknown): GenericValue {
 *     return new StringValue(String(value).toUpperCase());
 *   }
 *   fromGeneric(value: GenericValue): unknown {
 *     return value instanceof StringValue ? value.value.toLowerCase() : null;
 *   }
 * }
 * ```
 */
export interface Transformer {
  /**
   * Convert a native value into a generic value
   * 将原生值转换为通用值
   */
  toGeneric(value: unknown, context: TransformContext): GenericValue;

  /**
   * Convert a generic value back into a native value
   * 将通用值转换回原生值
   */
  fromGeneric(value: GenericValue, context: TransformContext): unknown;
}

/**
 * Transformer constructor referenced by `@Transform`
 * `@Transform`引用的转换器构造函数
 */
export type TransformerClass = new () => Transformer;
