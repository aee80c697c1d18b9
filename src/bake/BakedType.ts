import type { FieldDeclaration } from '../reflect/Decorators';
import type { Class, TypeRef } from '../reflect/TypeRef';
import { typeName } from '../reflect/TypeRef';
import type { Transformer } from '../transformer/Transformer';
import { readField, writeField } from '../reflect/ReflectionUtil';

/**
 * One serialized field of a baked class
 * 烘焙类中的一个可序列化字段
 */
export class Property {
  /** Field name 字段名 */
  readonly name: string;
  /** Effective type: the explicit type when given, the declared type otherwise 有效类型 */
  readonly type: TypeRef;

  constructor(
    /** Field identity 字段身份 */
    readonly field: FieldDeclaration,
    /** Field-level transformer 字段级转换器 */
    readonly transformer: Transformer | null,
    /** Explicit type supplied by `@Transform({ type })` 显式类型 */
    readonly explicitType: TypeRef | null
  ) {
    this.name = field.name;
    this.type = explicitType ?? field.declaredType;
  }

  get declaringClass(): Function {
    return this.field.declaringClass;
  }

  get declaredType(): TypeRef {
    return this.field.declaredType;
  }

  /**
   * Read this property of an object
   * @throws FieldAccessError
   */
  get(object: unknown): unknown {
    return readField(object, this);
  }

  /**
   * Write this property of an object
   * @throws FieldAccessError
   */
  set(object: unknown, value: unknown): void {
    writeField(object, this, value);
  }

  toString(): string {
    return `${this.declaringClass.name}.${this.name}: ${typeName(this.type)}`;
  }
}

/**
 * Immutable descriptor of a class, computed once by the baker
 * 由烘焙器计算一次的不可变类描述
 */
export class BakedType {
  constructor(
    /** Described class 描述的类 */
    readonly type: Class,
    /** Class-level transformers in pipeline order 类级转换器（管线顺序） */
    readonly transformers: readonly Transformer[],
    /** Serialized properties in field order 按字段顺序的属性 */
    readonly properties: readonly Property[]
  ) {
    Object.freeze(transformers);
    Object.freeze(properties);
    for (const property of properties) Object.freeze(property);
    Object.freeze(this);
  }

  get name(): string {
    return this.type.name;
  }

  /**
   * Whether class-level transformers replace field traversal
   */
  get transformed(): boolean {
    return this.transformers.length > 0;
  }

  findProperty(name: string): Property | undefined {
    return this.properties.find(property => property.name === name);
  }
}
