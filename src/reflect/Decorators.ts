/**
 * Decorators declaring the serialized shape of a class
 * 声明类序列化形态的装饰器
 *
 * Requires `experimentalDecorators`. When `emitDecoratorMetadata` is on, `@Field()` falls
 * back to the emitted `design:type`; otherwise pass the type explicitly.
 * 需要开启experimentalDecorators；开启emitDecoratorMetadata时@Field()可省略类型。
 *
 * @example
 * ```typescript
 * @Transform({ transformer: AuditTransformer, inheritable: true })
 * class Entity {
 *   @Field(Number) id = 0;
 *   @Transient() cache: unknown = null;
 * }
 *
 * class User extends Entity {
 *   @Field(String) name = '';
 *   @Transform({ transformer: DateTransformer }) @Field(Date) createdAt = new Date();
 * }
 * ```
 */

import 'reflect-metadata';
import type { TypeRef } from './TypeRef';
import type { TransformerClass } from '../transformer/Transformer';
import { TypeNotAllowedError } from '../errors/Errors';

/**
 * A declared field. Object identity is the field's identity.
 * 字段声明，对象引用即字段身份
 */
export interface FieldDeclaration {
  readonly name: string;
  readonly declaringClass: Function;
  readonly declaredType: TypeRef;
  readonly isStatic: boolean;
  readonly transient: boolean;
}

/**
 * Options of `@Transform`
 * `@Transform`选项
 */
export interface TransformOptions {
  /** Transformer class, instantiated once per baker 转换器类 */
  transformer: TransformerClass;
  /** Class level only: also applies to subclasses 仅类级：子类同样适用 */
  inheritable?: boolean;
  /** Explicit type overriding the declared field type 覆盖声明类型的显式类型 */
  type?: TypeRef;
}

/**
 * A recorded `@Transform` usage
 * 已记录的`@Transform`
 */
export interface TransformDeclaration {
  readonly transformer: TransformerClass;
  readonly inheritable: boolean;
  readonly type: TypeRef | undefined;
}

/**
 * Everything declared directly on one class
 * 直接声明在某个类上的全部元数据
 */
export interface ClassDeclarations {
  readonly owner: Function;
  readonly fields: FieldDeclaration[];
  readonly transforms: TransformDeclaration[];
  readonly fieldTransforms: Map<string, TransformDeclaration>;
  abstract: boolean;
}

/**
 * Registry of declarations by class
 * 按类存放的声明注册表
 */
const DECLARATIONS = new WeakMap<Function, ClassDeclarations>();

/**
 * Get or create the declarations recorded directly on a class
 * 获取或创建类自身的声明
 */
export function getOrCreateClassDeclarations(constructor: Function): ClassDeclarations {
  let declarations = DECLARATIONS.get(constructor);
  if (!declarations) {
    declarations = {
      owner: constructor,
      fields: [],
      transforms: [],
      fieldTransforms: new Map(),
      abstract: false
    };
    DECLARATIONS.set(constructor, declarations);
  }
  return declarations;
}

/**
 * Declarations recorded directly on a class, without its ancestors
 * 类自身（不含祖先）的声明
 */
export function getOwnClassDeclarations(constructor: Function): ClassDeclarations | undefined {
  return DECLARATIONS.get(constructor);
}

/**
 * Declare a serialized field
 * 声明可序列化字段
 *
 * @param type Field type; defaults to the emitted `design:type`, then to dynamic 字段类型
 */
export function Field(type?: TypeRef): PropertyDecorator {
  return (target: object, propertyKey: string | symbol): void => {
    recordField(target, propertyKey, type, false);
  };
}

/**
 * Declare a field that is never serialized
 * 声明不参与序列化的字段
 */
export function Transient(): PropertyDecorator {
  return (target: object, propertyKey: string | symbol): void => {
    recordField(target, propertyKey, undefined, true);
  };
}

/**
 * Attach a transformer to a class or to a field
 * 为类或字段附加转换器
 */
export function Transform(options: TransformOptions): ClassDecorator & PropertyDecorator {
  const declaration: TransformDeclaration = {
    transformer: options.transformer,
    inheritable: options.inheritable ?? false,
    type: options.type
  };

  return (target: object, propertyKey?: string | symbol): void => {
    if (propertyKey === undefined) {
      if (typeof target !== 'function') {
        throw new TypeNotAllowedError('@Transform without a property must decorate a class');
      }
      // class decorators run bottom-up; unshift keeps source order
      getOrCreateClassDeclarations(target).transforms.unshift(declaration);
      return;
    }

    const name = requireStringKey(propertyKey);
    // field decorators also run bottom-up, so the top-most one is applied last and wins
    getOrCreateClassDeclarations(ownerOf(target)).fieldTransforms.set(name, declaration);
  };
}

/**
 * Mark a class as not instantiable (abstract base or interface-like)
 * 将类标记为不可实例化（抽象基类或接口类）
 */
export function Abstract(): ClassDecorator {
  return (target: Function): void => {
    getOrCreateClassDeclarations(target).abstract = true;
  };
}

function recordField(target: object, propertyKey: string | symbol, type: TypeRef | undefined, transient: boolean): void {
  const name = requireStringKey(propertyKey);
  const isStatic = typeof target === 'function';
  const declaringClass = ownerOf(target);
  const declarations = getOrCreateClassDeclarations(declaringClass);

  const field: FieldDeclaration = {
    name,
    declaringClass,
    declaredType: type ?? designTypeOf(target, name),
    isStatic,
    transient
  };

  const existing = declarations.fields.findIndex(candidate => candidate.name === name && candidate.isStatic === isStatic);
  if (existing >= 0) {
    const previous = declarations.fields[existing];
    declarations.fields[existing] = {
      ...field,
      declaredType: type ?? previous.declaredType,
      transient: transient || previous.transient
    };
  } else {
    declarations.fields.push(field);
  }
}

function requireStringKey(propertyKey: string | symbol): string {
  if (typeof propertyKey !== 'string') {
    throw new TypeNotAllowedError(`Symbol keyed property ${String(propertyKey)} cannot be serialized`);
  }
  return propertyKey;
}

/**
 * Class that owns a decorated member: the target itself for statics, its constructor otherwise
 */
function ownerOf(target: object): Function {
  if (typeof target === 'function') return target;
  const constructor: unknown = Reflect.get(target, 'constructor');
  if (typeof constructor !== 'function') {
    throw new TypeNotAllowedError('Decorated member has no owning class');
  }
  return constructor;
}

function designTypeOf(target: object, name: string): TypeRef {
  const designType: unknown = Reflect.getMetadata('design:type', target, name);
  return isTypeRefLike(designType) ? designType : Object;
}

function isTypeRefLike(value: unknown): value is TypeRef {
  return typeof value === 'function' && value.prototype !== undefined;
}
