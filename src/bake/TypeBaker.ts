import { BakedType, Property } from './BakedType';
import type { Transformer, TransformerClass } from '../transformer/Transformer';
import type { Logger } from '../utils/Logger';
import { ConsoleLogger } from '../utils/Logger';
import {
  enumerateFields,
  getClassTransforms,
  getFieldTransform,
  isAbstractClass,
  isClass,
  isNativeBuiltin
} from '../reflect/ReflectionUtil';
import { NotInstantiableError, describeType } from '../errors/Errors';

/**
 * Type baking compiler and process-wide descriptor registry
 * 类型烘焙编译器与进程级描述注册表
 *
 * Inspects a class once (fields, effective types, transformers) and caches the resulting
 * {@link BakedType} for the lifetime of the baker. There is no eviction.
 * 每个类只检查一次并缓存结果，缓存不淘汰。
 *
 * @example
 * ```typescript
 * class Point {
 *   @Field(Number) x = 0;
 *   @Field(Number) y = 0;
 * }
 *
 * const baked = typeBaker.bake(Point);
 * baked.properties.map(p => p.name); // ['x', 'y']
 * typeBaker.bake(Point) === baked;   // true
 * ```
 */
export class TypeBaker {
  private readonly _baked = new Map<Function, BakedType>();
  private readonly _transformers = new Map<TransformerClass, Transformer>();
  private _bakeCount = 0;

  constructor(private readonly _logger: Logger = new ConsoleLogger('TypeBaker')) {}

  /**
   * Number of descriptors computed so far (cache hits do not count)
   * 已计算的描述数量（命中缓存不计）
   */
  get bakeCount(): number {
    return this._bakeCount;
  }

  /**
   * Number of cached descriptors
   */
  get size(): number {
    return this._baked.size;
  }

  /**
   * Bake a class, or return its cached descriptor
   * 烘焙类，或返回缓存的描述
   *
   * @throws NotInstantiableError for non-classes, `@Abstract()` classes and built-ins
   */
  bake(type: Function): BakedType {
    const cached = this._baked.get(type);
    if (cached) return cached;

    if (!isClass(type)) {
      throw new NotInstantiableError(`${describeType(type)} is not a class and cannot be baked`);
    }
    if (isAbstractClass(type)) {
      throw new NotInstantiableError(`${type.name} is abstract and cannot be baked`);
    }
    if (isNativeBuiltin(type)) {
      throw new NotInstantiableError(`${type.name} is a built-in class and cannot be baked`);
    }

    const transformers = getClassTransforms(type).map(declaration => this.getTransformer(declaration.transformer));
    const properties = enumerateFields(type).map(field => {
      const transform = getFieldTransform(field);
      return new Property(
        field,
        transform ? this.getTransformer(transform.transformer) : null,
        transform?.type ?? null
      );
    });

    const baked = new BakedType(type, transformers, properties);
    this._baked.set(type, baked);
    this._bakeCount++;

    this._logger.debug(
      `baked ${type.name} (${properties.length} properties, ${transformers.length} transformers)`
    );
    return baked;
  }

  /**
   * Cached descriptor of a class, without baking
   */
  get(type: Function): BakedType | undefined {
    return this._baked.get(type);
  }

  has(type: Function): boolean {
    return this._baked.has(type);
  }

  /**
   * Shared transformer instance for a transformer class
   * 获取转换器类的共享实例
   */
  getTransformer(transformerClass: TransformerClass): Transformer {
    let transformer = this._transformers.get(transformerClass);
    if (!transformer) {
      transformer = new transformerClass();
      this._transformers.set(transformerClass, transformer);
    }
    return transformer;
  }

  /**
   * Drop every cached descriptor and transformer (tests and hot reload)
   * 清空缓存（测试与热重载用）
   */
  clear(): void {
    this._baked.clear();
    this._transformers.clear();
    this._bakeCount = 0;
  }
}

/**
 * Process-wide default baker
 * 进程级默认烘焙器
 */
export const typeBaker = new TypeBaker();
