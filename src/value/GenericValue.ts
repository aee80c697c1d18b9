/**
 * Generic value tree
 * 通用值树
 *
 * All serializable data is converted to and from this closed set of variants:
 * object and array containers, string, number, bool and none scalars.
 * The tree must stay acyclic; `clone` and `equals` recurse once per level, so very deep
 * trees are the caller's risk.
 * 所有可序列化数据都与这组封闭的变体互相转换。树必须无环；clone与equals按层递归。
 */

/**
 * Variant tag
 * 变体标签
 */
export type ValueKind = 'object' | 'array' | 'string' | 'number' | 'bool' | 'none';

/**
 * Base class of every generic value
 * 所有通用值的基类
 */
export abstract class GenericValue {
  abstract readonly kind: ValueKind;

  /**
   * Deep, independent copy
   * 深拷贝
   */
  abstract clone(): GenericValue;

  /**
   * Deep structural equality
   * 深度结构相等
   */
  abstract equals(other: GenericValue): boolean;

  /**
   * Whether this is a container (object or array)
   * 是否为容器
   */
  isContainer(): boolean {
    return this.kind === 'object' || this.kind === 'array';
  }

  /**
   * Whether this is a scalar (string, number, bool or none)
   * 是否为标量
   */
  isScalar(): boolean {
    return !this.isContainer();
  }
}
