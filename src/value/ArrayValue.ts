import { GenericValue } from './GenericValue';
import { NoneValue } from './ScalarValues';
import { IndexOutOfRangeError, TypeNotAllowedError, describeType } from '../errors/Errors';

/**
 * Array container: ordered, index addressable, resizable
 * 数组容器：有序、可按索引访问、可变长
 *
 * @example
 * ```typescript
 * const array = new ArrayValue(2);   // [none, none]
 * array.set(1, new NumberValue(7));  // [none, 7]
 * array.set(5, new NumberValue(7));  // throws IndexOutOfRangeError
 * ```
 */
export class ArrayValue extends GenericValue {
  readonly kind = 'array';

  private readonly _items: GenericValue[] = [];

  /**
   * @param length Number of slots, each initialized to none 预分配的槽位数（均为none）
   */
  constructor(length = 0) {
    super();
    if (!Number.isInteger(length) || length < 0) {
      throw new IndexOutOfRangeError(length, 0);
    }
    for (let i = 0; i < length; i++) {
      this._items.push(new NoneValue());
    }
  }

  get length(): number {
    return this._items.length;
  }

  get(index: number): GenericValue {
    this.checkIndex(index);
    return this._items[index];
  }

  /**
   * Replace the item at an existing index
   * 替换已有索引处的元素
   */
  set(index: number, value: GenericValue): void {
    this.checkIndex(index);
    this.checkItem(value);
    this._items[index] = value;
  }

  /**
   * Append an item
   * 追加元素
   */
  add(value: GenericValue): void {
    this.checkItem(value);
    this._items.push(value);
  }

  remove(index: number): GenericValue {
    this.checkIndex(index);
    const [removed] = this._items.splice(index, 1);
    return removed;
  }

  values(): IterableIterator<GenericValue> {
    return this._items.values();
  }

  clone(): ArrayValue {
    const copy = new ArrayValue();
    for (const item of this._items) {
      copy.add(item.clone());
    }
    return copy;
  }

  equals(other: GenericValue): boolean {
    if (!(other instanceof ArrayValue) || other.length !== this.length) return false;
    return this._items.every((item, i) => item.equals(other._items[i]));
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this._items.length) {
      throw new IndexOutOfRangeError(index, this._items.length);
    }
  }

  private checkItem(value: GenericValue): void {
    if (!(value instanceof GenericValue)) {
      throw new TypeNotAllowedError(`ArrayValue items must be generic values, got ${describeType(value)}`);
    }
    if (value === this) {
      throw new TypeNotAllowedError('ArrayValue cannot contain itself');
    }
  }
}
