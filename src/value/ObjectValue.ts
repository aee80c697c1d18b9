import { GenericValue } from './GenericValue';
import { StringValue, NumberValue, BoolValue, NoneValue } from './ScalarValues';
import { TypeNotAllowedError, describeType } from '../errors/Errors';

/**
 * Raw key accepted by {@link ObjectValue.put} and friends; wrapped into a scalar value
 * 可直接作为键使用的原始值
 */
export type RawKey = string | number | bigint | boolean;

/**
 * Object container: insertion ordered mapping from value to value
 * 对象容器：保持插入顺序的值到值映射
 *
 * Scalar keys compare by content, container keys by identity.
 * 标量键按内容比较，容器键按引用比较。
 */
export class ObjectValue extends GenericValue {
  readonly kind = 'object';

  private readonly _entries = new Map<unknown, [GenericValue, GenericValue]>();

  get size(): number {
    return this._entries.size;
  }

  /**
   * Insert or replace an entry
   * 插入或替换条目
   */
  put(key: GenericValue | RawKey, value: GenericValue): void {
    if (!(value instanceof GenericValue)) {
      throw new TypeNotAllowedError(`ObjectValue entries must be generic values, got ${describeType(value)}`);
    }
    if (value === this) {
      throw new TypeNotAllowedError('ObjectValue cannot contain itself');
    }
    const keyValue = toKeyValue(key);
    const slot = identityOf(keyValue);
    const existing = this._entries.get(slot);
    if (existing) {
      existing[1] = value;
    } else {
      this._entries.set(slot, [keyValue, value]);
    }
  }

  get(key: GenericValue | RawKey): GenericValue | undefined {
    return this._entries.get(identityOf(toKeyValue(key)))?.[1];
  }

  has(key: GenericValue | RawKey): boolean {
    return this._entries.has(identityOf(toKeyValue(key)));
  }

  /**
   * Remove an entry, returning its value
   * 删除条目并返回其值
   */
  remove(key: GenericValue | RawKey): GenericValue | undefined {
    const slot = identityOf(toKeyValue(key));
    const existing = this._entries.get(slot);
    this._entries.delete(slot);
    return existing?.[1];
  }

  *keys(): IterableIterator<GenericValue> {
    for (const [key] of this._entries.values()) yield key;
  }

  *values(): IterableIterator<GenericValue> {
    for (const [, value] of this._entries.values()) yield value;
  }

  *entries(): IterableIterator<[GenericValue, GenericValue]> {
    for (const [key, value] of this._entries.values()) yield [key, value];
  }

  clone(): ObjectValue {
    const copy = new ObjectValue();
    for (const [key, value] of this._entries.values()) {
      copy.put(key.clone(), value.clone());
    }
    return copy;
  }

  /**
   * Container keys match any structurally equal key whose value is equal too
   * 容器键按结构匹配
   */
  equals(other: GenericValue): boolean {
    if (!(other instanceof ObjectValue) || other.size !== this.size) return false;
    const matched = new Set<GenericValue>();
    for (const [key, value] of this._entries.values()) {
      if (!key.isContainer()) {
        const theirs = other.get(key);
        if (!theirs || !theirs.equals(value)) return false;
        continue;
      }
      let found = false;
      for (const [theirKey, theirValue] of other.entries()) {
        if (matched.has(theirKey) || !theirKey.equals(key) || !theirValue.equals(value)) continue;
        matched.add(theirKey);
        found = true;
        break;
      }
      if (!found) return false;
    }
    return true;
  }
}

function toKeyValue(key: GenericValue | RawKey): GenericValue {
  if (key instanceof GenericValue) return key;
  switch (typeof key) {
    case 'string':
      return new StringValue(key);
    case 'number':
    case 'bigint':
      return new NumberValue(key);
    case 'boolean':
      return new BoolValue(key);
    default:
      throw new TypeNotAllowedError(`ObjectValue keys must be generic values or scalars, got ${describeType(key)}`);
  }
}

/**
 * Map slot for a key: content for scalars, the node itself for containers
 */
function identityOf(key: GenericValue): unknown {
  if (key instanceof StringValue) return `s:${key.value}`;
  if (key instanceof NumberValue) {
    return typeof key.value === 'bigint' ? `i:${key.value}` : `n:${Object.is(key.value, -0) ? '-0' : key.value}`;
  }
  if (key instanceof BoolValue) return `b:${key.value}`;
  if (key instanceof NoneValue) return 'none';
  return key;
}
