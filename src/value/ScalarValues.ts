import { GenericValue } from './GenericValue';
import { TypeNotAllowedError, describeType } from '../errors/Errors';

/**
 * String scalar
 * 字符串标量
 */
export class StringValue extends GenericValue {
  readonly kind = 'string';

  constructor(readonly value: string) {
    super();
    if (typeof value !== 'string') {
      throw new TypeNotAllowedError(`StringValue payload must be a string, got ${describeType(value)}`);
    }
  }

  clone(): StringValue {
    return new StringValue(this.value);
  }

  equals(other: GenericValue): boolean {
    return other instanceof StringValue && other.value === this.value;
  }
}

/**
 * Number scalar. Holds either a `number` or a `bigint` and never converts between them.
 * 数字标量，保存number或bigint，不做宽化转换
 */
export class NumberValue extends GenericValue {
  readonly kind = 'number';

  constructor(readonly value: number | bigint) {
    super();
    if (typeof value !== 'number' && typeof value !== 'bigint') {
      throw new TypeNotAllowedError(`NumberValue payload must be a number or bigint, got ${describeType(value)}`);
    }
  }

  clone(): NumberValue {
    return new NumberValue(this.value);
  }

  equals(other: GenericValue): boolean {
    return other instanceof NumberValue && Object.is(other.value, this.value);
  }
}

/**
 * Boolean scalar
 * 布尔标量
 */
export class BoolValue extends GenericValue {
  readonly kind = 'bool';

  constructor(readonly value: boolean) {
    super();
    if (typeof value !== 'boolean') {
      throw new TypeNotAllowedError(`BoolValue payload must be a boolean, got ${describeType(value)}`);
    }
  }

  clone(): BoolValue {
    return new BoolValue(this.value);
  }

  equals(other: GenericValue): boolean {
    return other instanceof BoolValue && other.value === this.value;
  }
}

/**
 * Explicit absence. Distinct from a key that is not present at all.
 * 显式的空值，区别于键不存在
 */
export class NoneValue extends GenericValue {
  readonly kind = 'none';

  clone(): NoneValue {
    return new NoneValue();
  }

  equals(other: GenericValue): boolean {
    return other instanceof NoneValue;
  }
}
