import type { Transformer } from './Transformer';
import type { GenericValue } from '../value/GenericValue';
import { NoneValue, NumberValue } from '../value/ScalarValues';
import { TypeNotAllowedError, describeType } from '../errors/Errors';

/**
 * Stores a `Date` as its epoch milliseconds
 * 将`Date`存储为毫秒时间戳
 *
 * @example
 * ```typescript
 * class Session {
 *   @Transform({ transformer: DateTransformer, type: Date })
 *   @Field(Date)
 *   startedAt = new Date();
 * }
 * ```
 */
export class DateTransformer implements Transformer {
  toGeneric(value: unknown): GenericValue {
    if (value === null || value === undefined) return new NoneValue();
    if (!(value instanceof Date)) {
      throw new TypeNotAllowedError(`DateTransformer expects a Date, got ${describeType(value)}`);
    }
    return new NumberValue(value.getTime());
  }

  fromGeneric(value: GenericValue): Date | null {
    if (value instanceof NoneValue) return null;
    if (!(value instanceof NumberValue)) {
      throw new TypeNotAllowedError(`DateTransformer expects a number value, got ${value.kind}`);
    }
    return new Date(Number(value.value));
  }
}
