import superjson from 'superjson';
import type { Transformer } from './Transformer';
import type { GenericValue } from '../value/GenericValue';
import { NoneValue, StringValue } from '../value/ScalarValues';
import { TypeNotAllowedError } from '../errors/Errors';

/**
 * Stores values superjson understands (`Map`, `Set`, `Date`, `RegExp`, bigint and plain
 * data nested in them) as a superjson string
 * 将superjson支持的值（Map、Set、Date、RegExp、bigint等）存储为superjson字符串
 *
 * @example
 * ```typescript
 * class Inventory {
 *   @Transform({ transformer: SuperjsonTransformer, type: Map })
 *   @Field(Map)
 *   counts = new Map<string, number>();
 * }
 * ```
 */
export class SuperjsonTransformer implements Transformer {
  toGeneric(value: unknown): GenericValue {
    if (value === undefined) return new NoneValue();
    return new StringValue(superjson.stringify(value));
  }

  fromGeneric(value: GenericValue): unknown {
    if (value instanceof NoneValue) return null;
    if (!(value instanceof StringValue)) {
      throw new TypeNotAllowedError(`SuperjsonTransformer expects a string value, got ${value.kind}`);
    }
    return superjson.parse(value.value);
  }
}
