import type { ValueCodec } from './ValueCodec';
import type { GenericValue } from '../value/GenericValue';
import { fromPlain, toPlain } from './PlainConverter';
import { TypeNotAllowedError } from '../errors/Errors';

/**
 * Text codec for generic value trees
 * 通用值树的文本编解码器
 */
export class JsonCodec implements ValueCodec<string> {
  readonly name = 'json';

  constructor(private readonly _pretty = false) {}

  /**
   * @throws TypeNotAllowedError for `NaN` and infinite numbers, which JSON cannot hold
   */
  encode(value: GenericValue): string {
    return JSON.stringify(toPlain(value), rejectNonFinite, this._pretty ? 2 : undefined);
  }

  decode(data: string): GenericValue {
    const parsed: unknown = JSON.parse(data);
    return fromPlain(parsed);
  }
}

function rejectNonFinite(_key: string, item: unknown): unknown {
  if (typeof item === 'number' && !Number.isFinite(item)) {
    throw new TypeNotAllowedError(`${item} cannot be represented in JSON`);
  }
  return item;
}
