import { encode, decode } from '@msgpack/msgpack';
import type { ValueCodec } from './ValueCodec';
import type { GenericValue } from '../value/GenericValue';
import { fromPlain, toPlain } from './PlainConverter';

/**
 * Binary codec for generic value trees
 * 通用值树的二进制编解码器
 *
 * @example
 * ```typescript
 * const codec = new MessagePackCodec();
 * const bytes = codec.encode(serialize(point));
 * const value = codec.decode(bytes);
 * ```
 */
export class MessagePackCodec implements ValueCodec<Uint8Array> {
  readonly name = 'msgpack';

  encode(value: GenericValue): Uint8Array {
    return encode(toPlain(value));
  }

  decode(data: Uint8Array): GenericValue {
    return fromPlain(decode(data));
  }
}
