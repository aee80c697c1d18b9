import type { GenericValue } from '../value/GenericValue';

/**
 * Encoder/decoder between generic value trees and a wire format
 * 通用值树与传输格式之间的编解码器
 */
export interface ValueCodec<T> {
  /** Format name 格式名称 */
  readonly name: string;
  encode(value: GenericValue): T;
  decode(data: T): GenericValue;
}
