export type { ValueCodec } from './ValueCodec';
export type { PlainValue } from './PlainConverter';
export { toPlain, fromPlain } from './PlainConverter';
export { JsonCodec } from './JsonCodec';
export { MessagePackCodec } from './MessagePackCodec';
