export { GenericValue } from './GenericValue';
export type { ValueKind } from './GenericValue';
export { StringValue, NumberValue, BoolValue, NoneValue } from './ScalarValues';
export { ObjectValue } from './ObjectValue';
export type { RawKey } from './ObjectValue';
export { ArrayValue } from './ArrayValue';
export { isAllowedType, assertAllowedType, toGenericValue, unwrapScalar } from './AllowedType';
