export type { Transformer, TransformerClass, TransformContext } from './Transformer';
export { DateTransformer } from './DateTransformer';
export { SuperjsonTransformer } from './SuperjsonTransformer';
