export type { Codec, CodecSettings, ValueSchema } from './codec.js';
export { DEFAULT_CODEC_SETTINGS } from './codec.js';
export { jsonCodec, compactJsonCodec } from './json.js';
export { yamlCodec } from './yaml.js';
export { plainCodec, type PlainValue } from './plain.js';
export { emptyCodec } from './empty.js';
export { framedCodec, FRAMED_EXTENSION } from './framed.js';
