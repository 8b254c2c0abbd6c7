export { decode, decodeStream } from './reader';
export { encode } from './writer';
export {
  RESERVED_TAGS,
  TagRegistry,
  deregisterTag,
  deregisterTranslator,
  registerTag,
  registerTranslator,
  tagRegistry
} from './registry';
export type { CodecOptions, JsonValue, Translator } from './types';
