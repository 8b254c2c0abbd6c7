import type { CodecOptions, NormalizedCodecOptions } from './types';
import { tagRegistry } from './registry';

/**
 * Merges user options with the library defaults.
 */
export function normalizeCodecOptions(
  options: CodecOptions = {}
): NormalizedCodecOptions {
  return {
    pretty: options.pretty ?? false,
    indent: options.indent ?? 2,
    registry: options.registry ?? tagRegistry
  };
}
