import type { TagRegistry } from './registry';

/**
 * A value representable in a JSON document.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Encodes and decodes values of a custom class under a tag.
 *
 * Methods use method syntax so that a translator for a specific class is
 * assignable where a translator for `unknown` is expected.
 *
 * @template T - The class of values the translator handles.
 *
 * @example
 * ```ts
 * registerTranslator<Money>({
 *   tag: 'money',
 *   test: (value): value is Money => value instanceof Money,
 *   encode: money => money.cents,
 *   decode: json => new Money(Number(json))
 * });
 * ```
 */
export type Translator<T = unknown> = {
  readonly tag: string;
  test(value: unknown): value is T;
  encode(value: T): JsonValue;
  decode(json: JsonValue): T;
};

export type CodecOptions = {
  /**
   * Emit indented, multi-line JSON.
   * @default false
   */
  pretty?: boolean;

  /**
   * Spaces per indentation level when `pretty` is set.
   * @default 2
   */
  indent?: number;

  /**
   * The tag registry to consult.
   * @default tagRegistry (the process-wide registry)
   */
  registry?: TagRegistry;
};

export type NormalizedCodecOptions = Required<CodecOptions>;
