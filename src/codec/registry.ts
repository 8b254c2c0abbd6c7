import type { SchemaRef } from '../types';
import { CodecError } from '../errors';
import type { Translator } from './types';

/**
 * Tags built into the wire format.
 *
 * - `inst`: a point in time, as an ISO-8601 string.
 * - `set`: an Immutable `Set`, as an array.
 * - `map`: an Immutable `Map` whose keys cannot be JSON object keys, as an
 *   array of `[key, value]` pairs.
 */
export const RESERVED_TAGS = ['inst', 'set', 'map'] as const;

export type ReservedTag = (typeof RESERVED_TAGS)[number];

const TAG_PATTERN = /^[A-Za-z][\w.\-/]*$/;

export function isReservedTag(tag: string): tag is ReservedTag {
  return RESERVED_TAGS.some(reserved => reserved === tag);
}

/**
 * Bidirectional mapping between tags and schemas (and translators).
 *
 * Lifecycle:
 * Starts empty and changes only through explicit register and deregister
 * calls. Registering while an encode or decode is running on the same
 * registry has undefined results; callers serialize such changes.
 */
export class TagRegistry {
  private readonly tagsBySchema = new Map<SchemaRef, string>();
  private readonly schemasByTag = new Map<string, SchemaRef>();
  private readonly translators = new Map<string, Translator>();

  /**
   * Binds `tag` to `schema`, replacing any previous binding of either.
   *
   * @throws {CodecError} When the tag is malformed, reserved, or used by a
   *         translator.
   */
  register(schema: SchemaRef, tag: string): void {
    this.assertAvailable(tag, this.translators.has(tag));

    this.deregister(schema);
    const previous = this.schemasByTag.get(tag);
    if (previous) this.tagsBySchema.delete(previous);

    this.tagsBySchema.set(schema, tag);
    this.schemasByTag.set(tag, schema);
  }

  /**
   * Removes the binding of `schema`.
   *
   * @returns `true` when a binding was removed.
   */
  deregister(schema: SchemaRef): boolean {
    const tag = this.tagsBySchema.get(schema);
    if (tag === undefined) return false;

    this.tagsBySchema.delete(schema);
    this.schemasByTag.delete(tag);
    return true;
  }

  tagOf(schema: SchemaRef): string | undefined {
    return this.tagsBySchema.get(schema);
  }

  schemaOf(tag: string): SchemaRef | undefined {
    return this.schemasByTag.get(tag);
  }

  /**
   * Registers a translator, replacing any translator with the same tag.
   *
   * @throws {CodecError} When the tag is malformed, reserved, or bound to a
   *         schema.
   */
  registerTranslator(translator: Translator): void {
    this.assertAvailable(translator.tag, this.schemasByTag.has(translator.tag));
    this.translators.set(translator.tag, translator);
  }

  deregisterTranslator(tag: string): boolean {
    return this.translators.delete(tag);
  }

  translatorFor(tag: string): Translator | undefined {
    return this.translators.get(tag);
  }

  /**
   * Finds the first registered translator accepting `value`.
   */
  findTranslator(value: unknown): Translator | undefined {
    for (const translator of this.translators.values()) {
      if (translator.test(value)) return translator;
    }
    return undefined;
  }

  private assertAvailable(tag: string, takenByOtherKind: boolean): void {
    if (!TAG_PATTERN.test(tag)) {
      throw new CodecError(
        `Invalid tag "${tag}": expected a letter followed by letters, digits, "_", ".", "-" or "/".`
      );
    }
    if (isReservedTag(tag)) {
      throw new CodecError(`Tag "${tag}" is reserved.`);
    }
    if (takenByOtherKind) {
      throw new CodecError(`Tag "${tag}" is already in use.`);
    }
  }
}

/**
 * The process-wide registry used when no registry is passed explicitly.
 */
export const tagRegistry = new TagRegistry();

export function registerTag(schema: SchemaRef, tag: string): void {
  tagRegistry.register(schema, tag);
}

export function deregisterTag(schema: SchemaRef): boolean {
  return tagRegistry.deregister(schema);
}

export function registerTranslator<T>(translator: Translator<T>): void {
  tagRegistry.registerTranslator(translator);
}

export function deregisterTranslator(tag: string): boolean {
  return tagRegistry.deregisterTranslator(tag);
}
