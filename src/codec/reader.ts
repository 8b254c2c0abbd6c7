import { List, Map as ImmutableMap, Set as ImmutableSet } from 'immutable';

import type { FieldType, SchemaRef } from '../types';
import { CodecError } from '../errors';
import { getHandle } from '../handles';
import { classify } from '../introspector';
import { stampType } from '../metadata';
import { createInstance } from '../runtime';
import { resolveSchemaTarget } from '../shapes';
import { isIsoDateString, isValidDate } from '../utils/type-guards';
import type { CodecOptions, JsonValue, NormalizedCodecOptions } from './types';
import { normalizeCodecOptions } from './options';

/**
 * The declared type of a value being decoded, when it sits inside a tagged
 * schema literal.
 */
type TypeHint = {
  readonly type: FieldType<unknown>;
  readonly owner: SchemaRef;
};

/**
 * Resolves the declared type of a container entry from its key (a map key,
 * or an index for lists and sets).
 */
type SlotHints = (key: unknown) => TypeHint | undefined;

const UNTYPED: SlotHints = () => undefined;

/**
 * Decodes one JSON document.
 *
 * Decoding Rules:
 * 1. Objects become Immutable `Map`s and arrays become `List`s.
 * 2. A single-key object whose key starts with `#` is a tagged literal:
 *    reserved tags (`#inst`, `#set`, `#map`), registered schema tags and
 *    registered translator tags are decoded accordingly.
 * 3. A tagged schema literal decodes to an instance, wherever it appears.
 *    Inside a field declared with a schema type the instance is stored by its
 *    backing map, as a builder would store it; the getter turns it back into
 *    an instance. Anywhere else (`t.any()` fields, untyped containers) the
 *    instance itself is kept, so its tag survives re-encoding.
 *
 * @throws {CodecError} For malformed JSON, unknown tags and malformed
 *         payloads of reserved tags.
 */
export function decode(text: string, options: CodecOptions = {}): unknown {
  const normalized = normalizeCodecOptions(options);
  return fromJson(parseJson(text), UNTYPED, normalized);
}

/**
 * Decodes newline-delimited documents one at a time. Blank lines are
 * skipped.
 */
export function* decodeStream(
  text: string,
  options: CodecOptions = {}
): Generator<unknown, void, undefined> {
  const normalized = normalizeCodecOptions(options);

  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === '') continue;
    yield fromJson(parseJson(line), UNTYPED, normalized);
  }
}

function parseJson(text: string): JsonValue {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new CodecError('Malformed JSON document.', { cause: error });
  }
}

function fromJson(
  json: JsonValue,
  slots: SlotHints,
  options: NormalizedCodecOptions
): unknown {
  if (json === null || typeof json !== 'object') return json;

  if (Array.isArray(json)) {
    return List(
      json.map((element, index) => fromSlot(element, slots(index), options))
    );
  }

  const keys = Object.keys(json);
  const [onlyKey] = keys;
  if (keys.length === 1 && onlyKey !== undefined && onlyKey.startsWith('#')) {
    return fromTagged(onlyKey.slice(1), json[onlyKey], slots, options);
  }

  return ImmutableMap(
    Object.entries(json).map(([key, value]): [unknown, unknown] => [
      key,
      fromSlot(value, slots(key), options)
    ])
  );
}

/**
 * Decodes a value stored inside a container. An instance landing in a slot
 * declared with a schema type is stored by its backing map.
 */
function fromSlot(
  json: JsonValue,
  hint: TypeHint | undefined,
  options: NormalizedCodecOptions
): unknown {
  const value = fromJson(json, slotsOf(hint), options);
  if (!declaresInstance(hint)) return value;
  return getHandle(value)?.data ?? value;
}

function fromTagged(
  tag: string,
  payload: JsonValue | undefined,
  slots: SlotHints,
  options: NormalizedCodecOptions
): unknown {
  switch (tag) {
    case 'inst':
      return decodeInstant(payload);
    case 'set':
      return ImmutableSet(
        expectArray(payload, tag).map((element, index) =>
          fromSlot(element, slots(index), options)
        )
      );
    case 'map':
      return ImmutableMap(
        expectArray(payload, tag).map(entry => decodeEntry(entry, slots, options))
      );
  }

  const schema = options.registry.schemaOf(tag);
  if (schema) {
    const data = fromJson(payload ?? null, fieldSlotsOf(schema), options);
    if (!ImmutableMap.isMap(data)) {
      throw new CodecError(`Tag "#${tag}" expects an object payload.`);
    }
    return createInstance(schema, data, stampType(schema));
  }

  const translator = options.registry.translatorFor(tag);
  if (translator) return translator.decode(payload ?? null);

  throw new CodecError(`Unknown tag "#${tag}".`);
}

function decodeInstant(payload: JsonValue | undefined): Date {
  const date = isIsoDateString(payload) ? new Date(payload) : undefined;
  if (!isValidDate(date)) {
    throw new CodecError('Tag "#inst" expects an ISO-8601 string.');
  }
  return date;
}

function decodeEntry(
  entry: JsonValue,
  slots: SlotHints,
  options: NormalizedCodecOptions
): [unknown, unknown] {
  if (!Array.isArray(entry) || entry.length !== 2) {
    throw new CodecError('Tag "#map" expects [key, value] pairs.');
  }
  const [keyJson, valueJson] = entry;
  const key = fromSlot(keyJson, undefined, options);
  return [key, fromSlot(valueJson, slots(key), options)];
}

function expectArray(payload: JsonValue | undefined, tag: string): JsonValue[] {
  if (!Array.isArray(payload)) {
    throw new CodecError(`Tag "#${tag}" expects an array payload.`);
  }
  return payload;
}

/**
 * Entries of a schema literal take the type of the field owning their key.
 */
function fieldSlotsOf(schema: SchemaRef): SlotHints {
  const { fieldsByKey } = classify(schema);

  return key => {
    const field = typeof key === 'string' ? fieldsByKey.get(key) : undefined;
    return field ? { type: field.type, owner: schema } : undefined;
  };
}

/**
 * Entries of a declared collection take its element (list, set) or value
 * (map) type; entries of an untagged nested record take its field types.
 */
function slotsOf(hint: TypeHint | undefined): SlotHints {
  if (!hint) return UNTYPED;

  const { owner } = hint;
  const shape = hint.type.shape;

  switch (shape.kind) {
    case 'optional':
      return slotsOf({ type: shape.of, owner });
    case 'list':
    case 'set': {
      const element = { type: shape.of, owner };
      return () => element;
    }
    case 'map': {
      const value = { type: shape.value, owner };
      return () => value;
    }
    case 'schema':
    case 'self':
      return fieldSlotsOf(resolveSchemaTarget(shape, owner));
    default:
      return UNTYPED;
  }
}

/**
 * Whether a slot of this declared type holds nested instances by their
 * backing map.
 */
function declaresInstance(hint: TypeHint | undefined): boolean {
  if (!hint) return false;

  const shape = hint.type.shape;
  if (shape.kind === 'optional') {
    return declaresInstance({ type: shape.of, owner: hint.owner });
  }
  return shape.kind === 'schema' || shape.kind === 'self';
}
