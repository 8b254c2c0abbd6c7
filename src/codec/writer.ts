import { List, Map as ImmutableMap, Set as ImmutableSet } from 'immutable';

import type { FieldType, SchemaRef } from '../types';
import { CodecError } from '../errors';
import { type DataMap, getHandle } from '../handles';
import { isOption } from '../guards';
import { classify } from '../introspector';
import { describeValue, resolveSchemaTarget } from '../shapes';
import { isFiniteValue, isPlainObject, isValidDate } from '../utils/type-guards';
import type { CodecOptions, JsonValue, NormalizedCodecOptions } from './types';
import { normalizeCodecOptions } from './options';

/**
 * The declared type of the value being encoded, when known.
 *
 * Only nested-instance types change the output: a raw map stored in a
 * schema-typed field is emitted under the tag of that schema.
 */
type TypeHint = {
  readonly type: FieldType<unknown>;
  readonly owner: SchemaRef;
};

/**
 * Encodes a value as JSON text.
 *
 * Encoding Rules:
 * 1. Instances are emitted as their backing map, under the tag of their
 *    schema when one is registered. Fields holding nested instances (or raw
 *    maps declared as schema-typed) emit the tag of the declared schema.
 * 2. Maps with string keys become objects; other maps, and maps whose single
 *    key would read as a tag, become `{"#map": [[key, value], ...]}`.
 * 3. Lists and arrays become arrays; sets become `{"#set": [...]}`; dates
 *    become `{"#inst": "<ISO-8601>"}`.
 * 4. Values accepted by a registered translator become `{"#tag": ...}`.
 *
 * @throws {CodecError} For non-finite numbers, bigints, symbols, functions,
 *         invalid dates and objects no rule covers.
 */
export function encode(value: unknown, options: CodecOptions = {}): string {
  const normalized = normalizeCodecOptions(options);
  const json = toJson(value, undefined, normalized);

  return normalized.pretty
    ? JSON.stringify(json, null, normalized.indent)
    : JSON.stringify(json);
}

function toJson(
  value: unknown,
  hint: TypeHint | undefined,
  options: NormalizedCodecOptions
): JsonValue {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      if (!isFiniteValue(value)) {
        throw new CodecError(`Cannot encode non-finite number ${value}.`);
      }
      return value;
    case 'bigint':
    case 'symbol':
    case 'function':
      throw new CodecError(`Cannot encode value of type ${typeof value}.`);
  }

  const handle = getHandle(value);
  if (handle) return encodeRecord(handle.schema, handle.data, options);

  if (hint) {
    const shape = hint.type.shape;

    if (shape.kind === 'optional') {
      return toJson(value, { type: shape.of, owner: hint.owner }, options);
    }
    if (
      (shape.kind === 'schema' || shape.kind === 'self') &&
      ImmutableMap.isMap(value)
    ) {
      return encodeRecord(
        resolveSchemaTarget(shape, hint.owner),
        value,
        options
      );
    }
  }

  if (isOption(value)) {
    return value.some ? toJson(value.value, hint, options) : null;
  }

  if (value instanceof Date) {
    if (!isValidDate(value)) {
      throw new CodecError('Cannot encode an invalid date.');
    }
    return { '#inst': value.toISOString() };
  }

  if (List.isList(value) || Array.isArray(value)) {
    const elementHint = elementHintOf(hint);
    return Array.from(value, element => toJson(element, elementHint, options));
  }

  if (ImmutableSet.isSet(value)) {
    const elementHint = elementHintOf(hint);
    return {
      '#set': Array.from(value, element => toJson(element, elementHint, options))
    };
  }

  if (ImmutableMap.isMap(value)) {
    return encodeEntries(value, () => valueHintOf(hint), options);
  }

  if (isPlainObject(value)) {
    return encodeEntries(ImmutableMap(value), () => undefined, options);
  }

  const translator = options.registry.findTranslator(value);
  if (translator) {
    return { [`#${translator.tag}`]: translator.encode(value) };
  }

  throw new CodecError(`Cannot encode value of type ${describeValue(value)}.`);
}

/**
 * Encodes the backing map of an instance of `schema`, tagging it when the
 * schema is registered. Field values are encoded with their declared types.
 */
function encodeRecord(
  schema: SchemaRef,
  data: DataMap,
  options: NormalizedCodecOptions
): JsonValue {
  const { fieldsByKey } = classify(schema);

  const body = encodeEntries(
    data,
    key => {
      const field = typeof key === 'string' ? fieldsByKey.get(key) : undefined;
      return field ? { type: field.type, owner: schema } : undefined;
    },
    options
  );

  const tag = options.registry.tagOf(schema);
  return tag === undefined ? body : { [`#${tag}`]: body };
}

/**
 * Encodes map entries as a JSON object, or as `#map` pairs when a key is not
 * a string or the object would be read back as a tagged literal.
 */
function encodeEntries(
  map: DataMap,
  hintFor: (key: unknown) => TypeHint | undefined,
  options: NormalizedCodecOptions
): JsonValue {
  const hasOnlyStringKeys = map.keySeq().every(key => typeof key === 'string');
  const readsAsTag =
    map.size === 1 &&
    map.keySeq().every(key => typeof key === 'string' && key.startsWith('#'));

  if (!hasOnlyStringKeys || readsAsTag) {
    return {
      '#map': Array.from(map, ([key, value]): JsonValue => [
        toJson(key, undefined, options),
        toJson(value, hintFor(key), options)
      ])
    };
  }

  // `fromEntries` defines own properties, so a `__proto__` key stays data.
  return Object.fromEntries(
    Array.from(map, ([key, value]): [string, JsonValue] => [
      String(key),
      toJson(value, hintFor(key), options)
    ])
  );
}

function elementHintOf(hint: TypeHint | undefined): TypeHint | undefined {
  if (!hint) return undefined;
  const shape = hint.type.shape;
  return shape.kind === 'list' || shape.kind === 'set'
    ? { type: shape.of, owner: hint.owner }
    : undefined;
}

function valueHintOf(hint: TypeHint | undefined): TypeHint | undefined {
  if (!hint) return undefined;
  const shape = hint.type.shape;
  return shape.kind === 'map' ? { type: shape.value, owner: hint.owner } : undefined;
}
