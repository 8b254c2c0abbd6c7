import {
  List,
  Map as ImmutableMap,
  Set as ImmutableSet,
  isCollection,
  isIndexed,
  isKeyed
} from 'immutable';

import { Option, type FieldType, type SchemaRef } from './types';
import { getHandle } from './handles';
import { isOption } from './guards';
import { stampType } from './metadata';
import { createInstance } from './runtime';
import { resolveSchemaTarget } from './shapes';
import {
  isFiniteValue,
  isIsoDateString,
  isNullish,
  isSafeBigInt,
  isValidDate
} from './utils/type-guards';

/**
 * Converts a value read from the backing map into its declared type.
 *
 * Conversion Rules:
 * 1. `optional`: absent → `Option.none()`; otherwise the converted inner
 *    value wrapped in `Option.some`.
 * 2. Absent (`null` / `undefined`) → `null` for every other type, so absence
 *    stays distinct from an empty collection.
 * 3. `schema` / `self`: instances pass through; an Immutable map becomes an
 *    instance of the target schema.
 * 4. `list` / `set` / `map`: converted element-wise; sets deduplicate.
 * 5. Scalars: the narrowest lossless coercion (safe `bigint` → number,
 *    ISO-8601 string or epoch milliseconds → `Date`).
 *
 * Values that do not fit the declared type are returned unchanged. Getters
 * stay total; `validate()` reports the mismatch.
 *
 * @param raw - The value stored in the backing map.
 * @param type - The declared field type.
 * @param owner - The schema declaring the field (target of `self`).
 */
export function toDeclaredType(
  raw: unknown,
  type: FieldType<unknown>,
  owner: SchemaRef
): unknown {
  const shape = type.shape;

  if (shape.kind === 'optional') {
    return isNullish(raw)
      ? Option.none()
      : Option.some(toDeclaredType(raw, shape.of, owner));
  }

  if (isNullish(raw)) return null;

  switch (shape.kind) {
    case 'schema':
    case 'self': {
      if (getHandle(raw)) return raw;
      if (!ImmutableMap.isMap(raw)) return raw;

      const target = resolveSchemaTarget(shape, owner);
      return createInstance(target, raw, stampType(target));
    }

    case 'list':
      if (isIndexed(raw) || Array.isArray(raw)) {
        return List(raw).map(element => toDeclaredType(element, shape.of, owner));
      }
      return raw;

    case 'set':
      if ((isCollection(raw) && !isKeyed(raw)) || Array.isArray(raw)) {
        return ImmutableSet(raw).map(element =>
          toDeclaredType(element, shape.of, owner)
        );
      }
      return raw;

    case 'map':
      if (isKeyed(raw)) {
        return ImmutableMap(raw).mapEntries(([key, value]) => [
          toDeclaredType(key, shape.key, owner),
          toDeclaredType(value, shape.value, owner)
        ]);
      }
      return raw;

    case 'integer':
    case 'number':
      return isSafeBigInt(raw) ? Number(raw) : raw;

    case 'instant':
      return toInstant(raw);

    default:
      return raw;
  }
}

function toInstant(raw: unknown): unknown {
  if (raw instanceof Date) return raw;

  if (isIsoDateString(raw)) {
    const date = new Date(raw);
    return isValidDate(date) ? date : raw;
  }

  if (isFiniteValue(raw)) {
    const date = new Date(raw);
    return isValidDate(date) ? date : raw;
  }

  return raw;
}

/**
 * Converts a getter-side value back into the form stored in the backing map.
 *
 * Conversion Rules:
 * 1. `undefined` → `null`.
 * 2. Instances → their backing map.
 * 3. Options → the contained raw value, or `null`.
 * 4. Arrays → `List`; Immutable collections are converted element-wise.
 * 5. Everything else is stored as-is.
 */
export function toRawValue(value: unknown): unknown {
  if (isNullish(value)) return null;

  const handle = getHandle(value);
  if (handle) return handle.data;

  if (isOption(value)) return value.some ? toRawValue(value.value) : null;

  if (Array.isArray(value)) return List(value).map(toRawValue);

  if (List.isList(value)) return value.map(toRawValue);
  if (ImmutableSet.isSet(value)) return value.map(toRawValue);
  if (ImmutableMap.isMap(value)) {
    return value.mapEntries(([key, entry]) => [
      toRawValue(key),
      toRawValue(entry)
    ]);
  }

  return value;
}
