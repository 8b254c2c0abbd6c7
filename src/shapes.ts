import { List, Map as ImmutableMap, Set as ImmutableSet } from 'immutable';

import type { FieldType, SchemaRef, TypeShape } from './types';
import { getHandle } from './handles';
import { isOption } from './guards';
import {
  getTypeTag,
  isFunction,
  isIntegerValue,
  isNullish,
  isRecord
} from './utils/type-guards';

/**
 * Resolves the schema a nested-instance shape points at.
 *
 * `self` resolves to `owner`, the schema declaring the field.
 */
export function resolveSchemaTarget(
  shape: Extract<TypeShape, { kind: 'schema' | 'self' }>,
  owner: SchemaRef
): SchemaRef {
  return shape.kind === 'self' ? owner : shape.resolve();
}

/**
 * Renders a declared type the way it appears in diagnostics.
 *
 * @example
 * describeType(t.map(t.string(), t.list(t.integer())), owner) // "map<string, list<integer>>"
 */
export function describeType(type: FieldType<unknown>, owner: SchemaRef): string {
  const shape = type.shape;

  switch (shape.kind) {
    case 'optional':
    case 'list':
    case 'set':
      return `${shape.kind}<${describeType(shape.of, owner)}>`;
    case 'map':
      return `map<${describeType(shape.key, owner)}, ${describeType(shape.value, owner)}>`;
    case 'schema':
    case 'self':
      return resolveSchemaTarget(shape, owner).name;
    case 'class':
      return shape.name;
    default:
      return shape.kind;
  }
}

/**
 * Names the runtime shape of a value, using the vocabulary of
 * {@link describeType} where the two overlap.
 *
 * Logic:
 * 1. Absent values and primitives map to their type keyword; numbers are
 *    `integer` when they have no fractional part.
 * 2. Instances map to their schema name; Options, Immutable collections and
 *    Dates to `optional`, `list` / `set` / `map` and `instant`.
 * 3. Any other object maps to its constructor name, or to its internal type
 *    tag when it has none.
 */
export function describeValue(value: unknown): string {
  if (isNullish(value)) return 'null';

  switch (typeof value) {
    case 'number':
      return isIntegerValue(value) ? 'integer' : 'number';
    case 'string':
    case 'boolean':
    case 'bigint':
    case 'symbol':
    case 'function':
      return typeof value;
  }

  const handle = getHandle(value);
  if (handle) return handle.schema.name;

  if (isOption(value)) return 'optional';
  if (List.isList(value)) return 'list';
  if (ImmutableSet.isSet(value)) return 'set';
  if (ImmutableMap.isMap(value)) return 'map';
  if (value instanceof Date) return 'instant';
  if (Array.isArray(value)) return 'array';

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype) return 'object';
  if (isRecord(proto) && isFunction(proto.constructor) && proto.constructor.name) {
    return proto.constructor.name;
  }

  return getTypeTag(value).slice('[object '.length, -1);
}
