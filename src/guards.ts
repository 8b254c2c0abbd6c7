import type { Option } from './types';
import { isPlainObject } from './utils/type-guards';

/**
 * Guard verifying the value is an {@link Option}.
 *
 * Options are frozen plain objects with exactly the keys `some` (and `value`
 * when `some` is `true`), so the check is structural.
 */
export function isOption(value: unknown): value is Option<unknown> {
  if (!isPlainObject(value)) return false;

  const keys = Object.keys(value);
  if (value.some === false) return keys.length === 1;
  return value.some === true && keys.length === 2 && 'value' in value;
}

/**
 * Strips a leading `:` sigil from a declared key.
 *
 * @example
 * toMapKey(':first-name') // "first-name"
 * toMapKey('age')         // "age"
 */
export function toMapKey(declared: string): string {
  return declared.startsWith(':') ? declared.slice(1) : declared;
}

/**
 * Derives the builder name of an accessor: `name` → `withName`.
 */
export function toBuilderName(accessor: string): string {
  return `with${accessor.charAt(0).toUpperCase()}${accessor.slice(1)}`;
}
