export type Guard<T> = (value: unknown) => value is T;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  bigint: bigint;
  string: string;
  symbol: symbol;
  function: (...args: never[]) => unknown;
};

/**
 * Creates a guard for a built-in `typeof` check.
 *
 * @template T  One of the keys of {@link PrimitiveTypeMap}.
 * @param type  The type keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof PrimitiveTypeMap>(
  type: T
): Guard<PrimitiveTypeMap[T]> {
  return (value: unknown): value is PrimitiveTypeMap[T] =>
    typeof value === type;
}

/** Guard verifying the value is a string. */
export const isString = is('string');

/** Guard verifying the value is a number (including NaN/Infinity). */
export const isNumber = is('number');

/** Guard verifying the value is a boolean. */
export const isBoolean = is('boolean');

/** Guard verifying the value is a bigint. */
export const isBigInt = is('bigint');

/** Guard verifying the value is a function. */
export const isFunction = is('function');

/**
 * Guard verifying the value is `null` or `undefined`.
 *
 * The backing map never distinguishes between an absent key and a key bound
 * to `null`; both read as "no value".
 */
export function isNullish(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Guard verifying the value is a finite number.
 *
 * Semantics:
 * - true  for:  0, 1, -1, 1.5, -0
 * - false for:  NaN, Infinity, -Infinity, non-numbers
 */
export function isFiniteValue(value: unknown): value is number {
  return isNumber(value) && Number.isFinite(value);
}

/**
 * Guard verifying the value is a number without a fractional part.
 *
 * Note:
 * `1.0` is an integer here: JavaScript has a single number type, so the
 * literal `1.0` and `1` are the same value.
 */
export function isIntegerValue(value: unknown): value is number {
  return isNumber(value) && Number.isInteger(value);
}

/**
 * Guard verifying the value is a bigint that converts to a number without
 * losing precision.
 */
export function isSafeBigInt(value: unknown): value is bigint {
  return (
    isBigInt(value) &&
    value <= BigInt(Number.MAX_SAFE_INTEGER) &&
    value >= BigInt(Number.MIN_SAFE_INTEGER)
  );
}

/**
 * Internal tag strings returned by `Object.prototype.toString`.
 *
 * The tag is read from the internal slot of the object, so it survives
 * minification (renamed constructors) and cross-realm values.
 */
const Tag = {
  Date: '[object Date]'
} as const;

/**
 * Reads the internal type tag of a value (e.g. `"[object Date]"`).
 */
export function getTypeTag(value: unknown): string {
  return Object.prototype.toString.call(value);
}

/**
 * Guard verifying the value is a `Date` holding a real timestamp.
 *
 * `new Date('garbage')` is a `Date` whose time value is `NaN`; it is rejected.
 */
export function isValidDate(value: unknown): value is Date {
  return (
    value instanceof Date &&
    getTypeTag(value) === Tag.Date &&
    !Number.isNaN(value.getTime())
  );
}

/**
 * Strict ISO-8601 date or date-time. `Date.parse` alone also accepts
 * implementation-specific formats such as `"March 7"`.
 */
const ISO_8601 =
  /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})?)?$/;

/**
 * Guard verifying the value is a string in strict ISO-8601 date or
 * date-time form. The calendar values themselves are not checked; pair it
 * with {@link isValidDate} on the parsed result.
 */
export function isIsoDateString(value: unknown): value is string {
  return isString(value) && ISO_8601.test(value);
}

/**
 * Narrowing helper for "object-like" values.
 *
 * Many type guards start from `unknown`. This helper provides a safe first step:
 * it checks that the value is a non-null object so properties can be read without
 * runtime errors and without type assertions.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Determines whether a value is a "plain object" (a simple POJO / dictionary
 * object).
 *
 * A value is considered plain if its prototype is either `Object.prototype`
 * (object literals, `JSON.parse` output) or `null` (`Object.create(null)`).
 * Arrays, Dates, class instances and Immutable collections are not plain.
 *
 * @typeParam T
 *   The (assumed) type of the object's property values after a successful check.
 *   Compile-time hint only; not validated at runtime.
 */
export function isPlainObject<T = unknown>(
  value: unknown
): value is Record<string, T> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}
