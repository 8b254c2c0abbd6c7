/**
 * Resolved form of an `optional(...)` field.
 *
 * Optional fields never resolve to `null`: an absent or `null` map entry
 * becomes `{ some: false }`, so callers can tell "declared optional and
 * absent" apart from "declared plain and absent" (which resolves to `null`).
 */
export type Option<T> =
  | { readonly some: true; readonly value: T }
  | { readonly some: false };

const EMPTY: Option<never> = { some: false };
const NONE = Object.freeze(EMPTY);

/**
 * Option constructors.
 */
export const Option = {
  /**
   * Create an Option holding a value.
   */
  some<T>(value: T): Option<T> {
    const option: Option<T> = { some: true, value };
    return Object.freeze(option);
  },

  /**
   * The empty Option. A single frozen value is shared by every caller.
   */
  none<T>(): Option<T> {
    return NONE;
  },

  /**
   * Unwrap to the contained value or `null`.
   */
  toNullable<T>(option: Option<T>): T | null {
    return option.some ? option.value : null;
  }
};
