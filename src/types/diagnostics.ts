/**
 * A segment of a path into a nested value: a map key or a list position.
 */
export type PathSegment = string | number;

/**
 * A single type violation found by `validate()`.
 */
export type FieldMismatch = {
  /**
   * The accessor name of the offending field.
   */
  readonly field: string;

  /**
   * Location of the violation inside the field value. Empty when the field
   * value itself is wrong; otherwise list positions and map keys.
   */
  readonly path: readonly PathSegment[];

  /**
   * The declared shape (e.g. `"list<integer>"`).
   */
  readonly expected: string;

  /**
   * The runtime shape that was found (e.g. `"string"`).
   */
  readonly actual: string;
};
