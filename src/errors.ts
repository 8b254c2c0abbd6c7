import type { FieldMismatch } from './types';

import {
  type ReportOptions,
  formatCodecFailure,
  formatDefinitionFailure,
  formatRequiredFieldMissing,
  formatValidationFailure
} from './report';

/**
 * Thrown when a required getter resolves to `null`.
 *
 * Raised immediately by the getter call; `validate()` reports the same
 * condition as part of a {@link ValidationFailedError} instead.
 */
export class RequiredFieldMissingError extends Error {
  override readonly name = 'RequiredFieldMissingError';

  constructor(
    readonly schemaName: string,
    readonly field: string
  ) {
    super(formatRequiredFieldMissing(schemaName, field));
  }
}

/**
 * Aggregate fault raised by `validate()`.
 *
 * Always carries every violation that was found: the full set of missing
 * required fields and every type mismatch, each with its path.
 */
export class ValidationFailedError extends Error {
  override readonly name = 'ValidationFailedError';

  constructor(
    readonly schemaName: string,
    readonly missing: readonly string[],
    readonly mismatches: readonly FieldMismatch[],
    options: ReportOptions = {}
  ) {
    super(formatValidationFailure(schemaName, missing, mismatches, options));
  }

  /**
   * Mismatched field name → actual runtime shape.
   *
   * When a field has several violations (e.g. two bad list elements), the
   * first one is kept.
   */
  get mismatchedFields(): ReadonlyMap<string, string> {
    const byField = new Map<string, string>();
    for (const mismatch of this.mismatches) {
      if (!byField.has(mismatch.field)) {
        byField.set(mismatch.field, mismatch.actual);
      }
    }
    return byField;
  }
}

/**
 * Thrown for malformed text, unknown tags, or values the codec cannot
 * represent.
 */
export class CodecError extends Error {
  override readonly name = 'CodecError';

  constructor(reason: string, options?: ErrorOptions) {
    super(formatCodecFailure(reason), options);
  }
}

/**
 * Thrown by `defineSchema` when a declaration is malformed.
 */
export class SchemaDefinitionError extends Error {
  override readonly name = 'SchemaDefinitionError';

  constructor(
    readonly schemaName: string,
    readonly problems: readonly string[]
  ) {
    super(formatDefinitionFailure(schemaName, problems));
  }
}
