import type { FieldMismatch } from './types';
import { isFiniteValue, isRecord } from './utils/type-guards';

/**
 * Prefix of every message produced by this library.
 */
export const MESSAGE_PREFIX = '[dynamic-record]';

export type ReportOptions = {
  /**
   * Maximum number of mismatch lines listed in a validation failure.
   * Remaining mismatches collapse into a single `… (n more)` line.
   * @default 5
   */
  maxPreviewItems?: number;
};

export type NormalizedReportOptions = Required<ReportOptions>;

export function normalizeReportOptions(
  options: ReportOptions = {}
): NormalizedReportOptions {
  return {
    maxPreviewItems: options.maxPreviewItems ?? 5
  };
}

/**
 * Reads report options passed through an untyped call site. Unknown entries
 * are ignored.
 */
export function toReportOptions(value: unknown): ReportOptions {
  if (!isRecord(value) || !isFiniteValue(value.maxPreviewItems)) return {};
  return { maxPreviewItems: value.maxPreviewItems };
}

/**
 * Formats the location of a mismatch as a dotted path that starts at the
 * field name.
 *
 * @example
 * formatMismatchPath({ field: 'tags', path: [2], ... }) // "tags.2"
 */
export function formatMismatchPath(mismatch: FieldMismatch): string {
  return [mismatch.field, ...mismatch.path].join('.');
}

/**
 * Formats a limited preview of mismatch lines.
 *
 * @returns One line per previewed mismatch, plus a truncation line when
 *          `limit` hides some of them.
 */
function formatMismatchPreview(
  mismatches: readonly FieldMismatch[],
  limit: number
): string[] {
  const lines = mismatches
    .slice(0, limit)
    .map(
      mismatch =>
        `  ${formatMismatchPath(mismatch)}: expected ${mismatch.expected}, got ${mismatch.actual}`
    );

  // Truncation indicator
  if (mismatches.length > limit) {
    lines.push(`  … (${mismatches.length - limit} more)`);
  }

  return lines;
}

/**
 * Builds the message of a failed `validate()` call.
 *
 * Layout:
 * 1. Header naming the schema.
 * 2. The missing required fields, quoted, on one line.
 * 3. A preview of the mismatched fields, one per line.
 * 4. A summary line with the totals.
 *
 * @example
 * ```text
 * [dynamic-record] Validation failed for Person.
 * Missing required fields: "name"
 * Mismatched fields:
 *   age: expected integer, got string
 * Summary: missing=1, mismatched=1
 * ```
 */
export function formatValidationFailure(
  schemaName: string,
  missing: readonly string[],
  mismatches: readonly FieldMismatch[],
  options: ReportOptions = {}
): string {
  const { maxPreviewItems } = normalizeReportOptions(options);

  const lines = [`${MESSAGE_PREFIX} Validation failed for ${schemaName}.`];

  if (missing.length > 0) {
    lines.push(
      `Missing required fields: ${missing.map(name => `"${name}"`).join(', ')}`
    );
  }

  if (mismatches.length > 0) {
    lines.push('Mismatched fields:');
    lines.push(...formatMismatchPreview(mismatches, maxPreviewItems));
  }

  lines.push(
    `Summary: missing=${missing.length}, mismatched=${mismatches.length}`
  );

  return lines.join('\n');
}

/**
 * Builds the message of a required getter that resolved to `null`.
 */
export function formatRequiredFieldMissing(
  schemaName: string,
  field: string
): string {
  return `${MESSAGE_PREFIX} Required field "${field}" of ${schemaName} was null.`;
}

/**
 * Describes a nested instance that failed its own validation, for use as the
 * "actual" shape of a mismatch on the parent field.
 *
 * @example
 * formatNestedFailure('Address', ['city'], ['zip']) // "Address (invalid: missing city; mismatched zip)"
 */
export function formatNestedFailure(
  schemaName: string,
  missing: readonly string[],
  mismatched: readonly string[]
): string {
  const parts: string[] = [];
  if (missing.length > 0) parts.push(`missing ${missing.join(', ')}`);
  if (mismatched.length > 0) parts.push(`mismatched ${mismatched.join(', ')}`);

  return `${schemaName} (invalid: ${parts.join('; ')})`;
}

/**
 * Builds the message of an invalid schema declaration.
 */
export function formatDefinitionFailure(
  schemaName: string,
  problems: readonly string[]
): string {
  return [
    `${MESSAGE_PREFIX} Invalid schema definition for "${schemaName}".`,
    ...problems.map(problem => `  - ${problem}`)
  ].join('\n');
}

/**
 * Builds the message of an encoding or decoding fault.
 */
export function formatCodecFailure(reason: string): string {
  return `${MESSAGE_PREFIX} ${reason}`;
}
