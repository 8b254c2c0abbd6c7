import { describe, expect, test } from 'vitest';

import type { FieldMismatch } from '../types';
import {
  formatDefinitionFailure,
  formatNestedFailure,
  formatValidationFailure
} from '../report';

function mismatch(field: string, index: number): FieldMismatch {
  return { field, path: [index], expected: 'integer', actual: 'string' };
}

describe('formatValidationFailure', () => {
  test('lists missing fields and mismatches with a summary', () => {
    const message = formatValidationFailure(
      'Person',
      ['name'],
      [{ field: 'age', path: [], expected: 'integer', actual: 'string' }]
    );

    expect(message).toBe(
      [
        '[dynamic-record] Validation failed for Person.',
        'Missing required fields: "name"',
        'Mismatched fields:',
        '  age: expected integer, got string',
        'Summary: missing=1, mismatched=1'
      ].join('\n')
    );
  });

  test('collapses mismatches beyond the preview limit', () => {
    const mismatches = [0, 1, 2, 3].map(index => mismatch('scores', index));
    const message = formatValidationFailure('Person', [], mismatches, {
      maxPreviewItems: 2
    });

    expect(message.split('\n')).toStrictEqual([
      '[dynamic-record] Validation failed for Person.',
      'Mismatched fields:',
      '  scores.0: expected integer, got string',
      '  scores.1: expected integer, got string',
      '  … (2 more)',
      'Summary: missing=0, mismatched=4'
    ]);
  });
});

describe('formatNestedFailure', () => {
  test('joins missing and mismatched field names', () => {
    expect(formatNestedFailure('Address', ['city', 'street'], ['zip'])).toBe(
      'Address (invalid: missing city, street; mismatched zip)'
    );
  });

  test('omits empty groups', () => {
    expect(formatNestedFailure('Address', [], ['zip'])).toBe(
      'Address (invalid: mismatched zip)'
    );
  });
});

test('formatDefinitionFailure lists one problem per line', () => {
  expect(formatDefinitionFailure('Broken', ['first', 'second'])).toBe(
    '[dynamic-record] Invalid schema definition for "Broken".\n  - first\n  - second'
  );
});
