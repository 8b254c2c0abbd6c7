import { List, Map as ImmutableMap, Set as ImmutableSet } from 'immutable';

import type { FieldMismatch, FieldType, PathSegment, SchemaRef } from './types';
import type { FieldDescriptor } from './introspector';
import { RequiredFieldMissingError, ValidationFailedError } from './errors';
import { getHandle } from './handles';
import { isOption } from './guards';
import { type ReportOptions, formatNestedFailure } from './report';
import { describeType, describeValue, resolveSchemaTarget } from './shapes';
import {
  isBoolean,
  isIntegerValue,
  isNumber,
  isString,
  isValidDate
} from './utils/type-guards';

/**
 * Access to the instance under validation, supplied by the runtime.
 */
export type ValidationContext = {
  /**
   * Resolves a field through the instance cache. Never throws for required
   * fields; returns `null` instead.
   */
  resolve(field: FieldDescriptor): unknown;

  /**
   * Validates a nested instance, throwing whatever its own `validate()`
   * would throw.
   */
  validateNested(instance: unknown): void;
};

/**
 * Accumulates violations while a single field value is walked.
 */
type Collector = {
  readonly owner: SchemaRef;
  readonly field: string;
  readonly context: ValidationContext;
  readonly mismatches: FieldMismatch[];
};

/**
 * Checks every field of an instance against its declared type.
 *
 * Logic:
 * 1. Each field is resolved through the shared cache.
 * 2. A `null` required field is recorded as missing; a `null` plain field is
 *    accepted.
 * 3. Any other value is walked against its declared type, recording every
 *    violation with its path.
 * 4. If anything was recorded, a single {@link ValidationFailedError} reports
 *    all of it.
 *
 * @throws {ValidationFailedError} When a required field is missing or a value
 *         does not match its declared type.
 */
export function validateFields(
  owner: SchemaRef,
  fields: readonly FieldDescriptor[],
  context: ValidationContext,
  options: ReportOptions = {}
): void {
  const missing: string[] = [];
  const mismatches: FieldMismatch[] = [];

  for (const field of fields) {
    const value = context.resolve(field);

    if (value === null) {
      if (field.required) missing.push(field.name);
      continue;
    }

    checkValue(value, field.type, [], {
      owner,
      field: field.name,
      context,
      mismatches
    });
  }

  if (missing.length > 0 || mismatches.length > 0) {
    throw new ValidationFailedError(owner.name, missing, mismatches, options);
  }
}

/**
 * Walks one value against a declared type.
 *
 * Optional values are checked only when present. Collections are checked
 * element by element (map keys and values both), so every bad element is
 * reported rather than the first.
 */
function checkValue(
  value: unknown,
  type: FieldType<unknown>,
  path: readonly PathSegment[],
  collector: Collector
): void {
  const shape = type.shape;

  const mismatch = (actual = describeValue(value)): void => {
    collector.mismatches.push({
      field: collector.field,
      path,
      expected: describeType(type, collector.owner),
      actual
    });
  };

  switch (shape.kind) {
    case 'any':
      return;

    case 'string':
      if (!isString(value)) mismatch();
      return;

    case 'integer':
      if (!isIntegerValue(value)) mismatch();
      return;

    case 'number':
      if (!isNumber(value)) mismatch();
      return;

    case 'boolean':
      if (!isBoolean(value)) mismatch();
      return;

    case 'instant':
      if (!isValidDate(value)) mismatch();
      return;

    case 'class':
      if (!shape.test(value)) mismatch();
      return;

    case 'optional':
      if (!isOption(value)) {
        mismatch();
      } else if (value.some) {
        checkValue(value.value, shape.of, path, collector);
      }
      return;

    case 'list':
      if (!List.isList(value)) {
        mismatch();
        return;
      }
      value.forEach((element, index) => {
        checkValue(element, shape.of, [...path, index], collector);
      });
      return;

    case 'set': {
      if (!ImmutableSet.isSet(value)) {
        mismatch();
        return;
      }
      let position = 0;
      for (const element of value) {
        checkValue(element, shape.of, [...path, position], collector);
        position += 1;
      }
      return;
    }

    case 'map':
      if (!ImmutableMap.isMap(value)) {
        mismatch();
        return;
      }
      for (const [key, entry] of value) {
        const segment = toPathSegment(key);
        checkValue(key, shape.key, [...path, segment], collector);
        checkValue(entry, shape.value, [...path, segment], collector);
      }
      return;

    case 'schema':
    case 'self': {
      const target = resolveSchemaTarget(shape, collector.owner);
      if (getHandle(value)?.schema !== target) {
        mismatch();
        return;
      }
      const nestedFailure = validateNested(value, collector.context);
      if (nestedFailure) mismatch(nestedFailure);
      return;
    }
  }
}

/**
 * Runs nested validation and turns its fault into a description.
 *
 * @returns `undefined` when the nested instance is valid.
 */
function validateNested(
  value: unknown,
  context: ValidationContext
): string | undefined {
  try {
    context.validateNested(value);
    return undefined;
  } catch (error) {
    if (error instanceof ValidationFailedError) {
      return formatNestedFailure(
        error.schemaName,
        error.missing,
        Array.from(error.mismatchedFields.keys())
      );
    }
    if (error instanceof RequiredFieldMissingError) {
      return formatNestedFailure(error.schemaName, [error.field], []);
    }
    throw error;
  }
}

function toPathSegment(key: unknown): PathSegment {
  return isString(key) || isNumber(key) ? key : String(key);
}
