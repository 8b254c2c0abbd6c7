import type { StandardSchemaV1 } from '@standard-schema/spec';
import { Map as ImmutableMap, fromJS } from 'immutable';

import type { SchemaRef } from './types';
import { ValidationFailedError } from './errors';
import { getHandle } from './handles';
import { stampType } from './metadata';
import { createInstance, validateInstance } from './runtime';
import { describeValue } from './shapes';
import { isPlainObject } from './utils/type-guards';

/**
 * Builds the Standard Schema V1 interface of a schema.
 *
 * About `~standard`:
 * It lets any Standard Schema consumer (form libraries, routers, other
 * validators' adapters) validate input against a schema without a
 * library-specific adapter.
 *
 * Accepted Input:
 * - an instance of the schema (validated as-is),
 * - an Immutable map (wrapped as an instance),
 * - a plain object (converted deeply with `fromJS`, then wrapped).
 *
 * Result Pattern:
 * `validate` never throws for invalid input. It returns `{ value }` holding
 * the validated instance, or `{ issues }` with one issue per missing field
 * and per mismatch, each with its path.
 *
 * @param schema - The schema to validate against.
 * @param isInstance - Narrows a validated value to the schema's instance type.
 */
export function createStandardProps<T>(
  schema: SchemaRef,
  isInstance: (value: unknown) => value is T
): StandardSchemaV1.Props<unknown, T> {
  return {
    version: 1,
    vendor: 'dynamic-record',
    validate: input => validateInput(schema, isInstance, input)
  };
}

function validateInput<T>(
  schema: SchemaRef,
  isInstance: (value: unknown) => value is T,
  input: unknown
): StandardSchemaV1.Result<T> {
  const candidate = toCandidate(schema, input);

  if (!isInstance(candidate)) {
    return {
      issues: [
        {
          message: `Expected ${schema.name}, a map or a plain object, got ${describeValue(input)}.`
        }
      ]
    };
  }

  try {
    validateInstance(candidate);
  } catch (error) {
    if (error instanceof ValidationFailedError) {
      return { issues: toIssues(error) };
    }
    throw error;
  }

  return { value: candidate };
}

/**
 * Brings the accepted input forms to an instance of `schema`.
 */
function toCandidate(schema: SchemaRef, input: unknown): unknown {
  const handle = getHandle(input);
  if (handle) return handle.schema === schema ? input : undefined;

  if (ImmutableMap.isMap(input)) {
    return createInstance(schema, input, stampType(schema));
  }

  if (isPlainObject(input)) {
    const converted: unknown = fromJS(input);
    if (ImmutableMap.isMap(converted)) {
      return createInstance(schema, converted, stampType(schema));
    }
  }

  return undefined;
}

function toIssues(error: ValidationFailedError): StandardSchemaV1.Issue[] {
  return [
    ...error.missing.map(field => ({
      message: 'Required field is missing.',
      path: [field]
    })),
    ...error.mismatches.map(mismatch => ({
      message: `Expected ${mismatch.expected}, got ${mismatch.actual}.`,
      path: [mismatch.field, ...mismatch.path]
    }))
  ];
}
