import { Map as ImmutableMap } from 'immutable';

import type { SchemaRef } from './types';
import { encode } from './codec/writer';
import { toDeclaredType, toRawValue } from './converter';
import { intersect, merge, subtract } from './differ';
import { RequiredFieldMissingError } from './errors';
import {
  type DataMap,
  type InstanceHandle,
  getHandle,
  registerHandle
} from './handles';
import {
  type FieldDescriptor,
  type MethodShape,
  type StructuralOperation,
  classify
} from './introspector';
import { stampType } from './metadata';
import { MESSAGE_PREFIX, type ReportOptions, toReportOptions } from './report';
import { describeValue } from './shapes';
import { validateFields } from './validator';
import { ValueCache } from './value-cache';
import { isString } from './utils/type-guards';

type BoundMethod = (...args: unknown[]) => unknown;

/**
 * Creates an instance of `schema` backed by `data`.
 *
 * An instance is a proxy over an empty, prototype-less target. Every string
 * property is looked up in the schema's method table; the resulting function
 * dispatches on the method shape. Unknown names and symbols read as
 * `undefined`, so instances are never mistaken for thenables or iterables.
 *
 * Invariants:
 * - Instances cannot be mutated: writes, definitions and deletions fail.
 * - Method functions are bound once per instance and name, so reading the
 *   same method twice yields the same function.
 *
 * @returns The instance. Callers that need the typed accessor contract narrow
 *          it with `Schema.isInstance`.
 */
export function createInstance(
  schema: SchemaRef,
  data: DataMap,
  metadata: DataMap = ImmutableMap()
): object {
  const handle: InstanceHandle = {
    schema,
    descriptor: classify(schema),
    data,
    metadata,
    cache: new ValueCache()
  };

  const bound = new Map<string, BoundMethod>();
  const target: object = Object.create(null);

  const instance: object = new Proxy(target, {
    get(_target, property) {
      if (!isString(property)) return undefined;

      const existing = bound.get(property);
      if (existing) return existing;

      const shape = handle.descriptor.methods.get(property);
      if (!shape) return undefined;

      const method: BoundMethod = (...args) =>
        dispatch(instance, handle, shape, args);
      bound.set(property, method);
      return method;
    },
    has(_target, property) {
      return isString(property) && handle.descriptor.methods.has(property);
    },
    set() {
      return false;
    },
    defineProperty() {
      return false;
    },
    deleteProperty() {
      return false;
    },
    setPrototypeOf() {
      return false;
    }
  });

  registerHandle(instance, handle);
  return instance;
}

/**
 * Executes one method call.
 *
 * Dispatch Order:
 * The shape already encodes the priority (see `classify`): default-bodied
 * accessors, then builders, then structural operations, then getters.
 */
function dispatch(
  self: object,
  handle: InstanceHandle,
  shape: MethodShape,
  args: readonly unknown[]
): unknown {
  switch (shape.kind) {
    case 'default':
      return Reflect.apply(shape.method, undefined, [self, ...args]);

    case 'builder':
      return createInstance(
        handle.schema,
        handle.data.set(shape.field.key, toRawValue(args[0])),
        handle.metadata
      );

    case 'metadataBuilder':
      return createInstance(
        handle.schema,
        handle.data,
        handle.metadata.set(shape.metadata.key, toRawValue(args[0]))
      );

    case 'structural':
      return invokeStructural(self, handle, shape.operation, args);

    case 'getter':
      return readField(handle, shape.field);

    case 'metadataGetter':
      return toDeclaredType(
        handle.metadata.get(shape.metadata.key),
        shape.metadata.type,
        handle.schema
      );
  }
}

/**
 * Resolves a field through the instance cache, without the required check.
 */
function resolveField(handle: InstanceHandle, field: FieldDescriptor): unknown {
  return handle.cache.resolve(field, () =>
    toDeclaredType(handle.data.get(field.key), field.type, handle.schema)
  );
}

function readField(handle: InstanceHandle, field: FieldDescriptor): unknown {
  const value = resolveField(handle, field);

  if (value === null && field.required) {
    throw new RequiredFieldMissingError(handle.schema.name, field.name);
  }

  return value;
}

function invokeStructural(
  self: object,
  handle: InstanceHandle,
  operation: StructuralOperation,
  args: readonly unknown[]
): unknown {
  switch (operation) {
    case 'getMap':
      return handle.data;
    case 'getMetadata':
      return handle.metadata;
    case 'getType':
      return handle.schema;
    case 'toString':
      return handle.data.toString();
    case 'hashCode':
      return handle.data.hashCode();
    case 'equals': {
      const other = getHandle(args[0]);
      return (
        other !== undefined &&
        other.schema === handle.schema &&
        handle.data.equals(other.data)
      );
    }
    case 'prettyPrint':
      process.stdout.write(`${encode(self, { pretty: true })}\n`);
      return undefined;
    case 'toFormattedString':
      return encode(self, { pretty: true });
    case 'merge':
      return createInstance(
        handle.schema,
        merge(handle.data, requireOperand(args[0], operation).data),
        stampType(handle.schema, handle.metadata)
      );
    case 'intersect':
      return createInstance(
        handle.schema,
        intersect(handle.data, requireOperand(args[0], operation).data),
        stampType(handle.schema)
      );
    case 'subtract':
      return createInstance(
        handle.schema,
        subtract(handle.data, requireOperand(args[0], operation).data),
        stampType(handle.schema)
      );
    case 'validate':
      validateHandle(handle, toReportOptions(args[0]));
      return self;
  }
}

function requireOperand(value: unknown, operation: string): InstanceHandle {
  const handle = getHandle(value);
  if (!handle) {
    throw new TypeError(
      `${MESSAGE_PREFIX} ${operation}() expects an instance, got ${describeValue(value)}.`
    );
  }
  return handle;
}

/**
 * Validates `value` when it is an instance; other values are ignored.
 *
 * @throws {ValidationFailedError} See `validate()`.
 */
export function validateInstance(value: unknown): void {
  const handle = getHandle(value);
  if (handle) validateHandle(handle);
}

/**
 * Validates an instance and, recursively, every nested instance reachable
 * through its declared fields.
 */
function validateHandle(
  handle: InstanceHandle,
  options: ReportOptions = {}
): void {
  validateFields(
    handle.schema,
    handle.descriptor.fields,
    {
      resolve: field => resolveField(handle, field),
      validateNested: validateInstance
    },
    options
  );
}
