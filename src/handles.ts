import type { Map as ImmutableMap } from 'immutable';

import type { SchemaRef } from './types';
import type { SchemaDescriptor } from './introspector';
import type { ValueCache } from './value-cache';
import { isRecord } from './utils/type-guards';

/**
 * Backing map of an instance. Decoded documents may carry non-string keys,
 * so keys are not narrowed.
 */
export type DataMap = ImmutableMap<unknown, unknown>;

/**
 * The state behind an instance handle.
 *
 * Every member is immutable or owned by exactly one instance (the cache).
 */
export type InstanceHandle = {
  readonly schema: SchemaRef;
  readonly descriptor: SchemaDescriptor;
  readonly data: DataMap;
  readonly metadata: DataMap;
  readonly cache: ValueCache;
};

const handles = new WeakMap<object, InstanceHandle>();

export function registerHandle(instance: object, handle: InstanceHandle): void {
  handles.set(instance, handle);
}

/**
 * Looks up the state behind a value.
 *
 * @returns The handle when `value` is an instance created by this library;
 *          otherwise `undefined`.
 */
export function getHandle(value: unknown): InstanceHandle | undefined {
  return isRecord(value) ? handles.get(value) : undefined;
}
