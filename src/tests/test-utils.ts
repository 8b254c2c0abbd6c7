import { is } from 'immutable';
import { assert } from 'vitest';

import type { ScenarioInput } from './types';

/**
 * Resolves a scenario input that may be a direct value or a builder function.
 */
export function resolveScenarioInput<T>(input: ScenarioInput<T>): T {
  if (typeof input === 'function') {
    return (input as () => T)();
  }
  return input;
}

/**
 * Asserts value equality in the Immutable sense (`is`): collections are
 * compared by content regardless of their internal layout, dates by time.
 */
export function assertSameValue(
  actual: unknown,
  expected: unknown,
  message?: string
): void {
  assert(
    is(actual, expected),
    message ?? `Expected ${String(actual)} to equal ${String(expected)}`
  );
}

/**
 * Unwraps a result that may be a promise, failing when it is one.
 */
export function expectSync<T>(result: T | Promise<T>): T {
  if (result instanceof Promise) {
    throw new Error('Expected a synchronous result');
  }
  return result;
}
