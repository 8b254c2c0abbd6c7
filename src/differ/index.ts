import { List, Map as ImmutableMap, is } from 'immutable';

import { Option } from '../types';
import type { DiffMap, DiffOptions, DiffParts, DiffResult } from './types';
import {
  createDivergent,
  createShared,
  normalizeOptions,
  toListPart,
  toMapPart
} from './utils';
import {
  type SequenceStrategy,
  checkSequenceStrategy,
  getSequenceStrategy
} from './strategies';

export type {
  DiffMap,
  DiffOptions,
  DiffResult,
  SequencePolicy
} from './types';

/**
 * Compares two arbitrary values and splits them into three parts.
 *
 * Logic:
 * 1. Equal values (Immutable `is`) are entirely shared.
 * 2. Two maps are compared key by key (see {@link compareEntries}).
 * 3. Two lists follow the active {@link SequenceStrategy}.
 * 4. Anything else is atomic: both sides keep their own value.
 */
function compare(
  a: unknown,
  b: unknown,
  strategy: SequenceStrategy
): DiffParts {
  // 1. Value Equality
  if (is(a, b)) return createShared(a);

  // 2. Nested Maps
  if (ImmutableMap.isMap(a) && ImmutableMap.isMap(b)) {
    return compareEntries(a, b, strategy);
  }

  // 3. Nested Lists
  if (List.isList(a) && List.isList(b)) {
    const { shouldRecurse, parts } = checkSequenceStrategy(strategy, a, b);
    if (!shouldRecurse) return parts;
    return compareSlots(a, b, strategy);
  }

  // 4. Atomic Leaves
  return createDivergent(a, b);
}

/**
 * Iterates over the keys of two maps to split their entries.
 *
 * Key presence (not value) decides membership: a key bound to `null` in `a`
 * only still belongs to `onlyInA`.
 *
 * Execution Flow (Depth-First):
 * Keys present on both sides are compared with {@link compare}, which
 * recurses into nested maps. Each non-empty part of a nested comparison is
 * placed under the same key in the corresponding result part.
 *
 * Trace Example:
 * _Comparing `a: { user: { name: "Ada", age: 36 } }` vs
 *            `b: { user: { name: "Ada", age: 37 } }`_
 *
 * 1. Root: `"user"` holds maps on both sides → recurse.
 * 2. Nested: `"name"` is equal → shared; `"age"` differs → both sides.
 * 3. Bubble Up: the root places each nested part under `"user"`:
 *    - onlyInA `{ user: { age: 36 } }`
 *    - onlyInB `{ user: { age: 37 } }`
 *    - shared  `{ user: { name: "Ada" } }`
 */
function compareEntries(
  a: DiffMap,
  b: DiffMap,
  strategy: SequenceStrategy
): DiffParts {
  const onlyInA: Array<[unknown, unknown]> = [];
  const onlyInB: Array<[unknown, unknown]> = [];
  const shared: Array<[unknown, unknown]> = [];

  // =========================================================================
  // Phase 1: Keys of `a`
  //
  // 1. If a key is missing in `b`, the entry belongs to `a` only.
  // 2. If a key exists in both, its values are compared.
  // =========================================================================
  for (const [key, valueA] of a) {
    if (!b.has(key)) {
      onlyInA.push([key, valueA]);
      continue;
    }

    const parts = compare(valueA, b.get(key), strategy);

    if (parts.onlyInA.some) onlyInA.push([key, parts.onlyInA.value]);
    if (parts.onlyInB.some) onlyInB.push([key, parts.onlyInB.value]);
    if (parts.shared.some) shared.push([key, parts.shared.value]);
  }

  // =========================================================================
  // Phase 2: Keys of `b`
  //
  // Keys present in both were handled in Phase 1; only additions remain.
  // =========================================================================
  for (const [key, valueB] of b) {
    if (!a.has(key)) onlyInB.push([key, valueB]);
  }

  return {
    onlyInA: toMapPart(onlyInA),
    onlyInB: toMapPart(onlyInB),
    shared: toMapPart(shared)
  };
}

/**
 * Compares two lists position by position.
 *
 * A position present in one list only belongs to that side; positions that do
 * not belong to a part become `null` holes in it.
 */
function compareSlots(
  a: List<unknown>,
  b: List<unknown>,
  strategy: SequenceStrategy
): DiffParts {
  const onlyInA: Option<unknown>[] = [];
  const onlyInB: Option<unknown>[] = [];
  const shared: Option<unknown>[] = [];

  const length = Math.max(a.size, b.size);

  for (let index = 0; index < length; index++) {
    if (index >= b.size) {
      onlyInA.push(Option.some(a.get(index)));
      continue;
    }
    if (index >= a.size) {
      onlyInB.push(Option.some(b.get(index)));
      continue;
    }

    const parts = compare(a.get(index), b.get(index), strategy);
    onlyInA.push(parts.onlyInA);
    onlyInB.push(parts.onlyInB);
    shared.push(parts.shared);
  }

  return {
    onlyInA: toListPart(onlyInA),
    onlyInB: toListPart(onlyInB),
    shared: toListPart(shared)
  };
}

/**
 * Calculates the three-way structural difference between two maps.
 *
 * Logic:
 * 1. Configuration:
 *    Normalizes `options` with the library defaults (lists are indexed).
 * 2. Strategy Resolution:
 *    Builds the {@link SequenceStrategy} for nested lists.
 * 3. Execution:
 *    Compares the roots key by key. Empty parts are reported as `null`.
 *
 * @example
 * ```ts
 * diff(Map({ a: 1, b: 2 }), Map({ b: 2, c: 3 }));
 * // { onlyInA: Map { a: 1 }, onlyInB: Map { c: 3 }, shared: Map { b: 2 } }
 * ```
 */
export function diff(
  a: DiffMap,
  b: DiffMap,
  options: DiffOptions = {}
): DiffResult {
  const strategy = getSequenceStrategy(normalizeOptions(options));
  const parts = compareEntries(a, b, strategy);

  return {
    onlyInA: toResultMap(parts.onlyInA),
    onlyInB: toResultMap(parts.onlyInB),
    shared: toResultMap(parts.shared)
  };
}

/**
 * Unwraps a root-level part. Root parts are always maps built by
 * `compareEntries`.
 */
function toResultMap(part: Option<unknown>): DiffMap | null {
  return part.some && ImmutableMap.isMap(part.value) ? part.value : null;
}

/**
 * Entries of `a` that are absent from, or differ in, `b`. Empty when none.
 */
export function subtract(a: DiffMap, b: DiffMap, options?: DiffOptions): DiffMap {
  return diff(a, b, options).onlyInA ?? ImmutableMap();
}

/**
 * Entries equal in both maps. Empty when none.
 */
export function intersect(a: DiffMap, b: DiffMap, options?: DiffOptions): DiffMap {
  return diff(a, b, options).shared ?? ImmutableMap();
}

/**
 * Right-biased, null-skipping combine: for keys in both maps, `b` wins
 * unless its value is `null`.
 */
export function merge(a: DiffMap, b: DiffMap): DiffMap {
  return a.mergeWith((valueA, valueB) => (valueB == null ? valueA : valueB), b);
}
