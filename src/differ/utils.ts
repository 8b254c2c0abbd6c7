import { List, Map as ImmutableMap } from 'immutable';

import { Option } from '../types';
import type { DiffMap, DiffParts, Options } from './types';

/**
 * Merges user options with the library defaults.
 */
export function normalizeOptions(options: Partial<Options> = {}): Options {
  return {
    sequences: options.sequences ?? 'indexed'
  };
}

/**
 * Parts of two equal values: everything is shared.
 */
export function createShared(value: unknown): DiffParts {
  return {
    onlyInA: Option.none(),
    onlyInB: Option.none(),
    shared: Option.some(value)
  };
}

/**
 * Parts of two values compared as atoms that differ: each side keeps its own
 * value and nothing is shared.
 */
export function createDivergent(a: unknown, b: unknown): DiffParts {
  return {
    onlyInA: Option.some(a),
    onlyInB: Option.some(b),
    shared: Option.none()
  };
}

/**
 * Wraps collected map entries as a diff part; no entries means no part.
 */
export function toMapPart(entries: ReadonlyArray<[unknown, unknown]>): Option<DiffMap> {
  return entries.length > 0 ? Option.some(ImmutableMap(entries)) : Option.none();
}

/**
 * Wraps collected list slots as a diff part.
 *
 * Slots that do not belong to the part are holes and read as `null`.
 * Trailing holes are trimmed; a part made only of holes is absent.
 */
export function toListPart(slots: readonly Option<unknown>[]): Option<List<unknown>> {
  let length = slots.length;
  while (length > 0 && !slots[length - 1]?.some) length -= 1;

  if (length === 0) return Option.none();

  return Option.some(
    List(slots.slice(0, length).map(slot => Option.toNullable(slot)))
  );
}
