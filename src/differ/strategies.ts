import { List } from 'immutable';

import { Option } from '../types';
import type { DiffParts, Options } from './types';
import { createDivergent, createShared } from './utils';

/**
 * The active strategy for lists nested in the compared maps.
 */
export type SequenceStrategy =
  | {
      /**
       * Lists are traversed position by position (recursion).
       */
      mode: 'indexed';
    }
  | {
      /**
       * Lists are compared as a single unit with value equality.
       */
      mode: 'atomic';
    };

/**
 * Selects the list strategy from the normalized options.
 */
export function getSequenceStrategy(options: Options): SequenceStrategy {
  switch (options.sequences) {
    case 'indexed':
      return { mode: 'indexed' };
    case 'atomic':
      return { mode: 'atomic' };
    default:
      throw new Error(`Invalid sequence policy: ${String(options.sequences)}`);
  }
}

/**
 * Executes the selected strategy against two lists.
 *
 * 1. **Atomic**: the lists are compared immediately; `shouldRecurse` is
 *    `false` and `parts` holds the result.
 * 2. **Indexed**: `shouldRecurse` is `true`, signaling the caller to compare
 *    the lists position by position.
 */
export function checkSequenceStrategy(
  strategy: SequenceStrategy,
  a: List<unknown>,
  b: List<unknown>
): { shouldRecurse: boolean; parts: DiffParts } {
  switch (strategy.mode) {
    case 'atomic':
      return {
        shouldRecurse: false,
        parts: a.equals(b) ? createShared(a) : createDivergent(a, b)
      };

    case 'indexed':
      return {
        shouldRecurse: true,
        parts: {
          onlyInA: Option.none(),
          onlyInB: Option.none(),
          shared: Option.none()
        }
      };
  }
}
