import type { Map as ImmutableMap } from 'immutable';

import type { Option } from '../types';

/**
 * A map accepted by the differ. Keys are compared with Immutable's value
 * equality, so any key type works.
 */
export type DiffMap = ImmutableMap<unknown, unknown>;

/**
 * How lists nested inside the compared maps are treated.
 *
 * - `'atomic'`: a list is a single value; two lists either match entirely
 *   or appear whole on both sides.
 * - `'indexed'`: lists are compared position by position, like maps keyed
 *   by index. Positions that do not belong to a side are filled with `null`.
 */
export type SequencePolicy = 'atomic' | 'indexed';

export type Options = {
  /**
   * @default 'indexed'
   */
  sequences: SequencePolicy;
};

export type DiffOptions = Partial<Options>;

/**
 * The three parts produced by comparing two values.
 *
 * `none` means the part is absent, which is distinct from a part holding
 * `null` (a key bound to `null` on one side only still belongs to that side).
 */
export type DiffParts = {
  readonly onlyInA: Option<unknown>;
  readonly onlyInB: Option<unknown>;
  readonly shared: Option<unknown>;
};

/**
 * The result of {@link diff}.
 *
 */
export type DiffResult = {
  /** Entries present in `a` only, or whose value differs from `b`. `null` when empty. */
  readonly onlyInA: DiffMap | null;

  /** Entries present in `b` only, or whose value differs from `a`. `null` when empty. */
  readonly onlyInB: DiffMap | null;

  /** Entries equal in both maps. `null` when empty. */
  readonly shared: DiffMap | null;
};
