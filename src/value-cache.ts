import type { FieldDescriptor } from './introspector';

/**
 * State of one field in a {@link ValueCache}.
 *
 * `null` is a legitimate resolved value, so it has its own state rather than
 * sharing the "not yet resolved" representation.
 */
export type CacheEntry =
  | { readonly state: 'unresolved' }
  | { readonly state: 'null' }
  | { readonly state: 'value'; readonly value: unknown };

const UNRESOLVED: CacheEntry = { state: 'unresolved' };
const RESOLVED_NULL: CacheEntry = { state: 'null' };

/**
 * Per-instance memo of converted field values.
 *
 * Conversion is pure, so a resolved entry is never invalidated. Installation
 * is first-write-wins: when a computation re-enters and resolves the same
 * field, the entry installed first is kept and returned to every caller.
 */
export class ValueCache {
  private readonly entries = new Map<FieldDescriptor, CacheEntry>();

  /**
   * Reads the current state of a field without resolving it.
   */
  peek(field: FieldDescriptor): CacheEntry {
    return this.entries.get(field) ?? UNRESOLVED;
  }

  /**
   * Returns the cached value of `field`, computing and installing it on the
   * first call.
   *
   * Logic:
   * 1. A resolved entry is returned immediately.
   * 2. Otherwise `compute` runs; `undefined` is treated as `null`.
   * 3. If another resolution installed an entry meanwhile, that entry wins.
   */
  resolve(field: FieldDescriptor, compute: () => unknown): unknown {
    const cached = this.peek(field);
    if (cached.state !== 'unresolved') return readEntry(cached);

    const computed = compute();

    const installed = this.peek(field);
    if (installed.state !== 'unresolved') return readEntry(installed);

    const entry: CacheEntry =
      computed == null ? RESOLVED_NULL : { state: 'value', value: computed };
    this.entries.set(field, entry);

    return readEntry(entry);
  }
}

function readEntry(entry: CacheEntry): unknown {
  switch (entry.state) {
    case 'value':
      return entry.value;
    case 'null':
    case 'unresolved':
      return null;
  }
}
