import { Map as ImmutableMap } from 'immutable';

import type { SchemaRef } from './types';
import type { DataMap } from './handles';

/**
 * Metadata key holding the name of the schema an instance was produced for.
 */
export const TYPE_TAG_KEY = 'type';

/**
 * Records `schema` as the type of a metadata map.
 */
export function stampType(
  schema: SchemaRef,
  metadata: DataMap = ImmutableMap()
): DataMap {
  return metadata.set(TYPE_TAG_KEY, schema.name);
}
