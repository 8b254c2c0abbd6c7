import { SchemaDefinitionError } from './errors';
import { toBuilderName, toMapKey } from './guards';
import { TYPE_TAG_KEY } from './metadata';
import { FieldDecl, FieldType } from './types';
import { isPlainObject, isString } from './utils/type-guards';

/**
 * The raw declaration handed to `defineSchema`, before validation.
 */
export type DefinitionInput = {
  readonly name: unknown;
  readonly fields: unknown;
  readonly metadata?: unknown;
};

/**
 * Validates the runtime integrity of a schema declaration.
 *
 * This enforces the structural contract of a declaration at runtime, for
 * callers that bypass the types (plain JavaScript, dynamically built
 * declarations):
 * 1. The name is a non-empty string.
 * 2. `fields` is a plain object of `field(...)` declarations.
 * 3. `metadata`, when given, is a plain object of `t.*` types.
 * 4. No two fields write the same backing map key.
 * 5. No two fields or metadata entries produce the same getter or builder
 *    name, and no metadata entry claims the type tag key.
 *
 * Every problem is collected before throwing.
 *
 * @throws {SchemaDefinitionError} When any of the checks fails.
 */
export function validateDefinition(definition: DefinitionInput): void {
  const problems: string[] = [];
  const name = isString(definition.name) ? definition.name : '';

  // 5. Accessor name uniqueness
  const ownerByAccessor = new Map<string, string>();
  const claimAccessors = (accessor: string, owner: string): void => {
    for (const method of [accessor, toBuilderName(accessor)]) {
      const previous = ownerByAccessor.get(method);
      if (previous === undefined) {
        ownerByAccessor.set(method, owner);
      } else {
        problems.push(
          `Accessor "${method}" is defined by both ${previous} and ${owner}.`
        );
      }
    }
  };

  // 1. Name
  if (name.trim() === '') {
    problems.push('The schema name must be a non-empty string.');
  }

  // 2. Fields
  if (!isPlainObject(definition.fields)) {
    problems.push('"fields" must be a plain object of field declarations.');
  } else {
    const ownerByKey = new Map<string, string>();

    for (const [accessor, decl] of Object.entries(definition.fields)) {
      if (!(decl instanceof FieldDecl)) {
        problems.push(
          `Field "${accessor}" must be declared with field(...), got ${typeof decl}.`
        );
        continue;
      }

      claimAccessors(accessor, `field "${accessor}"`);

      // 4. Map key uniqueness
      const key = toMapKey(decl.options.key ?? accessor);
      const owner = ownerByKey.get(key);

      if (key === '') {
        problems.push(`Field "${accessor}" maps to an empty key.`);
      } else if (owner !== undefined) {
        problems.push(
          `Fields "${owner}" and "${accessor}" both map to the key "${key}".`
        );
      } else {
        ownerByKey.set(key, accessor);
      }
    }
  }

  // 3. Metadata
  if (definition.metadata !== undefined) {
    if (!isPlainObject(definition.metadata)) {
      problems.push('"metadata" must be a plain object of field types.');
    } else {
      for (const [key, type] of Object.entries(definition.metadata)) {
        if (!(type instanceof FieldType)) {
          problems.push(
            `Metadata "${key}" must be declared with a t.* type, got ${typeof type}.`
          );
          continue;
        }
        if (toMapKey(key) === TYPE_TAG_KEY) {
          problems.push(
            `Metadata "${key}" is reserved for the schema type tag.`
          );
          continue;
        }
        claimAccessors(key, `metadata "${key}"`);
      }
    }
  }

  if (problems.length > 0) {
    throw new SchemaDefinitionError(name || '<anonymous>', problems);
  }
}
