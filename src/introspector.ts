import type {
  DefaultMethod,
  FieldType,
  SchemaRef,
  StructuralOperations
} from './types';
import { toBuilderName, toMapKey } from './guards';

/**
 * A field accessor pair (getter + builder) as seen by the runtime.
 */
export type FieldDescriptor = {
  /** Getter name. */
  readonly name: string;
  /** Builder name (`with` + capitalized getter name). */
  readonly builderName: string;
  /** Key in the backing map. */
  readonly key: string;
  readonly type: FieldType<unknown>;
  readonly required: boolean;
};

/**
 * A metadata accessor pair operating on the side-channel.
 */
export type MetadataDescriptor = {
  readonly name: string;
  readonly builderName: string;
  readonly key: string;
  readonly type: FieldType<unknown>;
};

/**
 * Names of the framework-level operations dispatched by name.
 */
export type StructuralOperation = keyof StructuralOperations<unknown>;

export const STRUCTURAL_OPERATIONS = [
  'getMap',
  'getMetadata',
  'getType',
  'toString',
  'hashCode',
  'equals',
  'prettyPrint',
  'toFormattedString',
  'merge',
  'intersect',
  'subtract',
  'validate'
] as const satisfies readonly StructuralOperation[];

/**
 * The closed set of method shapes an instance responds to.
 */
export type MethodShape =
  | { readonly kind: 'default'; readonly method: DefaultMethod }
  | { readonly kind: 'builder'; readonly field: FieldDescriptor }
  | { readonly kind: 'metadataBuilder'; readonly metadata: MetadataDescriptor }
  | { readonly kind: 'structural'; readonly operation: StructuralOperation }
  | { readonly kind: 'getter'; readonly field: FieldDescriptor }
  | { readonly kind: 'metadataGetter'; readonly metadata: MetadataDescriptor };

/**
 * Everything the runtime needs to know about a schema, derived once.
 */
export type SchemaDescriptor = {
  readonly schema: SchemaRef;

  /** Field accessors in declaration order. */
  readonly fields: readonly FieldDescriptor[];

  /** The subset of {@link fields} whose getters are required. */
  readonly required: readonly FieldDescriptor[];

  readonly metadata: readonly MetadataDescriptor[];

  /** Builder name → backing map key it writes. */
  readonly builderKeys: ReadonlyMap<string, string>;

  /** Backing map key → field accessor reading it. */
  readonly fieldsByKey: ReadonlyMap<string, FieldDescriptor>;

  /** Method name → shape. */
  readonly methods: ReadonlyMap<string, MethodShape>;
};

const descriptors = new WeakMap<SchemaRef, SchemaDescriptor>();

/**
 * Classifies every method of a schema.
 *
 * The result is memoized per schema identity for the lifetime of the schema
 * and is never invalidated: schemas are immutable once defined.
 *
 * Priority:
 * When two declarations produce the same method name, the higher kind wins:
 * `default` > `builder` / `metadataBuilder` > `structural` > `getter` /
 * `metadataGetter`. The method table is filled lowest priority first, so
 * later insertions override earlier ones.
 */
export function classify(schema: SchemaRef): SchemaDescriptor {
  const cached = descriptors.get(schema);
  if (cached) return cached;

  const descriptor = buildDescriptor(schema);
  descriptors.set(schema, descriptor);
  return descriptor;
}

function buildDescriptor(schema: SchemaRef): SchemaDescriptor {
  const fields: FieldDescriptor[] = Object.entries(schema.fields).map(
    ([name, decl]) => ({
      name,
      builderName: toBuilderName(name),
      key: toMapKey(decl.options.key ?? name),
      type: decl.type,
      required: decl.options.required
    })
  );

  const metadata: MetadataDescriptor[] = Object.entries(schema.metadata).map(
    ([name, type]) => ({
      name,
      builderName: toBuilderName(name),
      key: toMapKey(name),
      type
    })
  );

  const methods = new Map<string, MethodShape>();

  // 1. Getters (lowest priority)
  for (const field of fields) {
    methods.set(field.name, { kind: 'getter', field });
  }
  for (const entry of metadata) {
    methods.set(entry.name, { kind: 'metadataGetter', metadata: entry });
  }

  // 2. Structural operations
  for (const operation of STRUCTURAL_OPERATIONS) {
    methods.set(operation, { kind: 'structural', operation });
  }

  // 3. Builders
  for (const entry of metadata) {
    methods.set(entry.builderName, { kind: 'metadataBuilder', metadata: entry });
  }
  for (const field of fields) {
    methods.set(field.builderName, { kind: 'builder', field });
  }

  // 4. Default-bodied accessors (highest priority)
  for (const [name, method] of Object.entries(schema.defaults)) {
    methods.set(name, { kind: 'default', method });
  }

  return {
    schema,
    fields,
    required: fields.filter(field => field.required),
    metadata,
    builderKeys: new Map(fields.map(field => [field.builderName, field.key])),
    fieldsByKey: new Map(fields.map(field => [field.key, field])),
    methods
  };
}
