import type { StandardSchemaV1 } from '@standard-schema/spec';
import { Map as ImmutableMap, fromJS } from 'immutable';

import type {
  DefaultDecls,
  EmptyDecls,
  FieldDecls,
  Instance,
  MetadataDecls,
  SchemaRef,
  StructuralOperations
} from './types';
import { type CodecOptions, decode, encode } from './codec';
import { validateDefinition } from './definition-validator';
import { CodecError } from './errors';
import { type DataMap, getHandle } from './handles';
import { stampType } from './metadata';
import { MESSAGE_PREFIX } from './report';
import { createInstance } from './runtime';
import { createStandardProps } from './standard-schema';
import { describeValue } from './shapes';
import { isPlainObject } from './utils/type-guards';

/**
 * The declaration accepted by {@link defineSchema}.
 */
export type SchemaDefinition<F extends FieldDecls, M extends MetadataDecls> = {
  /**
   * Display name used in diagnostics and type-tag metadata.
   */
  readonly name: string;

  /**
   * Field accessors, keyed by getter name.
   */
  readonly fields: F;

  /**
   * Metadata side-channel accessors, keyed by metadata key.
   */
  readonly metadata?: M;
};

/**
 * A default-bodied accessor as written by the caller: `self` is typed as the
 * instance.
 */
type DefaultBody<Self> = (self: Self, ...args: never[]) => unknown;

/**
 * A schema: the accessor contract of its instances, plus factories.
 *
 * @template F - Field declarations.
 * @template M - Metadata declarations.
 * @template D - Default-bodied accessors.
 */
export class Schema<
  F extends FieldDecls,
  M extends MetadataDecls = EmptyDecls,
  D extends DefaultDecls = EmptyDecls
> implements SchemaRef
{
  /**
   * Type-level only: the instance type of this schema.
   */
  declare readonly '~instance': Instance<F, M, D>;

  /**
   * Standard Schema V1 interface.
   */
  readonly '~standard': StandardSchemaV1.Props<unknown, Instance<F, M, D>>;

  constructor(
    readonly name: string,
    readonly fields: F,
    readonly metadata: MetadataDecls,
    readonly defaults: DefaultDecls
  ) {
    this['~standard'] = createStandardProps(
      this,
      (value): value is Instance<F, M, D> => this.isInstance(value)
    );
  }

  /**
   * An instance with an empty backing map.
   */
  empty(): Instance<F, M, D> {
    return this.wrap(ImmutableMap());
  }

  /**
   * Wraps a backing map (or a plain object, converted deeply) as an instance.
   *
   * The map is used as-is: nothing is validated or converted until a getter
   * or `validate()` runs. The metadata is stamped with the schema name.
   */
  wrap(
    data: DataMap | Readonly<Record<string, unknown>>,
    metadata: DataMap = ImmutableMap()
  ): Instance<F, M, D> {
    const map = toDataMap(data);
    const instance = createInstance(this, map, stampType(this, metadata));

    if (!this.isInstance(instance)) {
      throw new Error(
        `${MESSAGE_PREFIX} Could not wrap a map as ${this.name}.`
      );
    }
    return instance;
  }

  /**
   * Guard verifying the value is an instance of exactly this schema.
   */
  isInstance(value: unknown): value is Instance<F, M, D> {
    return getHandle(value)?.schema === this;
  }

  /**
   * Decodes a document into an instance of this schema.
   *
   * A document tagged with this schema's registered tag decodes directly; an
   * untagged object is wrapped.
   *
   * @throws {CodecError} When the text is malformed or describes another
   *         schema or a non-map value.
   */
  decode(text: string, options?: CodecOptions): Instance<F, M, D> {
    const decoded = decode(text, options);

    if (this.isInstance(decoded)) return decoded;
    if (ImmutableMap.isMap(decoded)) return this.wrap(decoded);

    throw new CodecError(
      `Expected a ${this.name} document, got ${describeValue(decoded)}.`
    );
  }

  /**
   * Adds default-bodied accessors. Each receives the instance as `self`
   * followed by the call arguments.
   *
   * Returns a new schema: instances of this schema are not instances of the
   * returned one, and tag registrations do not carry over.
   *
   * @example
   * ```ts
   * const Person = defineSchema({ name: 'Person', fields }).withDefaults({
   *   greeting: (self, punctuation: string) => `Hello, ${self.name()}${punctuation}`
   * });
   * ```
   */
  withDefaults<ND extends Record<string, DefaultBody<Instance<F, M, D>>>>(
    defaults: ND
  ): Schema<F, M, D & ND> {
    return new Schema<F, M, D & ND>(this.name, this.fields, this.metadata, {
      ...this.defaults,
      ...defaults
    });
  }
}

function toDataMap(data: DataMap | Readonly<Record<string, unknown>>): DataMap {
  if (ImmutableMap.isMap(data)) return data;

  // Instances are proxies over prototype-less targets and would pass as
  // plain objects.
  const converted: unknown =
    isPlainObject(data) && !getHandle(data) ? fromJS(data) : undefined;
  if (!ImmutableMap.isMap(converted)) {
    throw new TypeError(
      `${MESSAGE_PREFIX} Expected a map or a plain object, got ${describeValue(data)}.`
    );
  }
  return converted;
}

/**
 * Declares a schema.
 *
 * @example
 * ```ts
 * const Person = defineSchema({
 *   name: 'Person',
 *   fields: {
 *     name: field(t.string()).required(),
 *     age: field(t.integer()),
 *     email: field(t.optional(t.string())).key(':email-address')
 *   },
 *   metadata: { source: t.string() }
 * });
 *
 * const ada = Person.empty().withName('Ada').withAge(36);
 * ada.name(); // "Ada"
 * ```
 *
 * @throws {SchemaDefinitionError} When the declaration is malformed.
 */
export function defineSchema<
  F extends FieldDecls,
  M extends MetadataDecls = EmptyDecls
>(definition: SchemaDefinition<F, M>): Schema<F, M> {
  validateDefinition(definition);

  return new Schema<F, M>(
    definition.name,
    definition.fields,
    definition.metadata ?? {},
    {}
  );
}

/**
 * Encodes an instance as JSON text (see `encode`).
 */
export function serialize(
  instance: StructuralOperations<unknown>,
  options?: CodecOptions
): string {
  return encode(instance, options);
}
