import type {
  List,
  Map as ImmutableMap,
  Set as ImmutableSet
} from 'immutable';

import type { Option } from './option';
import type { SchemaRef } from './schema';

/**
 * Runtime description of a declared field type.
 *
 * This is the closed set of type shapes the converter and the validator know
 * how to handle. Composite shapes hold their element types as `FieldType`
 * values, so a declaration like `t.list(t.optional(t.integer()))` is a small
 * tree of shapes.
 *
 * - Scalars: `string`, `integer`, `number`, `boolean`, `instant`, `any`.
 * - Wrappers: `optional`.
 * - Collections: `list`, `set`, `map`.
 * - Nested instances: `schema` (resolved lazily so that forward references
 *   work) and `self` (the schema that declares the field).
 * - `class`: values produced by a codec translator, checked with `instanceof`.
 */
export type TypeShape =
  | { readonly kind: 'string' }
  | { readonly kind: 'integer' }
  | { readonly kind: 'number' }
  | { readonly kind: 'boolean' }
  | { readonly kind: 'instant' }
  | { readonly kind: 'any' }
  | { readonly kind: 'optional'; readonly of: FieldType<unknown> }
  | { readonly kind: 'list'; readonly of: FieldType<unknown> }
  | { readonly kind: 'set'; readonly of: FieldType<unknown> }
  | {
      readonly kind: 'map';
      readonly key: FieldType<unknown>;
      readonly value: FieldType<unknown>;
    }
  | { readonly kind: 'schema'; readonly resolve: () => SchemaRef }
  | { readonly kind: 'self' }
  | {
      readonly kind: 'class';
      readonly name: string;
      readonly test: (value: unknown) => boolean;
    };

/**
 * A declared field type.
 *
 * Type Mechanics:
 * The `~resolved` member exists only at the type level (`declare` emits no
 * runtime property). It records the TypeScript type a getter resolves to, so
 * the accessor types of an instance can be inferred from the declaration
 * alone.
 *
 * @template T - The resolved (getter-side) type of the field.
 */
export class FieldType<T> {
  declare readonly '~resolved': T;

  constructor(readonly shape: TypeShape) {}
}

export declare const selfReference: unique symbol;

/**
 * Placeholder produced by `t.self()`.
 *
 * It is replaced by the declaring schema's instance type when the accessor
 * types are computed (see {@link BindSelf}).
 */
export type SelfReference = { readonly [selfReference]: true };

/**
 * Extracts the instance type carried by a schema.
 */
export type InstanceOf<S> = S extends { readonly '~instance': infer I }
  ? I
  : never;

/**
 * Replaces every {@link SelfReference} inside a resolved type with `Self`.
 *
 * Implementation Note:
 * Each check wraps both sides in a one-element tuple. A naked type parameter
 * would distribute over the `Option` union and produce
 * `Option<X> | Option<unknown>` instead of `Option<X>`.
 */
export type BindSelf<T, Self> = [T] extends [SelfReference]
  ? Self
  : [T] extends [Option<infer U>]
    ? Option<BindSelf<U, Self>>
    : [T] extends [List<infer U>]
      ? List<BindSelf<U, Self>>
      : [T] extends [ImmutableSet<infer U>]
        ? ImmutableSet<BindSelf<U, Self>>
        : [T] extends [ImmutableMap<infer K, infer V>]
          ? ImmutableMap<BindSelf<K, Self>, BindSelf<V, Self>>
          : T;

/**
 * Field type constructors.
 *
 * @example
 * ```ts
 * const Person = defineSchema({
 *   name: 'Person',
 *   fields: {
 *     name: field(t.string()).required(),
 *     nickname: field(t.optional(t.string())),
 *     tags: field(t.set(t.string())),
 *     manager: field(t.self())
 *   }
 * });
 * ```
 */
export const t = {
  string: (): FieldType<string> => new FieldType<string>({ kind: 'string' }),

  /** A number without a fractional part. */
  integer: (): FieldType<number> => new FieldType<number>({ kind: 'integer' }),

  number: (): FieldType<number> => new FieldType<number>({ kind: 'number' }),

  boolean: (): FieldType<boolean> =>
    new FieldType<boolean>({ kind: 'boolean' }),

  /** A point in time. Raw ISO-8601 strings and epoch milliseconds coerce to `Date`. */
  instant: (): FieldType<Date> => new FieldType<Date>({ kind: 'instant' }),

  /** Accepts any raw value unchanged. */
  any: (): FieldType<unknown> => new FieldType<unknown>({ kind: 'any' }),

  optional: <T>(of: FieldType<T>): FieldType<Option<T>> =>
    new FieldType<Option<T>>({ kind: 'optional', of }),

  list: <T>(of: FieldType<T>): FieldType<List<T>> =>
    new FieldType<List<T>>({ kind: 'list', of }),

  set: <T>(of: FieldType<T>): FieldType<ImmutableSet<T>> =>
    new FieldType<ImmutableSet<T>>({ kind: 'set', of }),

  map: <K, V>(
    key: FieldType<K>,
    value: FieldType<V>
  ): FieldType<ImmutableMap<K, V>> =>
    new FieldType<ImmutableMap<K, V>>({ kind: 'map', key, value }),

  /** A nested instance of an already defined schema. */
  schema: <S extends SchemaRef>(target: S): FieldType<InstanceOf<S>> =>
    new FieldType<InstanceOf<S>>({ kind: 'schema', resolve: () => target }),

  /** A nested instance of a schema that is defined later in the module. */
  lazy: <S extends SchemaRef>(resolve: () => S): FieldType<InstanceOf<S>> =>
    new FieldType<InstanceOf<S>>({ kind: 'schema', resolve }),

  /** A nested instance of the schema declaring this field. */
  self: (): FieldType<SelfReference> =>
    new FieldType<SelfReference>({ kind: 'self' }),

  /** Values of a custom class, usually produced by a codec translator. */
  instanceOf: <C>(
    ctor: abstract new (...args: never[]) => C
  ): FieldType<C> =>
    new FieldType<C>({
      kind: 'class',
      name: ctor.name,
      test: value => value instanceof ctor
    })
};
