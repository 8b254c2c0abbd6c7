import type { Map as ImmutableMap } from 'immutable';

import type { ReportOptions } from '../report';
import type { BindSelf, FieldType } from './field-types';
import type { Option } from './option';

/**
 * Options attached to a field declaration.
 *
 * @template R - Literal `true` when the getter is required.
 */
export type FieldOptions<R extends boolean> = {
  /**
   * A required getter throws `RequiredFieldMissingError` when its value
   * resolves to `null`, and `validate()` reports it as missing.
   */
  readonly required: R;

  /**
   * The key used in the backing map. Defaults to the accessor name.
   * A leading `:` sigil is stripped (`':first-name'` → `'first-name'`).
   */
  readonly key?: string;
};

/**
 * A field declaration: the declared type plus its accessor options.
 *
 * Each declaration yields two accessors on an instance:
 * - a getter named after the declaration key (`name()`), and
 * - a builder prefixed with `with` (`withName(value)`).
 *
 * @template T - The resolved type of the field.
 * @template R - Whether the getter is required.
 */
export class FieldDecl<T, R extends boolean = false> {
  constructor(
    readonly type: FieldType<T>,
    readonly options: FieldOptions<R>
  ) {}

  /**
   * Marks the getter as required.
   */
  required(): FieldDecl<T, true> {
    return new FieldDecl<T, true>(this.type, {
      ...this.options,
      required: true
    });
  }

  /**
   * Overrides the backing map key for this field.
   */
  key(mapKey: string): FieldDecl<T, R> {
    return new FieldDecl<T, R>(this.type, { ...this.options, key: mapKey });
  }
}

/**
 * Declares a field of the given type. Fields are not required unless
 * `.required()` is chained.
 */
export function field<T>(type: FieldType<T>): FieldDecl<T, false> {
  return new FieldDecl(type, { required: false });
}

/**
 * Field declarations of a schema, keyed by accessor name.
 */
export type FieldDecls = Readonly<Record<string, FieldDecl<unknown, boolean>>>;

/**
 * Metadata (side-channel) declarations of a schema, keyed by metadata key.
 */
export type MetadataDecls = Readonly<Record<string, FieldType<unknown>>>;

/**
 * The widest default-bodied accessor: receives the instance as `self`.
 *
 * The `never` parameters make every concrete default assignable to this type;
 * the runtime invokes defaults through `Reflect.apply`.
 */
export type DefaultMethod = (self: never, ...args: never[]) => unknown;

/**
 * Default-bodied accessors of a schema, keyed by method name.
 */
export type DefaultDecls = Readonly<Record<string, DefaultMethod>>;

/**
 * Declaration set with no entries.
 */
export type EmptyDecls = Record<never, never>;

/**
 * The type-erased view of a schema used by the runtime.
 *
 * Specific field, metadata and default types are abstracted away; the
 * runtime relies only on this structural contract, so schemas with
 * different declarations can share the same registries and caches.
 */
export interface SchemaRef {
  readonly name: string;
  readonly fields: FieldDecls;
  readonly metadata: MetadataDecls;
  readonly defaults: DefaultDecls;
}

/**
 * Framework-level operations available on every instance.
 *
 * These are the only methods dispatched by name; everything else is
 * dispatched by its declared shape.
 *
 * @template Self - The concrete instance type.
 */
export interface StructuralOperations<Self> {
  /**
   * The backing data map. Keys are strings unless the map was decoded from
   * `#map` entry pairs.
   */
  getMap(): ImmutableMap<unknown, unknown>;
  /** The metadata side-channel. */
  getMetadata(): ImmutableMap<unknown, unknown>;
  getType(): SchemaRef;
  /** Delegates to the backing map. */
  toString(): string;
  /** Delegates to the backing map. */
  hashCode(): number;
  /**
   * `true` only for an instance of the same schema whose backing map is equal
   * by value. Metadata does not take part in equality.
   */
  equals(other: unknown): boolean;
  /** Writes the pretty-printed encoding to stdout. */
  prettyPrint(): void;
  /** Returns the pretty-printed encoding. */
  toFormattedString(): string;
  /** Right-biased, null-skipping field-wise combine. */
  merge(other: Self): Self;
  /** Entries equal in both instances. */
  intersect(other: Self): Self;
  /** Entries of this instance that are absent from, or differ in, `other`. */
  subtract(other: Self): Self;
  /**
   * Throws `ValidationFailedError`, or returns this same instance. `options`
   * shapes the error message.
   */
  validate(options?: ReportOptions): Self;
}

/**
 * An instance of any schema.
 */
export interface AnyInstance extends StructuralOperations<AnyInstance> {}

/**
 * The value returned by a field getter (and accepted by its builder).
 *
 * Resolution Rules:
 * - `optional(...)` fields resolve to an `Option` and never to `null`.
 * - Required fields resolve to the declared type (reading `null` throws).
 * - Every other field may resolve to `null` when absent.
 */
export type FieldValue<Decl, Self> =
  Decl extends FieldDecl<infer T, infer R>
    ? [T] extends [Option<unknown>]
      ? BindSelf<T, Self>
      : R extends true
        ? BindSelf<T, Self>
        : BindSelf<T, Self> | null
    : never;

/**
 * The value returned by a metadata getter.
 */
export type MetadataValue<Type> =
  Type extends FieldType<infer T> ? T | null : never;

/**
 * The value accepted by a metadata builder.
 */
export type MetadataInput<Type> = Type extends FieldType<infer T> ? T : never;

/**
 * Call signature of a default-bodied accessor once `self` is bound.
 */
export type DefaultSignature<Method> = Method extends (
  self: never,
  ...args: infer A
) => infer R
  ? (...args: A) => R
  : never;

/**
 * The accessor contract of an instance of a schema.
 *
 * Composition:
 * 1. Field getters: `name(): T`.
 * 2. Field builders: `withName(value: T): Instance`.
 * 3. Metadata getters and builders, named the same way.
 * 4. Default-bodied accessors with `self` bound.
 * 5. {@link StructuralOperations}.
 *
 * Implementation Note:
 * Every self-reference appears inside a property type, where TypeScript
 * resolves it lazily; this keeps the alias recursive without an interface.
 */
export type Instance<
  F extends FieldDecls,
  M extends MetadataDecls = EmptyDecls,
  D extends DefaultDecls = EmptyDecls
> = {
  readonly [K in keyof F & string]: () => FieldValue<F[K], Instance<F, M, D>>;
} & {
  readonly [K in keyof F & string as `with${Capitalize<K>}`]: (
    value: FieldValue<F[K], Instance<F, M, D>>
  ) => Instance<F, M, D>;
} & {
  readonly [K in keyof M & string]: () => MetadataValue<M[K]>;
} & {
  readonly [K in keyof M & string as `with${Capitalize<K>}`]: (
    value: MetadataInput<M[K]>
  ) => Instance<F, M, D>;
} & {
  readonly [K in keyof D & string]: DefaultSignature<D[K]>;
} & StructuralOperations<Instance<F, M, D>>;
