export { Schema, defineSchema, serialize } from './schema';
export type { SchemaDefinition } from './schema';
export { FieldDecl, FieldType, Option, field, t } from './types';
export type {
  AnyInstance,
  DefaultDecls,
  EmptyDecls,
  FieldDecls,
  FieldMismatch,
  FieldValue,
  Instance,
  InstanceOf,
  MetadataDecls,
  PathSegment,
  SchemaRef,
  SelfReference,
  StructuralOperations,
  TypeShape
} from './types';

export {
  CodecError,
  RequiredFieldMissingError,
  SchemaDefinitionError,
  ValidationFailedError
} from './errors';
export type { ReportOptions } from './report';

export {
  RESERVED_TAGS,
  TagRegistry,
  decode,
  decodeStream,
  deregisterTag,
  deregisterTranslator,
  encode,
  registerTag,
  registerTranslator,
  tagRegistry
} from './codec';
export type { CodecOptions, JsonValue, Translator } from './codec';

export { diff, intersect, merge, subtract } from './differ';
export type {
  DiffMap,
  DiffOptions,
  DiffResult,
  SequencePolicy
} from './differ';

export { classify } from './introspector';
export type {
  FieldDescriptor,
  MetadataDescriptor,
  MethodShape,
  SchemaDescriptor
} from './introspector';
export { TYPE_TAG_KEY } from './metadata';
