export {
  AdapterError,
  AdapterErrorCodes,
  InvalidDeclarationError,
  MissingPropertiesError,
  UnexpectedNullError,
  UninitializedAdapterError,
  UnsupportedTypeError,
  type AdapterErrorCode,
} from './errors';
export { RawType, RawTypeKinds, type RawTypeKind } from './types/RawType';
export {
  EnumConstant,
  EnumType,
  defineEnum,
  type EnumConstantDeclaration,
} from './types/EnumType';
export {
  TypeDescriptor,
  TypeVariable,
  substitute,
  type TypeNode,
} from './types/TypeDescriptor';
export {
  Types,
  listOf,
  mapOf,
  setOf,
  typeOf,
  typeVariable,
  type TypeInput,
} from './types/Types';
export { QualifierMarker, type QualifierEntry } from './qualifiers/QualifierMarker';
export {
  QualifierDefinition,
  defineQualifier,
  type NoElements,
  type QualifierShape,
  type QualifierValues,
} from './qualifiers/defineQualifier';
export {
  qualifierElements,
  qualifierElementEquals,
  type QualifierElement,
} from './qualifiers/qualifierElements';
export { JsonAdapter } from './adapters/JsonAdapter';
export {
  booleanAdapter,
  byteAdapter,
  charAdapter,
  doubleAdapter,
  floatAdapter,
  intAdapter,
  jsonValueAdapter,
  longAdapter,
  shortAdapter,
  standardAdapterFactory,
  stringAdapter,
} from './adapters/standardAdapters';
export {
  ListJsonAdapter,
  MapJsonAdapter,
  SetJsonAdapter,
  collectionAdapterFactory,
} from './adapters/collectionAdapters';
export { EnumJsonAdapter, enumAdapterFactory } from './adapters/enumAdapters';
export {
  ExactAdapterFactory,
  type AdapterResolver,
  type JsonAdapterFactory,
} from './registry/JsonAdapterFactory';
export { DeferredAdapter } from './registry/DeferredAdapter';
export { AdapterRegistry, AdapterRegistryBuilder } from './registry/AdapterRegistry';
export {
  registryOptionsSchema,
  type RegistryOptions,
  type ResolvedRegistryOptions,
} from './registry/registryOptions';
export {
  RecordType,
  defineRecord,
  type BoundProperty,
  type DataKeys,
  type PropertyDeclaration,
  type PropertyDescriptor,
  type RecordDeclaration,
  type RecordProperties,
} from './records/RecordType';
export { ObjectAdapter } from './records/ObjectAdapter';
export { GeneratedAdapterFactory, type AdapterSource } from './records/GeneratedAdapterFactory';
export {
  QualifierCombinator,
  WrapperLayerKinds,
  arrayLayer,
  objectLayer,
  qualifierCombinator,
  type QualifierCombinatorOptions,
  type WrapperLayer,
} from './combinators/QualifierCombinator';
export { type Logger } from './shared/logger';
