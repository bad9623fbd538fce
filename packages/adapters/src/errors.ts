import type { QualifierMarker } from './qualifiers/QualifierMarker';
import type { RawType } from './types/RawType';
import type { TypeDescriptor } from './types/TypeDescriptor';

export const AdapterErrorCodes = {
  unsupportedType: 'unsupported_type',
  missingProperties: 'missing_properties',
  invalidDeclaration: 'invalid_declaration',
  uninitializedAdapter: 'uninitialized_adapter',
  unexpectedNull: 'unexpected_null',
} as const;

export type AdapterErrorCode =
  (typeof AdapterErrorCodes)[keyof typeof AdapterErrorCodes];

export class AdapterError extends Error {
  constructor(
    message: string,
    readonly code: AdapterErrorCode
  ) {
    super(message);
    this.name = 'AdapterError';
  }
}

/**
 * No factory in the chain produced an adapter for the requested descriptor.
 */
export class UnsupportedTypeError extends AdapterError {
  readonly rawType: RawType;
  readonly qualifiers: readonly QualifierMarker[];

  constructor(readonly type: TypeDescriptor) {
    super(`No JsonAdapter for ${type.toString()}`, AdapterErrorCodes.unsupportedType);
    this.name = 'UnsupportedTypeError';
    this.rawType = type.rawType;
    this.qualifiers = type.qualifiers;
  }
}

export const MISSING_PROPERTIES_PREFIX = 'The following properties were null: ';

/**
 * Every required property left unassigned by one decode, in declaration order.
 */
export class MissingPropertiesError extends AdapterError {
  constructor(readonly propertyNames: readonly string[]) {
    super(
      `${MISSING_PROPERTIES_PREFIX}${propertyNames.join(', ')}`,
      AdapterErrorCodes.missingProperties
    );
    this.name = 'MissingPropertiesError';
  }
}

export class InvalidDeclarationError extends AdapterError {
  constructor(message: string) {
    super(message, AdapterErrorCodes.invalidDeclaration);
    this.name = 'InvalidDeclarationError';
  }
}

export class UninitializedAdapterError extends AdapterError {
  constructor(readonly type: TypeDescriptor) {
    super(
      `Adapter for ${type.toString()} was used before its resolution completed`,
      AdapterErrorCodes.uninitializedAdapter
    );
    this.name = 'UninitializedAdapterError';
  }
}

export class UnexpectedNullError extends AdapterError {
  constructor(readonly path: string) {
    super(`Unexpected null at ${path}`, AdapterErrorCodes.unexpectedNull);
    this.name = 'UnexpectedNullError';
  }
}
