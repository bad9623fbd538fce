import { InvalidDeclarationError } from '../errors';
import type { QualifierMarker } from '../qualifiers/QualifierMarker';
import { hashString } from '../shared/hash';
import { RawType } from './RawType';

const qualifierSetKey = (qualifiers: readonly QualifierMarker[]): string =>
  qualifiers.length === 0 ? '' : `{${qualifiers.map((marker) => marker.key).join(',')}}`;

/** Deduplicates by key and orders by key, so equal sets share one layout. */
const normalizeQualifiers = (
  qualifiers: readonly QualifierMarker[]
): readonly QualifierMarker[] => {
  const byKey = new Map<string, QualifierMarker>();
  for (const marker of qualifiers) {
    if (!byKey.has(marker.key)) byKey.set(marker.key, marker);
  }
  return [...byKey.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, marker]) => marker);
};

const sameQualifiers = (
  a: readonly QualifierMarker[],
  b: readonly QualifierMarker[]
): boolean =>
  a.length === b.length && a.every((marker) => b.some((other) => marker.equals(other)));

/**
 * A use of a type parameter inside a generic declaration. Qualifiers on the
 * variable are merged into whatever type it is bound to.
 */
export class TypeVariable {
  readonly qualifiers: readonly QualifierMarker[];
  readonly key: string;

  constructor(
    readonly name: string,
    qualifiers: readonly QualifierMarker[] = []
  ) {
    this.qualifiers = normalizeQualifiers(qualifiers);
    this.key = `$${name}${qualifierSetKey(this.qualifiers)}`;
  }

  equals(other: TypeNode): boolean {
    return (
      other instanceof TypeVariable &&
      other.name === this.name &&
      sameQualifiers(this.qualifiers, other.qualifiers)
    );
  }

  toString(): string {
    const prefix = this.qualifiers.map((marker) => `${marker.toString()} `).join('');
    return `${prefix}${this.name}`;
  }
}

export type TypeNode<T = unknown> = TypeDescriptor<T> | TypeVariable;

/**
 * A raw type with its type arguments and the set of qualifiers attached to
 * it. Descriptors are immutable values: equality, hash and `key` are all
 * structural, and the qualifier set ignores order and duplicates.
 */
export class TypeDescriptor<T = unknown> {
  declare readonly valueType?: T;
  readonly qualifiers: readonly QualifierMarker[];
  readonly key: string;

  private constructor(
    readonly rawType: RawType,
    readonly typeArguments: readonly TypeNode[],
    qualifiers: readonly QualifierMarker[]
  ) {
    if (typeArguments.length !== rawType.arity) {
      throw new InvalidDeclarationError(
        `${rawType.qualifiedName} takes ${rawType.arity} type argument(s) but got ${typeArguments.length}`
      );
    }
    this.qualifiers = normalizeQualifiers(qualifiers);
    const args =
      typeArguments.length === 0 ? '' : `<${typeArguments.map((arg) => arg.key).join(',')}>`;
    this.key = `${rawType.id}${args}${qualifierSetKey(this.qualifiers)}`;
  }

  static of<T>(rawType: RawType<T>): TypeDescriptor<T> {
    return new TypeDescriptor<T>(rawType, [], []);
  }

  /**
   * Descriptor for a generic raw type. The value type is not derived from the
   * arguments, so callers state it.
   */
  static parameterized<T>(
    rawType: RawType,
    typeArguments: readonly TypeNode[],
    qualifiers: readonly QualifierMarker[] = []
  ): TypeDescriptor<T> {
    return new TypeDescriptor<T>(rawType, typeArguments, qualifiers);
  }

  /** True when no type variable remains anywhere in the arguments. */
  get isResolved(): boolean {
    return this.typeArguments.every(
      (arg) => arg instanceof TypeDescriptor && arg.isResolved
    );
  }

  qualifiedBy(...qualifiers: QualifierMarker[]): TypeDescriptor<T> {
    if (qualifiers.length === 0) return this;
    return new TypeDescriptor<T>(this.rawType, this.typeArguments, [
      ...this.qualifiers,
      ...qualifiers,
    ]);
  }

  withoutQualifiers(): TypeDescriptor<T> {
    if (this.qualifiers.length === 0) return this;
    return new TypeDescriptor<T>(this.rawType, this.typeArguments, []);
  }

  equals(other: TypeNode): boolean {
    if (this === other) return true;
    if (!(other instanceof TypeDescriptor)) return false;
    return (
      this.rawType === other.rawType &&
      this.typeArguments.length === other.typeArguments.length &&
      this.typeArguments.every((arg, index) => {
        const otherArg = other.typeArguments[index];
        return otherArg !== undefined && arg.equals(otherArg);
      }) &&
      sameQualifiers(this.qualifiers, other.qualifiers)
    );
  }

  hashCode(): number {
    return hashString(this.key);
  }

  toString(): string {
    const args =
      this.typeArguments.length === 0
        ? ''
        : `<${this.typeArguments.map((arg) => arg.toString()).join(', ')}>`;
    const base = `${this.rawType.qualifiedName}${args}`;
    if (this.qualifiers.length === 0) return base;
    return `${base} annotated [${this.qualifiers.map((marker) => marker.toString()).join(', ')}]`;
  }
}

/**
 * Replaces type variables using `bindings`. A bound variable's own
 * qualifiers are added to the bound descriptor.
 */
export function substitute(
  node: TypeNode,
  bindings: ReadonlyMap<string, TypeDescriptor>
): TypeDescriptor {
  if (node instanceof TypeVariable) {
    const bound = bindings.get(node.name);
    if (bound === undefined) {
      throw new InvalidDeclarationError(`Type variable ${node.name} is not bound`);
    }
    return bound.qualifiedBy(...node.qualifiers);
  }
  if (node.isResolved) return node;
  return TypeDescriptor.parameterized(
    node.rawType,
    node.typeArguments.map((arg) => substitute(arg, bindings)),
    node.qualifiers
  );
}

/** Names of every type variable used in `node`, in order of appearance. */
export function typeVariablesOf(node: TypeNode): string[] {
  if (node instanceof TypeVariable) return [node.name];
  return node.typeArguments.flatMap(typeVariablesOf);
}

export const toTypeNode = <T>(type: TypeNode<T> | RawType<T>): TypeNode<T> =>
  type instanceof RawType ? TypeDescriptor.of(type) : type;

export const toDescriptor = <T>(type: TypeDescriptor<T> | RawType<T>): TypeDescriptor<T> =>
  type instanceof RawType ? TypeDescriptor.of(type) : type;
