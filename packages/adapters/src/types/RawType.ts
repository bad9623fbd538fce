export const RawTypeKinds = {
  builtin: 'builtin',
  record: 'record',
  enum: 'enum',
} as const;

export type RawTypeKind = (typeof RawTypeKinds)[keyof typeof RawTypeKinds];

let nextRawTypeId = 1;

/**
 * A nominal type without arguments or qualifiers. Two raw types are equal
 * only when they are the same instance; `id` gives each one a stable place in
 * descriptor keys.
 */
export class RawType<T = unknown> {
  /** Phantom carrier for the decoded value type. */
  declare readonly valueType?: T;
  readonly id: number;

  constructor(
    readonly name: string,
    readonly qualifiedName: string,
    readonly kind: RawTypeKind,
    readonly arity: number = 0
  ) {
    this.id = nextRawTypeId;
    nextRawTypeId += 1;
  }

  toString(): string {
    return this.qualifiedName;
  }
}

export const qualifiedNameOf = (name: string, enclosing?: RawType): string =>
  enclosing === undefined ? name : `${enclosing.qualifiedName}.${name}`;
