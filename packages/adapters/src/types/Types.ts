import type { JsonValue } from '@lattice/json-stream';
import type { QualifierMarker } from '../qualifiers/QualifierMarker';
import { RawType, RawTypeKinds } from './RawType';
import {
  TypeDescriptor,
  TypeVariable,
  toTypeNode,
  type TypeNode,
} from './TypeDescriptor';

const builtin = <T>(name: string, arity = 0): RawType<T> =>
  new RawType<T>(name, name, RawTypeKinds.builtin, arity);

/**
 * Built-in raw types. Numeric kinds share the `number` value type and differ
 * in the range and precision their adapters accept.
 */
export const Types = {
  boolean: builtin<boolean>('Boolean'),
  string: builtin<string>('String'),
  double: builtin<number>('Double'),
  float: builtin<number>('Float'),
  int: builtin<number>('Int'),
  long: builtin<number>('Long'),
  short: builtin<number>('Short'),
  byte: builtin<number>('Byte'),
  char: builtin<string>('Char'),
  list: builtin<readonly unknown[]>('List', 1),
  set: builtin<ReadonlySet<unknown>>('Set', 1),
  map: builtin<ReadonlyMap<string, unknown>>('Map', 2),
  jsonValue: builtin<JsonValue>('JsonValue'),
} as const;

export type TypeInput<T> = TypeNode<T> | RawType<T>;

export const listOf = <E>(element: TypeInput<E>): TypeDescriptor<E[]> =>
  TypeDescriptor.parameterized<E[]>(Types.list, [toTypeNode(element)]);

export const setOf = <E>(element: TypeInput<E>): TypeDescriptor<Set<E>> =>
  TypeDescriptor.parameterized<Set<E>>(Types.set, [toTypeNode(element)]);

/** Map from JSON object names to values; keys are always strings. */
export const mapOf = <V>(value: TypeInput<V>): TypeDescriptor<Map<string, V>> =>
  TypeDescriptor.parameterized<Map<string, V>>(Types.map, [
    TypeDescriptor.of(Types.string),
    toTypeNode(value),
  ]);

/**
 * Descriptor for a raw type, or for a generic declaration applied to
 * concrete arguments. The value type of a parameterized descriptor is not
 * derived from its arguments, so callers state it.
 */
export function typeOf<T>(rawType: RawType<T>): TypeDescriptor<T>;
export function typeOf<T>(
  rawType: RawType,
  ...typeArguments: [TypeInput<unknown>, ...TypeInput<unknown>[]]
): TypeDescriptor<T>;
export function typeOf(
  rawType: RawType,
  ...typeArguments: TypeInput<unknown>[]
): TypeDescriptor<unknown> {
  return TypeDescriptor.parameterized(
    rawType,
    typeArguments.map((arg) => toTypeNode(arg))
  );
}

export const typeVariable = (name: string, ...qualifiers: QualifierMarker[]): TypeVariable =>
  new TypeVariable(name, qualifiers);
