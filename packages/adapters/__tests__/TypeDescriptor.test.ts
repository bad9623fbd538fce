import { describe, expect, it } from 'vitest';
import {
  InvalidDeclarationError,
  TypeDescriptor,
  Types,
  defineQualifier,
  listOf,
  mapOf,
  setOf,
  substitute,
  typeOf,
  typeVariable,
} from '../src';

const First = defineQualifier('First');
const Second = defineQualifier('Second');

describe('TypeDescriptor', () => {
  it('treats qualifier sets as unordered', () => {
    const a = typeOf(Types.string).qualifiedBy(First.of(), Second.of());
    const b = typeOf(Types.string).qualifiedBy(Second.of(), First.of());
    expect(a.equals(b)).toBe(true);
    expect(a.key).toBe(b.key);
    expect(a.hashCode()).toBe(b.hashCode());
  });

  it('collapses duplicate qualifiers', () => {
    const type = typeOf(Types.string).qualifiedBy(First.of(), First.of());
    expect(type.qualifiers).toHaveLength(1);
    expect(type.equals(typeOf(Types.string).qualifiedBy(First.of()))).toBe(true);
  });

  it('distinguishes subsets and supersets of qualifiers', () => {
    const one = typeOf(Types.string).qualifiedBy(First.of());
    const both = one.qualifiedBy(Second.of());
    expect(one.equals(both)).toBe(false);
    expect(both.withoutQualifiers().equals(TypeDescriptor.of(Types.string))).toBe(true);
  });

  it('compares type arguments pairwise', () => {
    expect(listOf(Types.string).equals(listOf(Types.string))).toBe(true);
    expect(listOf(Types.string).equals(listOf(Types.int))).toBe(false);
    expect(listOf(Types.string).equals(setOf(Types.string))).toBe(false);
    expect(mapOf(listOf(Types.int)).key).toBe(mapOf(listOf(Types.int)).key);
  });

  it('describes itself', () => {
    expect(mapOf(listOf(Types.int)).toString()).toBe('Map<String, List<Int>>');
    expect(typeOf(Types.string).qualifiedBy(First.of()).toString()).toBe(
      'String annotated [@First]'
    );
  });

  it('requires one argument per type parameter', () => {
    expect(() => TypeDescriptor.of(Types.list)).toThrow(InvalidDeclarationError);
    expect(() => TypeDescriptor.of(Types.list)).toThrow(
      'List takes 1 type argument(s) but got 0'
    );
  });

  it('tracks whether type variables remain', () => {
    expect(listOf(Types.string).isResolved).toBe(true);
    expect(listOf(typeVariable('T')).isResolved).toBe(false);
  });
});

describe('substitute', () => {
  it('replaces nested variables and merges their qualifiers', () => {
    const declared = listOf(typeVariable('T', First.of()));
    const bound = substitute(
      declared,
      new Map([['T', typeOf(Types.string).qualifiedBy(Second.of())]])
    );
    expect(bound.equals(listOf(typeOf(Types.string).qualifiedBy(First.of(), Second.of())))).toBe(
      true
    );
  });

  it('fails for an unbound variable', () => {
    expect(() => substitute(typeVariable('X'), new Map())).toThrow('Type variable X is not bound');
  });
});
