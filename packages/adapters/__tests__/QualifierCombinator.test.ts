import { MalformedInputError } from '@lattice/json-stream';
import { describe, expect, it } from 'vitest';
import {
  AdapterRegistry,
  InvalidDeclarationError,
  Types,
  arrayLayer,
  objectLayer,
  qualifierCombinator,
  typeOf,
} from '../src';
import { WrappedInArray, WrappedInObject } from './fixtures/conformance';

const wrapped = typeOf(Types.string).qualifiedBy(WrappedInObject.of(), WrappedInArray.of());

const registry = AdapterRegistry.builder()
  .add(
    qualifierCombinator({
      type: Types.string,
      qualifiers: [WrappedInObject.of(), WrappedInArray.of()],
      layers: [objectLayer('name'), arrayLayer()],
    })
  )
  .build();

describe('QualifierCombinator', () => {
  it('serves the exact qualifier set it was registered for', () => {
    const adapter = registry.adapterFor(wrapped);
    expect(adapter.fromJsonText('{"name":["x"]}')).toBe('x');
    expect(adapter.toJsonText('x')).toBe('{"name":["x"]}');
    expect(adapter.toString()).toBe(
      'QualifierCombinator(String annotated [@WrappedInArray, @WrappedInObject])'
    );
  });

  it('leaves partial qualifier sets unserved', () => {
    expect(() => registry.adapterFor(typeOf(Types.string).qualifiedBy(WrappedInArray.of()))).toThrow(
      'No JsonAdapter for String annotated [@WrappedInArray]'
    );
  });

  it('ignores the wrapping member name when decoding', () => {
    const adapter = registry.adapterFor(wrapped);
    expect(adapter.fromJsonText('{"other":["x"]}')).toBe('x');
    expect(adapter.toJsonText('x')).toBe('{"name":["x"]}');
  });

  it('rejects a second member in an object layer', () => {
    expect(() => registry.adapterFor(wrapped).fromJsonText('{"name":["x"],"more":1}')).toThrow(
      MalformedInputError
    );
  });

  it('requires qualifiers and layers', () => {
    expect(() =>
      qualifierCombinator({ type: Types.string, qualifiers: [], layers: [arrayLayer()] })
    ).toThrow(InvalidDeclarationError);
    expect(() =>
      qualifierCombinator({ type: Types.string, qualifiers: [WrappedInArray.of()], layers: [] })
    ).toThrow('Invalid qualifier combinator: at least one wrapper layer is required');
  });
});
