import { describe, expect, it } from 'vitest';
import {
  AdapterRegistry,
  MissingPropertiesError,
  Types,
  arrayLayer,
  objectLayer,
  qualifierCombinator,
  typeOf,
  type JsonAdapterFactory,
  type QualifierMarker,
} from '../src';
import {
  ContainsComplexlyQualifiedStringType,
  GenericClassType,
  GenericClassWithQualifierType,
  HelloJsonAdapter,
  InnerType,
  MultipleJsonQualifiersType,
  NestedClassesType,
  RenamedFieldsType,
  SimpleType,
  SomeEnum,
  TEST_CLASS_JSON,
  TestClassType,
  WrappedInArray,
  WrappedInObject,
  helloString,
  type GenericClassWithQualifier,
  type TestClass,
} from './fixtures/conformance';

const registry = AdapterRegistry.builder()
  .add(helloString, new HelloJsonAdapter())
  .addRecords(
    TestClassType,
    GenericClassType,
    SimpleType,
    RenamedFieldsType,
    NestedClassesType,
    InnerType,
    GenericClassWithQualifierType
  )
  .build();

describe('generated adapters', () => {
  it('decodes and re-encodes every kind of property', () => {
    const adapter = registry.adapterFor(TestClassType);
    const actual = adapter.fromJsonText(TEST_CLASS_JSON);

    const expected: TestClass = {
      string: 'string',
      nullableString: 'nullableString',
      integer: 4711,
      nullableInt: 1337,
      isBoolean: true,
      isNullableBoolean: false,
      aShort: 32767,
      nullableShort: -32768,
      aByte: -1,
      nullableByte: -128,
      aChar: 'c',
      nullableChar: 'n',
      list: ['String1', 'String2'],
      nestedList: [
        new Map([['key1', new Set(['set1', 'set2'])]]),
        new Map([
          ['key2', new Set(['set1', 'set2'])],
          ['key3', new Set<string>()],
        ]),
      ],
      abstractProperty: 'abstract',
      customName: 'other_value',
      annotated: 'Hello, World!',
      anotherAnnotated: 'Hello, Other World!',
      genericClass: { collection: ['val1', 'val2'], value: 'val3' },
    };

    expect(actual).toEqual(expected);
    expect(adapter.toJsonText(actual, { indent: '  ' })).toBe(TEST_CLASS_JSON);
  });

  it('reports every missing required property at once', () => {
    let caught: unknown;
    try {
      registry.adapterFor(TestClassType).fromJsonText('{}');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(MissingPropertiesError);
    expect(caught).toMatchObject({
      code: 'missing_properties',
      message:
        'The following properties were null: ' +
        'string, ' +
        'integer, ' +
        'isBoolean, ' +
        'aShort, ' +
        'aByte, ' +
        'aChar, ' +
        'list, ' +
        'nestedList, ' +
        'abstractProperty, ' +
        'customName, ' +
        'annotated, ' +
        'anotherAnnotated, ' +
        'genericClass',
    });
  });

  it('maps field names to custom JSON names', () => {
    const json = '{"jsonProp1":"value1","jsonProp2":"value2"}';
    const adapter = registry.adapterFor(RenamedFieldsType);
    const actual = adapter.fromJsonText(json);
    expect(actual).toEqual({ first: 'value1', second: 'value2' });
    expect(adapter.toJsonText(actual)).toBe(json);
  });

  it('skips unknown members and never writes them back', () => {
    const adapter = registry.adapterFor(SimpleType);
    const actual = adapter.fromJsonText('{"prop":"value","extra_prop":"extra_value"}');
    expect(actual).toEqual({ prop: 'value' });
    expect(adapter.toJsonText(actual)).toBe('{"prop":"value"}');
  });

  it('handles nested record types', () => {
    const json = '{"inner":{"prop":"value"}}';
    const adapter = registry.adapterFor(NestedClassesType);
    const actual = adapter.fromJsonText(json);
    expect(actual).toEqual({ inner: { prop: 'value' } });
    expect(adapter.toJsonText(actual)).toBe(json);
  });

  it('applies qualifiers declared on a type parameter', () => {
    const adapter = registry.adapterFor(
      typeOf<GenericClassWithQualifier<string>>(GenericClassWithQualifierType, Types.string)
    );
    const json = '{"value":"world!"}';
    const actual = adapter.fromJsonText(json);
    expect(actual).toEqual({ value: 'Hello, world!' });
    expect(adapter.toJsonText(actual)).toBe(json);
  });

  it('names generated adapters after the qualified record name', () => {
    expect(registry.adapterFor(NestedClassesType).toString()).toBe(
      'GeneratedJsonAdapter(NestedClasses)'
    );
    expect(registry.adapterFor(InnerType).toString()).toBe(
      'GeneratedJsonAdapter(NestedClasses.Inner)'
    );
  });
});

describe('qualifier combinators', () => {
  it('wraps a value in every layer of a multi-qualifier combinator', () => {
    const adapter = AdapterRegistry.builder()
      .add(
        qualifierCombinator({
          type: Types.string,
          qualifiers: [WrappedInObject.of(), WrappedInArray.of()],
          layers: [objectLayer('name'), arrayLayer()],
        })
      )
      .addRecords(MultipleJsonQualifiersType)
      .build()
      .adapterFor(MultipleJsonQualifiersType);

    const json = '{"string":{"name":["Hello, world!"]}}';
    expect(adapter.fromJsonText(json)).toEqual({ string: 'Hello, world!' });
    expect(adapter.toJsonText({ string: 'Hello, world!' })).toBe(json);
  });
});

describe('qualifiers with elements', () => {
  it('passes the full qualifier set to a factory exactly once', () => {
    let calls = 0;
    let seen: readonly QualifierMarker[] = [];
    const complexlyQualifiedStrings: JsonAdapterFactory = {
      create(type, resolver) {
        if (type.qualifiers.length === 0) return null;
        calls += 1;
        seen = type.qualifiers;
        return resolver.adapterFor(Types.string);
      },
    };

    AdapterRegistry.builder()
      .add(complexlyQualifiedStrings)
      .addRecords(ContainsComplexlyQualifiedStringType)
      .build()
      .adapterFor(ContainsComplexlyQualifiedStringType);

    expect(calls).toBe(1);
    expect(seen).toHaveLength(7);
    const element = (qualifier: string, name: string) =>
      seen.find((marker) => marker.name === qualifier)?.element(name);
    expect(element('WithStringElement', 'string')).toBe('\\$Hello, ');
    expect(element('WithNumberElement', 'number')).toBe(4);
    expect(element('WithBooleanElement', 'bool')).toBe(true);
    expect(element('WithClassElement', 'cls')).toBe(ContainsComplexlyQualifiedStringType);
    expect(element('WithEnumElement', 'someEnum')).toBe(SomeEnum.constant('VALUE5'));
    expect(element('WithArrayElements', 'stringArray')).toEqual(['one', '', 'three']);
    expect(element('WithArrayElements', 'byteArray')).toEqual(new Uint8Array([5]));
    expect(element('WithArrayElements', 'classArray')).toEqual([]);
    expect(element('WithDefaultStringElement', 'string')).toBe('default');
  });
});
