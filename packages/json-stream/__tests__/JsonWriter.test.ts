import { describe, expect, it } from 'vitest';
import { JsonWriter, WriterStateError } from '../src';

describe('JsonWriter', () => {
  it('writes compact output by default', () => {
    const writer = new JsonWriter();
    writer
      .beginObject()
      .name('a')
      .value(1)
      .name('b')
      .beginArray()
      .value('x')
      .value(true)
      .endArray()
      .name('c')
      .nullValue()
      .endObject();
    expect(writer.toString()).toBe('{"a":1,"b":["x",true],"c":null}');
  });

  it('indents nested containers and keeps empty ones on one line', () => {
    const writer = new JsonWriter({ indent: '  ' });
    writer
      .beginObject()
      .name('a')
      .value(1)
      .name('list')
      .beginArray()
      .value(2)
      .endArray()
      .name('empty')
      .beginArray()
      .endArray()
      .endObject();
    expect(writer.toString()).toBe(
      ['{', '  "a": 1,', '  "list": [', '    2', '  ],', '  "empty": []', '}'].join('\n')
    );
  });

  it('drops null members when serializeNulls is off', () => {
    const writer = new JsonWriter({ serializeNulls: false });
    writer.beginObject().name('a').nullValue().name('b').value('x').endObject();
    expect(writer.toString()).toBe('{"b":"x"}');
  });

  it('still writes null array elements when serializeNulls is off', () => {
    const writer = new JsonWriter({ serializeNulls: false });
    writer.beginArray().nullValue().endArray();
    expect(writer.toString()).toBe('[null]');
  });

  it('escapes quotes and line separators', () => {
    const writer = new JsonWriter();
    writer.value('line\u2028sep "q"');
    expect(writer.toString()).toBe('"line\\u2028sep \\"q\\""');
  });

  it('writes plain JSON trees', () => {
    const writer = new JsonWriter();
    writer.jsonValue({ a: [1, null, { b: false }], c: 'x' });
    expect(writer.toString()).toBe('{"a":[1,null,{"b":false}],"c":"x"}');
  });

  it('tracks the path of the value being written', () => {
    const writer = new JsonWriter();
    writer.beginObject().name('a').beginArray().value(1);
    expect(writer.path).toBe('$.a[1]');
  });

  it('refuses to render an incomplete document', () => {
    const writer = new JsonWriter().beginObject();
    expect(() => writer.toString()).toThrow('Incomplete document');
  });

  it('rejects non-finite numbers', () => {
    expect(() => new JsonWriter().value(Number.NaN)).toThrow(
      'Numeric values must be finite, but was NaN'
    );
  });

  it('rejects names outside of objects', () => {
    expect(() => new JsonWriter().name('a')).toThrow(WriterStateError);
  });

  it('rejects a second top-level value', () => {
    const writer = new JsonWriter().value(1);
    expect(() => writer.value(2)).toThrow('JSON must have only one top-level value');
  });

  it('validates its options', () => {
    expect(() => new JsonWriter({ indent: 'x' })).toThrow(
      'indent may only contain spaces and tabs'
    );
  });
});
