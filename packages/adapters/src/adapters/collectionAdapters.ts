import type { JsonReader, JsonWriter } from '@lattice/json-stream';
import type { AdapterResolver, JsonAdapterFactory } from '../registry/JsonAdapterFactory';
import { TypeDescriptor } from '../types/TypeDescriptor';
import { Types } from '../types/Types';
import { JsonAdapter } from './JsonAdapter';

export class ListJsonAdapter<E> extends JsonAdapter<E[]> {
  constructor(private readonly element: JsonAdapter<E>) {
    super();
  }

  fromJson(reader: JsonReader): E[] {
    const result: E[] = [];
    reader.beginArray();
    while (reader.hasNext()) {
      result.push(this.element.fromJson(reader));
    }
    reader.endArray();
    return result;
  }

  toJson(writer: JsonWriter, value: readonly E[]): void {
    writer.beginArray();
    for (const item of value) {
      this.element.toJson(writer, item);
    }
    writer.endArray();
  }

  override toString(): string {
    return `${this.element.toString()}.collection()`;
  }
}

/** Insertion order follows the document; repeated elements collapse. */
export class SetJsonAdapter<E> extends JsonAdapter<Set<E>> {
  constructor(private readonly element: JsonAdapter<E>) {
    super();
  }

  fromJson(reader: JsonReader): Set<E> {
    const result = new Set<E>();
    reader.beginArray();
    while (reader.hasNext()) {
      result.add(this.element.fromJson(reader));
    }
    reader.endArray();
    return result;
  }

  toJson(writer: JsonWriter, value: ReadonlySet<E>): void {
    writer.beginArray();
    for (const item of value) {
      this.element.toJson(writer, item);
    }
    writer.endArray();
  }

  override toString(): string {
    return `${this.element.toString()}.collection()`;
  }
}

export class MapJsonAdapter<V> extends JsonAdapter<Map<string, V>> {
  constructor(private readonly valueAdapter: JsonAdapter<V>) {
    super();
  }

  fromJson(reader: JsonReader): Map<string, V> {
    const result = new Map<string, V>();
    reader.beginObject();
    while (reader.hasNext()) {
      const name = reader.nextName();
      const value = this.valueAdapter.fromJson(reader);
      if (result.has(name)) {
        throw reader.dataError(`Map key '${name}' has multiple values`);
      }
      result.set(name, value);
    }
    reader.endObject();
    return result;
  }

  toJson(writer: JsonWriter, value: ReadonlyMap<string, V>): void {
    writer.beginObject();
    for (const [name, item] of value) {
      writer.name(name);
      this.valueAdapter.toJson(writer, item);
    }
    writer.endObject();
  }

  override toString(): string {
    return `JsonAdapter(String=${this.valueAdapter.toString()})`;
  }
}

const resolvedArgument = (type: TypeDescriptor, index: number): TypeDescriptor | null => {
  const argument = type.typeArguments[index];
  return argument instanceof TypeDescriptor ? argument : null;
};

/** Lists, sets and string-keyed maps of any resolvable element type. */
export const collectionAdapterFactory: JsonAdapterFactory = {
  name: 'collections',
  create(type: TypeDescriptor, resolver: AdapterResolver) {
    if (type.qualifiers.length > 0) return null;
    if (type.rawType === Types.list || type.rawType === Types.set) {
      const element = resolvedArgument(type, 0);
      if (element === null) return null;
      const elementAdapter = resolver.adapterFor(element);
      return type.rawType === Types.list
        ? new ListJsonAdapter(elementAdapter)
        : new SetJsonAdapter(elementAdapter);
    }
    if (type.rawType === Types.map) {
      const key = resolvedArgument(type, 0);
      const value = resolvedArgument(type, 1);
      if (key === null || value === null || !key.equals(TypeDescriptor.of(Types.string))) {
        return null;
      }
      return new MapJsonAdapter(resolver.adapterFor(value));
    }
    return null;
  },
};
