import { JsonTokens, type JsonReader, type JsonWriter } from '@lattice/json-stream';
import { JsonAdapter } from '../adapters/JsonAdapter';
import { MissingPropertiesError } from '../errors';
import type { BoundProperty, RecordProperties } from './RecordType';

const ABSENT: unique symbol = Symbol('absent');

/**
 * Adapter for a declared record. Decoding accepts members in any order,
 * skips unknown names and keeps the last of repeated ones; every missing
 * required property is reported at once. Encoding writes properties in
 * declaration order.
 */
export class ObjectAdapter<T> extends JsonAdapter<T> {
  private readonly indexByJsonName: ReadonlyMap<string, number>;

  constructor(
    readonly qualifiedName: string,
    private readonly properties: readonly BoundProperty<T>[],
    private readonly construct: (properties: RecordProperties<T>) => T
  ) {
    super();
    this.indexByJsonName = new Map(
      properties.map((property, index) => [property.descriptor.jsonName, index])
    );
  }

  fromJson(reader: JsonReader): T {
    const slots: unknown[] = this.properties.map(() => ABSENT);
    reader.beginObject();
    while (reader.hasNext()) {
      const index = this.indexByJsonName.get(reader.nextName());
      const property = index === undefined ? undefined : this.properties[index];
      if (index === undefined || property === undefined) {
        reader.skipValue();
        continue;
      }
      if (!property.descriptor.nullable && reader.peek() === JsonTokens.null) {
        // Null for a non-nullable property counts as absent.
        reader.nextNull();
        slots[index] = ABSENT;
        continue;
      }
      slots[index] = property.adapter.fromJson(reader);
    }
    reader.endObject();

    const missing = this.properties
      .filter((property, index) => property.descriptor.required && slots[index] === ABSENT)
      .map((property) => property.descriptor.name);
    if (missing.length > 0) {
      throw new MissingPropertiesError(missing);
    }

    const values = this.properties.map(({ descriptor }, index): readonly [string, unknown] => {
      const slot = slots[index];
      if (slot !== ABSENT) return [descriptor.name, slot];
      return [descriptor.name, descriptor.defaultValue === null ? null : descriptor.defaultValue()];
    });
    const properties: unknown = Object.fromEntries(values);
    // One entry per declared property, each decoded by the adapter for its declared type.
    return this.construct(properties as RecordProperties<T>);
  }

  toJson(writer: JsonWriter, value: T): void {
    writer.beginObject();
    for (const { descriptor, adapter } of this.properties) {
      writer.name(descriptor.jsonName);
      adapter.toJson(writer, value[descriptor.name]);
    }
    writer.endObject();
  }

  override toString(): string {
    return `GeneratedJsonAdapter(${this.qualifiedName})`;
  }
}
