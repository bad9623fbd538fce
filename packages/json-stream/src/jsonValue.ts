import type { JsonReader } from './JsonReader';
import type { JsonWriter } from './JsonWriter';
import { JsonTokens, type JsonValue } from './types';

export const isJsonArray = (value: JsonValue): value is readonly JsonValue[] =>
  Array.isArray(value);

/**
 * Reads the next value as a plain JSON tree. Object member order follows the
 * document; a repeated name keeps its last value.
 */
export function readJsonValue(reader: JsonReader): JsonValue {
  switch (reader.peek()) {
    case JsonTokens.beginArray: {
      const elements: JsonValue[] = [];
      reader.beginArray();
      while (reader.hasNext()) {
        elements.push(readJsonValue(reader));
      }
      reader.endArray();
      return elements;
    }
    case JsonTokens.beginObject: {
      const members = new Map<string, JsonValue>();
      reader.beginObject();
      while (reader.hasNext()) {
        const name = reader.nextName();
        members.set(name, readJsonValue(reader));
      }
      reader.endObject();
      return Object.fromEntries(members);
    }
    case JsonTokens.string:
      return reader.nextString();
    case JsonTokens.number:
      return reader.nextNumber();
    case JsonTokens.boolean:
      return reader.nextBoolean();
    case JsonTokens.null:
      return reader.nextNull();
    default:
      // Lets the reader report the misplaced token with its path.
      return reader.nextString();
  }
}

export function writeJsonValue(writer: JsonWriter, value: JsonValue): void {
  writer.jsonValue(value);
}
