import {
  JsonReader,
  JsonTokens,
  JsonWriter,
  type JsonWriterOptions,
} from '@lattice/json-stream';
import { UnexpectedNullError } from '../errors';

/**
 * Converts between JSON tokens and values of `T`. Adapters are stateless
 * once built and may be shared by any number of callers.
 */
export abstract class JsonAdapter<T> {
  abstract fromJson(reader: JsonReader): T;

  abstract toJson(writer: JsonWriter, value: T): void;

  /** Decodes a whole document; trailing tokens are an error. */
  fromJsonText(text: string): T {
    const reader = JsonReader.fromText(text);
    const value = this.fromJson(reader);
    reader.assertFullyConsumed();
    return value;
  }

  toJsonText(value: T, options: JsonWriterOptions = {}): string {
    const writer = new JsonWriter(options);
    this.toJson(writer, value);
    return writer.toString();
  }

  /** Accepts and emits JSON null in addition to what this adapter handles. */
  nullSafe(): JsonAdapter<T | null> {
    return new NullSafeJsonAdapter(this);
  }

  /** Rejects null in both directions. */
  nonNull(): JsonAdapter<NonNullable<T>> {
    return new NonNullJsonAdapter(this);
  }

  toString(): string {
    return 'JsonAdapter';
  }
}

class NullSafeJsonAdapter<T> extends JsonAdapter<T | null> {
  constructor(private readonly delegate: JsonAdapter<T>) {
    super();
  }

  fromJson(reader: JsonReader): T | null {
    if (reader.peek() === JsonTokens.null) {
      return reader.nextNull();
    }
    return this.delegate.fromJson(reader);
  }

  toJson(writer: JsonWriter, value: T | null | undefined): void {
    if (value === null || value === undefined) {
      writer.nullValue();
      return;
    }
    this.delegate.toJson(writer, value);
  }

  override nullSafe(): JsonAdapter<T | null> {
    return this;
  }

  override toString(): string {
    return `${this.delegate.toString()}.nullSafe()`;
  }
}

class NonNullJsonAdapter<T> extends JsonAdapter<NonNullable<T>> {
  constructor(private readonly delegate: JsonAdapter<T>) {
    super();
  }

  fromJson(reader: JsonReader): NonNullable<T> {
    if (reader.peek() === JsonTokens.null) {
      throw new UnexpectedNullError(reader.path);
    }
    const value = this.delegate.fromJson(reader);
    if (value === null || value === undefined) {
      throw new UnexpectedNullError(reader.path);
    }
    return value;
  }

  toJson(writer: JsonWriter, value: NonNullable<T> | null | undefined): void {
    if (value === null || value === undefined) {
      throw new UnexpectedNullError(writer.path);
    }
    this.delegate.toJson(writer, value);
  }

  override toString(): string {
    return `${this.delegate.toString()}.nonNull()`;
  }
}
