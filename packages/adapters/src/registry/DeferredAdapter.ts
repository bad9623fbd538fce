import type { JsonReader, JsonWriter } from '@lattice/json-stream';
import { JsonAdapter } from '../adapters/JsonAdapter';
import { UninitializedAdapterError } from '../errors';
import type { TypeDescriptor } from '../types/TypeDescriptor';

/**
 * Stands in for an adapter whose construction is still in progress, so that
 * a self-referential type can capture it. Bound exactly once, after which it
 * forwards every call.
 */
export class DeferredAdapter<T> extends JsonAdapter<T> {
  private delegate: JsonAdapter<T> | null = null;

  constructor(readonly type: TypeDescriptor<T>) {
    super();
  }

  bind(adapter: JsonAdapter<T>): void {
    if (this.delegate === null) {
      this.delegate = adapter;
    }
  }

  fromJson(reader: JsonReader): T {
    return this.resolved().fromJson(reader);
  }

  toJson(writer: JsonWriter, value: T): void {
    this.resolved().toJson(writer, value);
  }

  override toString(): string {
    return this.delegate === null
      ? `DeferredAdapter(${this.type.toString()})`
      : this.delegate.toString();
  }

  private resolved(): JsonAdapter<T> {
    if (this.delegate === null) {
      throw new UninitializedAdapterError(this.type);
    }
    return this.delegate;
  }
}
