import type { JsonAdapter } from '../adapters/JsonAdapter';
import type { AdapterResolver, JsonAdapterFactory } from '../registry/JsonAdapterFactory';
import type { RawType } from '../types/RawType';
import type { TypeDescriptor } from '../types/TypeDescriptor';

/** Anything that can build the adapter for one raw type, usually a record. */
export interface AdapterSource {
  readonly rawType: RawType;
  createAdapter(type: TypeDescriptor, resolver: AdapterResolver): JsonAdapter<unknown>;
}

/**
 * Dispatches on the raw type to the registered generated adapters.
 * Qualified descriptors are left to other factories.
 */
export class GeneratedAdapterFactory implements JsonAdapterFactory {
  readonly name = 'generated';
  private readonly byRawType: ReadonlyMap<RawType, AdapterSource>;

  constructor(sources: readonly AdapterSource[]) {
    this.byRawType = new Map(sources.map((source) => [source.rawType, source]));
  }

  create(type: TypeDescriptor, resolver: AdapterResolver): JsonAdapter<unknown> | null {
    if (type.qualifiers.length > 0) return null;
    const source = this.byRawType.get(type.rawType);
    return source === undefined ? null : source.createAdapter(type, resolver);
  }
}
