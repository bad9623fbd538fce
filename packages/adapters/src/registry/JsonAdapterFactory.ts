import type { JsonAdapter } from '../adapters/JsonAdapter';
import type { RawType } from '../types/RawType';
import { toDescriptor, type TypeDescriptor } from '../types/TypeDescriptor';

/** Resolves adapters for nested descriptors while a factory builds its own. */
export interface AdapterResolver {
  adapterFor<T>(type: TypeDescriptor<T> | RawType<T>): JsonAdapter<T>;
}

/**
 * One link of the registry's factory chain. Returning null passes the
 * request on to the next factory.
 */
export interface JsonAdapterFactory {
  readonly name?: string;
  create(type: TypeDescriptor, resolver: AdapterResolver): JsonAdapter<unknown> | null;
}

/** Matches one descriptor exactly, qualifier set included. */
export class ExactAdapterFactory<T> implements JsonAdapterFactory {
  readonly name: string;

  constructor(
    readonly type: TypeDescriptor<T>,
    readonly adapter: JsonAdapter<T>
  ) {
    this.name = `exact(${type.toString()})`;
  }

  create(type: TypeDescriptor): JsonAdapter<T> | null {
    return type.equals(this.type) ? this.adapter : null;
  }
}

export const exactAdapterFactory = <T>(
  type: TypeDescriptor<T> | RawType<T>,
  adapter: JsonAdapter<T>
): ExactAdapterFactory<T> => new ExactAdapterFactory(toDescriptor(type), adapter);
