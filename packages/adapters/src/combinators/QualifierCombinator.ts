import type { JsonReader, JsonWriter } from '@lattice/json-stream';
import { z } from 'zod';
import { JsonAdapter } from '../adapters/JsonAdapter';
import { InvalidDeclarationError } from '../errors';
import type { QualifierMarker } from '../qualifiers/QualifierMarker';
import type { AdapterResolver, JsonAdapterFactory } from '../registry/JsonAdapterFactory';
import type { RawType } from '../types/RawType';
import { toDescriptor, type TypeDescriptor } from '../types/TypeDescriptor';

export const WrapperLayerKinds = {
  object: 'object',
  array: 'array',
} as const;

/** One level of JSON structure wrapped around the delegate's value. */
export type WrapperLayer =
  | Readonly<{ kind: typeof WrapperLayerKinds.object; name: string }>
  | Readonly<{ kind: typeof WrapperLayerKinds.array }>;

export const objectLayer = (name: string): WrapperLayer => ({
  kind: WrapperLayerKinds.object,
  name,
});

export const arrayLayer = (): WrapperLayer => ({ kind: WrapperLayerKinds.array });

const combinatorOptionsSchema = z.object({
  qualifiers: z.array(z.unknown()).min(1, 'at least one qualifier is required'),
  layers: z.array(z.unknown()).min(1, 'at least one wrapper layer is required'),
});

/**
 * Serves a qualified descriptor by wrapping the adapter of its unqualified
 * form in fixed layers: `[objectLayer('name'), arrayLayer()]` turns `"x"`
 * into `{"name":["x"]}`. Decoding expects exactly one member per object
 * layer, whatever its name, and one element per array layer.
 */
export class QualifierCombinator<T> extends JsonAdapter<T> {
  constructor(
    readonly type: TypeDescriptor<T>,
    private readonly layers: readonly WrapperLayer[],
    private readonly delegate: JsonAdapter<T>
  ) {
    super();
  }

  fromJson(reader: JsonReader): T {
    for (const layer of this.layers) {
      if (layer.kind === WrapperLayerKinds.object) {
        reader.beginObject();
        // The member name is only fixed on output.
        reader.nextName();
      } else {
        reader.beginArray();
      }
    }
    const value = this.delegate.fromJson(reader);
    for (const layer of [...this.layers].reverse()) {
      if (layer.kind === WrapperLayerKinds.object) {
        reader.endObject();
      } else {
        reader.endArray();
      }
    }
    return value;
  }

  toJson(writer: JsonWriter, value: T): void {
    for (const layer of this.layers) {
      if (layer.kind === WrapperLayerKinds.object) {
        writer.beginObject().name(layer.name);
      } else {
        writer.beginArray();
      }
    }
    this.delegate.toJson(writer, value);
    for (const layer of [...this.layers].reverse()) {
      if (layer.kind === WrapperLayerKinds.object) {
        writer.endObject();
      } else {
        writer.endArray();
      }
    }
  }

  override toString(): string {
    return `QualifierCombinator(${this.type.toString()})`;
  }
}

export type QualifierCombinatorOptions<T> = Readonly<{
  type: TypeDescriptor<T> | RawType<T>;
  qualifiers: readonly QualifierMarker[];
  layers: readonly WrapperLayer[];
}>;

/**
 * Factory matching exactly `type` qualified by `qualifiers`; the delegate is
 * the adapter registered for the type without qualifiers.
 */
export function qualifierCombinator<T>(options: QualifierCombinatorOptions<T>): JsonAdapterFactory {
  const checked = combinatorOptionsSchema.safeParse(options);
  if (!checked.success) {
    throw new InvalidDeclarationError(
      `Invalid qualifier combinator: ${checked.error.issues.map((issue) => issue.message).join('; ')}`
    );
  }
  const base = toDescriptor(options.type);
  const target = base.qualifiedBy(...options.qualifiers);
  return {
    name: `combinator(${target.toString()})`,
    create(type: TypeDescriptor, resolver: AdapterResolver) {
      if (!type.equals(target)) return null;
      return new QualifierCombinator(target, options.layers, resolver.adapterFor(base.withoutQualifiers()));
    },
  };
}
