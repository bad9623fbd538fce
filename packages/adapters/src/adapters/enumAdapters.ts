import type { JsonReader, JsonWriter } from '@lattice/json-stream';
import type { JsonAdapterFactory } from '../registry/JsonAdapterFactory';
import { EnumType, type EnumConstant } from '../types/EnumType';
import type { TypeDescriptor } from '../types/TypeDescriptor';
import { JsonAdapter } from './JsonAdapter';

/** Encodes constants by their JSON name. */
export class EnumJsonAdapter<C extends string> extends JsonAdapter<EnumConstant<C>> {
  constructor(private readonly enumType: EnumType<C>) {
    super();
  }

  fromJson(reader: JsonReader): EnumConstant<C> {
    const name = reader.nextString();
    const constant = this.enumType.fromJsonName(name);
    if (constant === undefined) {
      const expected = this.enumType.constants.map((item) => item.jsonName).join(', ');
      throw reader.dataError(`Expected one of [${expected}] but was ${name}`);
    }
    return constant;
  }

  toJson(writer: JsonWriter, value: EnumConstant<C>): void {
    writer.value(value.jsonName);
  }

  override toString(): string {
    return `JsonAdapter(${this.enumType.qualifiedName})`;
  }
}

export const enumAdapterFactory: JsonAdapterFactory = {
  name: 'enums',
  create(type: TypeDescriptor) {
    if (type.qualifiers.length > 0 || !(type.rawType instanceof EnumType)) return null;
    return new EnumJsonAdapter(type.rawType);
  },
};
