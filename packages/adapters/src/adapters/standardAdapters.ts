import {
  JsonStreamErrorCodes,
  readJsonValue,
  writeJsonValue,
  type JsonReader,
  type JsonValue,
  type JsonWriter,
} from '@lattice/json-stream';
import type { RawType } from '../types/RawType';
import type { TypeDescriptor } from '../types/TypeDescriptor';
import { Types } from '../types/Types';
import type { JsonAdapterFactory } from '../registry/JsonAdapterFactory';
import { JsonAdapter } from './JsonAdapter';

type Read<T> = (reader: JsonReader) => T;
type Write<T> = (writer: JsonWriter, value: T) => void;

class PrimitiveJsonAdapter<T> extends JsonAdapter<T> {
  constructor(
    private readonly typeName: string,
    private readonly read: Read<T>,
    private readonly write: Write<T>
  ) {
    super();
  }

  fromJson(reader: JsonReader): T {
    return this.read(reader);
  }

  toJson(writer: JsonWriter, value: T): void {
    this.write(writer, value);
  }

  override toString(): string {
    return `JsonAdapter(${this.typeName})`;
  }
}

const writeScalar: Write<string | number | boolean> = (writer, value) => {
  writer.value(value);
};

const readRangedInt =
  (label: string, min: number, max: number): Read<number> =>
  (reader) => {
    const value = reader.nextInt();
    if (value < min || value > max) {
      throw reader.dataError(
        `Expected ${label} but was ${value}`,
        JsonStreamErrorCodes.invalidNumber
      );
    }
    return value;
  };

const readByte = readRangedInt('a byte', -128, 255);
const readShort = readRangedInt('a short', -32_768, 32_767);

export const booleanAdapter = new PrimitiveJsonAdapter<boolean>(
  'Boolean',
  (reader) => reader.nextBoolean(),
  writeScalar
);

export const stringAdapter = new PrimitiveJsonAdapter<string>(
  'String',
  (reader) => reader.nextString(),
  writeScalar
);

export const doubleAdapter = new PrimitiveJsonAdapter<number>(
  'Double',
  (reader) => reader.nextNumber(),
  writeScalar
);

/** Values are rounded to 32-bit precision on the way in. */
export const floatAdapter = new PrimitiveJsonAdapter<number>(
  'Float',
  (reader) => Math.fround(reader.nextNumber()),
  writeScalar
);

export const intAdapter = new PrimitiveJsonAdapter<number>(
  'Int',
  (reader) => reader.nextInt(),
  writeScalar
);

export const longAdapter = new PrimitiveJsonAdapter<number>(
  'Long',
  (reader) => {
    const value = reader.nextNumber();
    if (!Number.isSafeInteger(value)) {
      throw reader.dataError(
        `Expected a long but was ${value}`,
        JsonStreamErrorCodes.invalidNumber
      );
    }
    return value;
  },
  writeScalar
);

export const shortAdapter = new PrimitiveJsonAdapter<number>(
  'Short',
  readShort,
  writeScalar
);

/**
 * Bytes are signed. Input from -128 to 255 is accepted, so 255 decodes to -1;
 * output is the unsigned form.
 */
export const byteAdapter = new PrimitiveJsonAdapter<number>(
  'Byte',
  (reader) => (readByte(reader) << 24) >> 24,
  (writer, value) => {
    writer.value(value & 0xff);
  }
);

/** A single UTF-16 code unit carried as a one-character string. */
export const charAdapter = new PrimitiveJsonAdapter<string>(
  'Char',
  (reader) => {
    const value = reader.nextString();
    if (value.length !== 1) {
      throw reader.dataError(`Expected a char but was ${JSON.stringify(value)}`);
    }
    return value;
  },
  writeScalar
);

export const jsonValueAdapter = new PrimitiveJsonAdapter<JsonValue>(
  'JsonValue',
  readJsonValue,
  writeJsonValue
);

const STANDARD_ADAPTERS: ReadonlyMap<RawType, JsonAdapter<unknown>> = new Map<
  RawType,
  JsonAdapter<unknown>
>([
  [Types.boolean, booleanAdapter],
  [Types.string, stringAdapter],
  [Types.double, doubleAdapter],
  [Types.float, floatAdapter],
  [Types.int, intAdapter],
  [Types.long, longAdapter],
  [Types.short, shortAdapter],
  [Types.byte, byteAdapter],
  [Types.char, charAdapter],
  [Types.jsonValue, jsonValueAdapter],
]);

/** Scalars and raw JSON; never matches a qualified descriptor. */
export const standardAdapterFactory: JsonAdapterFactory = {
  name: 'standard',
  create(type: TypeDescriptor) {
    if (type.qualifiers.length > 0) return null;
    return STANDARD_ADAPTERS.get(type.rawType) ?? null;
  },
};
