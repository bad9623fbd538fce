export {
  JsonTokens,
  JsonScopes,
  renderJsonPath,
  type JsonToken,
  type JsonScope,
  type JsonValue,
} from './types';
export {
  JsonStreamError,
  JsonStreamErrorCodes,
  MalformedInputError,
  WriterStateError,
  type JsonStreamErrorCode,
} from './errors';
export { JsonReader } from './JsonReader';
export {
  JsonWriter,
  jsonWriterOptionsSchema,
  type JsonWriterOptions,
  type ResolvedJsonWriterOptions,
} from './JsonWriter';
export { readJsonValue, writeJsonValue, isJsonArray } from './jsonValue';
