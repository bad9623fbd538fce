export const JsonStreamErrorCodes = {
  syntax: 'syntax',
  truncated: 'truncated',
  unexpectedToken: 'unexpected_token',
  invalidNumber: 'invalid_number',
  trailingData: 'trailing_data',
  writerState: 'writer_state',
} as const;

export type JsonStreamErrorCode =
  (typeof JsonStreamErrorCodes)[keyof typeof JsonStreamErrorCodes];

export class JsonStreamError extends Error {
  constructor(
    message: string,
    readonly code: JsonStreamErrorCode,
    readonly path: string
  ) {
    super(message);
    this.name = 'JsonStreamError';
  }
}

/**
 * Raised by the reader when the token stream does not match what the caller
 * asked for, or when the text is not well-formed JSON.
 */
export class MalformedInputError extends JsonStreamError {
  constructor(
    message: string,
    code: Exclude<JsonStreamErrorCode, 'writer_state'>,
    path: string,
    readonly offset: number
  ) {
    super(`${message} at path ${path}`, code, path);
    this.name = 'MalformedInputError';
  }
}

export class WriterStateError extends JsonStreamError {
  constructor(message: string, path: string) {
    super(message, JsonStreamErrorCodes.writerState, path);
    this.name = 'WriterStateError';
  }
}
