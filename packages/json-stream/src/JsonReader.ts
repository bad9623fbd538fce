import { JsonStreamErrorCodes, MalformedInputError } from './errors';
import {
  JsonScopes,
  JsonTokens,
  renderJsonPath,
  type JsonScope,
  type JsonToken,
} from './types';

type Peeked =
  | Readonly<{
      token:
        | typeof JsonTokens.beginArray
        | typeof JsonTokens.endArray
        | typeof JsonTokens.beginObject
        | typeof JsonTokens.endObject
        | typeof JsonTokens.null
        | typeof JsonTokens.endDocument;
    }>
  | Readonly<{
      token: typeof JsonTokens.name | typeof JsonTokens.string;
      value: string;
    }>
  | Readonly<{ token: typeof JsonTokens.number; text: string }>
  | Readonly<{ token: typeof JsonTokens.boolean; value: boolean }>;

type MalformedCode = ConstructorParameters<typeof MalformedInputError>[1];

const NUMBER_PATTERN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const TOKEN_CONTINUATION = /[0-9A-Za-z_.+-]/;
const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

const LITERALS: ReadonlyArray<readonly [string, Peeked]> = [
  ['true', { token: JsonTokens.boolean, value: true }],
  ['false', { token: JsonTokens.boolean, value: false }],
  ['null', { token: JsonTokens.null }],
];

const ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

/**
 * Pull-style reader over a complete JSON document.
 *
 * Values are consumed one token at a time in document order. The grammar is
 * strict RFC 8259: no comments, no trailing commas, no unquoted names and a
 * single top-level value.
 */
export class JsonReader {
  private pos = 0;
  private peeked: Peeked | null = null;
  private readonly scopes: JsonScope[] = [JsonScopes.emptyDocument];
  private readonly pathNames: Array<string | null> = [null];
  private readonly pathIndices: number[] = [0];

  private constructor(private readonly text: string) {}

  static fromText(text: string): JsonReader {
    return new JsonReader(text);
  }

  get path(): string {
    return renderJsonPath(this.scopes, this.pathNames, this.pathIndices);
  }

  peek(): JsonToken {
    return this.fill().token;
  }

  hasNext(): boolean {
    const token = this.peek();
    return (
      token !== JsonTokens.endObject &&
      token !== JsonTokens.endArray &&
      token !== JsonTokens.endDocument
    );
  }

  beginArray(): void {
    this.expect(JsonTokens.beginArray);
    this.push(JsonScopes.emptyArray);
  }

  endArray(): void {
    this.expect(JsonTokens.endArray);
    this.pop();
  }

  beginObject(): void {
    this.expect(JsonTokens.beginObject);
    this.push(JsonScopes.emptyObject);
  }

  endObject(): void {
    this.expect(JsonTokens.endObject);
    this.pop();
  }

  nextName(): string {
    const peeked = this.fill();
    if (peeked.token !== JsonTokens.name) {
      throw this.unexpected('a name', peeked.token);
    }
    this.peeked = null;
    this.pathNames[this.pathNames.length - 1] = peeked.value;
    return peeked.value;
  }

  /** Reads a string value; a number token is returned as its literal text. */
  nextString(): string {
    const peeked = this.fill();
    let result: string;
    if (peeked.token === JsonTokens.string) {
      result = peeked.value;
    } else if (peeked.token === JsonTokens.number) {
      result = peeked.text;
    } else {
      throw this.unexpected('a string', peeked.token);
    }
    this.afterValue();
    return result;
  }

  nextNumber(): number {
    const peeked = this.fill();
    if (peeked.token !== JsonTokens.number) {
      throw this.unexpected('a number', peeked.token);
    }
    const value = Number(peeked.text);
    if (!Number.isFinite(value)) {
      throw this.malformed(
        `JSON forbids NaN and infinities: ${peeked.text}`,
        JsonStreamErrorCodes.invalidNumber
      );
    }
    this.afterValue();
    return value;
  }

  nextInt(): number {
    const peeked = this.fill();
    if (peeked.token !== JsonTokens.number) {
      throw this.unexpected('an int', peeked.token);
    }
    const value = Number(peeked.text);
    if (!Number.isInteger(value) || value < INT32_MIN || value > INT32_MAX) {
      throw this.malformed(
        `Expected an int but was ${peeked.text}`,
        JsonStreamErrorCodes.invalidNumber
      );
    }
    this.afterValue();
    return value;
  }

  nextBoolean(): boolean {
    const peeked = this.fill();
    if (peeked.token !== JsonTokens.boolean) {
      throw this.unexpected('a boolean', peeked.token);
    }
    this.afterValue();
    return peeked.value;
  }

  nextNull(): null {
    this.expect(JsonTokens.null);
    this.afterValue();
    return null;
  }

  /**
   * Consumes the next value whatever its shape. When positioned on a name,
   * the name and its value are both consumed.
   */
  skipValue(): void {
    let depth = 0;
    for (;;) {
      const token = this.peek();
      switch (token) {
        case JsonTokens.beginArray:
          this.beginArray();
          depth += 1;
          break;
        case JsonTokens.beginObject:
          this.beginObject();
          depth += 1;
          break;
        case JsonTokens.endArray:
          if (depth === 0) throw this.unexpected('a value', token);
          this.endArray();
          depth -= 1;
          break;
        case JsonTokens.endObject:
          if (depth === 0) throw this.unexpected('a value', token);
          this.endObject();
          depth -= 1;
          break;
        case JsonTokens.name:
          this.nextName();
          continue;
        case JsonTokens.string:
        case JsonTokens.number:
          this.nextString();
          break;
        case JsonTokens.boolean:
          this.nextBoolean();
          break;
        case JsonTokens.null:
          this.nextNull();
          break;
        case JsonTokens.endDocument:
          throw this.malformed(
            'Unexpected end of input',
            JsonStreamErrorCodes.truncated
          );
      }
      if (depth === 0) return;
    }
  }

  assertFullyConsumed(): void {
    const token = this.peek();
    if (token !== JsonTokens.endDocument) {
      throw this.malformed(
        `JSON document was not fully consumed, next token is ${token}`,
        JsonStreamErrorCodes.trailingData
      );
    }
  }

  /** An error at the current path, for callers rejecting a well-formed value. */
  dataError(
    message: string,
    code: MalformedCode = JsonStreamErrorCodes.unexpectedToken
  ): MalformedInputError {
    return this.malformed(message, code);
  }

  private fill(): Peeked {
    if (this.peeked === null) {
      this.peeked = this.doPeek();
    }
    return this.peeked;
  }

  private expect(token: JsonToken): void {
    const peeked = this.fill();
    if (peeked.token !== token) {
      throw this.unexpected(token, peeked.token);
    }
    this.peeked = null;
  }

  private push(scope: JsonScope): void {
    this.scopes.push(scope);
    this.pathNames.push(null);
    this.pathIndices.push(0);
  }

  private pop(): void {
    this.scopes.pop();
    this.pathNames.pop();
    this.pathIndices.pop();
    this.afterValue();
  }

  private afterValue(): void {
    this.peeked = null;
    const top = this.pathIndices.length - 1;
    this.pathIndices[top] = (this.pathIndices[top] ?? 0) + 1;
  }

  private doPeek(): Peeked {
    const depth = this.scopes.length - 1;
    const scope = this.scopes[depth];

    switch (scope) {
      case JsonScopes.emptyArray:
      case JsonScopes.nonemptyArray: {
        this.scopes[depth] = JsonScopes.nonemptyArray;
        const c = this.nextNonWhitespace();
        if (c === ']') {
          this.pos += 1;
          return { token: JsonTokens.endArray };
        }
        if (scope === JsonScopes.nonemptyArray) {
          if (c !== ',') {
            throw this.endOrSyntax(c, 'Unterminated array');
          }
          this.pos += 1;
        }
        break;
      }
      case JsonScopes.emptyObject:
      case JsonScopes.nonemptyObject: {
        this.scopes[depth] = JsonScopes.danglingName;
        let c = this.nextNonWhitespace();
        if (scope === JsonScopes.nonemptyObject) {
          if (c === '}') {
            this.pos += 1;
            return { token: JsonTokens.endObject };
          }
          if (c !== ',') {
            throw this.endOrSyntax(c, 'Unterminated object');
          }
          this.pos += 1;
          c = this.nextNonWhitespace();
        }
        if (c === '"') {
          this.pos += 1;
          return { token: JsonTokens.name, value: this.readString() };
        }
        if (c === '}' && scope === JsonScopes.emptyObject) {
          this.pos += 1;
          return { token: JsonTokens.endObject };
        }
        throw this.endOrSyntax(c, 'Expected name');
      }
      case JsonScopes.danglingName: {
        this.scopes[depth] = JsonScopes.nonemptyObject;
        const c = this.nextNonWhitespace();
        if (c !== ':') {
          throw this.endOrSyntax(c, "Expected ':'");
        }
        this.pos += 1;
        break;
      }
      case JsonScopes.emptyDocument:
        this.scopes[depth] = JsonScopes.nonemptyDocument;
        break;
      case JsonScopes.nonemptyDocument: {
        const c = this.nextNonWhitespace();
        if (c === undefined) {
          return { token: JsonTokens.endDocument };
        }
        throw this.malformed(
          'Expected end of document',
          JsonStreamErrorCodes.trailingData
        );
      }
    }

    return this.readValue();
  }

  private readValue(): Peeked {
    const c = this.nextNonWhitespace();
    switch (c) {
      case undefined:
        throw this.malformed(
          'Unexpected end of input',
          JsonStreamErrorCodes.truncated
        );
      case '[':
        this.pos += 1;
        return { token: JsonTokens.beginArray };
      case '{':
        this.pos += 1;
        return { token: JsonTokens.beginObject };
      case '"':
        this.pos += 1;
        return { token: JsonTokens.string, value: this.readString() };
      case 't':
      case 'f':
      case 'n':
        return this.readLiteral();
      default:
        return this.readNumber();
    }
  }

  private readLiteral(): Peeked {
    for (const [word, peeked] of LITERALS) {
      const end = this.pos + word.length;
      if (
        this.text.startsWith(word, this.pos) &&
        !TOKEN_CONTINUATION.test(this.text.charAt(end))
      ) {
        this.pos = end;
        return peeked;
      }
    }
    throw this.malformed('Unexpected character', JsonStreamErrorCodes.syntax);
  }

  private readNumber(): Peeked {
    NUMBER_PATTERN.lastIndex = this.pos;
    const match = NUMBER_PATTERN.exec(this.text);
    if (match === null) {
      throw this.malformed('Unexpected character', JsonStreamErrorCodes.syntax);
    }
    const end = this.pos + match[0].length;
    if (TOKEN_CONTINUATION.test(this.text.charAt(end))) {
      throw this.malformed('Malformed number', JsonStreamErrorCodes.syntax);
    }
    this.pos = end;
    return { token: JsonTokens.number, text: match[0] };
  }

  /** Reads string content; `pos` is just past the opening quote. */
  private readString(): string {
    let result = '';
    let start = this.pos;
    for (;;) {
      if (this.pos >= this.text.length) {
        throw this.malformed(
          'Unterminated string',
          JsonStreamErrorCodes.truncated
        );
      }
      const code = this.text.charCodeAt(this.pos);
      if (code === 0x22) {
        result += this.text.slice(start, this.pos);
        this.pos += 1;
        return result;
      }
      if (code === 0x5c) {
        result += this.text.slice(start, this.pos);
        this.pos += 1;
        result += this.readEscape();
        start = this.pos;
        continue;
      }
      if (code < 0x20) {
        throw this.malformed(
          'Unescaped control character in string',
          JsonStreamErrorCodes.syntax
        );
      }
      this.pos += 1;
    }
  }

  private readEscape(): string {
    if (this.pos >= this.text.length) {
      throw this.malformed(
        'Unterminated escape sequence',
        JsonStreamErrorCodes.truncated
      );
    }
    const c = this.text.charAt(this.pos);
    this.pos += 1;
    if (c === 'u') {
      const hex = this.text.slice(this.pos, this.pos + 4);
      if (hex.length < 4) {
        throw this.malformed(
          'Unterminated escape sequence',
          JsonStreamErrorCodes.truncated
        );
      }
      if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
        throw this.malformed(
          `Invalid escape sequence \\u${hex}`,
          JsonStreamErrorCodes.syntax
        );
      }
      this.pos += 4;
      return String.fromCharCode(Number.parseInt(hex, 16));
    }
    const escaped = ESCAPES[c];
    if (escaped === undefined) {
      throw this.malformed(
        `Invalid escape sequence \\${c}`,
        JsonStreamErrorCodes.syntax
      );
    }
    return escaped;
  }

  private nextNonWhitespace(): string | undefined {
    while (this.pos < this.text.length) {
      const c = this.text.charAt(this.pos);
      if (c !== ' ' && c !== '\t' && c !== '\n' && c !== '\r') {
        return c;
      }
      this.pos += 1;
    }
    return undefined;
  }

  private endOrSyntax(c: string | undefined, message: string): MalformedInputError {
    return c === undefined
      ? this.malformed(message, JsonStreamErrorCodes.truncated)
      : this.malformed(message, JsonStreamErrorCodes.syntax);
  }

  private unexpected(expected: string, actual: JsonToken): MalformedInputError {
    return this.malformed(
      `Expected ${expected} but was ${actual}`,
      JsonStreamErrorCodes.unexpectedToken
    );
  }

  private malformed(message: string, code: MalformedCode): MalformedInputError {
    return new MalformedInputError(message, code, this.path, this.pos);
  }
}
