import { z } from 'zod';
import { WriterStateError } from './errors';
import { isJsonArray } from './jsonValue';
import { JsonScopes, renderJsonPath, type JsonScope, type JsonValue } from './types';

export const jsonWriterOptionsSchema = z
  .object({
    /** Whitespace written once per nesting level; empty means compact output. */
    indent: z
      .string()
      .regex(/^[ \t]*$/, 'indent may only contain spaces and tabs')
      .default(''),
    /** When false, an object member whose value is null is left out. */
    serializeNulls: z.boolean().default(true),
  })
  .strict();

export type JsonWriterOptions = z.input<typeof jsonWriterOptionsSchema>;
export type ResolvedJsonWriterOptions = z.output<typeof jsonWriterOptionsSchema>;

const escapeString = (value: string): string =>
  JSON.stringify(value).replace(/\u2028/g, '\\u2028').replace(/\u2029/g, '\\u2029');

/**
 * Push-style writer producing JSON text.
 *
 * Names are held back until their value arrives so that null members can be
 * dropped when `serializeNulls` is off.
 */
export class JsonWriter {
  readonly indent: string;
  readonly serializeNulls: boolean;
  private readonly out: string[] = [];
  private readonly scopes: JsonScope[] = [JsonScopes.emptyDocument];
  private readonly pathNames: Array<string | null> = [null];
  private readonly pathIndices: number[] = [0];
  private deferredName: string | null = null;

  constructor(options: JsonWriterOptions = {}) {
    const resolved = jsonWriterOptionsSchema.parse(options);
    this.indent = resolved.indent;
    this.serializeNulls = resolved.serializeNulls;
  }

  get path(): string {
    return renderJsonPath(this.scopes, this.pathNames, this.pathIndices);
  }

  beginObject(): this {
    this.writeDeferredName();
    this.beforeValue();
    this.push(JsonScopes.emptyObject);
    this.out.push('{');
    return this;
  }

  endObject(): this {
    return this.close(JsonScopes.emptyObject, JsonScopes.nonemptyObject, '}');
  }

  beginArray(): this {
    this.writeDeferredName();
    this.beforeValue();
    this.push(JsonScopes.emptyArray);
    this.out.push('[');
    return this;
  }

  endArray(): this {
    return this.close(JsonScopes.emptyArray, JsonScopes.nonemptyArray, ']');
  }

  name(name: string): this {
    const scope = this.top();
    if (scope !== JsonScopes.emptyObject && scope !== JsonScopes.nonemptyObject) {
      throw new WriterStateError('Nesting problem: name outside of an object', this.path);
    }
    if (this.deferredName !== null) {
      throw new WriterStateError('Nesting problem: name written twice', this.path);
    }
    this.deferredName = name;
    this.pathNames[this.pathNames.length - 1] = name;
    return this;
  }

  value(value: string | number | boolean): this {
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new WriterStateError(`Numeric values must be finite, but was ${value}`, this.path);
    }
    this.writeDeferredName();
    this.beforeValue();
    this.out.push(typeof value === 'string' ? escapeString(value) : String(value));
    this.afterValue();
    return this;
  }

  nullValue(): this {
    if (this.deferredName !== null) {
      if (!this.serializeNulls) {
        this.deferredName = null;
        return this;
      }
      this.writeDeferredName();
    }
    this.beforeValue();
    this.out.push('null');
    this.afterValue();
    return this;
  }

  jsonValue(value: JsonValue): this {
    if (value === null) {
      return this.nullValue();
    }
    if (isJsonArray(value)) {
      this.beginArray();
      for (const element of value) {
        this.jsonValue(element);
      }
      return this.endArray();
    }
    if (typeof value === 'object') {
      this.beginObject();
      for (const [key, member] of Object.entries(value)) {
        this.name(key).jsonValue(member);
      }
      return this.endObject();
    }
    return this.value(value);
  }

  /** Returns the text written so far; the document must be complete. */
  toString(): string {
    if (this.scopes.length !== 1 || this.top() !== JsonScopes.nonemptyDocument) {
      throw new WriterStateError('Incomplete document', this.path);
    }
    return this.out.join('');
  }

  private top(): JsonScope {
    const scope = this.scopes[this.scopes.length - 1];
    if (scope === undefined) {
      throw new WriterStateError('Writer scope stack is empty', '$');
    }
    return scope;
  }

  private replaceTop(scope: JsonScope): void {
    this.scopes[this.scopes.length - 1] = scope;
  }

  private push(scope: JsonScope): void {
    this.scopes.push(scope);
    this.pathNames.push(null);
    this.pathIndices.push(0);
  }

  private close(empty: JsonScope, nonempty: JsonScope, bracket: string): this {
    const scope = this.top();
    if (scope !== empty && scope !== nonempty) {
      throw new WriterStateError('Nesting problem', this.path);
    }
    if (this.deferredName !== null) {
      throw new WriterStateError(`Dangling name: ${this.deferredName}`, this.path);
    }
    this.scopes.pop();
    this.pathNames.pop();
    this.pathIndices.pop();
    if (scope === nonempty) {
      this.newline();
    }
    this.out.push(bracket);
    this.afterValue();
    return this;
  }

  private afterValue(): void {
    const top = this.pathIndices.length - 1;
    this.pathIndices[top] = (this.pathIndices[top] ?? 0) + 1;
  }

  private newline(): void {
    if (this.indent === '') return;
    this.out.push('\n', this.indent.repeat(this.scopes.length - 1));
  }

  private writeDeferredName(): void {
    if (this.deferredName === null) return;
    const scope = this.top();
    if (scope === JsonScopes.nonemptyObject) {
      this.out.push(',');
    } else if (scope !== JsonScopes.emptyObject) {
      throw new WriterStateError('Nesting problem', this.path);
    }
    this.newline();
    this.replaceTop(JsonScopes.danglingName);
    this.out.push(escapeString(this.deferredName));
    this.deferredName = null;
  }

  private beforeValue(): void {
    switch (this.top()) {
      case JsonScopes.emptyDocument:
        this.replaceTop(JsonScopes.nonemptyDocument);
        return;
      case JsonScopes.nonemptyDocument:
        throw new WriterStateError('JSON must have only one top-level value', this.path);
      case JsonScopes.emptyArray:
        this.replaceTop(JsonScopes.nonemptyArray);
        this.newline();
        return;
      case JsonScopes.nonemptyArray:
        this.out.push(',');
        this.newline();
        return;
      case JsonScopes.danglingName:
        this.out.push(this.indent === '' ? ':' : ': ');
        this.replaceTop(JsonScopes.nonemptyObject);
        return;
      default:
        throw new WriterStateError('Nesting problem', this.path);
    }
  }
}
