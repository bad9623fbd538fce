export type JsonValue =
  | string
  | number
  | boolean
  | null
  | { readonly [k: string]: JsonValue }
  | readonly JsonValue[];

export const JsonTokens = {
  beginArray: 'beginArray',
  endArray: 'endArray',
  beginObject: 'beginObject',
  endObject: 'endObject',
  name: 'name',
  string: 'string',
  number: 'number',
  boolean: 'boolean',
  null: 'null',
  endDocument: 'endDocument',
} as const;

export type JsonToken = (typeof JsonTokens)[keyof typeof JsonTokens];

/**
 * Lexical scopes shared by the reader and the writer.
 *
 * `danglingName` is an object whose name has been consumed (or written) but
 * whose value has not.
 */
export const JsonScopes = {
  emptyDocument: 'emptyDocument',
  nonemptyDocument: 'nonemptyDocument',
  emptyArray: 'emptyArray',
  nonemptyArray: 'nonemptyArray',
  emptyObject: 'emptyObject',
  danglingName: 'danglingName',
  nonemptyObject: 'nonemptyObject',
} as const;

export type JsonScope = (typeof JsonScopes)[keyof typeof JsonScopes];

/**
 * Renders a JSONPath-like location (`$.list[2].name`) from the per-depth
 * scope, name and index stacks kept by readers and writers.
 */
export function renderJsonPath(
  scopes: ReadonlyArray<JsonScope>,
  names: ReadonlyArray<string | null>,
  indices: ReadonlyArray<number>
): string {
  let path = '$';
  for (let depth = 1; depth < scopes.length; depth += 1) {
    const scope = scopes[depth];
    if (scope === JsonScopes.emptyArray || scope === JsonScopes.nonemptyArray) {
      path += `[${indices[depth] ?? 0}]`;
    } else if (
      scope === JsonScopes.emptyObject ||
      scope === JsonScopes.danglingName ||
      scope === JsonScopes.nonemptyObject
    ) {
      const name = names[depth];
      path += '.';
      if (name !== null && name !== undefined) {
        path += name;
      }
    }
  }
  return path;
}
