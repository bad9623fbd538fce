import { z } from 'zod';
import { InvalidDeclarationError } from '../errors';
import { QualifierMarker, type QualifierEntry } from './QualifierMarker';
import { isQualifierElement } from './qualifierElements';

export type QualifierShape = z.ZodRawShape;

/** Shape of a qualifier without elements. */
export type NoElements = Record<never, z.ZodTypeAny>;

export type QualifierValues<S extends QualifierShape> = z.input<z.ZodObject<S>>;

/**
 * A declared qualifier. `of` builds markers; elements left out of the values
 * take the defaults declared on their schemas.
 */
export class QualifierDefinition<S extends QualifierShape> {
  constructor(
    readonly name: string,
    readonly shape: S
  ) {}

  of(values?: QualifierValues<S>): QualifierMarker {
    const provided = new Map<string, unknown>(Object.entries(values ?? {}));
    const issues: string[] = [];
    for (const key of provided.keys()) {
      if (!Object.prototype.hasOwnProperty.call(this.shape, key)) {
        issues.push(`unknown element ${key}`);
      }
    }

    const elements: QualifierEntry[] = [];
    const schemas: Array<[string, z.ZodTypeAny]> = Object.entries(this.shape);
    for (const [key, schema] of schemas) {
      const parsed = schema.safeParse(provided.get(key));
      if (!parsed.success) {
        issues.push(...parsed.error.issues.map((issue) => `${key}: ${issue.message}`));
        continue;
      }
      const value: unknown = parsed.data;
      if (!isQualifierElement(value)) {
        issues.push(`${key}: unsupported element value`);
        continue;
      }
      elements.push([key, value]);
    }

    if (issues.length > 0) {
      throw new InvalidDeclarationError(`Invalid @${this.name}: ${issues.join('; ')}`);
    }
    return new QualifierMarker(this.name, elements);
  }

  /** True for markers produced by this definition. */
  matches(marker: QualifierMarker): boolean {
    return marker.name === this.name;
  }
}

export function defineQualifier(name: string): QualifierDefinition<NoElements>;
export function defineQualifier<S extends QualifierShape>(
  name: string,
  shape: S
): QualifierDefinition<S>;
export function defineQualifier(
  name: string,
  shape: QualifierShape = {}
): QualifierDefinition<QualifierShape> {
  if (name.trim() === '') {
    throw new InvalidDeclarationError('Qualifier name must not be empty');
  }
  return new QualifierDefinition(name, shape);
}
