import { z } from 'zod';
import { EnumConstant, type EnumType } from '../types/EnumType';
import { RawType } from '../types/RawType';

/**
 * Values a qualifier element may hold. Raw types and enum constants compare
 * by identity; byte strings and arrays by content.
 */
export type QualifierElement =
  | string
  | number
  | boolean
  | RawType
  | EnumConstant
  | Uint8Array
  | readonly QualifierElement[];

const isElementArray = (value: QualifierElement): value is readonly QualifierElement[] =>
  Array.isArray(value);

export function isQualifierElement(value: unknown): value is QualifierElement {
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof RawType ||
    value instanceof EnumConstant ||
    value instanceof Uint8Array
  ) {
    return true;
  }
  return Array.isArray(value) && value.every((item: unknown) => isQualifierElement(item));
}

/** Schema builders for qualifier element shapes. */
export const qualifierElements = {
  string: () => z.string(),
  number: () => z.number(),
  boolean: () => z.boolean(),
  type: () =>
    z.custom<RawType>((value) => value instanceof RawType, {
      message: 'Expected a type reference',
    }),
  enumConstant: <C extends string>(enumType: EnumType<C>) =>
    z.custom<EnumConstant<C>>(
      (value) => value instanceof EnumConstant && value.enumType === enumType,
      { message: `Expected a constant of ${enumType.qualifiedName}` }
    ),
  bytes: () => z.instanceof(Uint8Array),
  array: <E extends z.ZodTypeAny>(element: E) => z.array(element),
};

export function qualifierElementEquals(a: QualifierElement, b: QualifierElement): boolean {
  if (typeof a === 'number' || typeof b === 'number') {
    return Object.is(a, b);
  }
  if (a instanceof Uint8Array || b instanceof Uint8Array) {
    if (!(a instanceof Uint8Array && b instanceof Uint8Array) || a.length !== b.length) {
      return false;
    }
    return a.every((byte, index) => byte === b[index]);
  }
  if (isElementArray(a) || isElementArray(b)) {
    if (!(isElementArray(a) && isElementArray(b)) || a.length !== b.length) {
      return false;
    }
    return a.every((item, index) => {
      const other = b[index];
      return other !== undefined && qualifierElementEquals(item, other);
    });
  }
  return a === b;
}

const hexByte = (byte: number): string => byte.toString(16).padStart(2, '0');

/**
 * Canonical text for an element. Equal elements, as decided by
 * `qualifierElementEquals`, always produce the same key and unequal ones never do.
 */
export function qualifierElementKey(element: QualifierElement): string {
  if (typeof element === 'string') return `s${JSON.stringify(element)}`;
  if (typeof element === 'number') return Object.is(element, -0) ? 'n-0' : `n${String(element)}`;
  if (typeof element === 'boolean') return element ? 'b1' : 'b0';
  if (element instanceof RawType) return `t#${element.id}`;
  if (element instanceof EnumConstant) return `e#${element.enumType.id}.${element.name}`;
  if (element instanceof Uint8Array) {
    return `x[${element.length}:${Array.from(element, hexByte).join('')}]`;
  }
  return `[${element.length}:${element.map(qualifierElementKey).join(',')}]`;
}

export function formatQualifierElement(element: QualifierElement): string {
  if (typeof element === 'string') return JSON.stringify(element);
  if (typeof element === 'number' || typeof element === 'boolean') return String(element);
  if (element instanceof RawType) return `${element.qualifiedName}::class`;
  if (element instanceof EnumConstant) return element.toString();
  if (element instanceof Uint8Array) return `[${Array.from(element).join(', ')}]`;
  return `[${element.map(formatQualifierElement).join(', ')}]`;
}
