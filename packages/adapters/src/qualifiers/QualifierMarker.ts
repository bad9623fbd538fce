import { hashString } from '../shared/hash';
import {
  formatQualifierElement,
  qualifierElementEquals,
  qualifierElementKey,
  type QualifierElement,
} from './qualifierElements';

export type QualifierEntry = readonly [name: string, value: QualifierElement];

/**
 * A qualifier instance attached to a type: the qualifier's name plus its
 * element values in declaration order, defaults already applied.
 */
export class QualifierMarker {
  readonly key: string;

  constructor(
    readonly name: string,
    readonly elements: readonly QualifierEntry[] = []
  ) {
    const body = elements
      .map(([element, value]) => `${element}=${qualifierElementKey(value)}`)
      .join(',');
    this.key = `@${name}(${body})`;
  }

  element(name: string): QualifierElement | undefined {
    return this.elements.find(([element]) => element === name)?.[1];
  }

  equals(other: QualifierMarker): boolean {
    if (this === other) return true;
    if (this.name !== other.name || this.elements.length !== other.elements.length) {
      return false;
    }
    return this.elements.every(([element, value], index) => {
      const entry = other.elements[index];
      return entry !== undefined && entry[0] === element && qualifierElementEquals(value, entry[1]);
    });
  }

  hashCode(): number {
    return hashString(this.key);
  }

  toString(): string {
    if (this.elements.length === 0) return `@${this.name}`;
    const body = this.elements
      .map(([element, value]) => `${element}=${formatQualifierElement(value)}`)
      .join(', ');
    return `@${this.name}(${body})`;
  }
}
