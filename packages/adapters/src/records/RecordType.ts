import { z } from 'zod';
import type { JsonAdapter } from '../adapters/JsonAdapter';
import { InvalidDeclarationError } from '../errors';
import type { AdapterResolver } from '../registry/JsonAdapterFactory';
import { RawType, RawTypeKinds, qualifiedNameOf } from '../types/RawType';
import {
  TypeDescriptor,
  substitute,
  toTypeNode,
  typeVariablesOf,
  type TypeNode,
} from '../types/TypeDescriptor';
import type { TypeInput } from '../types/Types';
import { ObjectAdapter } from './ObjectAdapter';

/** Keys of `T` that hold data rather than methods. */
export type DataKeys<T> = {
  [K in keyof T]-?: T[K] extends (...args: never[]) => unknown ? never : K;
}[keyof T] &
  string;

export type RecordProperties<T> = Pick<T, DataKeys<T>>;

export type PropertyDeclaration<V> = Readonly<{
  /** A thunk defers the lookup, for types declared later or self-references. */
  type: TypeInput<V> | (() => TypeInput<V>);
  /** Member name in JSON; defaults to the property name. */
  jsonName?: string;
  nullable?: boolean;
  /** Supplies the value when the member is absent. */
  defaultValue?: () => V;
}>;

export type RecordDeclaration<T> = Readonly<{
  name: string;
  enclosing?: RawType;
  typeParameters?: readonly string[];
  properties: { readonly [K in DataKeys<T>]: PropertyDeclaration<T[K]> };
  create: (properties: RecordProperties<T>) => T;
}>;

/**
 * A property as the object adapter sees it. A property is required when it
 * is neither nullable nor defaulted.
 */
export type PropertyDescriptor<T> = Readonly<{
  name: DataKeys<T>;
  jsonName: string;
  type: () => TypeNode;
  nullable: boolean;
  required: boolean;
  defaultValue: (() => unknown) | null;
}>;

export type BoundProperty<T> = Readonly<{
  descriptor: PropertyDescriptor<T>;
  adapter: JsonAdapter<unknown>;
}>;

const lazyTypeNode = <V>(declared: TypeInput<V> | (() => TypeInput<V>)): (() => TypeNode) => {
  let node: TypeNode | null = null;
  return () => {
    if (node === null) {
      node = toTypeNode(typeof declared === 'function' ? declared() : declared);
    }
    return node;
  };
};

const recordMetadataSchema = z
  .object({
    qualifiedName: z.string(),
    name: z.string().trim().min(1, 'record name must not be empty'),
    typeParameters: z.array(z.string().trim().min(1, 'type parameter names must not be empty')),
    properties: z.array(
      z.object({
        name: z.string().min(1, 'property names must not be empty'),
        jsonName: z.string(),
      })
    ),
  })
  .superRefine((record, ctx) => {
    const parameters = new Set(record.typeParameters);
    if (parameters.size !== record.typeParameters.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'type parameters must be unique' });
    }
    const jsonNames = new Set<string>();
    for (const property of record.properties) {
      if (jsonNames.has(property.jsonName)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `JSON name "${property.jsonName}" is used by more than one property`,
        });
      }
      jsonNames.add(property.jsonName);
    }
  });

/**
 * A declared record type and the generated adapter behind it. Generic records
 * bind their type parameters per requested descriptor, so each distinct set
 * of arguments gets its own adapter.
 */
export class RecordType<T> extends RawType<T> {
  readonly typeParameters: readonly string[];
  readonly properties: readonly PropertyDescriptor<T>[];
  private readonly construct: (properties: RecordProperties<T>) => T;

  constructor(declaration: RecordDeclaration<T>) {
    super(
      declaration.name,
      qualifiedNameOf(declaration.name, declaration.enclosing),
      RawTypeKinds.record,
      declaration.typeParameters?.length ?? 0
    );
    this.typeParameters = [...(declaration.typeParameters ?? [])];
    this.construct = declaration.create;

    const declared = declaration.properties;
    const names = Object.keys(declared).filter((key): key is DataKeys<T> =>
      Object.prototype.hasOwnProperty.call(declared, key)
    );
    this.properties = names.map((name) => {
      const property = declared[name];
      const nullable = property.nullable ?? false;
      const defaultValue = property.defaultValue ?? null;
      return {
        name,
        jsonName: property.jsonName ?? name,
        type: lazyTypeNode(property.type),
        nullable,
        required: !nullable && defaultValue === null,
        defaultValue,
      };
    });

    const metadata = recordMetadataSchema.safeParse({
      qualifiedName: this.qualifiedName,
      name: declaration.name,
      typeParameters: this.typeParameters,
      properties: this.properties.map((property) => ({
        name: property.name,
        jsonName: property.jsonName,
      })),
    });
    if (!metadata.success) {
      throw new InvalidDeclarationError(
        `Invalid record ${this.qualifiedName}: ${metadata.error.issues.map((issue) => issue.message).join('; ')}`
      );
    }
  }

  get rawType(): RawType {
    return this;
  }

  createAdapter(type: TypeDescriptor, resolver: AdapterResolver): ObjectAdapter<T> {
    const bindings = new Map<string, TypeDescriptor>();
    this.typeParameters.forEach((parameter, index) => {
      const argument = type.typeArguments[index];
      if (!(argument instanceof TypeDescriptor)) {
        throw new InvalidDeclarationError(
          `Type argument ${parameter} of ${this.qualifiedName} is not resolved in ${type.toString()}`
        );
      }
      bindings.set(parameter, argument);
    });

    const bound = this.properties.map((descriptor): BoundProperty<T> => {
      const declared = descriptor.type();
      const undeclared = typeVariablesOf(declared).find((name) => !bindings.has(name));
      if (undeclared !== undefined) {
        throw new InvalidDeclarationError(
          `Property ${descriptor.name} of ${this.qualifiedName} uses undeclared type variable ${undeclared}`
        );
      }
      const adapter = resolver.adapterFor(substitute(declared, bindings));
      return { descriptor, adapter: descriptor.nullable ? adapter.nullSafe() : adapter };
    });
    return new ObjectAdapter(this.qualifiedName, bound, this.construct);
  }
}

export function defineRecord<T extends object>(declaration: RecordDeclaration<T>): RecordType<T> {
  return new RecordType(declaration);
}
