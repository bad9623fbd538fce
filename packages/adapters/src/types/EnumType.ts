import { z } from 'zod';
import { InvalidDeclarationError } from '../errors';
import { RawType, RawTypeKinds, qualifiedNameOf } from './RawType';

export class EnumConstant<C extends string = string> {
  constructor(
    readonly enumType: RawType,
    readonly name: C,
    readonly ordinal: number,
    readonly jsonName: string
  ) {}

  toString(): string {
    return `${this.enumType.qualifiedName}.${this.name}`;
  }
}

export type EnumConstantDeclaration<C extends string> =
  | C
  | Readonly<{ name: C; jsonName?: string }>;

const enumDeclarationSchema = z
  .array(z.object({ name: z.string().min(1), jsonName: z.string() }))
  .min(1, 'an enum needs at least one constant')
  .superRefine((constants, ctx) => {
    const names = new Set<string>();
    const jsonNames = new Set<string>();
    for (const constant of constants) {
      if (names.has(constant.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate constant ${constant.name}` });
      }
      if (jsonNames.has(constant.jsonName)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate JSON name ${constant.jsonName}` });
      }
      names.add(constant.name);
      jsonNames.add(constant.jsonName);
    }
  });

/**
 * Enumeration whose constants are singletons; code and qualifier elements
 * compare them by identity.
 */
export class EnumType<C extends string = string> extends RawType<EnumConstant<C>> {
  readonly constants: readonly EnumConstant<C>[];
  private readonly byName: ReadonlyMap<string, EnumConstant<C>>;
  private readonly byJsonName: ReadonlyMap<string, EnumConstant<C>>;

  constructor(
    name: string,
    declarations: ReadonlyArray<EnumConstantDeclaration<C>>,
    enclosing?: RawType
  ) {
    super(name, qualifiedNameOf(name, enclosing), RawTypeKinds.enum);
    const normalized = declarations.map((declaration) =>
      typeof declaration === 'string'
        ? { name: declaration, jsonName: declaration }
        : { name: declaration.name, jsonName: declaration.jsonName ?? declaration.name }
    );
    const parsed = enumDeclarationSchema.safeParse(normalized);
    if (!parsed.success) {
      throw new InvalidDeclarationError(
        `Invalid enum ${this.qualifiedName}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`
      );
    }
    this.constants = normalized.map(
      (constant, ordinal) => new EnumConstant(this, constant.name, ordinal, constant.jsonName)
    );
    this.byName = new Map(this.constants.map((constant) => [constant.name, constant]));
    this.byJsonName = new Map(this.constants.map((constant) => [constant.jsonName, constant]));
  }

  constant(name: C): EnumConstant<C> {
    const constant = this.byName.get(name);
    if (constant === undefined) {
      throw new InvalidDeclarationError(`${this.qualifiedName} has no constant ${name}`);
    }
    return constant;
  }

  fromJsonName(jsonName: string): EnumConstant<C> | undefined {
    return this.byJsonName.get(jsonName);
  }
}

export function defineEnum<C extends string>(
  name: string,
  constants: ReadonlyArray<EnumConstantDeclaration<C>>,
  options: Readonly<{ enclosing?: RawType }> = {}
): EnumType<C> {
  return new EnumType(name, constants, options.enclosing);
}
