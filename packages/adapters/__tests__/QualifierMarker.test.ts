import { describe, expect, it } from 'vitest';
import {
  InvalidDeclarationError,
  RawType,
  RawTypeKinds,
  defineEnum,
  defineQualifier,
  qualifierElements,
} from '../src';

const Tagged = defineQualifier('Tagged', {
  label: qualifierElements.string().default('default'),
  weight: qualifierElements.number().default(0),
});

const Bytes = defineQualifier('Bytes', { bytes: qualifierElements.bytes() });
const Ref = defineQualifier('Ref', { target: qualifierElements.type() });
const Named = defineQualifier('Named', { name: qualifierElements.string().min(1) });
const Listed = defineQualifier('Listed', {
  words: qualifierElements.array(qualifierElements.string()),
  grid: qualifierElements.array(qualifierElements.array(qualifierElements.string())),
});

describe('QualifierMarker', () => {
  it('resolves defaults so omitted and stated values are equal', () => {
    const implicit = Tagged.of();
    const explicit = Tagged.of({ label: 'default', weight: 0 });
    expect(implicit.equals(explicit)).toBe(true);
    expect(implicit.key).toBe(explicit.key);
    expect(implicit.hashCode()).toBe(explicit.hashCode());
    expect(implicit.element('label')).toBe('default');
  });

  it('distinguishes element values', () => {
    expect(Tagged.of({ label: 'a' }).equals(Tagged.of({ label: 'b' }))).toBe(false);
    expect(Tagged.of({ weight: 1 }).equals(Tagged.of({ weight: 2 }))).toBe(false);
  });

  it('compares numbers with Object.is semantics', () => {
    expect(Tagged.of({ weight: 0 }).equals(Tagged.of({ weight: -0 }))).toBe(false);
    expect(Tagged.of({ weight: -0 }).equals(Tagged.of({ weight: -0 }))).toBe(true);
    expect(Tagged.of({ weight: 0 }).key).not.toBe(Tagged.of({ weight: -0 }).key);
  });

  it('distinguishes qualifiers with the same elements but different names', () => {
    const Other = defineQualifier('Other', {
      label: qualifierElements.string().default('default'),
      weight: qualifierElements.number().default(0),
    });
    expect(Tagged.of().equals(Other.of())).toBe(false);
    expect(Tagged.matches(Tagged.of())).toBe(true);
    expect(Tagged.matches(Other.of())).toBe(false);
  });

  it('compares byte strings by content', () => {
    const a = Bytes.of({ bytes: new Uint8Array([1, 2]) });
    const b = Bytes.of({ bytes: new Uint8Array([1, 2]) });
    const c = Bytes.of({ bytes: new Uint8Array([1, 2, 3]) });
    expect(a.equals(b)).toBe(true);
    expect(a.key).toBe(b.key);
    expect(a.equals(c)).toBe(false);
    expect(a.key).toBe('@Bytes(bytes=x[2:0102])');
  });

  it('compares arrays by content', () => {
    const a = Listed.of({ words: ['one', '', 'three'], grid: [['a'], ['b', 'c']] });
    const b = Listed.of({ words: ['one', '', 'three'], grid: [['a'], ['b', 'c']] });
    expect(a.equals(b)).toBe(true);
    expect(a.key).toBe(b.key);
    expect(a.hashCode()).toBe(b.hashCode());
    expect(a.key).toBe('@Listed(words=[3:s"one",s"",s"three"],grid=[2:[1:s"a"],[2:s"b",s"c"]])');
  });

  it('distinguishes arrays that differ in length or order', () => {
    const base = Listed.of({ words: ['one', 'two'], grid: [['a']] });
    expect(base.equals(Listed.of({ words: ['one', 'two', ''], grid: [['a']] }))).toBe(false);
    expect(base.equals(Listed.of({ words: ['two', 'one'], grid: [['a']] }))).toBe(false);
    expect(base.equals(Listed.of({ words: ['one', 'two'], grid: [['a'], []] }))).toBe(false);
    expect(base.key).not.toBe(Listed.of({ words: ['two', 'one'], grid: [['a']] }).key);
  });

  it('compares type references by identity', () => {
    const first = new RawType('Same', 'Same', RawTypeKinds.builtin);
    const second = new RawType('Same', 'Same', RawTypeKinds.builtin);
    expect(Ref.of({ target: first }).equals(Ref.of({ target: first }))).toBe(true);
    expect(Ref.of({ target: first }).equals(Ref.of({ target: second }))).toBe(false);
  });

  it('compares enum constants by identity', () => {
    const Level = defineEnum('Level', ['LOW', 'HIGH']);
    const WithLevel = defineQualifier('WithLevel', {
      level: qualifierElements.enumConstant(Level),
    });
    expect(
      WithLevel.of({ level: Level.constant('LOW') }).equals(
        WithLevel.of({ level: Level.constant('LOW') })
      )
    ).toBe(true);
    expect(
      WithLevel.of({ level: Level.constant('LOW') }).equals(
        WithLevel.of({ level: Level.constant('HIGH') })
      )
    ).toBe(false);
  });

  it('renders element values in toString', () => {
    expect(defineQualifier('Plain').of().toString()).toBe('@Plain');
    expect(Tagged.of({ label: 'x', weight: 2 }).toString()).toBe('@Tagged(label="x", weight=2)');
  });

  it('rejects element values that fail their schema', () => {
    expect(() => Named.of({ name: '' })).toThrow(InvalidDeclarationError);
    expect(() => Named.of({ name: '' })).toThrow('Invalid @Named: name: ');
  });

  it('rejects required elements that are left out', () => {
    expect(() => Named.of()).toThrow('Invalid @Named: name: Required');
  });

  it('rejects unknown elements', () => {
    const extra = { other: 1 };
    expect(() => defineQualifier('Plain').of(extra)).toThrow(
      'Invalid @Plain: unknown element other'
    );
  });

  it('rejects empty qualifier names', () => {
    expect(() => defineQualifier(' ')).toThrow('Qualifier name must not be empty');
  });
});
