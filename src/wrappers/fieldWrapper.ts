import { ArgumentTypeError, UnsupportedTypeError } from '../errors';
import { ABSENT } from '../engine/flagEngine';
import type { Arity, OptionDeclaration } from '../engine/flagEngine';
import { assertNever, tokenParser } from '../schema/classify';
import type { FieldKind, ItemKind } from '../schema/classify';
import { splitSequenceToken } from '../schema/converters';
import type { IntrospectedField } from '../schema/introspect';
import { enumNameOf } from '../schema/types';
import type { EnumMembers } from '../schema/types';
import { stableStringify } from '../util/deterministicJson';
import { describeDefault, silentLogger } from '../util/log';
import type { Logger } from '../util/log';

/** Kinds that map onto a single option. Records and subparsers are handled by the record wrapper. */
export type OptionKind = Exclude<FieldKind, { readonly tag: 'nested' | 'subgroup' | 'subparsers' }>;

type LeafKind = Exclude<OptionKind, { readonly tag: 'optional' }>;

/** A default that may be absent. Boxed so that `undefined` can be a default value. */
export type BoxedDefault = { readonly value: unknown } | undefined;

export function isOptionKind(kind: FieldKind): kind is OptionKind {
  return kind.tag !== 'nested' && kind.tag !== 'subgroup' && kind.tag !== 'subparsers';
}

function leafOf(kind: OptionKind, where: string): LeafKind {
  if (kind.tag !== 'optional') return kind;
  if (!isOptionKind(kind.inner)) throw new UnsupportedTypeError(`${where}: optional ${kind.inner.tag} has no option form`);
  return leafOf(kind.inner, where);
}

type EnumLike = { readonly name: string; readonly members: EnumMembers };

/** Member value for a member value or a member name. */
function toMember(kind: EnumLike, value: unknown, where: string): unknown {
  if (value === undefined || value === null) return value;
  if (enumNameOf(kind.members, value) !== undefined) return value;
  if (typeof value === 'string' && kind.members.has(value)) return kind.members.get(value);
  throw new ArgumentTypeError(`${where}: ${describeDefault(value)} is not a member of ${kind.name}`);
}

/** Member lookup for a parsed token, which is always a member name. */
function memberByName(kind: EnumLike, raw: unknown, where: string): unknown {
  if (raw === undefined || raw === null) return raw;
  if (typeof raw === 'string' && kind.members.has(raw)) return kind.members.get(raw);
  throw new ArgumentTypeError(`${where}: ${describeDefault(raw)} is not a member name of ${kind.name}`);
}

function normalizeDefault(kind: LeafKind, value: unknown, where: string): unknown {
  if (kind.tag === 'enum') return toMember(kind, value, where);
  if (kind.tag === 'sequence' && kind.item.tag === 'enum' && Array.isArray(value)) {
    const item = kind.item;
    return value.map((v: unknown) => toMember(item, v, where));
  }
  return value;
}

/** Engine form of a default: enum members become their names. */
function toEngine(kind: LeafKind, value: unknown): unknown {
  if (kind.tag === 'enum') return enumNameOf(kind.members, value) ?? value;
  if (kind.tag === 'sequence' && kind.item.tag === 'enum' && Array.isArray(value)) {
    const members = kind.item.members;
    return value.map((v: unknown) => enumNameOf(members, v) ?? v);
  }
  return value;
}

function arityOf(kind: LeafKind, multiple: boolean, hasDefault: boolean): Arity {
  switch (kind.tag) {
    case 'bool':
      if (multiple) return hasDefault ? 'zeroOrMore' : 'oneOrMore';
      return hasDefault ? 'optional' : 'one';
    case 'sequence':
      return multiple && !hasDefault ? 'oneOrMore' : 'zeroOrMore';
    case 'enum':
    case 'scalar':
      if (multiple) return hasDefault ? 'zeroOrMore' : 'oneOrMore';
      return 'one';
    default:
      return assertNever(kind, 'arity');
  }
}

function converterOf(kind: LeafKind, multiple: boolean): (raw: string) => unknown {
  if (kind.tag !== 'sequence') return tokenParser(kind);
  const item = tokenParser(kind.item);
  // With several destinations one occurrence is one instance's whole sequence.
  if (multiple) return (raw) => splitSequenceToken(raw).map(item);
  return item;
}

function choicesOf(kind: LeafKind, multiple: boolean): string[] | undefined {
  if (kind.tag === 'enum') return [...kind.members.keys()];
  if (kind.tag === 'sequence' && kind.item.tag === 'enum' && !multiple) return [...kind.item.members.keys()];
  return undefined;
}

function finalizeBool(raw: unknown, defaultValue: unknown, where: string): unknown {
  if (raw === ABSENT || (Array.isArray(raw) && raw.length === 0)) return !(defaultValue ?? false);
  if (raw === undefined || typeof raw === 'boolean') return raw;
  throw new ArgumentTypeError(`bool argument ${where} isn't bool: ${describeDefault(raw)}`);
}

function finalizeItem(item: ItemKind, value: unknown, where: string): unknown {
  return item.tag === 'enum' ? memberByName(item, value, where) : value;
}

function finalizeValue(kind: OptionKind, raw: unknown, defaultValue: unknown, where: string): unknown {
  switch (kind.tag) {
    case 'bool':
      return finalizeBool(raw, defaultValue, where);
    case 'enum':
      return memberByName(kind, raw, where);
    case 'sequence': {
      if (raw === undefined || raw === null) return raw;
      if (!Array.isArray(raw)) throw new ArgumentTypeError(`${where}: expected a list, got ${describeDefault(raw)}`);
      const items = raw.map((v: unknown) => finalizeItem(kind.item, v, where));
      if (kind.length !== undefined && items.length !== kind.length) {
        throw new ArgumentTypeError(`${where}: expected ${kind.length} values, got ${items.length}`);
      }
      return items;
    }
    case 'optional':
      if (raw === undefined || raw === null) return raw;
      if (!isOptionKind(kind.inner)) return raw;
      return finalizeValue(kind.inner, raw, defaultValue, where);
    case 'scalar':
      return raw;
    default:
      return assertNever(kind, where);
  }
}

function presentDefaults(defaults: readonly BoxedDefault[]): { readonly value: unknown }[] | undefined {
  const out: { readonly value: unknown }[] = [];
  for (const d of defaults) {
    if (!d) return undefined;
    out.push(d);
  }
  return out.length > 0 ? out : undefined;
}

export type FieldWrapperOptions = {
  /** Long option name without dashes; also the key of the parsed value. */
  optionName: string;
  /** Set inside subgroup alternatives: nothing is mandatory on the command line. */
  forceOptional?: boolean;
  logger?: Logger;
};

/** One record field that maps onto one option. */
export class FieldWrapper {
  private overlay: { readonly value: unknown } | undefined;
  private readonly leaf: LeafKind;
  private readonly logger: Logger;

  constructor(
    readonly field: IntrospectedField,
    readonly kind: OptionKind,
    private readonly options: FieldWrapperOptions,
  ) {
    this.leaf = leafOf(kind, options.optionName);
    this.logger = options.logger ?? silentLogger;
  }

  get name(): string {
    return this.field.name;
  }

  get optionName(): string {
    return this.options.optionName;
  }

  get key(): string {
    return this.options.optionName;
  }

  /** Single-instance default that wins over every record-level default. `undefined` clears it. */
  setDefault(value: unknown): void {
    this.overlay = value === undefined ? undefined : { value: normalizeDefault(this.leaf, value, this.optionName) };
  }

  clearDefault(): void {
    this.overlay = undefined;
  }

  /** Per-destination defaults with the single-instance overlay applied and enum names decoded. */
  effectiveDefaults(defaults: readonly BoxedDefault[]): BoxedDefault[] {
    if (this.overlay && defaults.length === 1) return [this.overlay];
    return defaults.map((d) => (d ? { value: normalizeDefault(this.leaf, d.value, this.optionName) } : undefined));
  }

  /**
   * Option for this field given its per-destination defaults. One entry means a
   * single destination; more switch to the multiple-values contract.
   */
  declaration(defaults: readonly BoxedDefault[]): OptionDeclaration {
    const effective = this.effectiveDefaults(defaults);
    const multiple = effective.length > 1;
    const present = presentDefaults(effective);
    const arity = arityOf(this.leaf, multiple, present !== undefined);

    let defaultValue: { value: unknown } | undefined;
    if (present) {
      const engineValues = present.map((d) => toEngine(this.leaf, d.value));
      const first = engineValues[0];
      if (!multiple) {
        defaultValue = first === undefined ? undefined : { value: first };
      } else if (engineValues.some((v) => v !== undefined)) {
        const same = engineValues.every((v) => stableStringify(v) === stableStringify(first));
        defaultValue = { value: same ? [first] : engineValues };
      }
    }

    this.logger.debug(
      `--${this.optionName}: ${arity}, default ${defaultValue ? describeDefault(defaultValue.value) : 'none'}`,
    );
    return {
      name: this.optionName,
      key: this.key,
      help: this.field.help,
      arity,
      required: present === undefined && !this.options.forceOptional,
      defaultValue,
      choices: choicesOf(this.leaf, multiple),
      convert: converterOf(this.leaf, multiple),
    };
  }

  /** Typed value for one instance from what the engine parsed for it. */
  finalize(raw: unknown, fallback: BoxedDefault): unknown {
    return finalizeValue(this.kind, raw, fallback?.value, this.optionName);
  }

  /** True when a value is still missing for a field that has no default and is not optional. */
  isMissing(value: unknown, fallback: BoxedDefault): boolean {
    return value === undefined && fallback === undefined && this.kind.tag !== 'optional';
  }
}
