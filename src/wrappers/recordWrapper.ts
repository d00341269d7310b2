import type { DocExtractor } from '../docs/docExtractor';
import type { FlagEngine } from '../engine/flagEngine';
import { ExcessKeyError, NotImplementedError, SchemaError } from '../errors';
import { assertNever, classify } from '../schema/classify';
import { declaredFieldNames, fieldsOf } from '../schema/introspect';
import type { IntrospectedField } from '../schema/introspect';
import type { RecordFactory } from '../schema/record';
import { resolveFieldDefault } from '../schema/types';
import type { FieldDefault } from '../schema/types';
import { silentLogger } from '../util/log';
import type { Logger } from '../util/log';
import { WrapperArena } from './arena';
import { FieldWrapper } from './fieldWrapper';
import type { BoxedDefault } from './fieldWrapper';

/** Record docs longer than this are cut when the fields document themselves. */
export const MAX_DESCRIPTION_LINES = 50;

export type Member =
  | { readonly mode: 'option'; readonly name: string; readonly wrapper: FieldWrapper }
  | { readonly mode: 'nested'; readonly name: string; readonly childId: number }
  /** Nested record whose default is bound to `null`: no options, always `null`. */
  | { readonly mode: 'omitted'; readonly name: string }
  | {
      readonly mode: 'subgroup';
      readonly name: string;
      readonly field: IntrospectedField;
      readonly alternatives: readonly number[];
    }
  | {
      readonly mode: 'subparsers';
      readonly name: string;
      readonly field: IntrospectedField;
      readonly alternatives: ReadonlyMap<string, RecordWrapper>;
    };

type Placement =
  | { readonly kind: 'root'; readonly prefix: string }
  | {
      readonly kind: 'child';
      readonly parentId: number;
      readonly field: IntrospectedField;
      /** Option path segment: the field name, plus the record name for one of several alternatives. */
      readonly segment: string;
      readonly nested: boolean;
      /** Every record of the subgroup this wrapper is one alternative of; empty when nested. */
      readonly alternatives: readonly RecordFactory[];
    };

export type WrapperContext = {
  readonly arena: WrapperArena<RecordWrapper>;
  readonly docs?: DocExtractor;
  readonly logger?: Logger;
};

export type RootOptions = {
  destination: string;
  /** Instance or mapping overriding the field defaults at this destination. */
  default?: unknown;
  /** Prepended to every option name, e.g. `train.`. */
  prefix?: string;
};

type Overlay = ReadonlyMap<string, unknown> | undefined;

function hasOwn(obj: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

function isMapping(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Options for one record type at one or more destinations. Built in two phases:
 * the constructor lays out the wrapper tree, defaults are resolved from the
 * overlays only when options are declared.
 */
export class RecordWrapper {
  readonly members: Member[] = [];
  readonly fields: readonly IntrospectedField[];
  private readonly logger: Logger;
  private readonly rootDestinations: string[] = [];
  private rootDefaults: unknown[] = [];
  private readonly rootKeywords: Readonly<Record<string, unknown>>[] = [];
  private override: { readonly value: unknown } | undefined;
  private cachedDestinations: readonly string[] | undefined;

  private constructor(
    private readonly ctx: WrapperContext,
    readonly id: number,
    readonly factory: RecordFactory,
    private readonly placement: Placement,
    readonly forceOptional: boolean,
  ) {
    this.logger = ctx.logger ?? silentLogger;
    this.fields = fieldsOf(factory.record, ctx.docs);
  }

  static root(ctx: WrapperContext, factory: RecordFactory, options: RootOptions): RecordWrapper {
    const wrapper = ctx.arena.add(
      (id) => new RecordWrapper(ctx, id, factory, { kind: 'root', prefix: options.prefix ?? '' }, false),
    );
    wrapper.rootDestinations.push(options.destination);
    wrapper.rootDefaults.push(options.default);
    wrapper.rootKeywords.push(factory.keywords);
    wrapper.build();
    return wrapper;
  }

  private addChild(
    factory: RecordFactory,
    field: IntrospectedField,
    segment: string,
    nested: boolean,
    alternatives: readonly RecordFactory[],
  ): RecordWrapper {
    const placement: Placement = { kind: 'child', parentId: this.id, field, segment, nested, alternatives };
    const forceOptional = this.forceOptional || !nested;
    const child = this.ctx.arena.add((id) => new RecordWrapper(this.ctx, id, factory, placement, forceOptional));
    child.build();
    return child;
  }

  private build(): void {
    const record = this.factory.record;
    for (const field of this.fields) {
      const where = `${record.name}.${field.name}`;
      const kind = classify(field.type, where);
      switch (kind.tag) {
        case 'nested': {
          if (this.boundToNull(field)) {
            this.members.push({ mode: 'omitted', name: field.name });
            break;
          }
          const child = this.addChild(kind.record, field, field.name, true, []);
          this.members.push({ mode: 'nested', name: field.name, childId: child.id });
          break;
        }
        case 'subgroup': {
          const several = kind.records.length > 1;
          const alternatives = kind.records.map((factory) => {
            const segment = several ? `${field.name}.${factory.record.name}` : field.name;
            return this.addChild(factory, field, segment, false, kind.records).id;
          });
          this.members.push({ mode: 'subgroup', name: field.name, field, alternatives });
          break;
        }
        case 'subparsers': {
          if (this.placement.kind !== 'root') {
            throw new NotImplementedError(`${where}: subparsers are only supported on a top-level record`);
          }
          const alternatives = new Map<string, RecordWrapper>();
          for (const [name, factory] of kind.alternatives) {
            const destination = `${this.destinations[0]}.${field.name}`;
            alternatives.set(name, RecordWrapper.root(this.ctx, factory, { destination }));
          }
          this.members.push({ mode: 'subparsers', name: field.name, field, alternatives });
          break;
        }
        case 'bool':
        case 'enum':
        case 'sequence':
        case 'optional':
        case 'scalar': {
          const wrapper = new FieldWrapper(field, kind, {
            optionName: this.optionPrefix + field.name,
            forceOptional: this.forceOptional,
            logger: this.logger,
          });
          this.members.push({ mode: 'option', name: field.name, wrapper });
          break;
        }
        default:
          assertNever(kind, where);
      }
    }
  }

  private boundToNull(field: IntrospectedField): boolean {
    const keywords = this.factory.keywords;
    if (hasOwn(keywords, field.name)) return keywords[field.name] === null;
    return field.default !== undefined && 'value' in field.default && field.default.value === null;
  }

  private parent(): RecordWrapper | undefined {
    return this.placement.kind === 'child' ? this.ctx.arena.get(this.placement.parentId) : undefined;
  }

  child(id: number): RecordWrapper {
    return this.ctx.arena.get(id);
  }

  get isRoot(): boolean {
    return this.placement.kind === 'root';
  }

  /** Prefix of this wrapper's option names, e.g. `model.` for a nested `model` field. */
  get optionPrefix(): string {
    const p = this.placement;
    if (p.kind === 'root') return p.prefix;
    return `${this.parent()?.optionPrefix ?? ''}${p.segment}.`;
  }

  get destinations(): readonly string[] {
    if (this.cachedDestinations) return this.cachedDestinations;
    const p = this.placement;
    const parent = this.parent();
    const destinations =
      p.kind === 'root' || !parent
        ? [...this.rootDestinations]
        : parent.destinations.map((d) => `${d}.${p.field.name}`);
    this.cachedDestinations = destinations;
    return destinations;
  }

  get title(): string {
    return `${this.factory.record.name} [${this.destinations.map((d) => `'${d}'`).join(', ')}]`;
  }

  get description(): string | undefined {
    const p = this.placement;
    if (p.kind === 'child' && p.nested && p.field.help) return p.field.help;
    const record = this.factory.record;
    const doc = record.doc ?? this.ctx.docs?.recordDoc(record);
    if (!doc) return undefined;
    const lines = doc.split('\n');
    if (!this.fields.some((f) => f.help) || lines.length <= MAX_DESCRIPTION_LINES) return doc;
    return `${lines.slice(0, MAX_DESCRIPTION_LINES).join('\n')} ...`;
  }

  /** Keys of every option of this wrapper and its nested records. */
  optionKeys(): string[] {
    const keys: string[] = [];
    for (const m of this.members) {
      if (m.mode === 'option') keys.push(m.wrapper.key);
      else if (m.mode === 'nested') keys.push(...this.child(m.childId).optionKeys());
      else if (m.mode === 'subgroup') for (const id of m.alternatives) keys.push(...this.child(id).optionKeys());
    }
    return keys;
  }

  /** Raw default per destination: the request default, a `setDefault` override, or what the parent hands down. */
  private rawDefaults(): unknown[] {
    const override = this.override;
    if (override) return this.destinations.map(() => override.value);
    const p = this.placement;
    const parent = this.parent();
    if (p.kind === 'root' || !parent) return this.rootDefaults;
    return parent.memberDefaults(p.field.name, p.field.default).map((d) => {
      const value = d?.value;
      if (p.nested || this.factory.record.isInstance(value)) return value;
      // An instance of another alternative says nothing about this one.
      if (!isMapping(value) || p.alternatives.some((alt) => alt.record.isInstance(value))) return undefined;
      if (p.alternatives.length > 1) {
        throw new SchemaError(
          `${parent.factory.record.name}.${p.field.name}: a mapping default is ambiguous between several records, pass an instance`,
        );
      }
      return value;
    });
  }

  private toOverlay(value: unknown, destination: string): Overlay {
    if (value === undefined || value === null) return undefined;
    const record = this.factory.record;
    if (!isMapping(value)) {
      throw new SchemaError(`default for ${record.name} at '${destination}' must be an instance or a mapping`);
    }
    const declared = declaredFieldNames(record);
    if (record.isInstance(value)) {
      return new Map(declared.filter((k) => k in value).map((k): [string, unknown] => [k, Reflect.get(value, k)]));
    }
    const excess = Object.keys(value).filter((k) => !declared.includes(k));
    if (excess.length > 0) throw new ExcessKeyError(excess, record.name, destination);
    return new Map(Object.entries(value));
  }

  /** Overlay per destination, validated against the declared fields. */
  overlays(): Overlay[] {
    const destinations = this.destinations;
    return this.rawDefaults().map((value, i) => this.toOverlay(value, destinations[i] ?? this.factory.record.name));
  }

  /** Partial keywords per destination. Merged top-level requests may come from different partials. */
  keywordsPerDestination(): readonly Readonly<Record<string, unknown>>[] {
    if (this.placement.kind === 'root') return this.rootKeywords;
    const keywords = this.factory.keywords;
    return this.destinations.map(() => keywords);
  }

  /** Effective default of one field per destination: partial keyword, overlay, declared default, or none. */
  memberDefaults(name: string, declared: FieldDefault | undefined): BoxedDefault[] {
    const keywords = this.keywordsPerDestination();
    return this.overlays().map((overlay, i) => {
      const bound = keywords[i];
      if (bound && hasOwn(bound, name)) return { value: bound[name] };
      if (overlay?.has(name)) return { value: overlay.get(name) };
      return declared ? { value: resolveFieldDefault(declared) } : undefined;
    });
  }

  /** Defaults of an option member with the field wrapper's own overlay applied. */
  optionDefaults(wrapper: FieldWrapper): BoxedDefault[] {
    return wrapper.effectiveDefaults(this.memberDefaults(wrapper.name, wrapper.field.default));
  }

  /**
   * Replaces the defaults of every destination with `value`, an instance or a
   * mapping of this record. `undefined` removes it.
   */
  setDefault(value: unknown): void {
    this.toOverlay(value, this.destinations[0] ?? this.factory.record.name);
    if (this.placement.kind === 'root') {
      this.rootDefaults = this.destinations.map(() => value);
    } else {
      this.override = value === undefined ? undefined : { value };
    }
  }

  /** Absorbs a wrapper of the same record requested at other destinations. */
  merge(other: RecordWrapper): void {
    if (!this.isRoot || !other.isRoot) throw new SchemaError('only top-level wrappers can be merged');
    if (other.factory.record !== this.factory.record) {
      throw new SchemaError(`cannot merge ${other.factory.record.name} into ${this.factory.record.name}`);
    }
    const known = new Set(this.rootDestinations);
    other.rootDestinations.forEach((destination, i) => {
      if (known.has(destination)) return;
      known.add(destination);
      this.rootDestinations.push(destination);
      this.rootDefaults.push(other.rootDefaults[i]);
      this.rootKeywords.push(other.rootKeywords[i]);
    });
    this.absorb(other);
    this.invalidate();
    this.logger.debug(`${this.factory.record.name}: destinations ${this.destinations.join(', ')}`);
  }

  private absorb(other: RecordWrapper): void {
    const name = this.factory.record.name;
    if (other.members.length !== this.members.length) {
      throw new SchemaError(`${name}: cannot merge wrappers with ${this.members.length} and ${other.members.length} members`);
    }
    this.override = undefined;
    this.members.forEach((member, i) => {
      const theirs = other.members[i];
      if (!theirs || theirs.mode !== member.mode || theirs.name !== member.name) {
        throw new SchemaError(`${name}.${member.name}: wrappers being merged do not line up`);
      }
      switch (member.mode) {
        case 'option':
          member.wrapper.clearDefault();
          break;
        case 'nested':
          if (theirs.mode === 'nested') this.child(member.childId).absorb(other.child(theirs.childId));
          break;
        case 'subgroup':
          if (theirs.mode !== 'subgroup' || theirs.alternatives.length !== member.alternatives.length) {
            throw new SchemaError(`${name}.${member.name}: subgroup alternatives do not line up`);
          }
          member.alternatives.forEach((id, j) => this.child(id).absorb(other.child(theirs.alternatives[j])));
          break;
        case 'subparsers':
          throw new NotImplementedError(`${name}.${member.name}: subparsers cannot be requested at several destinations`);
        case 'omitted':
          break;
        default:
          assertNever(member, name);
      }
    });
  }

  private invalidate(): void {
    this.cachedDestinations = undefined;
    for (const m of this.members) {
      if (m.mode === 'nested') this.child(m.childId).invalidate();
      else if (m.mode === 'subgroup') for (const id of m.alternatives) this.child(id).invalidate();
    }
  }

  /** Declares this wrapper's options in one group, then recurses into nested records. */
  register(engine: FlagEngine): void {
    engine.openGroup(this.title, this.description);
    const children: RecordWrapper[] = [];
    for (const member of this.members) {
      switch (member.mode) {
        case 'option':
          engine.addOption(member.wrapper.declaration(this.optionDefaults(member.wrapper)));
          break;
        case 'nested':
          children.push(this.child(member.childId));
          break;
        case 'subgroup':
          children.push(...member.alternatives.map((id) => this.child(id)));
          break;
        case 'subparsers':
          this.registerSubparsers(engine, member.field, member.alternatives);
          break;
        case 'omitted':
          break;
        default:
          assertNever(member, this.factory.record.name);
      }
    }
    for (const child of children) child.register(engine);
  }

  /** Key the engine reports the chosen subcommand of `fieldName` under. */
  subcommandKey(fieldName: string): string {
    return this.optionPrefix + fieldName;
  }

  private registerSubparsers(
    engine: FlagEngine,
    field: IntrospectedField,
    alternatives: ReadonlyMap<string, RecordWrapper>,
  ): void {
    if (this.destinations.length > 1) {
      throw new NotImplementedError(
        `${this.factory.record.name}.${field.name}: subparsers cannot be requested at several destinations`,
      );
    }
    const engines = engine.addSubcommands(this.subcommandKey(field.name), {
      title: field.name,
      description: field.help,
      required: field.default === undefined,
      alternatives: [...alternatives.keys()],
    });
    for (const [name, sub] of engines) alternatives.get(name)?.register(sub);
    this.logger.debug(`${this.factory.record.name}.${field.name}: subcommands ${[...engines.keys()].join(', ')}`);
  }
}
