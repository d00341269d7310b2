import type { AnyRecordSource, RecordSource } from './record';

/** Enumeration members keyed by member name. Values are what the record holds. */
export type EnumMembers = ReadonlyMap<string, string | number>;

/**
 * Runtime description of a field's declared type.
 *
 * `lazy` is the deferred form: it is resolved by the introspector before anything
 * classifies the type, so that records can refer to records declared later.
 */
export type TypeNode =
  | { readonly kind: 'boolean' }
  | { readonly kind: 'number'; readonly integer: boolean }
  | { readonly kind: 'string' }
  | { readonly kind: 'enum'; readonly name: string; readonly members: EnumMembers }
  | { readonly kind: 'list'; readonly item: TypeNode }
  | { readonly kind: 'tuple'; readonly item: TypeNode; readonly length?: number }
  | { readonly kind: 'optional'; readonly inner: TypeNode }
  | { readonly kind: 'union'; readonly members: readonly TypeNode[] }
  | { readonly kind: 'record'; readonly source: AnyRecordSource }
  | { readonly kind: 'subparsers'; readonly alternatives: ReadonlyMap<string, AnyRecordSource> }
  | { readonly kind: 'lazy'; readonly resolve: () => TypeNode }
  | { readonly kind: 'scalar'; readonly name: string; readonly parse: (raw: string) => unknown };

type LeafNode = Exclude<TypeNode, { readonly kind: 'list' | 'tuple' | 'optional' | 'union' | 'lazy' }>;

/** A `TypeNode` with every `lazy` replaced by what it resolves to. */
export type ResolvedNode =
  | LeafNode
  | { readonly kind: 'list'; readonly item: ResolvedNode }
  | { readonly kind: 'tuple'; readonly item: ResolvedNode; readonly length?: number }
  | { readonly kind: 'optional'; readonly inner: ResolvedNode }
  | { readonly kind: 'union'; readonly members: readonly ResolvedNode[] };

/** A type declaration. `T` only exists at compile time and types the built record. */
export type TypeDecl<T> = {
  readonly node: TypeNode;
  readonly __value?: T;
};

export type DeclValue<D> = D extends TypeDecl<infer T> ? T : never;

export type FieldDefault = { readonly value: unknown } | { readonly factory: () => unknown };

export type FieldDef<T> = {
  readonly type: TypeDecl<T>;
  readonly default?: FieldDefault;
  readonly help?: string;
  /** When false the field never reaches the command line and always takes its default. */
  readonly cmd: boolean;
};

export type FieldOptions<T> = {
  default?: T;
  defaultFactory?: () => T;
  help?: string;
  cmd?: boolean;
};

export type FieldShape = Readonly<Record<string, FieldDef<unknown>>>;

export type InferRecord<F extends FieldShape> = {
  [K in keyof F]: F[K] extends FieldDef<infer T> ? T : never;
};

export function field<T>(type: TypeDecl<T>, options: FieldOptions<T> = {}): FieldDef<T> {
  let fieldDefault: FieldDefault | undefined;
  if (options.default !== undefined) {
    fieldDefault = { value: options.default };
  } else if (options.defaultFactory) {
    fieldDefault = { factory: options.defaultFactory };
  } else if (type.node.kind === 'optional') {
    fieldDefault = { value: undefined };
  }
  return {
    type,
    default: fieldDefault,
    help: options.help,
    cmd: options.cmd ?? true,
  };
}

export function resolveFieldDefault(fieldDefault: FieldDefault): unknown {
  return 'factory' in fieldDefault ? fieldDefault.factory() : fieldDefault.value;
}

function enumMembers(members: object): EnumMembers {
  const out = new Map<string, string | number>();
  for (const [name, value] of Object.entries(members)) {
    // Numeric TS enums carry a reverse mapping (`E[0] === 'A'`); only names are members.
    if (!Number.isNaN(Number(name))) continue;
    if (typeof value === 'string' || typeof value === 'number') out.set(name, value);
  }
  return out;
}

/** Name of the member holding `value`, if any. */
export function enumNameOf(members: EnumMembers, value: unknown): string | undefined {
  for (const [name, member] of members) {
    if (member === value) return name;
  }
  return undefined;
}

function decl<T>(node: TypeNode): TypeDecl<T> {
  return { node };
}

export const t = {
  boolean: (): TypeDecl<boolean> => decl({ kind: 'boolean' }),
  number: (): TypeDecl<number> => decl({ kind: 'number', integer: false }),
  int: (): TypeDecl<number> => decl({ kind: 'number', integer: true }),
  string: (): TypeDecl<string> => decl({ kind: 'string' }),

  /** Works with TS `enum` objects and with `{ NAME: value } as const` objects. */
  enumOf: <E extends object>(name: string, members: E): TypeDecl<E[keyof E]> =>
    decl({ kind: 'enum', name, members: enumMembers(members) }),

  list: <T>(item: TypeDecl<T>): TypeDecl<T[]> => decl({ kind: 'list', item: item.node }),
  tuple: <T>(item: TypeDecl<T>, length?: number): TypeDecl<T[]> =>
    decl({ kind: 'tuple', item: item.node, length }),
  optional: <T>(inner: TypeDecl<T>): TypeDecl<T | undefined> => decl({ kind: 'optional', inner: inner.node }),
  union: <D extends TypeDecl<unknown>[]>(...members: D): TypeDecl<DeclValue<D[number]>> =>
    decl({ kind: 'union', members: members.map((m) => m.node) }),

  record: <T>(source: RecordSource<T>): TypeDecl<T> => decl({ kind: 'record', source }),
  subparsers: <A extends Record<string, RecordSource<unknown>>>(
    alternatives: A,
  ): TypeDecl<{ [K in keyof A]: A[K] extends RecordSource<infer T> ? T : never }[keyof A]> =>
    decl({ kind: 'subparsers', alternatives: new Map(Object.entries(alternatives)) }),

  /** Deferred declaration, for records that refer to records declared further down. */
  lazy: <T>(thunk: () => TypeDecl<T>): TypeDecl<T> => decl({ kind: 'lazy', resolve: () => thunk().node }),

  /** Any other value parsed from a single token, e.g. a path or a date. */
  scalar: <T>(name: string, parse: (raw: string) => T): TypeDecl<T> => decl({ kind: 'scalar', name, parse }),
};
