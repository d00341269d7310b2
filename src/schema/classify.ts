import { ArgumentTypeError, NotImplementedError, UnsupportedTypeError } from '../errors';
import { parseBoolean, parseNumber } from './converters';
import { toFactory } from './record';
import type { RecordFactory } from './record';
import type { EnumMembers, ResolvedNode } from './types';

export type FieldKind =
  | { readonly tag: 'bool' }
  | { readonly tag: 'enum'; readonly name: string; readonly members: EnumMembers }
  | {
      readonly tag: 'sequence';
      readonly item: ItemKind;
      readonly container: 'list' | 'tuple';
      readonly length?: number;
    }
  | { readonly tag: 'optional'; readonly inner: FieldKind }
  | { readonly tag: 'nested'; readonly record: RecordFactory }
  | { readonly tag: 'subgroup'; readonly records: readonly RecordFactory[] }
  | { readonly tag: 'subparsers'; readonly alternatives: ReadonlyMap<string, RecordFactory> }
  | { readonly tag: 'scalar'; readonly name: string; readonly parse: (raw: string) => unknown };

export type FieldKindTag = FieldKind['tag'];

/** Kinds a sequence may hold. */
export type ItemKind = Extract<FieldKind, { readonly tag: 'bool' | 'enum' | 'scalar' }>;

export const FIELD_KIND_TAGS = [
  'bool',
  'enum',
  'sequence',
  'optional',
  'nested',
  'subgroup',
  'subparsers',
  'scalar',
] as const satisfies readonly FieldKindTag[];

export function assertNever(value: never, context: string): never {
  throw new UnsupportedTypeError(`${context}: unhandled ${JSON.stringify(value)}`);
}

function containsRecord(node: ResolvedNode): boolean {
  switch (node.kind) {
    case 'record':
    case 'subparsers':
      return true;
    case 'list':
    case 'tuple':
      return containsRecord(node.item);
    case 'optional':
      return containsRecord(node.inner);
    case 'union':
      return node.members.some(containsRecord);
    default:
      return false;
  }
}

/** Records of an optional/union type, or null when some member is not a record. */
function recordMembers(node: ResolvedNode): RecordFactory[] | null {
  if (node.kind === 'record') return [toFactory(node.source)];
  if (node.kind === 'optional') return recordMembers(node.inner);
  if (node.kind === 'union') {
    const out: RecordFactory[] = [];
    for (const m of node.members) {
      const found = recordMembers(m);
      if (!found) return null;
      out.push(...found);
    }
    return out;
  }
  return null;
}

function scalarOf(node: ResolvedNode, where: string): ItemKind {
  switch (node.kind) {
    case 'boolean':
      return { tag: 'bool' };
    case 'enum':
      return { tag: 'enum', name: node.name, members: node.members };
    case 'number': {
      const integer = node.integer;
      return { tag: 'scalar', name: integer ? 'int' : 'number', parse: (raw) => parseNumber(raw, integer) };
    }
    case 'string':
      return { tag: 'scalar', name: 'string', parse: (raw) => raw };
    case 'scalar':
      return { tag: 'scalar', name: node.name, parse: node.parse };
    case 'union':
      return unionOfScalars(node.members.map((m) => scalarOf(m, where)));
    default:
      throw new UnsupportedTypeError(`${where}: ${node.kind} is not a single-token type`);
  }
}

/** Converter for one raw token of a single-token kind. */
export function tokenParser(kind: ItemKind): (raw: string) => unknown {
  switch (kind.tag) {
    case 'bool':
      return parseBoolean;
    case 'enum': {
      const { members, name } = kind;
      return (raw) => {
        if (!members.has(raw)) throw new ArgumentTypeError(`'${raw}' is not a member of ${name}`);
        return raw;
      };
    }
    case 'scalar':
      return kind.parse;
  }
}

function unionOfScalars(members: ItemKind[]): ItemKind {
  const parsers = members.map(tokenParser);
  const name = members.map((m) => (m.tag === 'scalar' ? m.name : m.tag === 'enum' ? m.name : 'boolean')).join(' | ');
  return {
    tag: 'scalar',
    name,
    parse: (raw) => {
      for (const parse of parsers) {
        try {
          return parse(raw);
        } catch (e) {
          if (!(e instanceof ArgumentTypeError)) throw e;
        }
      }
      throw new ArgumentTypeError(`'${raw}' does not match any of ${name}`);
    },
  };
}

/**
 * Classifies a resolved declared type. Order matters: boolean before scalar,
 * enum before sequence, records inside optional/union become a subgroup.
 */
export function classify(node: ResolvedNode, where = 'field'): FieldKind {
  switch (node.kind) {
    case 'boolean':
      return { tag: 'bool' };
    case 'enum':
      return { tag: 'enum', name: node.name, members: node.members };
    case 'list':
    case 'tuple': {
      if (containsRecord(node.item)) {
        throw new NotImplementedError(`${where}: a ${node.kind} of records is not supported (container of a record type)`);
      }
      if (node.item.kind === 'list' || node.item.kind === 'tuple') {
        throw new UnsupportedTypeError(`${where}: nested sequences are not supported`);
      }
      return {
        tag: 'sequence',
        item: scalarOf(node.item, where),
        container: node.kind,
        length: node.kind === 'tuple' ? node.length : undefined,
      };
    }
    case 'optional':
    case 'union': {
      const records = recordMembers(node);
      if (records) return { tag: 'subgroup', records };
      if (containsRecord(node)) {
        throw new UnsupportedTypeError(`${where}: unions may not mix records with other types`);
      }
      if (node.kind === 'optional') {
        const inner = classify(node.inner, where);
        return inner.tag === 'optional' ? inner : { tag: 'optional', inner };
      }
      return scalarOf(node, where);
    }
    case 'record':
      return { tag: 'nested', record: toFactory(node.source) };
    case 'subparsers': {
      const alternatives = new Map<string, RecordFactory>();
      for (const [key, source] of node.alternatives) alternatives.set(key, toFactory(source));
      return { tag: 'subparsers', alternatives };
    }
    case 'number':
    case 'string':
    case 'scalar':
      return scalarOf(node, where);
    default:
      return assertNever(node, where);
  }
}

