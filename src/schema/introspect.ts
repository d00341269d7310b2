import { SchemaError } from '../errors';
import type { DocExtractor, FieldDocs } from '../docs/docExtractor';
import { isRecordType } from './record';
import type { AnyRecordType } from './record';
import type { FieldDefault, ResolvedNode, TypeNode } from './types';

export type IntrospectedField = {
  readonly name: string;
  readonly type: ResolvedNode;
  /** Absent means the field is required. */
  readonly default: FieldDefault | undefined;
  readonly help?: string;
};

const MAX_LAZY_DEPTH = 32;

/**
 * Replaces every deferred (`lazy`) node. Runs before classification and never
 * descends into records: their own fields are resolved when they are introspected.
 */
export function resolveDeferred(node: TypeNode, owner: string, depth = 0): ResolvedNode {
  if (depth > MAX_LAZY_DEPTH) {
    throw new SchemaError(`${owner}: deferred type did not resolve after ${MAX_LAZY_DEPTH} steps`);
  }
  switch (node.kind) {
    case 'lazy':
      return resolveDeferred(node.resolve(), owner, depth + 1);
    case 'list':
      return { kind: 'list', item: resolveDeferred(node.item, owner, depth) };
    case 'tuple':
      return { kind: 'tuple', item: resolveDeferred(node.item, owner, depth), length: node.length };
    case 'optional':
      return { kind: 'optional', inner: resolveDeferred(node.inner, owner, depth) };
    case 'union':
      return { kind: 'union', members: node.members.map((m) => resolveDeferred(m, owner, depth)) };
    default:
      return node;
  }
}

export function pickHelp(docs: FieldDocs | undefined): string | undefined {
  if (!docs) return undefined;
  return docs.jsDoc || docs.commentAbove || docs.commentInline || undefined;
}

/** Fields that reach the command line, in declaration order. */
export function fieldsOf(record: unknown, docs?: DocExtractor): IntrospectedField[] {
  if (!isRecordType(record)) {
    throw new SchemaError(`${describeValue(record)} is not a record type (declare it with defineRecord)`);
  }
  const out: IntrospectedField[] = [];
  for (const [name, def] of Object.entries(record.fields)) {
    if (!def.cmd) {
      if (!def.default) {
        throw new SchemaError(`${record.name}.${name} is excluded from the command line but has no default`);
      }
      continue;
    }
    out.push({
      name,
      type: resolveDeferred(def.type.node, `${record.name}.${name}`),
      default: def.default,
      help: def.help ?? pickHelp(docs?.lookup(record, name)),
    });
  }
  return out;
}

/** Names of every declared field, including those kept off the command line. */
export function declaredFieldNames(record: AnyRecordType): string[] {
  return Object.keys(record.fields);
}

function describeValue(value: unknown): string {
  if (typeof value === 'function') return `function ${value.name || '<anonymous>'}`;
  if (value === null) return 'null';
  if (typeof value === 'object') return 'object';
  return `${typeof value} ${String(value)}`;
}
