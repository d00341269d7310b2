import fs from 'node:fs';

import { ArgumentTypeError, ExcessKeyError, SchemaError } from '../errors';
import { classify } from '../schema/classify';
import type { FieldKind } from '../schema/classify';
import { resolveDeferred } from '../schema/introspect';
import type { AnyRecordSource, AnyRecordType } from '../schema/record';
import { toFactory } from '../schema/record';
import type { EnumMembers } from '../schema/types';

function isMapping(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeEnum(name: string, members: EnumMembers, value: unknown, where: string): unknown {
  if (value === null) return value;
  if (typeof value !== 'string' || !members.has(value)) {
    throw new ArgumentTypeError(`${where}: ${JSON.stringify(value)} is not a member name of ${name}`);
  }
  return members.get(value);
}

function decodeValue(kind: FieldKind, value: unknown, where: string): unknown {
  switch (kind.tag) {
    case 'enum':
      return decodeEnum(kind.name, kind.members, value, where);
    case 'sequence': {
      const item = kind.item;
      if (item.tag !== 'enum' || !Array.isArray(value)) return value;
      return value.map((v: unknown, i) => decodeEnum(item.name, item.members, v, `${where}[${i}]`));
    }
    case 'optional':
      return value === null ? value : decodeValue(kind.inner, value, where);
    case 'nested':
      return isMapping(value) ? decodeDefaults(kind.record.record, value, where) : value;
    case 'subgroup': {
      const [sole] = kind.records;
      return sole && kind.records.length === 1 && isMapping(value)
        ? decodeDefaults(sole.record, value, where)
        : value;
    }
    default:
      return value;
  }
}

/**
 * Decodes a stored default mapping for `record`: enum members are stored by
 * name and come back as member values, nested mappings are decoded in turn.
 */
export function decodeDefaults(
  record: AnyRecordType,
  mapping: Readonly<Record<string, unknown>>,
  path: string = record.name,
): Record<string, unknown> {
  const excess = Object.keys(mapping).filter((k) => !Object.prototype.hasOwnProperty.call(record.fields, k));
  if (excess.length > 0) throw new ExcessKeyError(excess, record.name, path);
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(mapping)) {
    const def = record.fields[key];
    const kind = classify(resolveDeferred(def.type.node, `${record.name}.${key}`), `${record.name}.${key}`);
    out[key] = decodeValue(kind, value, `${path}.${key}`);
  }
  return out;
}

/**
 * Reads `{ "<destination>": { ...field values } }` from a JSON file, decoding
 * each entry against the record requested at that destination.
 */
export function loadDefaultsFile(
  file: string,
  targets: Readonly<Record<string, AnyRecordSource>>,
): Map<string, Record<string, unknown>> {
  const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  if (!isMapping(parsed)) throw new SchemaError(`${file}: expected an object keyed by destination`);
  const out = new Map<string, Record<string, unknown>>();
  for (const [destination, mapping] of Object.entries(parsed)) {
    const target = targets[destination];
    if (!target) throw new SchemaError(`${file}: no record is requested at '${destination}'`);
    if (!isMapping(mapping)) throw new SchemaError(`${file}: defaults for '${destination}' must be an object`);
    out.set(destination, decodeDefaults(toFactory(target).record, mapping, destination));
  }
  return out;
}
