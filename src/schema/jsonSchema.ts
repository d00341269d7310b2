import type { SchemaObject } from 'ajv';

import type { FieldShape, TypeNode } from './types';

/**
 * JSON schema checked by `RecordType.construct`.
 * Nested records, subparsers and custom scalars are opaque here: they are built
 * (and checked) by their own record types or converters.
 */
export function recordJsonSchema(fields: FieldShape): SchemaObject {
  const properties: Record<string, SchemaObject> = {};
  const required: string[] = [];
  for (const [name, def] of Object.entries(fields)) {
    properties[name] = nodeSchema(def.type.node);
    if (def.type.node.kind !== 'optional') required.push(name);
  }
  return { type: 'object', properties, required, additionalProperties: false };
}

function nodeSchema(node: TypeNode): SchemaObject {
  switch (node.kind) {
    case 'boolean':
      return { type: 'boolean' };
    case 'number':
      return { type: node.integer ? 'integer' : 'number' };
    case 'string':
      return { type: 'string' };
    case 'enum':
      return { enum: [...node.members.values()] };
    case 'list':
      return { type: 'array', items: nodeSchema(node.item) };
    case 'tuple':
      return node.length === undefined
        ? { type: 'array', items: nodeSchema(node.item) }
        : { type: 'array', items: nodeSchema(node.item), minItems: node.length, maxItems: node.length };
    case 'optional':
      // `undefined` never reaches ajv's property checks; absence is handled by `required`.
      return nodeSchema(node.inner);
    case 'union':
      return { anyOf: node.members.map(nodeSchema) };
    case 'record':
    case 'subparsers':
    case 'lazy':
    case 'scalar':
      return {};
  }
}
