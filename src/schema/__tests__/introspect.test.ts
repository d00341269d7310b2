import type { DocExtractor, FieldDocs } from '../../docs/docExtractor';
import { SchemaError } from '../../errors';
import { fieldsOf, pickHelp, resolveDeferred } from '../introspect';
import { defineRecord } from '../record';
import { field, t } from '../types';
import type { TypeDecl } from '../types';

describe('fieldsOf', () => {
  test('yields command-line fields in declaration order', () => {
    const Run = defineRecord('Run', {
      name: field(t.string()),
      workers: field(t.int(), { default: 4, help: 'worker count' }),
      cache: field(t.string(), { default: '/tmp/cache', cmd: false }),
      verbose: field(t.boolean(), { default: false }),
    });
    const fields = fieldsOf(Run);
    expect(fields.map((f) => f.name)).toEqual(['name', 'workers', 'verbose']);
    expect(fields[0].default).toBeUndefined();
    expect(fields[1]).toEqual({ name: 'workers', type: { kind: 'number', integer: true }, default: { value: 4 }, help: 'worker count' });
  });

  test('fails with SchemaError for values that are not records', () => {
    class Plain {}
    expect(() => fieldsOf(Plain)).toThrow(SchemaError);
    expect(() => fieldsOf(Plain)).toThrow('function Plain is not a record type (declare it with defineRecord)');
    expect(() => fieldsOf(42)).toThrow('number 42 is not a record type');
  });

  test('a field kept off the command line needs a default', () => {
    const Broken = defineRecord('Broken', { hidden: field(t.int(), { cmd: false }) });
    expect(() => fieldsOf(Broken)).toThrow('Broken.hidden is excluded from the command line but has no default');
  });

  test('deferred declarations are resolved before anything classifies them', () => {
    const Outer = defineRecord('Outer', {
      inner: field(t.lazy(() => t.optional(t.lazy(() => t.record(Inner))))),
    });
    const Inner = defineRecord('Inner', { x: field(t.int(), { default: 1 }) });
    const [inner] = fieldsOf(Outer);
    expect(inner.type).toEqual({ kind: 'optional', inner: { kind: 'record', source: Inner } });
  });

  test('a deferred declaration that never resolves fails', () => {
    const loop: TypeDecl<number> = t.lazy(() => loop);
    expect(() => resolveDeferred(loop.node, 'R.f')).toThrow('R.f: deferred type did not resolve after 32 steps');
  });

  test('help prefers explicit help, then JSDoc, then comments', () => {
    const Documented = defineRecord('Documented', {
      a: field(t.int(), { default: 1, help: 'explicit' }),
      b: field(t.int(), { default: 2 }),
      c: field(t.int(), { default: 3 }),
      d: field(t.int(), { default: 4 }),
    });
    const table: Record<string, FieldDocs> = {
      a: { jsDoc: 'ignored' },
      b: { jsDoc: 'from jsdoc', commentAbove: 'above', commentInline: 'inline' },
      c: { commentAbove: 'above', commentInline: 'inline' },
      d: { commentInline: 'inline' },
    };
    const docs: DocExtractor = {
      lookup: (_record, name) => table[name],
      recordDoc: () => undefined,
    };
    expect(fieldsOf(Documented, docs).map((f) => f.help)).toEqual(['explicit', 'from jsdoc', 'above', 'inline']);
    expect(pickHelp(undefined)).toBeUndefined();
  });
});
