import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { defineRecord } from '../../schema/record';
import { fieldsOf } from '../../schema/introspect';
import { field, t } from '../../schema/types';
import { TypeScriptDocExtractor } from '../docExtractor';

function writeSource(content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'record-args-docs-'));
  const file = path.join(dir, 'records.ts');
  fs.writeFileSync(file, content, 'utf8');
  return file;
}

const SOURCE = `
/** Options of one training run. */
export const Hparams = defineRecord('Hparams', {
  /** Step size of the optimizer. */
  rate: field(t.number()),
  // Random seed
  // shared by every worker
  seed: field(t.int(), { default: 13 }),
  epochs: field(t.int(), { default: 3 }), // passes over the data
  /**
   * Batch size.
   * @deprecated use the loader setting
   */
  batch: field(t.int(), { default: 8 }),
  plain: field(t.int(), { default: 0 }),
});

interface Shape {
  /** Width in pixels. */
  width: number;
  height: number; /* in pixels */
}
`;

describe('TypeScriptDocExtractor', () => {
  const file = writeSource(SOURCE);
  const Hparams = defineRecord(
    'Hparams',
    {
      rate: field(t.number()),
      seed: field(t.int(), { default: 13 }),
      epochs: field(t.int(), { default: 3 }),
      batch: field(t.int(), { default: 8 }),
      plain: field(t.int(), { default: 0 }),
    },
    { docSource: { file } },
  );

  test('reads doc blocks, comments above and trailing comments', () => {
    const docs = new TypeScriptDocExtractor();
    expect(docs.lookup(Hparams, 'rate')).toEqual({ jsDoc: 'Step size of the optimizer.' });
    expect(docs.lookup(Hparams, 'seed')).toEqual({ commentAbove: 'Random seed\nshared by every worker' });
    expect(docs.lookup(Hparams, 'epochs')).toEqual({ commentInline: 'passes over the data' });
    expect(docs.lookup(Hparams, 'batch')).toEqual({ jsDoc: 'Batch size.' });
    expect(docs.lookup(Hparams, 'plain')).toBeUndefined();
  });

  test('record docs come from the declaration', () => {
    expect(new TypeScriptDocExtractor().recordDoc(Hparams)).toBe('Options of one training run.');
  });

  test('field help falls back to the extracted docs', () => {
    const help = fieldsOf(Hparams, new TypeScriptDocExtractor()).map((f) => f.help);
    expect(help).toEqual([
      'Step size of the optimizer.',
      'Random seed\nshared by every worker',
      'passes over the data',
      'Batch size.',
      undefined,
    ]);
  });

  test('interfaces named by the doc source are read too', () => {
    const Shape = defineRecord(
      'Shape',
      { width: field(t.int(), { default: 1 }), height: field(t.int(), { default: 1 }) },
      { docSource: { file, declaration: 'Shape' } },
    );
    const docs = new TypeScriptDocExtractor();
    expect(docs.lookup(Shape, 'width')).toEqual({ jsDoc: 'Width in pixels.' });
    expect(docs.lookup(Shape, 'height')).toEqual({ commentInline: 'in pixels' });
  });

  test('records without a readable source have no docs', () => {
    const Missing = defineRecord('Missing', { a: field(t.int(), { default: 1 }) }, { docSource: { file: `${file}.gone` } });
    const docs = new TypeScriptDocExtractor();
    expect(docs.lookup(Missing, 'a')).toBeUndefined();
    expect(docs.recordDoc(Missing)).toBeUndefined();
  });
});
