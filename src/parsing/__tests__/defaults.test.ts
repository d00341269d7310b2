import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ArgumentTypeError, ExcessKeyError, SchemaError } from '../../errors';
import { defineRecord, partial } from '../../schema/record';
import { field, t } from '../../schema/types';
import { ArgumentParser } from '../argumentParser';
import { decodeDefaults, loadDefaultsFile } from '../defaults';

enum Mode {
  Fast = 'fast',
  Slow = 'slow',
}

const Inner = defineRecord('Inner', {
  mode: field(t.enumOf('Mode', Mode), { default: Mode.Fast }),
  depth: field(t.int(), { default: 1 }),
});

const Config = defineRecord('Config', {
  name: field(t.string(), { default: 'run' }),
  modes: field(t.list(t.enumOf('Mode', Mode)), { defaultFactory: () => [] }),
  inner: field(t.record(Inner)),
  extra: field(t.optional(t.record(Inner))),
});

function writeJson(value: unknown): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'record-args-defaults-'));
  const file = path.join(dir, 'defaults.json');
  fs.writeFileSync(file, JSON.stringify(value), 'utf8');
  return file;
}

describe('decodeDefaults', () => {
  test('enum names become members, nested mappings are decoded in turn', () => {
    expect(
      decodeDefaults(Config, {
        name: 'x',
        modes: ['Slow', 'Fast'],
        inner: { mode: 'Slow' },
        extra: { depth: 3 },
      }),
    ).toEqual({ name: 'x', modes: [Mode.Slow, Mode.Fast], inner: { mode: Mode.Slow }, extra: { depth: 3 } });
  });

  test('stored member values are not member names', () => {
    expect(() => decodeDefaults(Config, { inner: { mode: 'slow' } })).toThrow(ArgumentTypeError);
    expect(() => decodeDefaults(Config, { inner: { mode: 'slow' } })).toThrow(
      'Config.inner.mode: "slow" is not a member name of Mode',
    );
    expect(() => decodeDefaults(Config, { modes: ['Fast', 'fast'] })).toThrow('Config.modes[1]: "fast" is not a member name of Mode');
  });

  test('unknown keys are reported with their path', () => {
    expect(() => decodeDefaults(Config, { inner: { width: 2 } }, 'cfg')).toThrow(ExcessKeyError);
    expect(() => decodeDefaults(Config, { inner: { width: 2 } }, 'cfg')).toThrow(
      "['width'] are not fields of Inner at path 'cfg.inner'!",
    );
  });
});

describe('loadDefaultsFile', () => {
  test('reads one mapping per destination and feeds the parser', () => {
    const file = writeJson({ cfg: { name: 'stored', inner: { mode: 'Slow', depth: 4 } } });
    const loaded = loadDefaultsFile(file, { cfg: Config });
    expect(loaded.get('cfg')).toEqual({ name: 'stored', inner: { mode: Mode.Slow, depth: 4 } });

    const parser = new ArgumentParser({ exitOnError: false });
    parser.request(Config, 'cfg', { default: loaded.get('cfg') });
    expect(parser.parse(['--inner.depth', '5']).get('cfg')).toEqual({
      name: 'stored',
      modes: [],
      inner: { mode: Mode.Slow, depth: 5 },
      extra: undefined,
    });
  });

  test('partials decode against their record', () => {
    const file = writeJson({ inner: { mode: 'Fast' } });
    expect(loadDefaultsFile(file, { inner: partial(Inner, { depth: 2 }) }).get('inner')).toEqual({ mode: Mode.Fast });
  });

  test('rejects files that are not keyed by a requested destination', () => {
    expect(() => loadDefaultsFile(writeJson([1, 2]), { cfg: Config })).toThrow('expected an object keyed by destination');
    expect(() => loadDefaultsFile(writeJson({ other: {} }), { cfg: Config })).toThrow(SchemaError);
    expect(() => loadDefaultsFile(writeJson({ other: {} }), { cfg: Config })).toThrow("no record is requested at 'other'");
    expect(() => loadDefaultsFile(writeJson({ cfg: 3 }), { cfg: Config })).toThrow("defaults for 'cfg' must be an object");
  });
});
