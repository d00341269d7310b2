import { RecordConstructionError, SchemaError } from '../../errors';
import { defineRecord, isRecordType, partial, toFactory } from '../record';
import { field, t } from '../types';

const Hparams = defineRecord('Hparams', {
  seed: field(t.int(), { default: 13 }),
  rate: field(t.number()),
  tags: field(t.list(t.string()), { defaultFactory: () => ['base'] }),
});

describe('defineRecord', () => {
  test('construct fills declared defaults', () => {
    const hp = Hparams.construct({ rate: 0.1 });
    expect(hp).toEqual({ seed: 13, rate: 0.1, tags: ['base'] });
    expect(Hparams.isInstance(hp)).toBe(true);
    expect(Hparams.isInstance({ seed: 13, rate: 0.1, tags: ['base'] })).toBe(false);
  });

  test('default factories produce a fresh value per instance', () => {
    const a = Hparams.construct({ rate: 1 });
    const b = Hparams.construct({ rate: 1 });
    expect(a.tags).not.toBe(b.tags);
  });

  test('construct validates values against the field types', () => {
    expect(() => Hparams.construct({ rate: 'fast' })).toThrow(RecordConstructionError);
    expect(() => Hparams.construct({ rate: 'fast' })).toThrow('rate must be number');
    expect(() => Hparams.construct({})).toThrow("must have required property 'rate'");
    expect(() => Hparams.construct({ seed: 1.5, rate: 1 })).toThrow('seed must be integer');
  });

  test('construct rejects unknown keys', () => {
    expect(() => Hparams.construct({ rate: 1, lr: 2 })).toThrow('Hparams: unexpected field(s) lr');
  });

  test('class-backed records build through the construct callback', () => {
    class Point {
      constructor(
        readonly x: number,
        readonly y: number,
      ) {}
    }
    const PointRecord = defineRecord(
      'Point',
      { x: field(t.int()), y: field(t.int(), { default: 0 }) },
      { construct: (v) => new Point(v.x, v.y) },
    );
    const p = PointRecord.construct({ x: 2 });
    expect(p).toBeInstanceOf(Point);
    expect(p).toEqual(new Point(2, 0));
    expect(PointRecord.isInstance(p)).toBe(true);
  });

  test('field names must be identifiers', () => {
    expect(() => defineRecord('Bad', { 'not-ok': field(t.int()) })).toThrow(SchemaError);
  });
});

describe('partial', () => {
  test('binds keyword defaults', () => {
    const p = partial(Hparams, { seed: 7 });
    expect(toFactory(p)).toEqual({ record: Hparams, keywords: { seed: 7 } });
    expect(toFactory(Hparams)).toEqual({ record: Hparams, keywords: {} });
  });

  test('rejects keywords that are not fields', () => {
    expect(() => partial(Hparams, { lr: 1 })).toThrow('Hparams: partial keywords lr are not fields');
  });
});

describe('isRecordType', () => {
  test('recognizes records only', () => {
    expect(isRecordType(Hparams)).toBe(true);
    expect(isRecordType({ kind: 'record', fields: {} })).toBe(false);
    expect(isRecordType(class Hparams {})).toBe(false);
    expect(isRecordType(undefined)).toBe(false);
  });
});
