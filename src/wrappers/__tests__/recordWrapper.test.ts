import { RecordingEngine } from '../../engine/recordingEngine';
import type { RecordedGroup } from '../../engine/recordingEngine';
import { ExcessKeyError, NotImplementedError, SchemaError } from '../../errors';
import { defineRecord, partial, toFactory } from '../../schema/record';
import type { AnyRecordSource } from '../../schema/record';
import { field, t } from '../../schema/types';
import { WrapperArena } from '../arena';
import { MAX_DESCRIPTION_LINES, RecordWrapper } from '../recordWrapper';
import type { RootOptions } from '../recordWrapper';

const Model = defineRecord(
  'Model',
  {
    lr: field(t.number(), { default: 0.1, help: 'learning rate' }),
    layers: field(t.int(), { default: 2 }),
  },
  { doc: 'Model settings.' },
);

const Outer = defineRecord('Outer', {
  seed: field(t.int(), { default: 13 }),
  model: field(t.record(Model), { help: 'the model' }),
});

const Adam = defineRecord('Adam', { lr: field(t.number(), { default: 0.001 }) });
const Sgd = defineRecord('Sgd', {
  lr: field(t.number()),
  momentum: field(t.number(), { default: 0.9 }),
});

function makeRoot(arena: WrapperArena<RecordWrapper>, source: AnyRecordSource, options: RootOptions): RecordWrapper {
  return RecordWrapper.root({ arena }, toFactory(source), options);
}

function declared(wrapper: RecordWrapper): RecordedGroup[] {
  const engine = new RecordingEngine();
  wrapper.register(engine);
  return engine.toGroups();
}

function nestedChild(wrapper: RecordWrapper, name: string): RecordWrapper {
  const member = wrapper.members.find((m) => m.name === name);
  if (member?.mode !== 'nested') throw new Error(`${name} is not nested`);
  return wrapper.child(member.childId);
}

describe('RecordWrapper layout', () => {
  test('nested records get their own group with field-path option names', () => {
    const root = makeRoot(new WrapperArena(), Outer, { destination: 'cfg' });
    expect(declared(root)).toEqual([
      {
        title: "Outer ['cfg']",
        options: [{ name: '--seed', arity: 'one', required: false, default: 13 }],
        subcommands: [],
      },
      {
        title: "Model ['cfg.model']",
        description: 'the model',
        options: [
          { name: '--model.lr', arity: 'one', required: false, default: 0.1, help: 'learning rate' },
          { name: '--model.layers', arity: 'one', required: false, default: 2 },
        ],
        subcommands: [],
      },
    ]);
  });

  test('a prefix is prepended to every option name', () => {
    const root = makeRoot(new WrapperArena(), Outer, { destination: 'cfg', prefix: 'train.' });
    const names = declared(root).flatMap((g) => g.options.map((o) => o.name));
    expect(names).toEqual(['--train.seed', '--train.model.lr', '--train.model.layers']);
  });

  test('subgroup alternatives carry the record name only when there are several', () => {
    const Train = defineRecord('Train', {
      opt: field(t.union(t.record(Adam), t.record(Sgd)), { defaultFactory: () => Adam.construct() }),
      warm: field(t.optional(t.record(Adam))),
    });
    const groups = declared(makeRoot(new WrapperArena(), Train, { destination: 't' }));
    expect(groups.map((g) => g.title)).toEqual(["Train ['t']", "Adam ['t.opt']", "Sgd ['t.opt']", "Adam ['t.warm']"]);
    expect(groups[1].options).toEqual([{ name: '--opt.Adam.lr', arity: 'one', required: false, default: 0.001 }]);
    expect(groups[2].options).toEqual([
      { name: '--opt.Sgd.lr', arity: 'one', required: false },
      { name: '--opt.Sgd.momentum', arity: 'one', required: false, default: 0.9 },
    ]);
    expect(groups[3].options.map((o) => o.name)).toEqual(['--warm.lr']);
  });

  test('a nested record bound to null has no options', () => {
    const root = makeRoot(new WrapperArena(), partial(Outer, { model: null }), { destination: 'cfg' });
    expect(root.members.map((m) => m.mode)).toEqual(['option', 'omitted']);
    expect(declared(root)).toHaveLength(1);
  });

  test('subparsers below the top level are not implemented', () => {
    const Holder = defineRecord('Holder', { command: field(t.subparsers({ adam: Adam })) });
    const Top = defineRecord('Top', { holder: field(t.record(Holder)) });
    expect(() => makeRoot(new WrapperArena(), Top, { destination: 'top' })).toThrow(NotImplementedError);
    expect(() => makeRoot(new WrapperArena(), Top, { destination: 'top' })).toThrow(
      'Holder.command: subparsers are only supported on a top-level record',
    );
  });
});

describe('RecordWrapper descriptions', () => {
  const longDoc = Array.from({ length: MAX_DESCRIPTION_LINES + 5 }, (_, i) => `line ${i + 1}`).join('\n');

  test('long record docs are cut when fields carry their own help', () => {
    const Documented = defineRecord('Documented', { a: field(t.int(), { default: 1, help: 'a' }) }, { doc: longDoc });
    const description = makeRoot(new WrapperArena(), Documented, { destination: 'd' }).description ?? '';
    const lines = description.split('\n');
    expect(lines).toHaveLength(MAX_DESCRIPTION_LINES);
    expect(lines[MAX_DESCRIPTION_LINES - 1]).toBe(`line ${MAX_DESCRIPTION_LINES} ...`);
  });

  test('long record docs stay intact when no field has help', () => {
    const Plain = defineRecord('Plain', { a: field(t.int(), { default: 1 }) }, { doc: longDoc });
    expect(makeRoot(new WrapperArena(), Plain, { destination: 'd' }).description).toBe(longDoc);
  });

  test('a record without a nested field help uses its own doc', () => {
    const root = makeRoot(new WrapperArena(), Model, { destination: 'm' });
    expect(root.description).toBe('Model settings.');
  });
});

describe('RecordWrapper defaults', () => {
  test('partial keywords beat the request default, which beats the field default', () => {
    const root = makeRoot(new WrapperArena(), partial(Model, { layers: 8 }), {
      destination: 'm',
      default: { lr: 0.3, layers: 4 },
    });
    expect(declared(root)[0].options.map((o) => o.default)).toEqual([0.3, 8]);
  });

  test('a mapping default reaches nested records', () => {
    const root = makeRoot(new WrapperArena(), Outer, { destination: 'cfg' });
    root.setDefault({ model: { lr: 0.5 } });
    expect(declared(root)[1].options.map((o) => o.default)).toEqual([0.5, 2]);
  });

  test('an instance default is read field by field', () => {
    const root = makeRoot(new WrapperArena(), Model, { destination: 'm' });
    root.setDefault(Model.construct({ lr: 0.7 }));
    expect(declared(root)[0].options.map((o) => o.default)).toEqual([0.7, 2]);
  });

  test('setDefault on a nested wrapper overrides what the parent hands down', () => {
    const root = makeRoot(new WrapperArena(), Outer, { destination: 'cfg', default: { model: { layers: 3 } } });
    nestedChild(root, 'model').setDefault({ layers: 6 });
    expect(declared(root)[1].options.map((o) => o.default)).toEqual([0.1, 6]);
  });

  test('unknown keys fail with ExcessKeyError naming the keys and the path', () => {
    const root = makeRoot(new WrapperArena(), Outer, { destination: 'cfg' });
    expect(() => root.setDefault({ seed: 1, bogus: 2 })).toThrow(ExcessKeyError);
    expect(() => root.setDefault({ seed: 1, bogus: 2 })).toThrow("['bogus'] are not fields of Outer at path 'cfg'!");

    root.setDefault({ model: { nope: 1 } });
    expect(() => declared(root)).toThrow("['nope'] are not fields of Model at path 'cfg.model'!");
  });

  test('the subgroup default only feeds the alternative it is an instance of', () => {
    const Train = defineRecord('Train', {
      opt: field(t.union(t.record(Adam), t.record(Sgd)), { defaultFactory: () => Sgd.construct({ lr: 0.2 }) }),
    });
    const groups = declared(makeRoot(new WrapperArena(), Train, { destination: 't' }));
    expect(groups[1].options[0].default).toBe(0.001);
    expect(groups[2].options.map((o) => o.default)).toEqual([0.2, 0.9]);
  });
});

describe('RecordWrapper merge', () => {
  test('unions destinations and switches every option to one value per destination', () => {
    const arena = new WrapperArena<RecordWrapper>();
    const a = makeRoot(arena, Outer, { destination: 'a' });
    const b = makeRoot(arena, Outer, { destination: 'b', default: { seed: 7 } });
    const again = makeRoot(arena, Outer, { destination: 'a' });
    expect(nestedChild(a, 'model').destinations).toEqual(['a.model']);

    a.merge(b);
    a.merge(again);
    expect(a.destinations).toEqual(['a', 'b']);
    expect(nestedChild(a, 'model').destinations).toEqual(['a.model', 'b.model']);
    expect(a.title).toBe("Outer ['a', 'b']");

    const [top, model] = declared(a);
    expect(top.options).toEqual([{ name: '--seed', arity: 'zeroOrMore', required: false, default: [13, 7] }]);
    expect(model.options[0]).toEqual({
      name: '--model.lr',
      arity: 'zeroOrMore',
      required: false,
      default: [0.1],
      help: 'learning rate',
    });
  });

  test('clears single-instance field defaults', () => {
    const arena = new WrapperArena<RecordWrapper>();
    const a = makeRoot(arena, Model, { destination: 'a' });
    const lr = a.members[0];
    if (lr.mode !== 'option') throw new Error('expected an option');
    lr.wrapper.setDefault(0.9);
    expect(a.optionDefaults(lr.wrapper)).toEqual([{ value: 0.9 }]);
    a.merge(makeRoot(arena, Model, { destination: 'b' }));
    expect(lr.wrapper.effectiveDefaults([{ value: 0.1 }])).toEqual([{ value: 0.1 }]);
  });

  test('refuses wrappers that do not line up', () => {
    const arena = new WrapperArena<RecordWrapper>();
    const a = makeRoot(arena, Outer, { destination: 'a' });
    expect(() => a.merge(makeRoot(arena, Model, { destination: 'b' }))).toThrow(SchemaError);
    expect(() => a.merge(makeRoot(arena, Model, { destination: 'b' }))).toThrow('cannot merge Model into Outer');
    expect(() => a.merge(makeRoot(arena, partial(Outer, { model: null }), { destination: 'c' }))).toThrow(
      'Outer.model: wrappers being merged do not line up',
    );
  });

  test('subparsers cannot be merged', () => {
    const Cmd = defineRecord('Cmd', { command: field(t.subparsers({ adam: Adam, sgd: Sgd })) });
    const arena = new WrapperArena<RecordWrapper>();
    const a = makeRoot(arena, Cmd, { destination: 'x' });
    expect(() => a.merge(makeRoot(arena, Cmd, { destination: 'y' }))).toThrow(
      'Cmd.command: subparsers cannot be requested at several destinations',
    );
  });
});
