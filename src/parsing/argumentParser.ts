import { CommanderError } from 'commander';

import type { DocExtractor } from '../docs/docExtractor';
import { createCommanderEngine } from '../engine/commanderEngine';
import { USAGE_EXIT_CODE } from '../engine/flagEngine';
import type { EngineFactory, EngineOutput, FlagEngine } from '../engine/flagEngine';
import { RecordingEngine } from '../engine/recordingEngine';
import type { RecordedGroup } from '../engine/recordingEngine';
import { ArgumentTypeError, ParserStateError, SchemaError, UnsupportedTypeError } from '../errors';
import { classify } from '../schema/classify';
import { resolveDeferred } from '../schema/introspect';
import type { IntrospectedField } from '../schema/introspect';
import { toFactory } from '../schema/record';
import type { AnyRecordType, RecordFactory, RecordSource, RecordType } from '../schema/record';
import { resolveFieldDefault } from '../schema/types';
import type { FieldDef } from '../schema/types';
import { silentLogger } from '../util/log';
import type { Logger } from '../util/log';
import { WrapperArena } from '../wrappers/arena';
import { FieldWrapper, isOptionKind } from '../wrappers/fieldWrapper';
import type { BoxedDefault } from '../wrappers/fieldWrapper';
import { RecordWrapper } from '../wrappers/recordWrapper';
import { buildInstances } from './reconstruct';

export type ArgumentParserOptions = {
  /** Program name shown in usage (default `record-args`). */
  name?: string;
  description?: string;
  /** Source of field help when a field declares none. */
  docs?: DocExtractor;
  logger?: Logger;
  /** Exit the process on usage errors and `--help` (default true). Otherwise the `CommanderError` is thrown. */
  exitOnError?: boolean;
  output?: EngineOutput;
  engineFactory?: EngineFactory;
};

export type RequestOptions = {
  /** Instance or mapping overriding the record's field defaults at this destination. */
  default?: unknown;
  /** Prepended to the record's option names. */
  prefix?: string;
};

type RequestGroup = {
  record: AnyRecordType;
  prefix: string;
  destinations: string[];
  /** One per destination: partials of the same record may bind different keywords. */
  factories: RecordFactory[];
  defaults: unknown[];
};

type PlainArgument = {
  name: string;
  field: IntrospectedField;
};

type Built = {
  groups: RecordWrapper[];
  plain: { name: string; wrapper: FieldWrapper; fallback: BoxedDefault }[];
};

/** Parsed result: one value per destination and per plain argument. */
export class Namespace {
  constructor(private readonly entries: ReadonlyMap<string, unknown>) {}

  get(destination: string): unknown {
    return this.entries.get(destination);
  }

  has(destination: string): boolean {
    return this.entries.has(destination);
  }

  /** The record instance at `destination`, typed by its record. */
  getRecord<T>(record: RecordType<T>, destination: string): T {
    const value = this.entries.get(destination);
    if (!record.isInstance(value)) {
      throw new ArgumentTypeError(`'${destination}' does not hold a ${record.name}`);
    }
    return value;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  toJSON(): Record<string, unknown> {
    return Object.fromEntries(this.entries);
  }
}

/**
 * Collects record requests and plain arguments, and turns a command line into
 * a `Namespace`. Wrappers are built on every `parse`, never at request time.
 */
export class ArgumentParser {
  private readonly requests: RequestGroup[] = [];
  private readonly plain: PlainArgument[] = [];
  private readonly used = new Set<string>();
  private locked = false;
  private readonly logger: Logger;
  private readonly engineFactory: EngineFactory;

  constructor(private readonly options: ArgumentParserOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.engineFactory = options.engineFactory ?? createCommanderEngine;
  }

  private claim(destination: string): void {
    if (this.locked) throw new ParserStateError(`cannot add '${destination}': parsing has already started`);
    if (destination.trim() === '') throw new SchemaError('destination must be a non-empty string');
    if (this.used.has(destination)) throw new SchemaError(`destination '${destination}' is already in use`);
    this.used.add(destination);
  }

  /**
   * Exposes `source` at `destination`. Requests for the same record type and
   * prefix share their options, which then take one value per destination,
   * even when they come from different partials.
   */
  request<T>(source: RecordSource<T>, destination: string, options: RequestOptions = {}): this {
    this.claim(destination);
    const prefix = options.prefix ?? '';
    const factory = toFactory(source);
    const existing = this.requests.find((r) => r.record === factory.record && r.prefix === prefix);
    if (existing) {
      existing.destinations.push(destination);
      existing.factories.push(factory);
      existing.defaults.push(options.default);
    } else {
      this.requests.push({
        record: factory.record,
        prefix,
        destinations: [destination],
        factories: [factory],
        defaults: [options.default],
      });
    }
    this.logger.debug(`requested ${factory.record.name} at '${destination}'`);
    return this;
  }

  /** Adds a plain option `--name`; its value lands in the namespace under `name`. */
  addArgument<T>(name: string, def: FieldDef<T>): this {
    this.claim(name);
    if (!def.cmd) throw new SchemaError(`${name}: a plain argument cannot be kept off the command line`);
    this.plain.push({
      name,
      field: { name, type: resolveDeferred(def.type.node, name), default: def.default, help: def.help },
    });
    return this;
  }

  private build(): Built {
    const arena = new WrapperArena<RecordWrapper>();
    const ctx = { arena, docs: this.options.docs, logger: this.logger };
    const groups = this.requests.map((request) => {
      const [first, ...rest] = request.destinations.map((destination, i) =>
        RecordWrapper.root(ctx, request.factories[i], {
          destination,
          default: request.defaults[i],
          prefix: request.prefix,
        }),
      );
      if (!first) throw new SchemaError(`${request.record.name} was requested without a destination`);
      for (const other of rest) first.merge(other);
      return first;
    });
    const plain = this.plain.map(({ name, field }) => {
      const kind = classify(field.type, name);
      if (!isOptionKind(kind)) {
        throw new UnsupportedTypeError(`${name}: record types are exposed with request(), not addArgument()`);
      }
      const wrapper = new FieldWrapper(field, kind, { optionName: name, logger: this.logger });
      const fallback: BoxedDefault = field.default ? { value: resolveFieldDefault(field.default) } : undefined;
      return { name, wrapper, fallback };
    });
    return { groups, plain };
  }

  private register(engine: FlagEngine, built: Built): void {
    for (const { wrapper, fallback } of built.plain) engine.addOption(wrapper.declaration([fallback]));
    for (const wrapper of built.groups) wrapper.register(engine);
  }

  /**
   * Parses `argv` (user arguments only, without the node binary and script).
   * Usage errors and `--help` follow `exitOnError`.
   */
  parse(argv: readonly string[] = process.argv.slice(2)): Namespace {
    this.locked = true;
    const built = this.build();
    const engine = this.engineFactory({
      name: this.options.name,
      description: this.options.description,
      exitOnError: this.options.exitOnError,
      output: this.options.output,
    });
    this.register(engine, built);
    const flags = engine.parse(argv);

    const entries = new Map<string, unknown>();
    for (const { name, wrapper, fallback } of built.plain) {
      entries.set(name, wrapper.finalize(flags.values[wrapper.key], fallback));
    }
    for (const wrapper of built.groups) {
      const instances = buildInstances(wrapper, flags);
      wrapper.destinations.forEach((destination, i) => entries.set(destination, instances[i]));
    }
    this.logger.debug(`parsed ${entries.size} destination(s)`);
    return new Namespace(entries);
  }

  /** The option groups `parse` would declare, without parsing anything. */
  describe(): RecordedGroup[] {
    const engine = new RecordingEngine();
    this.register(engine, this.build());
    return engine.toGroups();
  }
}

export type CliResult = {
  exitCode: number;
  namespace?: Namespace;
};

/**
 * Parses and maps engine exits to a status: 0 for a parse or `--help`, 2 for
 * usage errors. The parser must be built with `exitOnError: false`.
 */
export function runCli(parser: ArgumentParser, argv: readonly string[]): CliResult {
  try {
    return { exitCode: 0, namespace: parser.parse(argv) };
  } catch (e) {
    if (e instanceof CommanderError) return { exitCode: e.exitCode === 0 ? 0 : USAGE_EXIT_CODE };
    throw e;
  }
}
