import { Command, InvalidArgumentError, Option } from 'commander';

import { ArgumentTypeError, SchemaError } from '../errors';
import { ABSENT, USAGE_EXIT_CODE } from './flagEngine';
import type {
  EngineFactory,
  EngineOptions,
  FlagEngine,
  OptionDeclaration,
  ParsedFlags,
  SubcommandSpec,
} from './flagEngine';

/** Preset of options that may be given bare; mapped to `ABSENT` / `[]` by the arg parser. */
const BARE: unique symbol = Symbol('record-args.bare');

const PLACEHOLDERS: Record<OptionDeclaration['arity'], string> = {
  one: '<value>',
  optional: '[value]',
  zeroOrMore: '[values...]',
  oneOrMore: '<values...>',
};

function convertToken(decl: OptionDeclaration, token: unknown): unknown {
  if (typeof token !== 'string') throw new InvalidArgumentError(`Expected a value for --${decl.name}.`);
  if (decl.choices && !decl.choices.includes(token)) {
    throw new InvalidArgumentError(`Allowed choices are ${decl.choices.join(', ')}.`);
  }
  try {
    return decl.convert(token);
  } catch (e) {
    if (e instanceof ArgumentTypeError) throw new InvalidArgumentError(e.message);
    throw e;
  }
}

type Registered = { decl: OptionDeclaration; attribute: string };

type SubcommandGroup = {
  key: string;
  required: boolean;
  engines: Map<string, CommanderEngine>;
  selected?: string;
};

/**
 * `FlagEngine` on top of commander. Arity maps to the option placeholder
 * (`<value>`, `[value]`, `<values...>`, `[values...]`); values are converted by
 * an arg parser per token so commander's own error reporting applies.
 */
export class CommanderEngine implements FlagEngine {
  private readonly registered: Registered[] = [];
  private readonly descriptions: string[] = [];
  private group: string | undefined;
  /** Flag name to the title of the group that declared it. */
  private readonly owners = new Map<string, string>();
  private subcommands: SubcommandGroup | undefined;

  constructor(readonly command: Command) {}

  openGroup(title: string, description?: string): void {
    this.group = title;
    if (description) this.descriptions.push(`${title}\n${description.replace(/^/gm, '  ')}`);
  }

  addOption(decl: OptionDeclaration): void {
    const owner = this.group ?? 'options';
    const taken = this.owners.get(decl.name);
    if (taken !== undefined) {
      throw new SchemaError(`--${decl.name} is declared by both ${taken} and ${owner}; request one of them with a prefix`);
    }
    const option = new Option(`--${decl.name} ${PLACEHOLDERS[decl.arity]}`, decl.help ?? '');
    const defaultRef = decl.defaultValue?.value;

    option.argParser((token: unknown, previous: unknown): unknown => {
      switch (decl.arity) {
        case 'one':
          return convertToken(decl, token);
        case 'optional':
          return token === BARE ? ABSENT : convertToken(decl, token);
        case 'zeroOrMore':
        case 'oneOrMore': {
          // Start over on the first occurrence, when `previous` is still the default.
          const list = Array.isArray(previous) && previous !== defaultRef ? previous : [];
          return token === BARE ? [...list] : [...list, convertToken(decl, token)];
        }
      }
    });
    if (decl.arity === 'optional' || decl.arity === 'zeroOrMore') option.preset(BARE);
    if (decl.defaultValue && decl.defaultValue.value !== undefined) option.default(decl.defaultValue.value);
    if (decl.required) option.makeOptionMandatory();
    if (this.group) option.helpGroup(`${this.group}:`);

    this.command.addOption(option);
    this.owners.set(decl.name, owner);
    this.registered.push({ decl, attribute: option.attributeName() });
  }

  addSubcommands(key: string, spec: SubcommandSpec): ReadonlyMap<string, FlagEngine> {
    if (this.subcommands) {
      throw new SchemaError(`only one subparsers field can be registered per command (already have '${this.subcommands.key}')`);
    }
    // Options after the subcommand name belong to the subcommand.
    this.command.enablePositionalOptions();
    const group: SubcommandGroup = { key, required: spec.required, engines: new Map() };
    for (const name of spec.alternatives) {
      const sub = this.command.command(name).description(spec.description ?? spec.title);
      sub.allowExcessArguments(false);
      sub.action(() => {
        group.selected = name;
      });
      group.engines.set(name, new CommanderEngine(sub));
    }
    this.subcommands = group;
    return group.engines;
  }

  parse(argv: readonly string[]): ParsedFlags {
    this.prepare();
    this.command.parse([...argv], { from: 'user' });
    return this.collect();
  }

  private prepare(): void {
    // Without an action, commander reports a missing subcommand as a usage error.
    if (!this.subcommands || !this.subcommands.required) this.command.action(() => undefined);
    if (this.descriptions.length > 0) this.command.addHelpText('after', `\n${this.descriptions.join('\n\n')}`);
    for (const engine of this.subcommands?.engines.values() ?? []) {
      if (engine.descriptions.length > 0) engine.command.addHelpText('after', `\n${engine.descriptions.join('\n\n')}`);
    }
  }

  private collect(): ParsedFlags {
    const values: Record<string, unknown> = {};
    const supplied = new Set<string>();
    for (const { decl, attribute } of this.registered) {
      values[decl.key] = this.command.getOptionValue(attribute);
      if (this.command.getOptionValueSource(attribute) === 'cli') supplied.add(decl.key);
    }
    const subcommands = new Map<string, { name: string; flags: ParsedFlags }>();
    const group = this.subcommands;
    const selected = group?.selected;
    const engine = selected !== undefined ? group?.engines.get(selected) : undefined;
    if (group && selected !== undefined && engine) {
      subcommands.set(group.key, { name: selected, flags: engine.collect() });
    }
    return { values, supplied, subcommands };
  }
}

export function configureCommand(command: Command, options: EngineOptions): Command {
  const exitOnError = options.exitOnError ?? true;
  command.name(options.name ?? 'record-args').allowExcessArguments(false);
  if (options.description) command.description(options.description);
  if (options.output) command.configureOutput(options.output);
  command.exitOverride((err) => {
    if (!exitOnError) throw err;
    process.exit(err.exitCode === 0 ? 0 : USAGE_EXIT_CODE);
  });
  return command;
}

export const createCommanderEngine: EngineFactory = (options) =>
  new CommanderEngine(configureCommand(new Command(), options));
