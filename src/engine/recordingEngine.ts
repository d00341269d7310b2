import type { Arity, FlagEngine, OptionDeclaration, ParsedFlags, SubcommandSpec } from './flagEngine';

export type RecordedOption = {
  name: string;
  arity: Arity;
  required: boolean;
  default?: unknown;
  choices?: string[];
  help?: string;
};

export type RecordedSubcommands = {
  key: string;
  title: string;
  required: boolean;
  alternatives: Record<string, RecordedGroup[]>;
};

export type RecordedGroup = {
  title: string;
  description?: string;
  options: RecordedOption[];
  subcommands: RecordedSubcommands[];
};

type PendingSubcommands = { key: string; spec: SubcommandSpec; engines: Map<string, RecordingEngine> };

type Slot = { group: RecordedGroup; pending: PendingSubcommands[] };

/**
 * Engine that only records what is declared. Backs `ArgumentParser.describe()`
 * and the `describe` command; parsing yields no values.
 */
export class RecordingEngine implements FlagEngine {
  private readonly groups: Slot[] = [];

  private current(): Slot {
    const last = this.groups[this.groups.length - 1];
    if (last) return last;
    const first: Slot = { group: { title: 'options', options: [], subcommands: [] }, pending: [] };
    this.groups.push(first);
    return first;
  }

  openGroup(title: string, description?: string): void {
    this.groups.push({ group: { title, description, options: [], subcommands: [] }, pending: [] });
  }

  addOption(decl: OptionDeclaration): void {
    this.current().group.options.push({
      name: `--${decl.name}`,
      arity: decl.arity,
      required: decl.required,
      default: decl.defaultValue?.value,
      choices: decl.choices ? [...decl.choices] : undefined,
      help: decl.help,
    });
  }

  addSubcommands(key: string, spec: SubcommandSpec): ReadonlyMap<string, FlagEngine> {
    const engines = new Map(spec.alternatives.map((name): [string, RecordingEngine] => [name, new RecordingEngine()]));
    this.current().pending.push({ key, spec, engines });
    return engines;
  }

  parse(): ParsedFlags {
    return { values: {}, supplied: new Set(), subcommands: new Map() };
  }

  /** Recorded groups, subcommand engines included. */
  toGroups(): RecordedGroup[] {
    return this.groups.map(({ group, pending }) => ({
      ...group,
      subcommands: pending.map(({ key, spec, engines }) => ({
        key,
        title: spec.title,
        required: spec.required,
        alternatives: Object.fromEntries([...engines].map(([name, engine]) => [name, engine.toGroups()])),
      })),
    }));
  }
}
