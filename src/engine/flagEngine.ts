/**
 * The flat flag-parsing engine the wrappers register options with.
 * `createCommanderEngine` is the default; anything implementing `FlagEngine` can stand in.
 */

/** Value of a zero-or-one option given bare, i.e. without a token. */
export const ABSENT: unique symbol = Symbol('record-args.absent');

/**
 * How many tokens an option takes.
 * - `one`: exactly one token.
 * - `optional`: zero or one token; bare presence yields `ABSENT`.
 * - `zeroOrMore`: a list; bare presence yields `[]`.
 * - `oneOrMore`: a list of at least one token.
 */
export type Arity = 'one' | 'optional' | 'zeroOrMore' | 'oneOrMore';

export type OptionDeclaration = {
  /** Long option name without dashes, e.g. `model.lr`. */
  readonly name: string;
  /** Key of the option's value in `ParsedFlags.values`. */
  readonly key: string;
  readonly help?: string;
  readonly arity: Arity;
  readonly required: boolean;
  /** Value used when the option is not given. Boxed so `undefined` is never a default. */
  readonly defaultValue?: { readonly value: unknown };
  readonly choices?: readonly string[];
  /** Converts one raw token. Throws `ArgumentTypeError` on bad input. */
  readonly convert: (raw: string) => unknown;
};

export type ParsedFlags = {
  readonly values: Readonly<Record<string, unknown>>;
  /** Keys of options that were given on the command line (as opposed to defaulted). */
  readonly supplied: ReadonlySet<string>;
  /** Selected subcommand per subcommand key, with that subcommand's own flags. */
  readonly subcommands: ReadonlyMap<string, { readonly name: string; readonly flags: ParsedFlags }>;
};

export type SubcommandSpec = {
  readonly title: string;
  readonly description?: string;
  readonly required: boolean;
  readonly alternatives: readonly string[];
};

export type EngineOutput = {
  writeOut?: (str: string) => void;
  writeErr?: (str: string) => void;
};

export type EngineOptions = {
  name?: string;
  description?: string;
  /** Exit the process on usage errors and `--help` (default true). Otherwise throw. */
  exitOnError?: boolean;
  output?: EngineOutput;
};

export interface FlagEngine {
  /** Options added after this call are listed under `title` in the help. */
  openGroup(title: string, description?: string): void;
  addOption(declaration: OptionDeclaration): void;
  /** Registers one subcommand per alternative and returns the engine of each. */
  addSubcommands(key: string, spec: SubcommandSpec): ReadonlyMap<string, FlagEngine>;
  parse(argv: readonly string[]): ParsedFlags;
}

export type EngineFactory = (options: EngineOptions) => FlagEngine;

/** Exit status for usage errors. */
export const USAGE_EXIT_CODE = 2;
