#!/usr/bin/env node

import path from 'node:path';

import { Command, CommanderError } from 'commander';
import { VERSION } from './index';
import { TypeScriptDocExtractor } from './docs/docExtractor';
import { USAGE_EXIT_CODE } from './engine/flagEngine';
import { RecordArgsError, SchemaError } from './errors';
import { ArgumentParser, runCli } from './parsing/argumentParser';
import { loadDefaultsFile } from './parsing/defaults';
import { isRecordType } from './schema/record';
import type { AnyRecordType } from './schema/record';
import { stableStringify } from './util/deterministicJson';
import { createConsoleLogger, silentLogger } from './util/log';

export type CliIo = {
  out: (str: string) => void;
  err: (str: string) => void;
};

const processIo: CliIo = {
  out: (str) => process.stdout.write(str),
  err: (str) => process.stderr.write(str),
};

type TargetOptions = {
  export?: string;
  dest?: string;
  verbose?: boolean;
};

type ParseOptions = TargetOptions & {
  defaults?: string;
};

type Target = {
  record: AnyRecordType;
  destination: string;
};

function loadModule(modulePath: string): object {
  const resolved = path.resolve(modulePath);
  let loaded: unknown;
  try {
    loaded = require(resolved);
  } catch (e) {
    throw new SchemaError(`cannot load ${resolved}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (typeof loaded !== 'object' || loaded === null) throw new SchemaError(`${resolved} exports nothing`);
  return loaded;
}

/** The named export, or the first export that is a record type. */
function pickTarget(modulePath: string, opts: TargetOptions): Target {
  const mod = loadModule(modulePath);
  if (opts.export) {
    const value: unknown = Reflect.get(mod, opts.export);
    if (!isRecordType(value)) throw new SchemaError(`export '${opts.export}' of ${modulePath} is not a record type`);
    return { record: value, destination: opts.dest ?? opts.export };
  }
  for (const value of Object.values(mod)) {
    if (isRecordType(value)) return { record: value, destination: opts.dest ?? value.name };
  }
  throw new SchemaError(`${modulePath} does not export a record type`);
}

function createParser(target: Target, opts: ParseOptions, io: CliIo): ArgumentParser {
  const parser = new ArgumentParser({
    name: target.record.name,
    docs: new TypeScriptDocExtractor(),
    logger: opts.verbose ? createConsoleLogger({ verbose: true, scope: 'record-args' }) : silentLogger,
    exitOnError: false,
    output: { writeOut: io.out, writeErr: io.err },
  });
  const defaults = opts.defaults
    ? loadDefaultsFile(opts.defaults, { [target.destination]: target.record }).get(target.destination)
    : undefined;
  return parser.request(target.record, target.destination, { default: defaults });
}

/**
 * `record-args describe <module>` prints the options derived from a record type;
 * `record-args parse <module> -- <args...>` prints the parsed namespace.
 * Returns the exit status: 0 on success, 2 on usage errors, 1 otherwise.
 */
export function runRecordArgsCli(argv: readonly string[], io: CliIo = processIo): number {
  let exitCode = 0;
  const program = new Command();

  program
    .name('record-args')
    .description('Derive command-line options from record types and parse arguments into records')
    .version(VERSION)
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err });

  program
    .command('describe')
    .description('Print the option groups derived from a record type as JSON')
    .argument('<module>', 'Module exporting record types')
    .option('--export <name>', 'Export holding the record type (default: first record type)')
    .option('--dest <name>', 'Destination to request the record at')
    .option('-v, --verbose', 'Verbose logging', false)
    .action((modulePath: string, opts: TargetOptions) => {
      const target = pickTarget(modulePath, opts);
      io.out(stableStringify(createParser(target, opts, io).describe()));
    });

  program
    .command('parse')
    .description('Parse arguments given after -- into a record and print it as JSON')
    .argument('<module>', 'Module exporting record types')
    .argument('[args...]', 'Arguments for the record parser')
    .option('--export <name>', 'Export holding the record type (default: first record type)')
    .option('--dest <name>', 'Destination to request the record at')
    .option('--defaults <file>', 'JSON file of defaults keyed by destination')
    .option('-v, --verbose', 'Verbose logging', false)
    .action((modulePath: string, args: string[], opts: ParseOptions) => {
      const target = pickTarget(modulePath, opts);
      const result = runCli(createParser(target, opts, io), args);
      exitCode = result.exitCode;
      if (result.namespace) io.out(stableStringify(result.namespace.toJSON()));
    });

  try {
    program.parse([...argv], { from: 'user' });
    return exitCode;
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode === 0 ? 0 : USAGE_EXIT_CODE;
    if (e instanceof RecordArgsError) {
      io.err(`${e.message}\n`);
      return 1;
    }
    throw e;
  }
}

// Run CLI only when executed directly (not when imported in tests)
if (require.main === module) {
  process.exitCode = runRecordArgsCli(process.argv.slice(2));
}
