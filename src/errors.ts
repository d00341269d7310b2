/** Base class for every error raised by record-args itself (engine errors are commander's own). */
export class RecordArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The value handed in is not a record type, or a record declaration is malformed. */
export class SchemaError extends RecordArgsError {}

/** A field's declared type has no command-line encoding. */
export class UnsupportedTypeError extends RecordArgsError {}

/** A known gap, e.g. a list of records. Raised at wrapper-build time, never degraded. */
export class NotImplementedError extends UnsupportedTypeError {}

/**
 * A field requested under N destinations received a value count other than 1 or N.
 */
export class InconsistentArgumentError extends RecordArgsError {
  readonly field: string;
  readonly actual: number;
  readonly expected: readonly [1, number];

  constructor(field: string, actual: number, instances: number) {
    super(
      `The field '${field}' contains ${actual} values, but either 1 or ${instances} values were expected.`,
    );
    this.field = field;
    this.actual = actual;
    this.expected = [1, instances];
  }
}

/** A parsed value could not be coerced to the field's declared type. */
export class ArgumentTypeError extends RecordArgsError {}

/** A default mapping names keys that are neither fields nor nested records of the target. */
export class ExcessKeyError extends RecordArgsError {
  readonly keys: readonly string[];
  readonly path: string;

  constructor(keys: readonly string[], recordName: string, path: string) {
    super(`[${keys.map((k) => `'${k}'`).join(', ')}] are not fields of ${recordName} at path '${path}'!`);
    this.keys = keys;
    this.path = path;
  }
}

/** `RecordType.construct` was given values that break the record's declared shape. */
export class RecordConstructionError extends RecordArgsError {}

/** The parser was mutated after parsing started. */
export class ParserStateError extends RecordArgsError {}
