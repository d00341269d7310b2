import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';

import { RecordConstructionError, SchemaError } from '../errors';
import { recordJsonSchema } from './jsonSchema';
import { resolveFieldDefault } from './types';
import type { FieldShape, InferRecord } from './types';

/** Where the TypeScript declaration of a record lives, for help text extraction. */
export type DocSource = {
  /** Absolute path of the `.ts` file that declares the record. */
  file: string;
  /** Name of the variable, interface, class or type alias holding the fields (default: record name). */
  declaration?: string;
};

export type RecordType<T> = {
  readonly kind: 'record';
  readonly name: string;
  readonly doc?: string;
  readonly docSource?: DocSource;
  /** Declared fields, in declaration order. */
  readonly fields: FieldShape;
  /**
   * Builds an instance. Missing keys take their declared defaults; the result is
   * validated against the field types before the instance is built.
   */
  construct(values?: Readonly<Record<string, unknown>>): T;
  /** True for instances produced by `construct`. */
  isInstance(value: unknown): value is T;
};

/** A record plus keyword values that override its field defaults. */
export type RecordPartial<T> = {
  readonly kind: 'partial';
  readonly record: RecordType<T>;
  readonly keywords: Readonly<Record<string, unknown>>;
};

export type RecordSource<T> = RecordType<T> | RecordPartial<T>;
export type AnyRecordType = RecordType<unknown>;
export type AnyRecordSource = RecordSource<unknown>;

export type RecordOptions = {
  doc?: string;
  docSource?: DocSource;
};

const FIELD_NAME = /^[A-Za-z_$][\w$]*$/;

const ajv = new Ajv({ allErrors: true, strict: false });

function hasOwn(obj: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

function createRecordType<F extends FieldShape, R>(
  name: string,
  fields: F,
  options: RecordOptions,
  build: (values: InferRecord<F>) => R,
): RecordType<R> {
  const shape: FieldShape = fields;
  const badNames = Object.keys(shape).filter((k) => !FIELD_NAME.test(k));
  if (badNames.length > 0) {
    throw new SchemaError(`${name}: field names must be identifiers, got ${badNames.join(', ')}`);
  }

  const instances = new WeakSet<object>();
  let validate: ValidateFunction<InferRecord<F>> | undefined;

  return {
    kind: 'record',
    name,
    doc: options.doc,
    docSource: options.docSource,
    fields: shape,
    construct(values = {}) {
      const extra = Object.keys(values).filter((k) => !hasOwn(shape, k));
      if (extra.length > 0) {
        throw new RecordConstructionError(`${name}: unexpected field(s) ${extra.join(', ')}`);
      }
      const candidate: Record<string, unknown> = {};
      for (const [key, def] of Object.entries(shape)) {
        if (hasOwn(values, key)) candidate[key] = values[key];
        else if (def.default) candidate[key] = resolveFieldDefault(def.default);
      }
      validate ??= ajv.compile<InferRecord<F>>(recordJsonSchema(shape));
      if (!validate(candidate)) {
        throw new RecordConstructionError(`${name}: ${ajv.errorsText(validate.errors, { dataVar: name })}`);
      }
      const instance = build(candidate);
      if (typeof instance === 'object' && instance !== null) instances.add(instance);
      return instance;
    },
    isInstance(value: unknown): value is R {
      return typeof value === 'object' && value !== null && instances.has(value);
    },
  };
}

/**
 * Declares a record type.
 *
 * ```ts
 * const Hparams = defineRecord('Hparams', {
 *   seed: field(t.int(), { default: 13 }),
 *   rate: field(t.number()),
 * });
 * type Hparams = RecordValue<typeof Hparams>;
 * ```
 *
 * Pass `construct` to back the record with a class.
 */
export function defineRecord<F extends FieldShape>(
  name: string,
  fields: F,
  options?: RecordOptions,
): RecordType<InferRecord<F>>;
export function defineRecord<F extends FieldShape, R>(
  name: string,
  fields: F,
  options: RecordOptions & { construct: (values: InferRecord<F>) => R },
): RecordType<R>;
export function defineRecord<F extends FieldShape, R>(
  name: string,
  fields: F,
  options: RecordOptions & { construct?: (values: InferRecord<F>) => R } = {},
): RecordType<InferRecord<F>> | RecordType<R> {
  if (options.construct) return createRecordType(name, fields, options, options.construct);
  return createRecordType(name, fields, options, (values: InferRecord<F>) => ({ ...values }));
}

export type RecordValue<R> = R extends RecordType<infer T> ? T : never;

/** Binds keyword values over a record's defaults, like a partially applied constructor. */
export function partial<T>(record: RecordType<T>, keywords: Readonly<Record<string, unknown>>): RecordPartial<T> {
  const unknown = Object.keys(keywords).filter((k) => !hasOwn(record.fields, k));
  if (unknown.length > 0) {
    throw new SchemaError(`${record.name}: partial keywords ${unknown.join(', ')} are not fields`);
  }
  return { kind: 'partial', record, keywords };
}

export function isRecordType(value: unknown): value is AnyRecordType {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'record' &&
    'fields' in value &&
    typeof value.fields === 'object' &&
    'construct' in value &&
    typeof value.construct === 'function' &&
    'isInstance' in value &&
    typeof value.isInstance === 'function'
  );
}

export type RecordFactory = {
  readonly record: AnyRecordType;
  readonly keywords: Readonly<Record<string, unknown>>;
};

export function toFactory(source: AnyRecordSource): RecordFactory {
  return source.kind === 'partial'
    ? { record: source.record, keywords: source.keywords }
    : { record: source, keywords: {} };
}
