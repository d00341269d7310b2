import type { ParsedFlags } from '../engine/flagEngine';
import { ArgumentTypeError, InconsistentArgumentError, SchemaError } from '../errors';
import { assertNever } from '../schema/classify';
import type { Member, RecordWrapper } from '../wrappers/recordWrapper';

/**
 * Splits one parsed value across `instances` records. A non-list or an empty
 * list applies to every instance, one element is broadcast, N elements are
 * distributed in destination order.
 */
export function distribute(field: string, value: unknown, instances: number): unknown[] {
  if (!Array.isArray(value) || value.length === 0) return Array.from({ length: instances }, () => value);
  const items: readonly unknown[] = value;
  if (items.length === 1) return Array.from({ length: instances }, () => items[0]);
  if (items.length === instances) return [...items];
  throw new InconsistentArgumentError(field, items.length, instances);
}

function optionColumn(wrapper: RecordWrapper, member: Extract<Member, { mode: 'option' }>, flags: ParsedFlags, n: number): unknown[] {
  const field = member.wrapper;
  const raw = flags.values[field.key];
  const perInstance = n > 1 ? distribute(member.name, raw, n) : [raw];
  const defaults = wrapper.optionDefaults(field);
  return perInstance.map((value, i) => {
    const fallback = defaults[i];
    const finalized = field.finalize(value, fallback);
    if (wrapper.forceOptional && field.isMissing(finalized, fallback)) {
      throw new ArgumentTypeError(`the following argument is required: --${field.optionName}`);
    }
    return finalized;
  });
}

function subgroupColumn(
  wrapper: RecordWrapper,
  member: Extract<Member, { mode: 'subgroup' }>,
  flags: ParsedFlags,
): unknown[] {
  const alternatives = member.alternatives.map((id) => wrapper.child(id));
  const chosen = alternatives.filter((alt) => alt.optionKeys().some((key) => flags.supplied.has(key)));
  if (chosen.length > 1) {
    const names = chosen.map((alt) => alt.factory.record.name).join(', ');
    throw new ArgumentTypeError(`${member.name}: options of several alternatives were given (${names})`);
  }
  const [selected] = chosen;
  if (selected) return buildInstances(selected, flags);

  // Nothing given: the field default, built through the only alternative when it is a mapping.
  const defaults = wrapper.memberDefaults(member.name, member.field.default).map((d) => d?.value);
  const [sole] = alternatives;
  const needsBuild = defaults.some(
    (value) => value !== undefined && value !== null && !alternatives.some((alt) => alt.factory.record.isInstance(value)),
  );
  if (!needsBuild) return defaults;
  if (!sole || alternatives.length > 1) {
    throw new SchemaError(`${member.name}: a mapping default needs a single record alternative`);
  }
  const built = buildInstances(sole, flags);
  return defaults.map((value, i) => (value === undefined || value === null ? value : built[i]));
}

function subparsersColumn(
  wrapper: RecordWrapper,
  member: Extract<Member, { mode: 'subparsers' }>,
  flags: ParsedFlags,
): unknown[] {
  const selected = flags.subcommands.get(wrapper.subcommandKey(member.name));
  if (!selected) return wrapper.memberDefaults(member.name, member.field.default).map((d) => d?.value);
  const alternative = member.alternatives.get(selected.name);
  if (!alternative) throw new SchemaError(`${member.name}: unknown subcommand '${selected.name}'`);
  return buildInstances(alternative, selected.flags);
}

function memberColumn(wrapper: RecordWrapper, member: Member, flags: ParsedFlags, n: number): unknown[] {
  switch (member.mode) {
    case 'option':
      return optionColumn(wrapper, member, flags, n);
    case 'nested':
      return buildInstances(wrapper.child(member.childId), flags);
    case 'omitted':
      return Array.from({ length: n }, () => null);
    case 'subgroup':
      return subgroupColumn(wrapper, member, flags);
    case 'subparsers':
      return subparsersColumn(wrapper, member, flags);
    default:
      return assertNever(member, wrapper.factory.record.name);
  }
}

/** One record instance per destination of `wrapper`, in destination order. */
export function buildInstances(wrapper: RecordWrapper, flags: ParsedFlags): unknown[] {
  const n = wrapper.destinations.length;
  const values: Record<string, unknown>[] = Array.from({ length: n }, () => ({}));
  for (const member of wrapper.members) {
    memberColumn(wrapper, member, flags, n).forEach((value, i) => {
      values[i][member.name] = value;
    });
  }
  const record = wrapper.factory.record;
  const keywords = wrapper.keywordsPerDestination();
  return values.map((v, i) => record.construct({ ...keywords[i], ...v }));
}
