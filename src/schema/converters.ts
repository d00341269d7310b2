import { ArgumentTypeError } from '../errors';

const TRUE_STRINGS = ['true', 'yes', 'y', 'on', '1'];
const FALSE_STRINGS = ['false', 'no', 'n', 'off', '0'];

export function parseBoolean(raw: string): boolean {
  const s = raw.trim().toLowerCase();
  if (TRUE_STRINGS.includes(s)) return true;
  if (FALSE_STRINGS.includes(s)) return false;
  throw new ArgumentTypeError(`Boolean value expected for argument, received '${raw}'`);
}

export function parseNumber(raw: string, integer: boolean): number {
  const s = raw.trim();
  const n = s === '' ? Number.NaN : Number(s);
  if (!Number.isFinite(n)) throw new ArgumentTypeError(`'${raw}' is not a number`);
  if (integer && !Number.isInteger(n)) throw new ArgumentTypeError(`'${raw}' is not an integer`);
  if (integer && !Number.isSafeInteger(n)) throw new ArgumentTypeError(`'${raw}' is too large to be kept exactly`);
  return n;
}

function unquote(s: string): string {
  if (s.length >= 2 && (s[0] === '"' || s[0] === "'") && s[s.length - 1] === s[0]) return s.slice(1, -1);
  return s;
}

/**
 * Splits one raw token into the items of a whole sequence.
 * Accepts `1 2 3`, `1,2,3`, `[1,2,3]` and `(1, 2, 3)`.
 */
export function splitSequenceToken(raw: string): string[] {
  let s = raw.trim();
  if ((s.startsWith('[') && s.endsWith(']')) || (s.startsWith('(') && s.endsWith(')'))) {
    s = s.slice(1, -1);
  }
  const parts = s.includes(',') ? s.split(',') : s.split(/\s+/);
  return parts.map((p) => unquote(p.trim())).filter((p) => p !== '');
}
