export type Logger = {
  debug(message: string): void;
};

export const silentLogger: Logger = {
  debug: () => undefined,
};

/**
 * Logger writing to stderr. `debug` lines only show when `verbose` is set so a
 * parse stays silent on stdout, which belongs to the caller.
 */
export function createConsoleLogger(opts: { verbose: boolean; scope?: string }): Logger {
  const tag = opts.scope ? `[${opts.scope}] ` : '';
  return {
    debug: (message) => {
      // eslint-disable-next-line no-console
      if (opts.verbose) console.error(`${tag}${message}`);
    },
  };
}

/** Short printable form of a default value for log lines. */
export function describeDefault(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (typeof value === 'symbol') return value.toString();
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
