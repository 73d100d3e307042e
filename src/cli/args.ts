export interface ParsedArgs {
  command: string | undefined;
  flags: Record<string, string | boolean>;
  rest: string[];
}

const BOOLEAN_FLAGS = new Set(['force', 'help']);

/**
 * `<command> [positional...] [--flag value] [--switch]`. A value flag at the
 * end of argv gets the empty string, which callers treat as missing.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const args = [...argv];
  const command = args.shift();
  const flags: Record<string, string | boolean> = {};
  const rest: string[] = [];
  while (args.length > 0) {
    const token = args.shift();
    if (token === undefined) break;
    if (token === '-h') {
      flags.help = true;
      continue;
    }
    if (token.startsWith('--')) {
      const key = token.slice(2);
      if (BOOLEAN_FLAGS.has(key)) {
        flags[key] = true;
        continue;
      }
      flags[key] = args.shift() ?? '';
      continue;
    }
    rest.push(token);
  }
  return { command, flags, rest };
}

export function stringFlag(flags: ParsedArgs['flags'], key: string): string | undefined {
  const value = flags[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}
