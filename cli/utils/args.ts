/**
 * Argument Parsing Utility
 *
 * `--key value` becomes an option, a bare `--key` or `-k` a flag, anything
 * else is positional.
 */

export interface ParsedArgs {
  positional: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    positional: [],
    flags: {},
    options: {}
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];

      if (next !== undefined && !next.startsWith('-')) {
        result.options[key] = next;
        i++;
      } else {
        result.flags[key] = true;
      }
    } else if (arg.startsWith('-') && arg.length > 1) {
      result.flags[arg.slice(1)] = true;
    } else {
      result.positional.push(arg);
    }
  }

  return result;
}

export function hasFlag(args: ParsedArgs, ...names: string[]): boolean {
  return names.some(name => args.flags[name]);
}

export function getOption(args: ParsedArgs, ...names: string[]): string | undefined {
  for (const name of names) {
    if (args.options[name]) return args.options[name];
  }
  return undefined;
}

export function getNumberOption(args: ParsedArgs, name: string): number | undefined {
  const raw = getOption(args, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`Option --${name} must be a number, got "${raw}"`);
  }
  return value;
}
