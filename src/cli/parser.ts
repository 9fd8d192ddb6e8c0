export interface ParsedArgs {
  positionals: string[];
  flags: Record<string, string | boolean>;
}

/**
 * Split argv into flags and positionals.
 * `--key=value` and `--key value` set a value unless `key` is a boolean flag;
 * `-abc` sets the switches a, b and c; everything after `--` is positional.
 */
export function parseArgs(
  args: readonly string[],
  booleanFlags: ReadonlySet<string> = new Set(),
): ParsedArgs {
  const result: ParsedArgs = { positionals: [], flags: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (arg === '--') {
      result.positionals.push(...args.slice(i + 1));
      break;
    }

    if (arg.startsWith('--')) {
      const equalIndex = arg.indexOf('=');
      if (equalIndex !== -1) {
        result.flags[arg.slice(2, equalIndex)] = arg.slice(equalIndex + 1);
        continue;
      }
      const key = arg.slice(2);
      const next = args[i + 1];
      if (!booleanFlags.has(key) && next !== undefined && !next.startsWith('-')) {
        result.flags[key] = next;
        i++; // Skip next arg as it's the value
      } else {
        result.flags[key] = true;
      }
    } else if (arg.startsWith('-') && arg.length > 1) {
      for (const char of arg.slice(1)) {
        result.flags[char] = true;
      }
    } else {
      result.positionals.push(arg);
    }
  }

  return result;
}
