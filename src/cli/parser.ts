export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  flags: Record<string, string | boolean | string[]>;
}

export interface ParseOptions {
  // Flags that never take a value, so `--strict results.json` keeps the positional
  booleans?: readonly string[];
  // Short name -> long name, e.g. { w: 'weights' }
  aliases?: Readonly<Record<string, string>>;
}

export function parseArgs(args: string[], options: ParseOptions = {}): ParsedArgs {
  const result: ParsedArgs = {
    command: undefined,
    positionals: [],
    flags: {},
  };

  const booleans = new Set(options.booleans ?? []);
  const aliases = options.aliases ?? {};

  let i = 0;
  let commandFound = false;
  let flagsEnded = false;

  // Helper to check if a string looks like a flag (not a negative number)
  const isFlag = (str: string): boolean => {
    if (!str.startsWith('-')) return false;
    // Single dash is not a flag
    if (str === '-') return false;
    // Check if it's a negative number: starts with - followed by digits (optionally with decimal)
    const negativeNumberPattern = /^-\d+(\.\d+)?$/;
    return !negativeNumberPattern.test(str);
  };

  // Repeated value flags collect into an array
  const setFlag = (rawKey: string, value: string | boolean): void => {
    const key = aliases[rawKey] ?? rawKey;
    const existing = result.flags[key];
    if (typeof value === 'string' && typeof existing === 'string') {
      result.flags[key] = [existing, value];
    } else if (typeof value === 'string' && Array.isArray(existing)) {
      result.flags[key] = [...existing, value];
    } else {
      result.flags[key] = value;
    }
  };

  const takesValue = (rawKey: string): boolean => !booleans.has(aliases[rawKey] ?? rawKey);

  const addPositional = (arg: string): void => {
    if (!commandFound) {
      result.command = arg;
      commandFound = true;
    } else {
      result.positionals.push(arg);
    }
  };

  while (i < args.length) {
    const arg = args[i];
    if (arg === undefined || arg === '') {
      i++;
      continue;
    }

    if (flagsEnded) {
      addPositional(arg);
    } else if (arg === '--') {
      flagsEnded = true;
    } else if (arg.startsWith('--')) {
      // Long flag: --flag or --flag=value
      const equalIndex = arg.indexOf('=');
      if (equalIndex !== -1) {
        setFlag(arg.slice(2, equalIndex), arg.slice(equalIndex + 1));
      } else {
        const key = arg.slice(2);
        const nextArg = args[i + 1];
        // Check if next arg is a value (not a flag)
        if (takesValue(key) && nextArg !== undefined && nextArg !== '' && !isFlag(nextArg)) {
          setFlag(key, nextArg);
          i++; // Skip next arg as it's the value
        } else {
          setFlag(key, true);
        }
      }
    } else if (isFlag(arg)) {
      // Short flag: -f or -f value
      const key = arg.slice(1);

      // Handle multiple short flags like -abc as -a -b -c
      if (key.length > 1) {
        for (const char of key) {
          setFlag(char, true);
        }
      } else {
        const nextArg = args[i + 1];
        if (takesValue(key) && nextArg !== undefined && nextArg !== '' && !isFlag(nextArg)) {
          setFlag(key, nextArg);
          i++;
        } else {
          setFlag(key, true);
        }
      }
    } else {
      addPositional(arg);
    }

    i++;
  }

  return result;
}

// Last value of a string flag, undefined when absent or boolean
export function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags[name];
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value[value.length - 1];
  return undefined;
}

export function booleanFlag(args: ParsedArgs, name: string): boolean | undefined {
  const value = args.flags[name];
  if (value === true || value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

// Flags shared by every controlscore command
export const CLI_PARSE_OPTIONS: ParseOptions = {
  booleans: ['help', 'version', 'json', 'verbose', 'quiet', 'strict', 'dry-run'],
  aliases: { h: 'help', v: 'verbose', q: 'quiet', i: 'input', o: 'out', w: 'weights', s: 'service-weights', c: 'compensating' },
};
