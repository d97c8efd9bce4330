import { ValidationError } from './errors.ts';

export type ParsedArgs = {
  positionals: string[];
  flags: Set<string>;
  options: Map<string, string>;
};

/**
 * Splits a command's arguments. `flags` are booleans, `options` take a value
 * either as the next argument or after `=`. A lone `-` is a positional.
 */
export function parseArgs(args: { values: string[]; flags: readonly string[]; options: readonly string[] }): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], flags: new Set(), options: new Map() };
  let index = 0;

  while (index < args.values.length) {
    const value = args.values[index] ?? '';
    index += 1;

    if (value === '--') {
      parsed.positionals.push(...args.values.slice(index));
      break;
    }

    if (value === '-' || !value.startsWith('-')) {
      parsed.positionals.push(value);
      continue;
    }

    const equals = value.indexOf('=');
    const name = equals === -1 ? value : value.slice(0, equals);

    if (args.options.includes(name)) {
      const optionValue = equals === -1 ? args.values[index] : value.slice(equals + 1);
      if (optionValue === undefined || (equals === -1 && optionValue.startsWith('-'))) {
        throw new ValidationError({ message: `${name} requires a value` });
      }
      if (equals === -1) {
        index += 1;
      }
      parsed.options.set(name, optionValue);
      continue;
    }

    if (args.flags.includes(value)) {
      parsed.flags.add(value);
      continue;
    }

    throw new ValidationError({ message: `Unknown flag: ${value}` });
  }

  return parsed;
}
