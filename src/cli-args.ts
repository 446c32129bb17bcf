import { CliUsageError } from './errors.js';

export const USAGE = 'crew-cover -i <inputfile> -o <outputfile>';

export interface CliArgs {
  help: boolean;
  input?: string;
  output?: string;
  rest: string[];
}

type OptionName = 'help' | 'input' | 'output';

interface OptionSpec {
  name: OptionName;
  takesValue: boolean;
}

const SHORT_OPTIONS: Record<string, OptionSpec> = {
  h: { name: 'help', takesValue: false },
  i: { name: 'input', takesValue: true },
  o: { name: 'output', takesValue: true },
};

const LONG_OPTIONS: Record<string, OptionSpec> = {
  in: { name: 'input', takesValue: true },
  out: { name: 'output', takesValue: true },
};

/**
 * Resolves a long option from an exact name or an unambiguous prefix
 */
function resolveLong(name: string): OptionSpec {
  if (LONG_OPTIONS[name]) {
    return LONG_OPTIONS[name];
  }

  const matches = Object.keys(LONG_OPTIONS).filter(key => key.startsWith(name));
  if (matches.length === 1) {
    return LONG_OPTIONS[matches[0]];
  }
  if (matches.length > 1) {
    throw new CliUsageError(`option --${name} not a unique prefix`);
  }
  throw new CliUsageError(`option --${name} not recognized`);
}

/**
 * Parses `-h`, `-i/--in <path>` and `-o/--out <path>`.
 * Stops at `--` or at the first non-option argument.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = { help: false, rest: [] };
  const apply = (spec: OptionSpec, value: string): void => {
    if (spec.name === 'help') {
      result.help = true;
    } else {
      result[spec.name] = value;
    }
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];

    if (arg === '--') {
      i++;
      break;
    }

    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      const spec = resolveLong(name);

      if (eq !== -1) {
        apply(spec, arg.slice(eq + 1));
      } else if (i + 1 < argv.length) {
        apply(spec, argv[i + 1]);
        i++;
      } else {
        throw new CliUsageError(`option --${name} requires argument`);
      }
      i++;
      continue;
    }

    if (!arg.startsWith('-') || arg === '-') {
      break;
    }

    // Clustered short options, e.g. -hifile
    let pos = 1;
    while (pos < arg.length) {
      const flag = arg[pos];
      const spec = SHORT_OPTIONS[flag];
      if (!spec) {
        throw new CliUsageError(`option -${flag} not recognized`);
      }
      pos++;

      if (!spec.takesValue) {
        apply(spec, '');
        continue;
      }

      if (pos < arg.length) {
        apply(spec, arg.slice(pos));
      } else if (i + 1 < argv.length) {
        apply(spec, argv[i + 1]);
        i++;
      } else {
        throw new CliUsageError(`option -${flag} requires argument`);
      }
      break;
    }
    i++;
  }

  result.rest = argv.slice(i);
  return result;
}
