/**
 * CLI flag parsing for the check and fmt commands.
 */

export type RunMode = 'check' | 'fmt';

export interface RunFlags {
  mode: RunMode;
  specPath: string;
  /** "-" means stdout */
  diagOut: string;
  /** "-" means stdout; ignored with inPlace */
  out: string;
  inPlace: boolean;
  summary: boolean;
  configPath?: string;
}

const VALUE_FLAGS = ['--diag-out', '--out', '--config'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(arg: string): arg is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === arg);
}

/**
 * Parse the arguments that follow the mode word.
 * Reports problems on stderr and returns null.
 */
export function parseRunFlags(mode: RunMode, args: readonly string[]): RunFlags | null {
  const values: Partial<Record<ValueFlag, string>> = {};
  let inPlace = false;
  let summary = false;
  const positional: string[] = [];

  let i = 0;
  while (i < args.length) {
    const arg = args[i] ?? '';

    if (arg === '--') {
      positional.push(...args.slice(i + 1));
      break;
    }

    // --flag=value form
    const eq = arg.indexOf('=');
    const name = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;

    if (isValueFlag(name)) {
      let value: string | undefined;
      if (name !== arg) {
        value = arg.slice(eq + 1);
        i++;
      } else {
        value = args[i + 1];
        i += 2;
      }
      if (value === undefined || value === '' || value.startsWith('--')) {
        console.error(`Error: ${name} requires a path`);
        return null;
      }
      values[name] = value;
      continue;
    }

    if (arg === '--in-place') {
      inPlace = true;
    } else if (arg === '--summary') {
      summary = true;
    } else if (arg.startsWith('-') && arg !== '-') {
      console.error(`Error: Unknown option: ${arg}`);
      return null;
    } else {
      positional.push(arg);
    }
    i++;
  }

  if (mode === 'check' && (inPlace || values['--out'] !== undefined)) {
    console.error('Error: --out and --in-place are only valid with fmt');
    return null;
  }

  if (inPlace && values['--out'] !== undefined) {
    console.error('Error: --in-place cannot be combined with --out');
    return null;
  }

  const [specPath, ...extra] = positional;
  if (!specPath) {
    console.error('Error: No spec file provided');
    console.error(`Usage: cli-specrows ${mode} [options] <spec>`);
    return null;
  }
  if (extra.length > 0) {
    console.error(`Error: Unexpected argument: ${extra[0]}`);
    return null;
  }

  return {
    mode,
    specPath,
    diagOut: values['--diag-out'] ?? '-',
    out: values['--out'] ?? '-',
    inPlace,
    summary,
    configPath: values['--config'],
  };
}
