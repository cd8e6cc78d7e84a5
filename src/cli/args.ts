// =============================================================================
// CLI Arguments
// =============================================================================

import type { FormulaValue } from '../engine/expression/coercion';

export type CliCommand = 'eval' | 'validate' | 'run' | 'grammar' | 'help';

export interface CliOptions {
  command: CliCommand;
  /** Expression text for eval/validate, formula set path for run. */
  target?: string;
  vars: Record<string, FormulaValue>;
  criteria: Record<string, string | number | boolean>;
  inputFile?: string;
  strict: boolean;
  optimize: boolean;
  cache: boolean;
  pretty: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const COMMANDS: readonly CliCommand[] = ['eval', 'validate', 'run', 'grammar', 'help'];

function isCommand(value: string): value is CliCommand {
  return (COMMANDS as readonly string[]).includes(value);
}

/**
 * Parse a literal given on the command line: true/false, null, a number,
 * or else the raw string.
 */
export function parseLiteral(raw: string): FormulaValue {
  const text = raw.trim();
  if (text === 'true') return true;
  if (text === 'false') return false;
  if (text === 'null') return null;
  if (text !== '' && Number.isFinite(Number(text))) return Number(text);
  return raw;
}

function parseAssignment(flag: string, value: string | undefined): [string, FormulaValue] {
  if (!value) throw new CliUsageError(`Missing value for ${flag}`);
  const eq = value.indexOf('=');
  if (eq <= 0) throw new CliUsageError(`${flag} expects name=value, got "${value}"`);
  return [value.slice(0, eq).trim(), parseLiteral(value.slice(eq + 1))];
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = {
    command: 'help',
    vars: {},
    criteria: {},
    strict: false,
    optimize: false,
    cache: false,
    pretty: false,
  };
  let commandSeen = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (arg === '--help' || arg === '-h') {
      options.command = 'help';
      return options;
    }
    if (arg === '--strict') {
      options.strict = true;
      continue;
    }
    if (arg === '--optimize') {
      options.optimize = true;
      continue;
    }
    if (arg === '--cache') {
      options.cache = true;
      continue;
    }
    if (arg === '--pretty') {
      options.pretty = true;
      continue;
    }
    if (arg === '--var' || arg === '-v') {
      const [name, value] = parseAssignment(arg, argv[i + 1]);
      options.vars[name] = value;
      i++;
      continue;
    }
    if (arg.startsWith('--var=')) {
      const [name, value] = parseAssignment('--var', arg.slice('--var='.length));
      options.vars[name] = value;
      continue;
    }
    if (arg === '--criteria' || arg === '-c') {
      const [name, value] = parseAssignment(arg, argv[i + 1]);
      options.criteria[name] = value ?? 'null';
      i++;
      continue;
    }
    if (arg === '--input' || arg === '-i') {
      const value = argv[i + 1];
      if (!value) throw new CliUsageError(`Missing value for ${arg}`);
      options.inputFile = value;
      i++;
      continue;
    }
    if (arg.startsWith('--input=')) {
      options.inputFile = arg.slice('--input='.length);
      continue;
    }
    if (arg.startsWith('-') && arg.length > 1 && !/^-\d/.test(arg)) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    if (!commandSeen) {
      if (!isCommand(arg)) throw new CliUsageError(`Unknown command: ${arg}`);
      options.command = arg;
      commandSeen = true;
      continue;
    }
    if (options.target === undefined) {
      options.target = arg;
      continue;
    }
    throw new CliUsageError(`Unexpected argument: ${arg}`);
  }

  if ((options.command === 'eval' || options.command === 'validate' || options.command === 'run') && !options.target) {
    throw new CliUsageError(options.command === 'run' ? 'run needs a formula set file' : `${options.command} needs an expression`);
  }
  return options;
}

export const HELP_TEXT = [
  'formula-engine',
  '',
  'Usage:',
  '  formula-engine eval "<expression>" [--var name=value]...',
  '  formula-engine validate "<expression>"',
  '  formula-engine run <formula-set.json> [--input vars.json] [--var name=value]... [--criteria key=value]...',
  '  formula-engine grammar',
  '',
  'Options:',
  '  --var, -v name=value        Bind a variable (numbers, true/false and null are parsed)',
  '  --input, -i <file>          JSON object of input variables for run',
  '  --criteria, -c key=value    Select a set from a file holding several formula sets',
  '  --strict                    Strict type coercion',
  '  --optimize                  Fold constant subexpressions',
  '  --cache                     Memoise evaluation results',
  '  --pretty                    Indent JSON output',
  '  --help, -h                  Show this help',
  '',
  'Engine limits are read from FORMULA_* environment variables.',
].join('\n');
