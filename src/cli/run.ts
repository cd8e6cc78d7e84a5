// =============================================================================
// CLI Runner
// Dispatches parsed arguments to the engine; returns the process exit code
// =============================================================================

import { readFile } from 'fs/promises';
import { loadEngineConfig } from '../config';
import { FormulaError } from '../engine/errors';
import { FormulaSetExecutor } from '../engine/executor';
import { FormulaEngine } from '../engine/formula-engine';
import { parseFormulaSet, parseVariables, selectFormulaSet } from '../engine/formula-set';
import type { FormulaSet } from '../engine/types';
import { describeTokenType, isTokenType } from '../engine/expression/token-types';
import { logger } from '../utils/logger';
import { CliOptions, CliUsageError, HELP_TEXT, parseArgs } from './args';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readFile: (path: string) => Promise<string>;
  env: NodeJS.ProcessEnv;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function defaultIO(): CliIO {
  return {
    stdout: (text) => process.stdout.write(`${text}\n`),
    stderr: (text) => process.stderr.write(`${text}\n`),
    readFile: (path) => readFile(path, 'utf8'),
    env: process.env,
  };
}

export async function runCli(argv: readonly string[], io: CliIO = defaultIO()): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (err) {
    if (!(err instanceof CliUsageError)) throw err;
    io.stderr(`${err.message}\n\n${HELP_TEXT}`);
    return EXIT_USAGE;
  }

  const print = (value: unknown) => io.stdout(JSON.stringify(value, null, options.pretty ? 2 : undefined));

  try {
    const createEngine = () => FormulaEngine.create(loadEngineConfig(io.env, {
      ...(options.strict ? { strictMode: true } : {}),
      ...(options.optimize ? { enableOptimization: true } : {}),
      ...(options.cache ? { enableCaching: true } : {}),
    }));

    switch (options.command) {
      case 'help':
        io.stdout(HELP_TEXT);
        return EXIT_OK;

      case 'eval': {
        const result = createEngine().calculate(options.target ?? '', options.vars);
        print({
          value: result.value,
          success: result.success,
          touched: result.touched,
          functionsUsed: result.functionsUsed,
          ...(result.error ? { error: result.error.toData() } : {}),
        });
        return result.success ? EXIT_OK : EXIT_FAILURE;
      }

      case 'validate': {
        const report = createEngine().validate(options.target ?? '');
        print(report);
        return report.valid ? EXIT_OK : EXIT_FAILURE;
      }

      case 'run': {
        const set = await loadFormulaSet(io, options);
        const fromFile = options.inputFile ? parseVariables(parseJson(await readText(io, options.inputFile), options.inputFile)) : {};
        const execution = new FormulaSetExecutor(createEngine()).execute(set, { ...fromFile, ...options.vars });
        print(execution);
        return execution.status === 'FAILED' ? EXIT_FAILURE : EXIT_OK;
      }

      case 'grammar': {
        const engine = createEngine();
        io.stdout(engine.grammar.toBNF((symbol) => (isTokenType(symbol) ? quoteTerminal(describeTokenType(symbol)) : symbol)));
        io.stdout('');
        print(engine.table.stats);
        return EXIT_OK;
      }
    }
  } catch (err) {
    if (err instanceof FormulaError) {
      io.stderr(JSON.stringify({ error: err.toData() }, null, options.pretty ? 2 : undefined));
      return EXIT_FAILURE;
    }
    if (err instanceof CliUsageError) {
      io.stderr(err.message);
      return EXIT_USAGE;
    }
    throw err;
  }
}

async function loadFormulaSet(io: CliIO, options: CliOptions): Promise<FormulaSet> {
  const path = options.target ?? '';
  const data = parseJson(await readText(io, path), path);

  if (!Array.isArray(data)) return parseFormulaSet(data);

  const sets = data.map((entry) => parseFormulaSet(entry));
  const selected = selectFormulaSet(sets, options.criteria);
  if (!selected) {
    throw new CliUsageError(`No formula set in ${path} matches criteria ${JSON.stringify(options.criteria)}`);
  }
  logger.debug(`Selected formula set "${selected.name}" from ${sets.length} candidates`);
  return selected;
}

async function readText(io: CliIO, path: string): Promise<string> {
  try {
    return await io.readFile(path);
  } catch (err) {
    throw new CliUsageError(`Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function parseJson(text: string, source: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (err) {
    throw new CliUsageError(`${source} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function quoteTerminal(text: string): string {
  return /^[A-Z]+$/.test(text) ? text : `"${text}"`;
}
