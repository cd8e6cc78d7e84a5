import { describe, it, expect } from 'vitest';
import { CliUsageError, HELP_TEXT, parseArgs, parseLiteral } from '../src/cli/args';
import { CliIO, EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runCli } from '../src/cli/run';
import { captureError } from './helpers';

const SET = {
  id: 'set-1',
  name: 'Scoring',
  formulas: [
    { id: 'f1', name: 'Sum', expression: 'a + b', order: 1, resultVariable: 'sum' },
    { id: 'f2', name: 'Double', expression: 'sum * 2', order: 2, resultVariable: 'doubled' },
  ],
};

function fakeIO(files: Record<string, string> = {}, env: NodeJS.ProcessEnv = {}) {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    readFile: async (path) => {
      const content = files[path];
      if (content === undefined) throw new Error(`ENOENT: no such file, open '${path}'`);
      return content;
    },
    env,
  };
  return { io, out, err };
}

function usageMessage(argv: string[]): string {
  const err = captureError(() => parseArgs(argv));
  if (!(err instanceof CliUsageError)) throw new Error('Expected a usage error');
  return err.message;
}

describe('parseArgs', () => {
  it('parses a command with variables and flags', () => {
    expect(parseArgs(['eval', 'x * 2', '--var', 'x=21', '-v', 'name=abc', '--strict', '--pretty'])).toEqual({
      command: 'eval',
      target: 'x * 2',
      vars: { x: 21, name: 'abc' },
      criteria: {},
      strict: true,
      optimize: false,
      cache: false,
      pretty: true,
    });
  });

  it('accepts option=value forms and a leading negative number', () => {
    const options = parseArgs(['--var=x=1', 'eval', '-1 + x', '--input=vars.json']);
    expect(options.target).toBe('-1 + x');
    expect(options.vars).toEqual({ x: 1 });
    expect(options.inputFile).toBe('vars.json');
  });

  it('keeps null criteria as text', () => {
    expect(parseArgs(['run', 'set.json', '-c', 'tier=null']).criteria).toEqual({ tier: 'null' });
  });

  it('defaults to help', () => {
    expect(parseArgs([]).command).toBe('help');
    expect(parseArgs(['eval', '--help']).command).toBe('help');
  });

  it('reports usage errors', () => {
    expect(usageMessage(['run'])).toBe('run needs a formula set file');
    expect(usageMessage(['eval'])).toBe('eval needs an expression');
    expect(usageMessage(['eval', 'a', 'b'])).toBe('Unexpected argument: b');
    expect(usageMessage(['--bogus'])).toBe('Unknown option: --bogus');
    expect(usageMessage(['frobnicate'])).toBe('Unknown command: frobnicate');
    expect(usageMessage(['eval', 'x', '-v', 'x'])).toBe('-v expects name=value, got "x"');
    expect(usageMessage(['eval', 'x', '--var'])).toBe('Missing value for --var');
  });

  it('parses literals', () => {
    expect(parseLiteral('3.5')).toBe(3.5);
    expect(parseLiteral(' true')).toBe(true);
    expect(parseLiteral('null')).toBeNull();
    expect(parseLiteral('abc')).toBe('abc');
    expect(parseLiteral('')).toBe('');
  });
});

describe('runCli', () => {
  it('prints help', async () => {
    const { io, out } = fakeIO();
    expect(await runCli([], io)).toBe(EXIT_OK);
    expect(out).toEqual([HELP_TEXT]);
  });

  it('evaluates an expression', async () => {
    const { io, out } = fakeIO();
    expect(await runCli(['eval', '2 + 3 * 4'], io)).toBe(EXIT_OK);
    expect(out).toEqual(['{"value":14,"success":true,"touched":[],"functionsUsed":[]}']);
  });

  it('binds variables from the command line', async () => {
    const { io, out } = fakeIO();
    expect(await runCli(['eval', 'x * 2', '--var', 'x=21'], io)).toBe(EXIT_OK);
    expect(out).toEqual(['{"value":42,"success":true,"touched":["x"],"functionsUsed":[]}']);
  });

  it('fails on an evaluation error', async () => {
    const { io, out } = fakeIO();
    expect(await runCli(['eval', '1 / 0'], io)).toBe(EXIT_FAILURE);
    expect(JSON.parse(out[0])).toMatchObject({ value: null, success: false, error: { kind: 'DivisionByZero' } });
  });

  it('reads engine settings from the environment', async () => {
    const { io, out } = fakeIO({}, { FORMULA_STRICT_MODE: 'true' });
    expect(await runCli(['eval', 'true + 1'], io)).toBe(EXIT_FAILURE);
    expect(JSON.parse(out[0])).toMatchObject({ error: { kind: 'UnsupportedType' } });
  });

  it('validates an expression', async () => {
    const { io, out } = fakeIO();
    expect(await runCli(['validate', 'foo(1)'], io)).toBe(EXIT_FAILURE);
    expect(JSON.parse(out[0])).toEqual({ valid: false, variables: [], functions: ['FOO'], unknownFunctions: ['FOO'] });
  });

  it('runs a formula set file', async () => {
    const { io, out } = fakeIO({ 'set.json': JSON.stringify(SET) });
    expect(await runCli(['run', 'set.json', '--var', 'a=2', '--var', 'b=3'], io)).toBe(EXIT_OK);
    expect(JSON.parse(out[0])).toMatchObject({ status: 'SUCCESS', finalResult: 10 });
  });

  it('merges an input file with command-line variables', async () => {
    const { io, out } = fakeIO({ 'set.json': JSON.stringify(SET), 'vars.json': '{"a": 2, "b": 3}' });
    expect(await runCli(['run', 'set.json', '--input', 'vars.json', '--var', 'b=4'], io)).toBe(EXIT_OK);
    expect(JSON.parse(out[0])).toMatchObject({ finalResult: 12, inputVariables: { a: 2, b: 4 } });
  });

  it('selects a set by criteria', async () => {
    const sets = [
      { ...SET, id: 'default' },
      { ...SET, id: 'gold', criteria: { tier: 'gold' }, formulas: [{ ...SET.formulas[0], expression: 'a * 100' }] },
    ];
    const { io, out } = fakeIO({ 'sets.json': JSON.stringify(sets) });
    expect(await runCli(['run', 'sets.json', '-c', 'tier=gold', '-v', 'a=2', '-v', 'b=3'], io)).toBe(EXIT_OK);
    expect(JSON.parse(out[0])).toMatchObject({ formulaSetId: 'gold', finalResult: 200 });
  });

  it('fails when a run fails', async () => {
    const { io, out } = fakeIO({ 'set.json': JSON.stringify(SET) });
    expect(await runCli(['run', 'set.json', '--var', 'a=2'], io)).toBe(EXIT_FAILURE);
    expect(JSON.parse(out[0])).toMatchObject({ status: 'FAILED', error: { kind: 'StepExecutionError' } });
  });

  it('reports unreadable and malformed files as usage errors', async () => {
    const missing = fakeIO();
    expect(await runCli(['run', 'missing.json'], missing.io)).toBe(EXIT_USAGE);
    expect(missing.err).toEqual(["Cannot read missing.json: ENOENT: no such file, open 'missing.json'"]);

    const bad = fakeIO({ 'bad.json': '{' });
    expect(await runCli(['run', 'bad.json'], bad.io)).toBe(EXIT_USAGE);
    expect(bad.err[0].startsWith('bad.json is not valid JSON: ')).toBe(true);
  });

  it('prints formula errors to stderr', async () => {
    const { io, err } = fakeIO({ 'set.json': JSON.stringify({ ...SET, formulas: [] }) });
    expect(await runCli(['run', 'set.json'], io)).toBe(EXIT_FAILURE);
    expect(JSON.parse(err[0])).toMatchObject({ error: { kind: 'EmptySteps' } });
  });

  it('prints usage errors with the help text', async () => {
    const { io, err } = fakeIO();
    expect(await runCli(['frobnicate'], io)).toBe(EXIT_USAGE);
    expect(err).toEqual([`Unknown command: frobnicate\n\n${HELP_TEXT}`]);
  });

  it('dumps the grammar and table statistics', async () => {
    const { io, out } = fakeIO();
    expect(await runCli(['grammar'], io)).toBe(EXIT_OK);
    expect(out[0].split('\n')[0]).toBe('Expr ::= Expr "||" AndExpr | AndExpr');
    expect(out[0]).toContain('Primary ::= "(" Expr ")"');
    expect(out[1]).toBe('');
    expect(JSON.parse(out[2]).stateCount).toBeGreaterThan(0);
  });
});
