import { describe, it, expect } from 'vitest';
import { FormulaSetExecutor } from '../src/engine/executor';
import { FormulaEngine } from '../src/engine/formula-engine';
import { parseFormulaSet, parseVariables, selectFormulaSet } from '../src/engine/formula-set';
import type { Formula, FormulaSet } from '../src/engine/types';
import { captureFormulaError } from './helpers';

const engine = FormulaEngine.create();
const executor = new FormulaSetExecutor(engine);

function scoringSet(overrides: Partial<FormulaSet> = {}, second: Partial<Formula> = {}): FormulaSet {
  return {
    id: 'set-1',
    name: 'Scoring',
    formulas: [
      { id: 'f2', name: 'Double', expression: 'sum * 2', order: 2, resultVariable: 'doubled', ...second },
      { id: 'f1', name: 'Sum', expression: 'a + b', order: 1, resultVariable: 'sum' },
    ],
    ...overrides,
  };
}

describe('FormulaSetExecutor', () => {
  it('runs formulas in order and feeds results forward', () => {
    const execution = executor.execute(scoringSet(), { a: 2, b: 3 });

    expect(execution.status).toBe('SUCCESS');
    expect(execution.steps.map((s) => [s.formulaId, s.resultVariableName, s.resultValue])).toEqual([
      ['f1', 'sum', 5],
      ['f2', 'doubled', 10],
    ]);
    expect(execution.finalResult).toBe(10);
    expect(execution.skippedSteps).toEqual([]);
    expect(execution.error).toBeUndefined();
    expect(execution.formulaSetId).toBe('set-1');
    expect(execution.inputVariables).toEqual({ a: 2, b: 3 });
  });

  it('uses the set result variable when one is named', () => {
    expect(executor.execute(scoringSet({ resultVariable: 'sum' }), { a: 2, b: 3 }).finalResult).toBe(5);
  });

  it('skips steps whose condition is false', () => {
    const execution = executor.execute(scoringSet({}, { executionCondition: 'sum > 100' }), { a: 2, b: 3 });

    expect(execution.status).toBe('PARTIAL');
    expect(execution.steps).toHaveLength(1);
    expect(execution.skippedSteps).toEqual([{ stepOrder: 2, formulaId: 'f2', formulaName: 'Double', condition: 'sum > 100' }]);
    expect(execution.finalResult).toBe(5);
  });

  it('gives null when the named result variable was never set', () => {
    const set = scoringSet({ resultVariable: 'doubled' }, { executionCondition: 'sum > 100' });
    expect(executor.execute(set, { a: 2, b: 3 }).finalResult).toBeNull();
  });

  it('runs steps whose condition holds', () => {
    const execution = executor.execute(scoringSet({}, { executionCondition: 'sum >= 5' }), { a: 2, b: 3 });
    expect(execution.status).toBe('SUCCESS');
    expect(execution.finalResult).toBe(10);
  });

  it('stops at the first failing step', () => {
    const execution = executor.execute(scoringSet({}, { expression: 'sum / zero' }), { a: 2, b: 3, zero: 0 });

    expect(execution.status).toBe('FAILED');
    expect(execution.finalResult).toBeNull();
    expect(execution.steps).toHaveLength(1);
    expect(execution.error).toMatchObject({
      kind: 'StepExecutionError',
      stage: 'orchestrator',
      message: 'Step 1 ("Double") failed: Division by zero (5 / 0)',
      details: { stepIndex: 1, formulaId: 'f2', causeKind: 'DivisionByZero' },
      cause: { kind: 'DivisionByZero' },
    });
  });

  it('treats a condition that cannot be evaluated as a failure', () => {
    const execution = executor.execute(scoringSet({}, { executionCondition: 'missing > 1' }), { a: 2, b: 3 });
    expect(execution.status).toBe('FAILED');
    expect(execution.error?.details).toMatchObject({ causeKind: 'UndefinedVariable' });
  });

  it('limits the number of executed steps', () => {
    const limited = new FormulaSetExecutor(FormulaEngine.create({ maxFormulaSteps: 1 }));
    const execution = limited.execute(scoringSet(), { a: 2, b: 3 });

    expect(execution.status).toBe('FAILED');
    expect(execution.steps).toHaveLength(1);
    expect(execution.error).toMatchObject({
      kind: 'TooManySteps',
      message: 'Formula set "Scoring" exceeds 1 executed steps',
      details: { limit: 1, observed: 2, stepIndex: 1 },
    });
  });

  it('records rejected input variables as a failure', () => {
    const limited = new FormulaSetExecutor(FormulaEngine.create({ maxVariables: 1 }));
    const execution = limited.execute(scoringSet(), { a: 2, b: 3 });

    expect(execution.status).toBe('FAILED');
    expect(execution.steps).toEqual([]);
    expect(execution.error).toMatchObject({
      kind: 'InvalidFormulaSet',
      message: 'Input variables rejected: Context holds 2 variables; the limit is 1',
      details: { causeKind: 'TooManyVariables' },
    });
  });

  it('throws for a set without formulas', () => {
    const err = captureFormulaError(() => executor.execute(scoringSet({ formulas: [] })));
    expect(err.kind).toBe('EmptySteps');
    expect(err.message).toBe('Formula set "Scoring" has no formulas');
  });

  it('throws for duplicate result variables', () => {
    const err = captureFormulaError(() => executor.execute(scoringSet({}, { resultVariable: 'sum' })));
    expect(err.kind).toBe('InvalidFormulaSet');
    expect(err.message).toBe('Invalid formula set: formulas.1.resultVariable: duplicate result variable "sum"');
  });

  it('returns a frozen record and leaves the inputs alone', () => {
    const inputs = { a: 2, b: 3 };
    const execution = executor.execute(scoringSet(), inputs);

    expect(Object.isFrozen(execution)).toBe(true);
    expect(Object.isFrozen(execution.steps)).toBe(true);
    expect(Object.isFrozen(execution.steps[0])).toBe(true);
    expect(inputs).toEqual({ a: 2, b: 3 });
    expect(new Date(execution.completedAt).getTime()).toBeGreaterThanOrEqual(new Date(execution.startedAt).getTime());
  });
});

describe('formula set parsing', () => {
  it('rejects formulas with an order below 1', () => {
    const err = captureFormulaError(() => parseFormulaSet(scoringSet({}, { order: 0 })));
    expect(err.kind).toBe('InvalidFormulaSet');
    expect(err.details.issues).toEqual([{ path: 'formulas.0.order', message: 'Number must be greater than or equal to 1' }]);
  });

  it('rejects values that are not objects', () => {
    expect(captureFormulaError(() => parseFormulaSet('nope')).message).toBe('Invalid formula set: (root): Expected object, received string');
  });

  it('validates input variables', () => {
    expect(parseVariables({ a: 1, b: 'x', c: null, d: true })).toEqual({ a: 1, b: 'x', c: null, d: true });
    const err = captureFormulaError(() => parseVariables({ a: [1] }));
    expect(err.kind).toBe('InvalidFormulaSet');
  });
});

describe('selectFormulaSet', () => {
  const base = scoringSet();
  const gold = { ...base, id: 'gold', criteria: { tier: 'gold' } };
  const goldEu = { ...base, id: 'gold-eu', criteria: { tier: 'gold', region: 'eu' } };
  const fallback = { ...base, id: 'fallback' };

  it('prefers the set with the most matching criteria', () => {
    expect(selectFormulaSet([gold, goldEu, fallback], { tier: 'gold', region: 'eu' })?.id).toBe('gold-eu');
    expect(selectFormulaSet([gold, goldEu, fallback], { tier: 'gold' })?.id).toBe('gold');
  });

  it('falls back to a set without criteria', () => {
    expect(selectFormulaSet([gold, fallback], { tier: 'silver' })?.id).toBe('fallback');
    expect(selectFormulaSet([gold, goldEu], { tier: 'silver' })).toBeUndefined();
  });
});
