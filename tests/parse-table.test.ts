import { describe, it, expect } from 'vitest';
import { createExpressionGrammar } from '../src/engine/expression/expression-grammar';
import { Grammar } from '../src/engine/expression/grammar';
import { ParseTableBuilder, TableConflict } from '../src/engine/expression/parse-table';
import { captureFormulaError, lrButNotLalrGrammar, twoCGrammar } from './helpers';

function conflictsOf(grammar: Grammar): TableConflict[] {
  const err = captureFormulaError(() => new ParseTableBuilder(grammar).build());
  expect(err.kind).toBe('GrammarConflict');
  const conflicts = err.details.conflicts;
  if (!Array.isArray(conflicts)) throw new Error('conflicts missing from error details');
  return conflicts;
}

describe('ParseTableBuilder', () => {
  it('builds the canonical LR(1) collection', () => {
    const states = new ParseTableBuilder(twoCGrammar()).buildCanonicalCollection();
    expect(states).toHaveLength(10);
    expect(states.every((s) => s.core.isBuilt)).toBe(true);
    expect(states[0].items[0].toString()).toBe('[START → • S EOF, EOF]');
  });

  it('merges same-core states into an LALR(1) table', () => {
    const table = new ParseTableBuilder(twoCGrammar()).build();
    expect(table.stats.canonicalStateCount).toBe(10);
    expect(table.stats.stateCount).toBe(7);
    expect(table.stats.rejectedMerges).toBe(0);
    expect(table.stateCount).toBe(7);
  });

  it('keeps the canonical table when merging is off', () => {
    const table = new ParseTableBuilder(twoCGrammar(), { lalr: false }).build();
    expect(table.stateCount).toBe(10);
  });

  it('fills shift, accept and error actions', () => {
    const table = new ParseTableBuilder(twoCGrammar()).build();
    expect(table.action(0, 'c').type).toBe('shift');
    expect(table.action(0, 'EOF')).toEqual({ type: 'error' });
    expect(table.expectedTerminals(0)).toEqual(['c', 'd']);

    const afterS = table.goto(0, 'S');
    expect(afterS).toBeDefined();
    expect(table.action(afterS ?? -1, 'EOF')).toEqual({ type: 'accept' });
    expect(table.goto(0, 'missing')).toBeUndefined();
  });

  it('refuses merges that would add a conflict', () => {
    const table = new ParseTableBuilder(lrButNotLalrGrammar()).build();
    expect(table.stats.rejectedMerges).toBe(1);
    expect(table.stats.stateCount).toBe(table.stats.canonicalStateCount);
  });

  it('reports shift-reduce conflicts of an ambiguous grammar', () => {
    const ambiguous = new Grammar({
      terminals: ['+', 'n'],
      nonTerminals: ['E'],
      startSymbol: 'E',
      productions: [
        { id: 0, lhs: 'E', rhs: ['E', '+', 'E'] },
        { id: 1, lhs: 'E', rhs: ['n'] },
      ],
    });
    const conflicts = conflictsOf(ambiguous);
    expect(conflicts.length).toBeGreaterThan(0);
    expect(conflicts.every((c) => c.kind === 'shift-reduce' && c.symbol === '+')).toBe(true);
  });

  it('reports reduce-reduce conflicts with the state and productions involved', () => {
    const grammar = new Grammar({
      terminals: ['x'],
      nonTerminals: ['S', 'A', 'B'],
      startSymbol: 'S',
      productions: [
        { id: 0, lhs: 'S', rhs: ['A'] },
        { id: 1, lhs: 'S', rhs: ['B'] },
        { id: 2, lhs: 'A', rhs: ['x'] },
        { id: 3, lhs: 'B', rhs: ['x'] },
      ],
    });

    const err = captureFormulaError(() => new ParseTableBuilder(grammar).build());
    expect(err.message).toBe('Grammar is not LALR(1): state 4 on EOF: reduce-reduce (reduce 2 / reduce 3)');
    expect(conflictsOf(grammar)).toEqual([
      {
        state: 4,
        symbol: 'EOF',
        kind: 'reduce-reduce',
        actions: [{ type: 'reduce', production: 2 }, { type: 'reduce', production: 3 }],
      },
    ]);
  });

  it('builds the formula grammar without conflicts', () => {
    const { grammar } = createExpressionGrammar();
    const table = new ParseTableBuilder(grammar).build();
    expect(table.stateCount).toBeGreaterThan(0);
    expect(table.stats.stateCount).toBeLessThan(table.stats.canonicalStateCount);
  });

  it('serialises the same table the same way every time', () => {
    const first = new ParseTableBuilder(createExpressionGrammar().grammar).build().toJSON();
    const second = new ParseTableBuilder(createExpressionGrammar().grammar).build().toJSON();
    expect(JSON.stringify(first)).toBe(JSON.stringify(second));

    const actionKeys = Object.keys(first.states[0].actions);
    expect(actionKeys).toEqual([...actionKeys].sort());
  });
});
