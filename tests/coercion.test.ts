import { describe, it, expect } from 'vitest';
import { toBoolean, toNumber } from '../src/engine/expression/coercion';
import { EvaluationContext } from '../src/engine/expression/evaluation-context';
import { captureFormulaError } from './helpers';

describe('toNumber', () => {
  it('converts booleans and numeric strings', () => {
    expect(toNumber(true)).toBe(1);
    expect(toNumber(false)).toBe(0);
    expect(toNumber(' 42 ')).toBe(42);
    expect(toNumber('1e3')).toBe(1000);
    expect(toNumber('.5')).toBe(0.5);
    expect(toNumber('-3')).toBe(-3);
  });

  it('refuses other strings and null', () => {
    expect(captureFormulaError(() => toNumber('abc')).kind).toBe('NumberConversionError');
    expect(captureFormulaError(() => toNumber('')).kind).toBe('NumberConversionError');
    expect(captureFormulaError(() => toNumber(null)).kind).toBe('UnsupportedType');
  });

  it('accepts only numbers in strict mode', () => {
    expect(toNumber(5, true)).toBe(5);
    expect(captureFormulaError(() => toNumber('1', true)).kind).toBe('UnsupportedType');
    expect(captureFormulaError(() => toNumber(true, true)).kind).toBe('UnsupportedType');
  });
});

describe('toBoolean', () => {
  it.each([
    ['TRUE', true],
    [' false ', false],
    ['0', false],
    ['2', true],
    ['yes', true],
    ['', false],
  ])('treats %j as %s', (value, expected) => {
    expect(toBoolean(value)).toBe(expected);
  });

  it('treats numbers by zero-ness and null as false', () => {
    expect(toBoolean(0)).toBe(false);
    expect(toBoolean(-1)).toBe(true);
    expect(toBoolean(NaN)).toBe(false);
    expect(toBoolean(null)).toBe(false);
  });

  it('accepts only true/false strings in strict mode', () => {
    expect(toBoolean('True', true)).toBe(true);
    expect(captureFormulaError(() => toBoolean('yes', true)).kind).toBe('UnsupportedType');
    expect(captureFormulaError(() => toBoolean(null, true)).kind).toBe('UnsupportedType');
  });
});

describe('EvaluationContext', () => {
  it('limits the number of variables', () => {
    const err = captureFormulaError(() => EvaluationContext.create({ a: 1, b: 2, c: 3 }, { maxVariables: 2 }));
    expect(err.kind).toBe('TooManyVariables');
    expect(err.details).toEqual({ limit: 2, observed: 3 });

    const full = EvaluationContext.create({ a: 1, b: 2 }, { maxVariables: 2 });
    expect(captureFormulaError(() => full.withVariable('c', 3)).kind).toBe('TooManyVariables');
    expect(full.withVariable('a', 5).get('a')).toBe(5);
  });

  it('returns new contexts and leaves the original alone', () => {
    const base = EvaluationContext.create({ a: 1 });
    const extended = base.withVariables({ b: 2, c: null });
    expect(base.names()).toEqual(['a']);
    expect(extended.variables()).toEqual({ a: 1, b: 2, c: null });
    expect(extended.withoutVariable('a').has('a')).toBe(false);
    expect(extended.withoutVariable('zzz')).toBe(extended);
    expect(extended.size).toBe(3);
  });

  it('refuses non-finite numbers', () => {
    expect(captureFormulaError(() => EvaluationContext.create({ x: NaN })).kind).toBe('MathError');
    expect(captureFormulaError(() => EvaluationContext.create({ x: Infinity })).kind).toBe('MathError');
  });

  it('keys snapshots independently of insertion order', () => {
    const a = EvaluationContext.create({ a: 1, b: 'two' });
    const b = EvaluationContext.create({ b: 'two', a: 1 });
    expect(a.snapshotKey).toBe(b.snapshotKey);
    expect(a.snapshotKey).not.toBe(a.withVariable('a', 2).snapshotKey);
  });

  it('carries its options to derived contexts', () => {
    const ctx = EvaluationContext.create({}, { strictMode: true, maxDepth: 10 }).withVariable('x', 1);
    expect(ctx.strictMode).toBe(true);
    expect(ctx.maxDepth).toBe(10);
  });
});
