import { describe, it, expect } from 'vitest';
import { FunctionRegistry, createDefaultRegistry } from '../src/engine/expression/functions';
import { roundHalfAwayFromZero } from '../src/engine/expression/functions/number-functions';
import { captureFormulaError } from './helpers';

const registry = createDefaultRegistry();

function call(name: string, ...args: number[]): number {
  const fn = registry.get(name);
  if (!fn) throw new Error(`Function ${name} is not registered`);
  return fn.execute(args);
}

describe('FunctionRegistry', () => {
  it('looks names up case-insensitively', () => {
    expect(registry.get('abs')?.name).toBe('ABS');
    expect(registry.has('Ceiling')).toBe(true);
    expect(registry.has('RANDOM')).toBe(false);
  });

  it('lists names sorted, aliases included', () => {
    const names = registry.list();
    expect(names).toEqual([...names].sort());
    expect(names).toContain('AVERAGE');
    expect(names).toContain('PERM');
  });

  it('refuses an alias for an unknown function', () => {
    expect(() => new FunctionRegistry().alias('X', 'Y')).toThrow('Cannot alias X: unknown function Y');
  });
});

describe('number functions', () => {
  it('rounds half away from zero', () => {
    expect(roundHalfAwayFromZero(2.5)).toBe(3);
    expect(roundHalfAwayFromZero(-2.5)).toBe(-3);
    expect(roundHalfAwayFromZero(0.5)).toBe(1);
    expect(roundHalfAwayFromZero(1.25, 1)).toBe(1.3);
  });

  it('computes integer functions', () => {
    expect(call('FACTORIAL', 5)).toBe(120);
    expect(call('FACTORIAL', 0)).toBe(1);
    expect(call('GCD', 12, 18)).toBe(6);
    expect(call('LCM', 4, 6)).toBe(12);
    expect(call('LCM', 0, 5)).toBe(0);
    expect(call('LCM', 6000000042, 10000000070)).toBe(30000000210);
    expect(call('COMBINATION', 5, 2)).toBe(10);
    expect(call('COMB', 3, 5)).toBe(0);
    expect(call('PERMUTATION', 5, 2)).toBe(20);
  });

  it('validates integer arguments', () => {
    const err = captureFormulaError(() => call('GCD', 1.5, 2));
    expect(err.kind).toBe('MathError');
    expect(err.message).toBe('GCD: a must be an integer, got 1.5');
    expect(captureFormulaError(() => call('FACTORIAL', 21)).message).toBe('FACTORIAL: n must be at most 20, got 21');
    expect(captureFormulaError(() => call('COMBINATION', 63, 1)).message).toBe('COMBINATION: n must be at most 62, got 63');
    expect(captureFormulaError(() => call('PERMUTATION', -1, 1)).message).toBe('PERMUTATION: arguments must not be negative');
  });

  it('keeps the sign of the dividend in MOD and refuses a zero divisor', () => {
    expect(call('MOD', -7, 3)).toBe(-1);
    expect(captureFormulaError(() => call('MOD', 7, 0)).kind).toBe('DivisionByZero');
  });

  it('refuses logarithms of non-positive numbers', () => {
    expect(captureFormulaError(() => call('LOG', 0)).message).toBe('LOG: logarithm of non-positive number 0');
    expect(call('LOG10', 1000)).toBeCloseTo(3);
  });

  it('provides constants', () => {
    expect(call('PI')).toBe(Math.PI);
    expect(call('E')).toBe(Math.E);
  });
});

describe('trigonometric functions', () => {
  it('converts between degrees and radians', () => {
    expect(call('DEGREES', Math.PI)).toBeCloseTo(180);
    expect(call('RADIANS', 90)).toBeCloseTo(Math.PI / 2);
    expect(call('ATAN2', 1, 1)).toBeCloseTo(Math.PI / 4);
  });

  it('checks domains', () => {
    expect(captureFormulaError(() => call('ASIN', 2)).message).toBe('ASIN: argument 2 is outside [-1, 1]');
    expect(captureFormulaError(() => call('ACOSH', 0.5)).kind).toBe('MathError');
    expect(captureFormulaError(() => call('ATANH', 1)).kind).toBe('MathError');
    expect(call('ACOS', 1)).toBe(0);
  });
});

describe('aggregate functions', () => {
  it('aggregates any number of arguments', () => {
    expect(call('MIN', 3, 1, 2)).toBe(1);
    expect(call('MAX', 3, 1, 2)).toBe(3);
    expect(call('SUM')).toBe(0);
    expect(call('AVERAGE', 1, 2, 3, 4)).toBe(2.5);
  });
});
