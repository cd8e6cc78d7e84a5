// =============================================================================
// Number Functions
// Rounding, powers, logarithms and integer combinatorics
// =============================================================================

import { EvaluationError } from '../../errors';
import { mathError, requireInteger } from './helpers';
import type { FunctionRegistry } from './index';

const MAX_FACTORIAL = 20;
const MAX_COMBINATION_N = 62;
const MAX_PERMUTATION_N = 20;

/** Round half away from zero to `digits` decimal places. */
export function roundHalfAwayFromZero(value: number, digits = 0): number {
  const factor = Math.pow(10, digits);
  return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}

function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

function checkCountArgs(fn: string, n: number, k: number, maxN: number): void {
  requireInteger(fn, n, 'n');
  requireInteger(fn, k, 'k');
  if (n < 0 || k < 0) throw mathError(fn, 'arguments must not be negative', { n, k });
  if (n > maxN) throw mathError(fn, `n must be at most ${maxN}, got ${n}`, { n, limit: maxN });
}

export function registerNumberFunctions(registry: FunctionRegistry): void {
  registry.register({
    name: 'ABS',
    minArgs: 1,
    maxArgs: 1,
    description: 'Absolute value',
    execute: ([x]) => Math.abs(x),
  });

  registry.register({
    name: 'SQRT',
    minArgs: 1,
    maxArgs: 1,
    description: 'Square root',
    execute: ([x]) => {
      if (x < 0) throw mathError('SQRT', `square root of negative number ${x}`, { value: x });
      return Math.sqrt(x);
    },
  });

  registry.register({
    name: 'ROUND',
    minArgs: 1,
    maxArgs: 2,
    description: 'Round half away from zero, optionally to a number of decimal places',
    execute: ([x, digits]) => roundHalfAwayFromZero(x, digits === undefined ? 0 : requireInteger('ROUND', digits, 'digits')),
  });

  registry.register({
    name: 'FLOOR',
    minArgs: 1,
    maxArgs: 1,
    description: 'Largest integer not greater than the value',
    execute: ([x]) => Math.floor(x),
  });

  registry.register({
    name: 'CEIL',
    minArgs: 1,
    maxArgs: 1,
    description: 'Smallest integer not less than the value',
    execute: ([x]) => Math.ceil(x),
  });
  registry.alias('CEILING', 'CEIL');

  registry.register({
    name: 'TRUNC',
    minArgs: 1,
    maxArgs: 1,
    description: 'Drop the fractional part',
    execute: ([x]) => Math.trunc(x),
  });
  registry.alias('TRUNCATE', 'TRUNC');

  registry.register({
    name: 'SIGN',
    minArgs: 1,
    maxArgs: 1,
    description: '-1, 0 or 1 by the sign of the value',
    execute: ([x]) => Math.sign(x),
  });

  registry.register({
    name: 'MOD',
    minArgs: 2,
    maxArgs: 2,
    description: 'Remainder of a division; takes the sign of the dividend',
    execute: ([a, b]) => {
      if (b === 0) {
        throw new EvaluationError('DivisionByZero', `MOD: division by zero (${a} mod 0)`, { details: { function: 'MOD', dividend: a } });
      }
      return a % b;
    },
  });

  registry.register({
    name: 'POW',
    minArgs: 2,
    maxArgs: 2,
    description: 'Base raised to an exponent',
    execute: ([base, exponent]) => Math.pow(base, exponent),
  });

  registry.register({
    name: 'EXP',
    minArgs: 1,
    maxArgs: 1,
    description: 'e raised to the value',
    execute: ([x]) => Math.exp(x),
  });

  registry.register({
    name: 'LOG',
    minArgs: 1,
    maxArgs: 1,
    description: 'Natural logarithm',
    execute: ([x]) => {
      if (x <= 0) throw mathError('LOG', `logarithm of non-positive number ${x}`, { value: x });
      return Math.log(x);
    },
  });

  registry.register({
    name: 'LOG10',
    minArgs: 1,
    maxArgs: 1,
    description: 'Base-10 logarithm',
    execute: ([x]) => {
      if (x <= 0) throw mathError('LOG10', `logarithm of non-positive number ${x}`, { value: x });
      return Math.log10(x);
    },
  });

  registry.register({
    name: 'PI',
    minArgs: 0,
    maxArgs: 0,
    description: 'The constant π',
    execute: () => Math.PI,
  });

  registry.register({
    name: 'E',
    minArgs: 0,
    maxArgs: 0,
    description: "Euler's number",
    execute: () => Math.E,
  });

  registry.register({
    name: 'GCD',
    minArgs: 2,
    maxArgs: 2,
    description: 'Greatest common divisor of two integers',
    execute: ([a, b]) => gcd(requireInteger('GCD', a, 'a'), requireInteger('GCD', b, 'b')),
  });

  registry.register({
    name: 'LCM',
    minArgs: 2,
    maxArgs: 2,
    description: 'Least common multiple of two integers',
    execute: ([a, b]) => {
      requireInteger('LCM', a, 'a');
      requireInteger('LCM', b, 'b');
      if (a === 0 || b === 0) return 0;
      return Math.abs((a / gcd(a, b)) * b);
    },
  });

  registry.register({
    name: 'FACTORIAL',
    minArgs: 1,
    maxArgs: 1,
    description: `n! for integers 0..${MAX_FACTORIAL}`,
    execute: ([n]) => {
      requireInteger('FACTORIAL', n, 'n');
      if (n < 0) throw mathError('FACTORIAL', `factorial of negative number ${n}`, { n });
      if (n > MAX_FACTORIAL) throw mathError('FACTORIAL', `n must be at most ${MAX_FACTORIAL}, got ${n}`, { n, limit: MAX_FACTORIAL });
      let result = 1;
      for (let i = 2; i <= n; i++) result *= i;
      return result;
    },
  });

  registry.register({
    name: 'COMBINATION',
    minArgs: 2,
    maxArgs: 2,
    description: `Number of k-element subsets of n elements (n ≤ ${MAX_COMBINATION_N})`,
    execute: ([n, k]) => {
      checkCountArgs('COMBINATION', n, k, MAX_COMBINATION_N);
      if (k > n) return 0;
      const r = Math.min(k, n - k);
      let result = 1n;
      for (let i = 1; i <= r; i++) {
        result = (result * BigInt(n - r + i)) / BigInt(i);
      }
      return Number(result);
    },
  });
  registry.alias('COMB', 'COMBINATION');

  registry.register({
    name: 'PERMUTATION',
    minArgs: 2,
    maxArgs: 2,
    description: `Number of ordered k-element arrangements of n elements (n ≤ ${MAX_PERMUTATION_N})`,
    execute: ([n, k]) => {
      checkCountArgs('PERMUTATION', n, k, MAX_PERMUTATION_N);
      if (k > n) return 0;
      let result = 1;
      for (let i = n - k + 1; i <= n; i++) result *= i;
      return result;
    },
  });
  registry.alias('PERM', 'PERMUTATION');
}
