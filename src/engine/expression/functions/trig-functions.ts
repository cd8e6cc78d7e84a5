// =============================================================================
// Trigonometric Functions
// Angles are in radians; RADIANS/DEGREES convert
// =============================================================================

import { mathError } from './helpers';
import type { FunctionRegistry } from './index';

type Unary = (x: number) => number;

const UNARY: Array<[name: string, description: string, fn: Unary]> = [
  ['SIN', 'Sine', Math.sin],
  ['COS', 'Cosine', Math.cos],
  ['TAN', 'Tangent', Math.tan],
  ['ATAN', 'Arc tangent', Math.atan],
  ['SINH', 'Hyperbolic sine', Math.sinh],
  ['COSH', 'Hyperbolic cosine', Math.cosh],
  ['TANH', 'Hyperbolic tangent', Math.tanh],
  ['ASINH', 'Inverse hyperbolic sine', Math.asinh],
  ['RADIANS', 'Degrees to radians', (x) => (x * Math.PI) / 180],
  ['DEGREES', 'Radians to degrees', (x) => (x * 180) / Math.PI],
];

export function registerTrigFunctions(registry: FunctionRegistry): void {
  for (const [name, description, fn] of UNARY) {
    registry.register({ name, minArgs: 1, maxArgs: 1, description, execute: ([x]) => fn(x) });
  }

  registry.register({
    name: 'ASIN',
    minArgs: 1,
    maxArgs: 1,
    description: 'Arc sine; defined on [-1, 1]',
    execute: ([x]) => {
      if (x < -1 || x > 1) throw mathError('ASIN', `argument ${x} is outside [-1, 1]`, { value: x });
      return Math.asin(x);
    },
  });

  registry.register({
    name: 'ACOS',
    minArgs: 1,
    maxArgs: 1,
    description: 'Arc cosine; defined on [-1, 1]',
    execute: ([x]) => {
      if (x < -1 || x > 1) throw mathError('ACOS', `argument ${x} is outside [-1, 1]`, { value: x });
      return Math.acos(x);
    },
  });

  registry.register({
    name: 'ATAN2',
    minArgs: 2,
    maxArgs: 2,
    description: 'Angle of the point (x, y), called as ATAN2(y, x)',
    execute: ([y, x]) => Math.atan2(y, x),
  });

  registry.register({
    name: 'ACOSH',
    minArgs: 1,
    maxArgs: 1,
    description: 'Inverse hyperbolic cosine; defined for values ≥ 1',
    execute: ([x]) => {
      if (x < 1) throw mathError('ACOSH', `argument ${x} is less than 1`, { value: x });
      return Math.acosh(x);
    },
  });

  registry.register({
    name: 'ATANH',
    minArgs: 1,
    maxArgs: 1,
    description: 'Inverse hyperbolic tangent; defined on (-1, 1)',
    execute: ([x]) => {
      if (x <= -1 || x >= 1) throw mathError('ATANH', `argument ${x} is outside (-1, 1)`, { value: x });
      return Math.atanh(x);
    },
  });
}
