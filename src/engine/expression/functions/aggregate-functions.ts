// =============================================================================
// Aggregate Functions
// Variadic MIN / MAX / SUM / AVG
// =============================================================================

import type { FunctionRegistry } from './index';

export function registerAggregateFunctions(registry: FunctionRegistry): void {
  registry.register({
    name: 'MIN',
    minArgs: 1,
    maxArgs: Infinity,
    description: 'Smallest of the arguments',
    execute: (args) => Math.min(...args),
  });

  registry.register({
    name: 'MAX',
    minArgs: 1,
    maxArgs: Infinity,
    description: 'Largest of the arguments',
    execute: (args) => Math.max(...args),
  });

  registry.register({
    name: 'SUM',
    minArgs: 0,
    maxArgs: Infinity,
    description: 'Sum of the arguments; 0 when called without any',
    execute: (args) => args.reduce((sum, x) => sum + x, 0),
  });

  registry.register({
    name: 'AVG',
    minArgs: 1,
    maxArgs: Infinity,
    description: 'Arithmetic mean of the arguments',
    execute: (args) => args.reduce((sum, x) => sum + x, 0) / args.length,
  });
  registry.alias('AVERAGE', 'AVG');
}
