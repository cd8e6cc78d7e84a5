// =============================================================================
// Function Registry
// Built-in and caller-supplied functions callable from formulas
// =============================================================================

import { registerAggregateFunctions } from './aggregate-functions';
import { registerNumberFunctions } from './number-functions';
import { registerTrigFunctions } from './trig-functions';

export interface FormulaFunction {
  name: string;
  minArgs: number;
  /** Infinity for variadic functions. */
  maxArgs: number;
  description: string;
  execute: (args: readonly number[]) => number;
}

/** Names are case-insensitive; they are stored upper-cased. */
export class FunctionRegistry {
  private functions: Map<string, FormulaFunction> = new Map();

  register(fn: FormulaFunction): void {
    this.functions.set(fn.name.toUpperCase(), fn);
  }

  /** Register `aliasName` as another name for an existing function. */
  alias(aliasName: string, target: string): void {
    const fn = this.get(target);
    if (!fn) throw new Error(`Cannot alias ${aliasName}: unknown function ${target}`);
    this.functions.set(aliasName.toUpperCase(), fn);
  }

  get(name: string): FormulaFunction | undefined {
    return this.functions.get(name.toUpperCase());
  }

  has(name: string): boolean {
    return this.functions.has(name.toUpperCase());
  }

  list(): string[] {
    return [...this.functions.keys()].sort();
  }
}

/**
 * Create a registry with all built-in formula functions.
 */
export function createDefaultRegistry(): FunctionRegistry {
  const registry = new FunctionRegistry();
  registerNumberFunctions(registry);
  registerTrigFunctions(registry);
  registerAggregateFunctions(registry);
  return registry;
}
