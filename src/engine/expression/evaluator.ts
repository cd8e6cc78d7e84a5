// =============================================================================
// Evaluator
// Tree-walking interpreter over the AST with per-context memoisation
// =============================================================================

import { EvaluationError, FormulaError, limitDetails } from '../errors';
import type { AstNode, BinaryNode, ConditionalNode, FunctionCallNode, UnaryNode } from './ast';
import { FormulaValue, toBoolean, toNumber } from './coercion';
import type { EvaluationContext } from './evaluation-context';
import type { FunctionRegistry } from './functions';

export interface EvaluationResult {
  value: FormulaValue;
  success: boolean;
  error?: FormulaError;
  evaluationTimeMs: number;
  /** Variables read during evaluation, sorted. */
  touched: string[];
  /** Functions called during evaluation, upper-cased and sorted. */
  functionsUsed: string[];
}

export interface EvaluatorOptions {
  /** Cached results kept per AST node, least recently used dropped first. */
  maxCacheEntries?: number;
}

export const DEFAULT_MAX_CACHE_ENTRIES = 256;

interface Usage {
  variables: Set<string>;
  functions: Set<string>;
}

interface CachedValue {
  value: FormulaValue;
  variables: readonly string[];
  functions: readonly string[];
}

export class Evaluator {
  private cache = new WeakMap<AstNode, Map<string, CachedValue>>();
  private readonly maxCacheEntries: number;

  constructor(private readonly functions: FunctionRegistry, options: EvaluatorOptions = {}) {
    this.maxCacheEntries = options.maxCacheEntries ?? DEFAULT_MAX_CACHE_ENTRIES;
  }

  /**
   * Evaluate an AST. Formula errors are reported on the result, never thrown.
   */
  evaluate(ast: AstNode, ctx: EvaluationContext): EvaluationResult {
    const startedAt = Date.now();
    const usage = newUsage();
    try {
      const value = this.evalNode(ast, ctx, 1, usage);
      return { value, success: true, evaluationTimeMs: Date.now() - startedAt, ...usageLists(usage) };
    } catch (err) {
      if (!(err instanceof FormulaError)) throw err;
      return {
        value: null,
        success: false,
        error: err,
        evaluationTimeMs: Date.now() - startedAt,
        ...usageLists(usage),
      };
    }
  }

  /**
   * Evaluate an AST and return the bare value; formula errors are thrown.
   */
  compute(ast: AstNode, ctx: EvaluationContext): FormulaValue {
    return this.evalNode(ast, ctx, 1, newUsage());
  }

  /** Number of cached results held for a node. */
  cachedEntryCount(node: AstNode): number {
    return this.cache.get(node)?.size ?? 0;
  }

  // ===========================================================================
  // Nodes
  // ===========================================================================

  private evalNode(node: AstNode, ctx: EvaluationContext, depth: number, usage: Usage): FormulaValue {
    if (depth > ctx.maxDepth) {
      throw new EvaluationError('TooDeep', `Evaluation exceeded depth ${ctx.maxDepth}`, {
        details: limitDetails(ctx.maxDepth, depth),
      });
    }

    if (!ctx.enableCaching) return this.dispatch(node, ctx, depth, usage);

    const key = `${ctx.strictMode}|${ctx.maxDepth}|${ctx.snapshotKey}`;
    let entries = this.cache.get(node);
    const hit = entries?.get(key);
    if (entries && hit) {
      // refresh recency
      entries.delete(key);
      entries.set(key, hit);
      for (const name of hit.variables) usage.variables.add(name);
      for (const name of hit.functions) usage.functions.add(name);
      return hit.value;
    }

    const local = newUsage();
    const value = this.dispatch(node, ctx, depth, local);
    for (const name of local.variables) usage.variables.add(name);
    for (const name of local.functions) usage.functions.add(name);

    if (!entries) {
      entries = new Map();
      this.cache.set(node, entries);
    }
    entries.set(key, { value, variables: [...local.variables], functions: [...local.functions] });
    while (entries.size > this.maxCacheEntries) {
      const oldest = entries.keys().next();
      if (oldest.done) break;
      entries.delete(oldest.value);
    }
    return value;
  }

  private dispatch(node: AstNode, ctx: EvaluationContext, depth: number, usage: Usage): FormulaValue {
    switch (node.type) {
      case 'number':
      case 'boolean':
        return node.value;
      case 'variable': {
        const value = ctx.get(node.name);
        if (value === undefined) {
          throw new EvaluationError('UndefinedVariable', `Undefined variable "${node.name}"`, {
            position: node.position,
            details: { name: node.name },
          });
        }
        usage.variables.add(node.name);
        return value;
      }
      case 'unary':
        return this.evalUnary(node, ctx, depth, usage);
      case 'binary':
        return this.evalBinary(node, ctx, depth, usage);
      case 'call':
        return this.evalCall(node, ctx, depth, usage);
      case 'conditional':
        return this.evalConditional(node, ctx, depth, usage);
    }
  }

  private evalUnary(node: UnaryNode, ctx: EvaluationContext, depth: number, usage: Usage): FormulaValue {
    const operand = this.evalNode(node.operand, ctx, depth + 1, usage);
    switch (node.operator) {
      case '-':
        return -toNumber(operand, ctx.strictMode);
      case '+':
        return toNumber(operand, ctx.strictMode);
      case '!':
        return !toBoolean(operand, ctx.strictMode);
      default:
        throw unsupportedOperator(String(node.operator), node);
    }
  }

  private evalBinary(node: BinaryNode, ctx: EvaluationContext, depth: number, usage: Usage): FormulaValue {
    const strict = ctx.strictMode;
    const left = () => this.evalNode(node.left, ctx, depth + 1, usage);
    const right = () => this.evalNode(node.right, ctx, depth + 1, usage);

    switch (node.operator) {
      case '&&':
        return toBoolean(left(), strict) && toBoolean(right(), strict);
      case '||':
        return toBoolean(left(), strict) || toBoolean(right(), strict);
      case '==':
        return valuesEqual(left(), right(), strict);
      case '!=':
        return !valuesEqual(left(), right(), strict);
      default:
        break;
    }

    const a = toNumber(left(), strict);
    const b = toNumber(right(), strict);

    switch (node.operator) {
      case '<':
        return a < b;
      case '<=':
        return a <= b;
      case '>':
        return a > b;
      case '>=':
        return a >= b;
      case '+':
        return finite(a + b, node);
      case '-':
        return finite(a - b, node);
      case '*':
        return finite(a * b, node);
      case '/':
        if (b === 0) throw divisionByZero(a, node);
        return finite(a / b, node);
      case '%':
        if (b === 0) throw divisionByZero(a, node);
        return finite(a % b, node);
      case '^':
        return finite(Math.pow(a, b), node);
      default:
        throw unsupportedOperator(String(node.operator), node);
    }
  }

  private evalCall(node: FunctionCallNode, ctx: EvaluationContext, depth: number, usage: Usage): FormulaValue {
    const fn = this.functions.get(node.name);
    if (!fn) {
      throw new EvaluationError('UnsupportedFunction', `Unknown function "${node.name}"`, {
        position: node.position,
        details: { name: node.name },
      });
    }

    const count = node.args.length;
    if (count < fn.minArgs || count > fn.maxArgs) {
      const expected = fn.minArgs === fn.maxArgs
        ? `${fn.minArgs}`
        : fn.maxArgs === Infinity ? `at least ${fn.minArgs}` : `${fn.minArgs}-${fn.maxArgs}`;
      throw new EvaluationError('WrongArgumentCount', `${fn.name} expects ${expected} argument(s), got ${count}`, {
        position: node.position,
        details: { name: fn.name, minArgs: fn.minArgs, maxArgs: fn.maxArgs === Infinity ? null : fn.maxArgs, actual: count },
      });
    }

    usage.functions.add(node.name.toUpperCase());
    const args = node.args.map((arg) => toNumber(this.evalNode(arg, ctx, depth + 1, usage), ctx.strictMode));

    let result: number;
    try {
      result = fn.execute(args);
    } catch (err) {
      if (err instanceof FormulaError) throw err;
      throw new EvaluationError('MathError', `${fn.name} failed: ${err instanceof Error ? err.message : String(err)}`, {
        position: node.position,
        details: { name: fn.name },
        cause: err,
      });
    }
    return finite(result, node);
  }

  private evalConditional(node: ConditionalNode, ctx: EvaluationContext, depth: number, usage: Usage): FormulaValue {
    const condition = toBoolean(this.evalNode(node.condition, ctx, depth + 1, usage), ctx.strictMode);
    return this.evalNode(condition ? node.whenTrue : node.whenFalse, ctx, depth + 1, usage);
  }
}

// ── Helpers ──

function newUsage(): Usage {
  return { variables: new Set(), functions: new Set() };
}

function usageLists(usage: Usage): Pick<EvaluationResult, 'touched' | 'functionsUsed'> {
  return { touched: [...usage.variables].sort(), functionsUsed: [...usage.functions].sort() };
}

/**
 * Booleans compare with booleans and strings with strings; null equals only
 * null; everything else compares numerically.
 */
function valuesEqual(a: FormulaValue, b: FormulaValue, strict: boolean): boolean {
  if (typeof a === 'boolean' && typeof b === 'boolean') return a === b;
  if (typeof a === 'string' && typeof b === 'string') return a === b;
  if (a === null || b === null) return a === b;
  return toNumber(a, strict) === toNumber(b, strict);
}

function finite(value: number, node: BinaryNode | FunctionCallNode): number {
  if (!Number.isFinite(value)) {
    const what = node.type === 'binary' ? `"${node.operator}"` : node.name;
    throw new EvaluationError('MathError', `${what} produced a non-finite result`, {
      position: node.position,
      details: { result: String(value) },
    });
  }
  return value;
}

function divisionByZero(dividend: number, node: BinaryNode): EvaluationError {
  return new EvaluationError('DivisionByZero', `Division by zero (${dividend} ${node.operator} 0)`, {
    position: node.position,
    details: { operator: node.operator, dividend },
  });
}

function unsupportedOperator(operator: string, node: UnaryNode | BinaryNode): EvaluationError {
  return new EvaluationError('UnsupportedOperator', `Unsupported operator "${operator}"`, {
    position: node.position,
    details: { operator },
  });
}
