// =============================================================================
// Evaluation Context
// Immutable variable bindings plus the limits and flags one evaluation runs with
// =============================================================================

import { EvaluationError, limitDetails } from '../errors';
import { FormulaValue, describeValue, isFormulaValue } from './coercion';

export interface EvaluationContextOptions {
  maxDepth?: number;
  maxVariables?: number;
  strictMode?: boolean;
  enableCaching?: boolean;
}

export type VariableBindings = Readonly<Record<string, FormulaValue>>;

export class EvaluationContext {
  readonly maxDepth: number;
  readonly maxVariables: number;
  readonly strictMode: boolean;
  readonly enableCaching: boolean;

  private readonly bindings: ReadonlyMap<string, FormulaValue>;
  private cachedSnapshotKey?: string;

  private constructor(bindings: Map<string, FormulaValue>, options: Required<EvaluationContextOptions>) {
    if (bindings.size > options.maxVariables) {
      throw new EvaluationError('TooManyVariables', `Context holds ${bindings.size} variables; the limit is ${options.maxVariables}`, {
        details: limitDetails(options.maxVariables, bindings.size),
      });
    }
    this.bindings = bindings;
    this.maxDepth = options.maxDepth;
    this.maxVariables = options.maxVariables;
    this.strictMode = options.strictMode;
    this.enableCaching = options.enableCaching;
  }

  static create(variables: VariableBindings = {}, options: EvaluationContextOptions = {}): EvaluationContext {
    const bindings = new Map<string, FormulaValue>();
    for (const [name, value] of Object.entries(variables)) {
      bindings.set(name, checkValue(name, value));
    }
    return new EvaluationContext(bindings, {
      maxDepth: options.maxDepth ?? 256,
      maxVariables: options.maxVariables ?? 100,
      strictMode: options.strictMode ?? false,
      enableCaching: options.enableCaching ?? false,
    });
  }

  get(name: string): FormulaValue | undefined {
    return this.bindings.get(name);
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  get size(): number {
    return this.bindings.size;
  }

  names(): string[] {
    return [...this.bindings.keys()];
  }

  /** Copy of the bindings as a plain object. */
  variables(): Record<string, FormulaValue> {
    return Object.fromEntries(this.bindings);
  }

  withVariable(name: string, value: FormulaValue): EvaluationContext {
    const bindings = new Map(this.bindings);
    bindings.set(name, checkValue(name, value));
    return new EvaluationContext(bindings, this.options());
  }

  withVariables(variables: VariableBindings): EvaluationContext {
    const bindings = new Map(this.bindings);
    for (const [name, value] of Object.entries(variables)) bindings.set(name, checkValue(name, value));
    return new EvaluationContext(bindings, this.options());
  }

  withoutVariable(name: string): EvaluationContext {
    if (!this.bindings.has(name)) return this;
    const bindings = new Map(this.bindings);
    bindings.delete(name);
    return new EvaluationContext(bindings, this.options());
  }

  /**
   * Stable key for the bindings, used to memoise evaluation results.
   */
  get snapshotKey(): string {
    if (this.cachedSnapshotKey === undefined) {
      const entries = [...this.bindings].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      this.cachedSnapshotKey = JSON.stringify(entries);
    }
    return this.cachedSnapshotKey;
  }

  private options(): Required<EvaluationContextOptions> {
    return {
      maxDepth: this.maxDepth,
      maxVariables: this.maxVariables,
      strictMode: this.strictMode,
      enableCaching: this.enableCaching,
    };
  }
}

function checkValue(name: string, value: unknown): FormulaValue {
  if (!isFormulaValue(value)) {
    throw new EvaluationError('UnsupportedType', `Variable "${name}" has unsupported type ${typeof value}`, {
      details: { name, valueType: typeof value },
    });
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new EvaluationError('MathError', `Variable "${name}" is not a finite number (${describeValue(value)} ${value})`, {
      details: { name, value: String(value) },
    });
  }
  return value;
}
