// =============================================================================
// Condition Evaluator
// Decides whether a formula step runs, from its optional condition expression
// =============================================================================

import { toBoolean } from './expression/coercion';
import type { EvaluationContext } from './expression/evaluation-context';
import type { FormulaEngine } from './formula-engine';

export interface ConditionResult {
  passed: boolean;
  details: Record<string, unknown>;
}

export class ConditionEvaluator {
  private engine: FormulaEngine;

  constructor(engine: FormulaEngine) {
    this.engine = engine;
  }

  /**
   * Evaluate a step condition. Passes when no condition is defined.
   * A condition that fails to evaluate throws: it is a step failure, not a
   * false condition.
   */
  evaluate(condition: string | undefined, ctx: EvaluationContext): ConditionResult {
    if (!condition) {
      return { passed: true, details: { reason: 'No condition defined' } };
    }

    const result = this.engine.calculate(condition, ctx);
    if (result.error) throw result.error;

    return {
      passed: toBoolean(result.value, ctx.strictMode),
      details: { condition, value: result.value, touched: result.touched },
    };
  }
}
