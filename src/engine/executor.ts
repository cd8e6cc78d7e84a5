// =============================================================================
// Formula Set Executor
// Orchestrates: Condition → Formula → Result variable, step by step
// =============================================================================

import { randomUUID } from 'crypto';
import { logger } from '../utils/logger';
import { ConditionEvaluator } from './condition-evaluator';
import { FormulaError, OrchestrationError, limitDetails } from './errors';
import type { FormulaValue } from './expression/coercion';
import type { EvaluationContext, VariableBindings } from './expression/evaluation-context';
import type { FormulaEngine } from './formula-engine';
import { parseFormulaSet } from './formula-set';
import {
  ExecutionStatus, ExecutionStep, Formula, FormulaExecution, FormulaSet, SkippedStep,
} from './types';

interface StepRun {
  steps: ExecutionStep[];
  skippedSteps: SkippedStep[];
  failure?: OrchestrationError;
  /** Variables after the last executed step. */
  context?: EvaluationContext;
}

export class FormulaSetExecutor {
  private engine: FormulaEngine;
  private conditionEvaluator: ConditionEvaluator;

  constructor(engine: FormulaEngine) {
    this.engine = engine;
    this.conditionEvaluator = new ConditionEvaluator(engine);
  }

  /**
   * Run every formula of the set in order against the input variables and
   * the results of earlier steps. An invalid or empty set is thrown; a
   * failing step ends the run and is reported on the returned record.
   */
  execute(formulaSet: FormulaSet, inputVariables: VariableBindings = {}): FormulaExecution {
    const set = parseFormulaSet(formulaSet);
    const startTime = new Date();
    const formulas = [...set.formulas].sort((a, b) => a.order - b.order);

    let run: StepRun = { steps: [], skippedSteps: [] };
    try {
      const ctx = this.engine.createContext(inputVariables);
      run = this.runFormulas(set, formulas, ctx);
    } catch (err) {
      if (!(err instanceof FormulaError)) throw err;
      run.failure = new OrchestrationError('InvalidFormulaSet', `Input variables rejected: ${err.message}`, {
        details: { causeKind: err.kind },
        cause: err,
      });
    }

    const { steps, skippedSteps, failure, context } = run;
    const status: ExecutionStatus = failure ? 'FAILED' : skippedSteps.length > 0 ? 'PARTIAL' : 'SUCCESS';
    const completedAt = new Date();
    const execution: FormulaExecution = {
      id: randomUUID(),
      formulaSetId: set.id,
      formulaSetName: set.name,
      inputVariables: Object.freeze({ ...inputVariables }),
      steps: Object.freeze(steps.map((s) => Object.freeze(s))),
      skippedSteps: Object.freeze(skippedSteps.map((s) => Object.freeze(s))),
      finalResult: failure || !context ? null : this.finalResult(set, steps, context),
      status,
      startedAt: startTime.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startTime.getTime(),
    };
    if (failure) execution.error = failure.toData();

    logger.info(
      `Formula set "${set.name}" ${status} in ${execution.durationMs}ms ` +
      `(${steps.length} executed, ${skippedSteps.length} skipped)`,
    );
    return Object.freeze(execution);
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Run the sorted formulas until one fails or the step ceiling is reached.
   */
  private runFormulas(set: FormulaSet, formulas: readonly Formula[], initial: EvaluationContext): StepRun {
    const run: StepRun = { steps: [], skippedSteps: [] };
    const maxSteps = this.engine.config.maxFormulaSteps;
    let ctx = initial;

    for (let index = 0; index < formulas.length; index++) {
      const formula = formulas[index];

      if (run.steps.length >= maxSteps) {
        run.failure = new OrchestrationError('TooManySteps', `Formula set "${set.name}" exceeds ${maxSteps} executed steps`, {
          details: { ...limitDetails(maxSteps, run.steps.length + 1), stepIndex: index },
        });
        break;
      }

      try {
        const condition = this.conditionEvaluator.evaluate(formula.executionCondition, ctx);
        if (!condition.passed) {
          run.skippedSteps.push(this.toSkipped(formula));
          logger.debug(`Formula "${formula.name}" skipped: condition not met`);
          continue;
        }

        const { step, context } = this.runStep(formula, ctx);
        run.steps.push(step);
        ctx = context;
      } catch (err) {
        if (!(err instanceof FormulaError)) throw err;
        run.failure = new OrchestrationError('StepExecutionError', `Step ${index} ("${formula.name}") failed: ${err.message}`, {
          details: { stepIndex: index, formulaId: formula.id, causeKind: err.kind },
          cause: err,
        });
        logger.error(`Formula set "${set.name}" step ${index} failed: ${err.message}`);
        break;
      }
    }

    run.context = ctx;
    return run;
  }

  private runStep(formula: Formula, ctx: EvaluationContext): { step: ExecutionStep; context: EvaluationContext } {
    const result = this.engine.calculate(formula.expression, ctx);
    if (result.error) throw result.error;

    const step: ExecutionStep = {
      stepOrder: formula.order,
      formulaId: formula.id,
      formulaName: formula.name,
      expression: formula.expression,
      resultVariableName: formula.resultVariable,
      resultValue: result.value,
      executedAt: new Date().toISOString(),
      evaluationTimeMs: result.evaluationTimeMs,
    };
    return { step, context: ctx.withVariable(formula.resultVariable, result.value) };
  }

  private toSkipped(formula: Formula): SkippedStep {
    return {
      stepOrder: formula.order,
      formulaId: formula.id,
      formulaName: formula.name,
      condition: formula.executionCondition ?? '',
    };
  }

  private finalResult(set: FormulaSet, steps: readonly ExecutionStep[], ctx: EvaluationContext): FormulaValue {
    if (set.resultVariable) return ctx.get(set.resultVariable) ?? null;
    return steps.length > 0 ? steps[steps.length - 1].resultValue : null;
  }
}
