// =============================================================================
// Formula Engine Types
// Formula sets, executions and their step traces
// =============================================================================

import type { FormulaErrorData } from './errors';
import type { FormulaValue } from './expression/coercion';

export type { FormulaValue };

// --- Formula definitions ---

export interface Formula {
  id: string;
  name: string;
  expression: string;
  /** 1-based position in the set; formulas run in ascending order. */
  order: number;
  /** Variable the result is stored under for later formulas. */
  resultVariable: string;
  /** Formula is skipped when this evaluates falsy. */
  executionCondition?: string;
  description?: string;
}

export type FormulaSetCriteria = Record<string, string | number | boolean>;

export interface FormulaSet {
  id: string;
  name: string;
  description?: string;
  formulas: Formula[];
  /** Attributes used by selectFormulaSet, e.g. application type or region. */
  criteria?: FormulaSetCriteria;
  /** Variable whose value becomes the final result; defaults to the last step. */
  resultVariable?: string;
}

// --- Execution records ---

export type ExecutionStatus = 'SUCCESS' | 'FAILED' | 'PARTIAL';

export interface ExecutionStep {
  stepOrder: number;
  formulaId: string;
  formulaName: string;
  expression: string;
  resultVariableName: string;
  resultValue: FormulaValue;
  executedAt: string;
  evaluationTimeMs: number;
}

export interface SkippedStep {
  stepOrder: number;
  formulaId: string;
  formulaName: string;
  condition: string;
}

export interface FormulaExecution {
  id: string;
  formulaSetId: string;
  formulaSetName: string;
  inputVariables: Readonly<Record<string, FormulaValue>>;
  steps: readonly ExecutionStep[];
  skippedSteps: readonly SkippedStep[];
  finalResult: FormulaValue;
  status: ExecutionStatus;
  error?: FormulaErrorData;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}
