// =============================================================================
// Formula Set Validation (Zod)
// Shape checks for formula sets and input variables, plus set selection
// =============================================================================

import { z } from 'zod';
import { OrchestrationError } from './errors';
import type { FormulaValue } from './expression/coercion';
import type { FormulaSet, FormulaSetCriteria } from './types';

const variableName = z.string().regex(/^[\p{L}_][\p{L}\p{N}_]*$/u, 'must be a valid variable name');

export const formulaValueSchema = z.union([z.number().finite(), z.boolean(), z.string(), z.null()]);

export const variablesSchema = z.record(formulaValueSchema);

export const formulaSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  expression: z.string().min(1),
  order: z.number().int().min(1),
  resultVariable: variableName,
  executionCondition: z.string().min(1).optional(),
  description: z.string().optional(),
});

export const formulaSetSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  formulas: z.array(formulaSchema),
  criteria: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  resultVariable: variableName.optional(),
}).superRefine((set, ctx) => {
  const seen = { ids: new Set<string>(), orders: new Set<number>(), results: new Set<string>() };
  set.formulas.forEach((formula, index) => {
    if (seen.ids.has(formula.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['formulas', index, 'id'], message: `duplicate formula id "${formula.id}"` });
    }
    if (seen.orders.has(formula.order)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['formulas', index, 'order'], message: `duplicate order ${formula.order}` });
    }
    if (seen.results.has(formula.resultVariable)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['formulas', index, 'resultVariable'],
        message: `duplicate result variable "${formula.resultVariable}"`,
      });
    }
    seen.ids.add(formula.id);
    seen.orders.add(formula.order);
    seen.results.add(formula.resultVariable);
  });
});

function issuesOf(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}

/**
 * Validate an untrusted formula set. Shape problems are InvalidFormulaSet;
 * a set without formulas is EmptySteps.
 */
export function parseFormulaSet(input: unknown): FormulaSet {
  const parsed = formulaSetSchema.safeParse(input);
  if (!parsed.success) {
    const issues = issuesOf(parsed.error);
    throw new OrchestrationError(
      'InvalidFormulaSet',
      `Invalid formula set: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
      { details: { issues } },
    );
  }
  if (parsed.data.formulas.length === 0) {
    throw new OrchestrationError('EmptySteps', `Formula set "${parsed.data.name}" has no formulas`, {
      details: { formulaSetId: parsed.data.id },
    });
  }
  return parsed.data;
}

export function parseVariables(input: unknown): Record<string, FormulaValue> {
  const parsed = variablesSchema.safeParse(input);
  if (!parsed.success) {
    const issues = issuesOf(parsed.error);
    throw new OrchestrationError(
      'InvalidFormulaSet',
      `Invalid input variables: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
      { details: { issues } },
    );
  }
  return parsed.data;
}

/**
 * Pick the set whose criteria all match. Among matches the one with the
 * most criteria wins; a set without criteria matches anything.
 */
export function selectFormulaSet(sets: readonly FormulaSet[], criteria: FormulaSetCriteria): FormulaSet | undefined {
  let best: FormulaSet | undefined;
  let bestScore = -1;

  for (const set of sets) {
    const required = Object.entries(set.criteria ?? {});
    if (!required.every(([key, value]) => criteria[key] === value)) continue;
    if (required.length > bestScore) {
      best = set;
      bestScore = required.length;
    }
  }
  return best;
}
