// Shared argument checks for the built-in functions

import { EvaluationError } from '../../errors';

export function mathError(fn: string, message: string, details: Record<string, unknown> = {}): EvaluationError {
  return new EvaluationError('MathError', `${fn}: ${message}`, { details: { function: fn, ...details } });
}

export function requireInteger(fn: string, value: number, label: string): number {
  if (!Number.isInteger(value)) throw mathError(fn, `${label} must be an integer, got ${value}`, { [label]: value });
  return value;
}
