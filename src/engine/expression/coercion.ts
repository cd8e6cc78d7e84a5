// =============================================================================
// Value Coercion
// Number/boolean conversion rules for formula values, lenient or strict
// =============================================================================

import { EvaluationError } from '../errors';

export type FormulaValue = number | boolean | string | null;

const NUMERIC_STRING = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function describeValue(value: FormulaValue): string {
  return value === null ? 'null' : typeof value;
}

export function isFormulaValue(value: unknown): value is FormulaValue {
  return value === null || typeof value === 'number' || typeof value === 'boolean' || typeof value === 'string';
}

function unsupported(value: FormulaValue, target: string): EvaluationError {
  return new EvaluationError('UnsupportedType', `Cannot use ${describeValue(value)} value ${JSON.stringify(value)} as a ${target}`, {
    details: { value, valueType: describeValue(value), target },
  });
}

/**
 * Numeric view of a value. Outside strict mode booleans count as 1/0 and
 * numeric strings are parsed; strict mode accepts numbers only.
 */
export function toNumber(value: FormulaValue, strict = false): number {
  if (typeof value === 'number') return value;
  if (strict || value === null) throw unsupported(value, 'number');
  if (typeof value === 'boolean') return value ? 1 : 0;

  const text = value.trim();
  if (!NUMERIC_STRING.test(text)) {
    throw new EvaluationError('NumberConversionError', `Cannot convert "${value}" to a number`, {
      details: { value },
    });
  }
  return Number(text);
}

/**
 * Truth value of a formula value. "true"/"false" match in any case.
 * Outside strict mode a numeric string is truthy when non-zero, any other
 * non-empty string is truthy and null is false.
 */
export function toBoolean(value: FormulaValue, strict = false): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);

  if (typeof value === 'string') {
    const text = value.trim().toLowerCase();
    if (text === 'true') return true;
    if (text === 'false') return false;
    if (strict) throw unsupported(value, 'boolean');
    if (NUMERIC_STRING.test(text)) return Number(text) !== 0;
    return text.length > 0;
  }

  if (strict) throw unsupported(value, 'boolean');
  return false;
}
