// =============================================================================
// Formula Errors
// One error hierarchy shared by every pipeline stage
// =============================================================================

export const FORMULA_ERROR_KINDS = {
  // lexer
  UnexpectedCharacter: 'UnexpectedCharacter',
  UnclosedVariable: 'UnclosedVariable',
  InvalidNumberFormat: 'InvalidNumberFormat',
  InvalidTokenSequence: 'InvalidTokenSequence',
  TooLarge: 'TooLarge',
  // grammar / table construction
  InvalidGrammar: 'InvalidGrammar',
  GrammarConflict: 'GrammarConflict',
  EmptyCoreItems: 'EmptyCoreItems',
  // parser
  UnexpectedToken: 'UnexpectedToken',
  TooDeep: 'TooDeep',
  TooManySteps: 'TooManySteps',
  // ast builders
  ChildCountMismatch: 'ChildCountMismatch',
  ChildTypeMismatch: 'ChildTypeMismatch',
  // evaluator
  UndefinedVariable: 'UndefinedVariable',
  DivisionByZero: 'DivisionByZero',
  UnsupportedOperator: 'UnsupportedOperator',
  UnsupportedFunction: 'UnsupportedFunction',
  WrongArgumentCount: 'WrongArgumentCount',
  UnsupportedType: 'UnsupportedType',
  NumberConversionError: 'NumberConversionError',
  MathError: 'MathError',
  TooManyVariables: 'TooManyVariables',
  // orchestration
  EmptySteps: 'EmptySteps',
  StepExecutionError: 'StepExecutionError',
  InvalidFormulaSet: 'InvalidFormulaSet',
  FormulaValidationFailed: 'FormulaValidationFailed',
  VariableExtractionFailed: 'VariableExtractionFailed',
  // configuration
  InvalidConfiguration: 'InvalidConfiguration',
} as const;

export type FormulaErrorKind = keyof typeof FORMULA_ERROR_KINDS;

export type FormulaErrorStage =
  | 'lexer'
  | 'grammar'
  | 'parser'
  | 'ast'
  | 'evaluator'
  | 'orchestrator'
  | 'config';

export type LexErrorKind =
  | 'UnexpectedCharacter'
  | 'UnclosedVariable'
  | 'InvalidNumberFormat'
  | 'InvalidTokenSequence'
  | 'TooLarge';

export type GrammarErrorKind = 'InvalidGrammar' | 'GrammarConflict' | 'EmptyCoreItems';

export type ParseErrorKind = 'UnexpectedToken' | 'TooDeep' | 'TooManySteps';

export type AstBuildErrorKind = 'ChildCountMismatch' | 'ChildTypeMismatch';

export type EvaluationErrorKind =
  | 'UndefinedVariable'
  | 'DivisionByZero'
  | 'UnsupportedOperator'
  | 'UnsupportedFunction'
  | 'WrongArgumentCount'
  | 'UnsupportedType'
  | 'NumberConversionError'
  | 'MathError'
  | 'TooDeep'
  | 'TooManyVariables';

export type OrchestrationErrorKind =
  | 'EmptySteps'
  | 'StepExecutionError'
  | 'InvalidFormulaSet'
  | 'TooManySteps'
  | 'FormulaValidationFailed'
  | 'VariableExtractionFailed';

export interface SourcePosition {
  /** 0-based offset into the formula text. */
  index: number;
  /** 1-based. */
  line: number;
  /** 1-based. */
  column: number;
}

export interface FormulaErrorOptions {
  position?: SourcePosition;
  details?: Record<string, unknown>;
  cause?: unknown;
}

/** Plain, JSON-compatible view of an error, as stored on failed results. */
export interface FormulaErrorData {
  kind: FormulaErrorKind;
  stage: FormulaErrorStage;
  message: string;
  position?: SourcePosition;
  details: Record<string, unknown>;
  cause?: FormulaErrorData | { message: string };
}

export class FormulaError extends Error {
  readonly kind: FormulaErrorKind;
  readonly stage: FormulaErrorStage;
  readonly position?: SourcePosition;
  readonly details: Record<string, unknown>;

  constructor(stage: FormulaErrorStage, kind: FormulaErrorKind, message: string, options: FormulaErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'FormulaError';
    this.stage = stage;
    this.kind = kind;
    this.position = options.position;
    this.details = options.details ?? {};
  }

  toData(): FormulaErrorData {
    const data: FormulaErrorData = {
      kind: this.kind,
      stage: this.stage,
      message: this.message,
      details: this.details,
    };
    if (this.position) data.position = this.position;
    if (this.cause instanceof FormulaError) {
      data.cause = this.cause.toData();
    } else if (this.cause instanceof Error) {
      data.cause = { message: this.cause.message };
    }
    return data;
  }
}

export class LexError extends FormulaError {
  declare readonly kind: LexErrorKind;

  constructor(kind: LexErrorKind, message: string, options?: FormulaErrorOptions) {
    super('lexer', kind, message, options);
    this.name = 'LexError';
  }
}

export class GrammarError extends FormulaError {
  declare readonly kind: GrammarErrorKind;

  constructor(kind: GrammarErrorKind, message: string, options?: FormulaErrorOptions) {
    super('grammar', kind, message, options);
    this.name = 'GrammarError';
  }
}

export class ParseError extends FormulaError {
  declare readonly kind: ParseErrorKind;

  constructor(kind: ParseErrorKind, message: string, options?: FormulaErrorOptions) {
    super('parser', kind, message, options);
    this.name = 'ParseError';
  }
}

export class AstBuildError extends FormulaError {
  declare readonly kind: AstBuildErrorKind;

  constructor(kind: AstBuildErrorKind, message: string, options?: FormulaErrorOptions) {
    super('ast', kind, message, options);
    this.name = 'AstBuildError';
  }
}

export class EvaluationError extends FormulaError {
  declare readonly kind: EvaluationErrorKind;

  constructor(kind: EvaluationErrorKind, message: string, options?: FormulaErrorOptions) {
    super('evaluator', kind, message, options);
    this.name = 'EvaluationError';
  }
}

export class OrchestrationError extends FormulaError {
  declare readonly kind: OrchestrationErrorKind;

  constructor(kind: OrchestrationErrorKind, message: string, options?: FormulaErrorOptions) {
    super('orchestrator', kind, message, options);
    this.name = 'OrchestrationError';
  }
}

export class ConfigurationError extends FormulaError {
  declare readonly kind: 'InvalidConfiguration';

  constructor(message: string, options?: FormulaErrorOptions) {
    super('config', 'InvalidConfiguration', message, options);
    this.name = 'ConfigurationError';
  }
}

// ── Helpers ──

export function limitDetails(limit: number, observed: number): Record<string, unknown> {
  return { limit, observed };
}

export function isFormulaError(value: unknown): value is FormulaError {
  return value instanceof FormulaError;
}
