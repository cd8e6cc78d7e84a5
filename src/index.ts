// =============================================================================
// Scoring Formula Engine — Public API
// =============================================================================

export { DEFAULT_ENGINE_CONFIG, engineConfigSchema, loadEngineConfig, resolveEngineConfig } from './config';
export type { EngineConfig, EngineConfigInput } from './config';

export {
  AstBuildError, ConfigurationError, EvaluationError, FORMULA_ERROR_KINDS, FormulaError, GrammarError,
  LexError, OrchestrationError, ParseError, isFormulaError,
} from './engine/errors';
export type { FormulaErrorData, FormulaErrorKind, FormulaErrorStage, SourcePosition } from './engine/errors';

export { FormulaEngine } from './engine/formula-engine';
export type { FormulaEngineOptions, FormulaValidationReport } from './engine/formula-engine';
export { FormulaSetExecutor } from './engine/executor';
export { ConditionEvaluator } from './engine/condition-evaluator';
export type { ConditionResult } from './engine/condition-evaluator';
export { formulaSchema, formulaSetSchema, parseFormulaSet, parseVariables, selectFormulaSet } from './engine/formula-set';
export type {
  ExecutionStatus, ExecutionStep, Formula, FormulaExecution, FormulaSet, FormulaSetCriteria, SkippedStep,
} from './engine/types';

export { Tokenizer } from './engine/expression/lexer';
export type { TokenizerOptions } from './engine/expression/lexer';
export { TokenType } from './engine/expression/token-types';
export type { Token } from './engine/expression/token-types';
export { AUGMENTED_PRODUCTION_ID, AUGMENTED_START, Grammar } from './engine/expression/grammar';
export type { GrammarDefinition, Production } from './engine/expression/grammar';
export { NonTerminal, createExpressionGrammar } from './engine/expression/expression-grammar';
export { CompressedLRState, LRItem, canMergeLALR } from './engine/expression/lr-items';
export { ParseTable, ParseTableBuilder } from './engine/expression/parse-table';
export type { LR1State, ParseAction, ParseTableStats, TableConflict } from './engine/expression/parse-table';
export { LRParser } from './engine/expression/parser';
export { AstBuilderRegistry } from './engine/expression/ast-builders';
export type { AstBuilder, ChildNode } from './engine/expression/ast-builders';
export { astDepth, collectFunctions, collectVariables, formatExpression } from './engine/expression/ast';
export type { AstNode, BinaryOperator, UnaryOperator } from './engine/expression/ast';
export { EvaluationContext } from './engine/expression/evaluation-context';
export type { EvaluationContextOptions, VariableBindings } from './engine/expression/evaluation-context';
export { DEFAULT_MAX_CACHE_ENTRIES, Evaluator } from './engine/expression/evaluator';
export type { EvaluationResult, EvaluatorOptions } from './engine/expression/evaluator';
export { ConstantFolder } from './engine/expression/optimizer';
export { toBoolean, toNumber } from './engine/expression/coercion';
export type { FormulaValue } from './engine/expression/coercion';
export { FunctionRegistry, createDefaultRegistry } from './engine/expression/functions';
export type { FormulaFunction } from './engine/expression/functions';
