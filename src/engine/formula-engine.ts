// =============================================================================
// Formula Engine
// Grammar, parse table, builders and functions wired up once and shared
// =============================================================================

import { EngineConfig, EngineConfigInput, resolveEngineConfig } from '../config';
import { logger } from '../utils/logger';
import { FormulaError, FormulaErrorData, OrchestrationError } from './errors';
import { AstNode, collectFunctions, collectVariables } from './expression/ast';
import { AstBuilderRegistry } from './expression/ast-builders';
import { EvaluationContext, VariableBindings } from './expression/evaluation-context';
import { EvaluationResult, Evaluator } from './expression/evaluator';
import { createExpressionGrammar } from './expression/expression-grammar';
import { FunctionRegistry, createDefaultRegistry } from './expression/functions';
import { Grammar } from './expression/grammar';
import { Tokenizer } from './expression/lexer';
import { ConstantFolder } from './expression/optimizer';
import { ParseTable, ParseTableBuilder } from './expression/parse-table';
import { LRParser } from './expression/parser';
import { Token } from './expression/token-types';

export interface FormulaEngineOptions {
  /** Defaults to the built-in function table. */
  functions?: FunctionRegistry;
}

export interface FormulaValidationReport {
  valid: boolean;
  error?: FormulaErrorData;
  variables: string[];
  functions: string[];
  unknownFunctions: string[];
}

export class FormulaEngine {
  readonly config: EngineConfig;
  readonly grammar: Grammar;
  readonly table: ParseTable;
  readonly functions: FunctionRegistry;

  private readonly tokenizer: Tokenizer;
  private readonly parser: LRParser;
  private readonly evaluator: Evaluator;
  private readonly folder?: ConstantFolder;

  private constructor(
    config: EngineConfig,
    grammar: Grammar,
    builders: AstBuilderRegistry,
    table: ParseTable,
    functions: FunctionRegistry,
  ) {
    this.config = config;
    this.grammar = grammar;
    this.table = table;
    this.functions = functions;

    this.tokenizer = new Tokenizer({
      maxFormulaLength: config.maxFormulaLength,
      maxTokenCount: config.maxTokenCount,
    });
    this.parser = new LRParser(table, grammar, builders, {
      maxParsingSteps: config.maxParsingSteps,
      maxStackDepth: config.maxStackDepth,
      maxParsingDepth: config.maxParsingDepth,
    });
    this.evaluator = new Evaluator(functions, { maxCacheEntries: config.maxCacheEntries });
    if (config.enableOptimization) {
      this.folder = new ConstantFolder(this.evaluator, this.createContext());
    }
  }

  /**
   * Build the grammar and LALR(1) table and check the builder registry.
   * Grammar or table problems are thrown here, before any formula runs.
   */
  static create(config: EngineConfigInput = {}, options: FormulaEngineOptions = {}): FormulaEngine {
    const resolved = resolveEngineConfig(config);
    const { grammar, builders } = createExpressionGrammar();
    const table = new ParseTableBuilder(grammar).build();

    logger.info(
      `Formula parse table ready: ${table.stateCount} LALR states ` +
      `(${table.stats.canonicalStateCount} canonical) in ${table.stats.buildTimeMs}ms`,
    );

    return new FormulaEngine(resolved, grammar, builders, table, options.functions ?? createDefaultRegistry());
  }

  tokenize(text: string): Token[] {
    return this.tokenizer.tokenize(text);
  }

  /**
   * Parse formula text into an AST, folding constants when optimisation is on.
   */
  parse(text: string): AstNode {
    const ast = this.parser.parse(this.tokenizer.stream(text));
    return this.folder ? this.folder.fold(ast) : ast;
  }

  createContext(variables: VariableBindings = {}): EvaluationContext {
    return EvaluationContext.create(variables, {
      maxDepth: this.config.maxEvaluationDepth,
      maxVariables: this.config.maxVariables,
      strictMode: this.config.strictMode,
      enableCaching: this.config.enableCaching,
    });
  }

  evaluate(ast: AstNode, ctx: EvaluationContext): EvaluationResult {
    return this.evaluator.evaluate(ast, ctx);
  }

  cachedEntryCount(ast: AstNode): number {
    return this.evaluator.cachedEntryCount(ast);
  }

  /**
   * Parse and evaluate in one go. Lexing, parsing and evaluation errors
   * are all reported on the result.
   */
  calculate(text: string, variables: VariableBindings | EvaluationContext = {}): EvaluationResult {
    const startedAt = Date.now();
    try {
      const ctx = variables instanceof EvaluationContext ? variables : this.createContext(variables);
      const result = this.evaluate(this.parse(text), ctx);
      return { ...result, evaluationTimeMs: Date.now() - startedAt };
    } catch (err) {
      if (!(err instanceof FormulaError)) throw err;
      return {
        value: null,
        success: false,
        error: err,
        evaluationTimeMs: Date.now() - startedAt,
        touched: [],
        functionsUsed: [],
      };
    }
  }

  /**
   * Check that a formula parses and only calls known functions.
   */
  validate(text: string): FormulaValidationReport {
    let ast: AstNode;
    try {
      ast = this.parser.parse(this.tokenizer.stream(text));
    } catch (err) {
      if (!(err instanceof FormulaError)) throw err;
      return { valid: false, error: err.toData(), variables: [], functions: [], unknownFunctions: [] };
    }

    const functions = collectFunctions(ast);
    const unknownFunctions = functions.filter((name) => !this.functions.has(name));
    return { valid: unknownFunctions.length === 0, variables: collectVariables(ast), functions, unknownFunctions };
  }

  isValidFormula(text: string): boolean {
    return this.validate(text).valid;
  }

  /**
   * Like {@link isValidFormula} but throws FormulaValidationFailed, keeping
   * the lexer or parser error as the cause.
   */
  assertValidFormula(text: string): void {
    const ast = this.parseOrWrap(text, 'FormulaValidationFailed');
    const unknownFunctions = collectFunctions(ast).filter((name) => !this.functions.has(name));
    if (unknownFunctions.length > 0) {
      throw new OrchestrationError('FormulaValidationFailed', `Formula calls unknown function(s): ${unknownFunctions.join(', ')}`, {
        details: { formula: text, unknownFunctions },
      });
    }
  }

  /**
   * Variable names a formula reads, in order of first use.
   */
  extractVariables(text: string): string[] {
    return collectVariables(this.parseOrWrap(text, 'VariableExtractionFailed'));
  }

  /** Upper-cased function names a formula calls, in order of first use. */
  extractFunctions(text: string): string[] {
    return collectFunctions(this.parseOrWrap(text, 'FormulaValidationFailed'));
  }

  private parseOrWrap(text: string, kind: 'FormulaValidationFailed' | 'VariableExtractionFailed'): AstNode {
    try {
      return this.parser.parse(this.tokenizer.stream(text));
    } catch (err) {
      if (!(err instanceof FormulaError)) throw err;
      throw new OrchestrationError(kind, `Cannot analyse formula: ${err.message}`, {
        details: { formula: text, causeKind: err.kind },
        cause: err,
      });
    }
  }
}
