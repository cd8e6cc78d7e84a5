// =============================================================================
// LR Parser
// Table-driven shift/reduce loop with explicit state and value stacks
// =============================================================================

import { GrammarError, ParseError, SourcePosition, limitDetails } from '../errors';
import type { AstNode } from './ast';
import type { AstBuilderRegistry, ChildNode } from './ast-builders';
import type { Grammar } from './grammar';
import type { ParseTable } from './parse-table';
import { Token, TokenType, describeTokenType, isTokenType } from './token-types';

export interface ParserOptions {
  maxParsingSteps?: number;
  maxStackDepth?: number;
  /** Deepest AST the parser will build. */
  maxParsingDepth?: number;
}

interface Frame {
  value: ChildNode;
  /** AST depth of the value; tokens are 0. */
  depth: number;
}

const START_POSITION: SourcePosition = { index: 0, line: 1, column: 1 };

export class LRParser {
  private readonly maxParsingSteps: number;
  private readonly maxStackDepth: number;
  private readonly maxParsingDepth: number;

  constructor(
    private readonly table: ParseTable,
    private readonly grammar: Grammar,
    private readonly builders: AstBuilderRegistry,
    options: ParserOptions = {},
  ) {
    this.maxParsingSteps = options.maxParsingSteps ?? Number.POSITIVE_INFINITY;
    this.maxStackDepth = options.maxStackDepth ?? Number.POSITIVE_INFINITY;
    this.maxParsingDepth = options.maxParsingDepth ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Parse a token sequence into an AST. Tokens are pulled one at a time,
   * so a lazy lexer stream is consumed only as far as the parse gets.
   */
  parse(tokens: Iterable<Token>): AstNode {
    const input = tokens[Symbol.iterator]();
    const states: number[] = [0];
    const values: Frame[] = [];

    let lookahead = this.pull(input, START_POSITION);
    let steps = 0;

    while (true) {
      steps++;
      if (steps > this.maxParsingSteps) {
        throw new ParseError('TooManySteps', `Parsing exceeded ${this.maxParsingSteps} steps`, {
          position: lookahead.position,
          details: limitDetails(this.maxParsingSteps, steps),
        });
      }

      const state = states[states.length - 1];
      const action = this.table.action(state, lookahead.type);

      switch (action.type) {
        case 'shift': {
          states.push(action.state);
          values.push({ value: { kind: 'token', token: lookahead }, depth: 0 });
          if (states.length > this.maxStackDepth) {
            throw new ParseError('TooDeep', `Parser stack exceeded ${this.maxStackDepth} entries`, {
              position: lookahead.position,
              details: limitDetails(this.maxStackDepth, states.length),
            });
          }
          lookahead = this.pull(input, lookahead.position);
          break;
        }

        case 'reduce': {
          const production = this.grammar.production(action.production);
          const count = production.rhs.length;
          const frames = values.splice(values.length - count, count);
          states.length -= count;

          const built = this.builders.build(production, frames.map((f) => f.value));
          const depth = resultDepth(built, frames);
          if (depth > this.maxParsingDepth) {
            throw new ParseError('TooDeep', `Expression nesting exceeded depth ${this.maxParsingDepth}`, {
              position: lookahead.position,
              details: limitDetails(this.maxParsingDepth, depth),
            });
          }

          const target = this.table.goto(states[states.length - 1], production.lhs);
          if (target === undefined) {
            throw new GrammarError('InvalidGrammar', `No GOTO for ${production.lhs} from state ${states[states.length - 1]}`, {
              details: { state: states[states.length - 1], symbol: production.lhs },
            });
          }
          states.push(target);
          values.push({ value: built, depth });
          break;
        }

        case 'accept': {
          const top = values[values.length - 1];
          if (values.length !== 1 || top.value.kind !== 'node') {
            throw new GrammarError('InvalidGrammar', 'Accepted input did not reduce to a single expression');
          }
          return top.value.node;
        }

        case 'error':
          throw this.unexpected(lookahead, state);
      }
    }
  }

  private pull(input: Iterator<Token>, fallback: SourcePosition): Token {
    const next = input.next();
    if (next.done) return { type: TokenType.EOF, value: '', raw: '', position: fallback };
    return next.value;
  }

  private unexpected(token: Token, state: number): ParseError {
    const expected = this.table.expectedTerminals(state).map(displaySymbol);
    const found = token.type === TokenType.EOF ? 'end of input' : `"${token.raw}"`;
    const where = `line ${token.position.line}, column ${token.position.column}`;
    return new ParseError('UnexpectedToken', `Unexpected ${found} at ${where}; expected one of: ${expected.join(', ')}`, {
      position: token.position,
      details: { token: token.type, text: token.raw, expected },
    });
  }
}

function displaySymbol(symbol: string): string {
  return isTokenType(symbol) ? describeTokenType(symbol) : symbol;
}

/**
 * Depth of a reduced value: a node passed through unchanged keeps its
 * depth, an argument list takes its deepest element, a new node adds one.
 */
function resultDepth(built: ChildNode, frames: readonly Frame[]): number {
  const deepest = frames.reduce((max, frame) => Math.max(max, frame.depth), 0);
  if (built.kind === 'args') return deepest;
  if (built.kind === 'node') {
    const node = built.node;
    const passed = frames.find((frame) => frame.value.kind === 'node' && frame.value.node === node);
    if (passed) return passed.depth;
  }
  return deepest + 1;
}
