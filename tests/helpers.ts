import { FormulaError } from '../src/engine/errors';
import type { AstNode } from '../src/engine/expression/ast';
import { Grammar } from '../src/engine/expression/grammar';
import type { Token, TokenType } from '../src/engine/expression/token-types';

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected the call to throw');
}

export function captureFormulaError(fn: () => unknown): FormulaError {
  const err = captureError(fn);
  if (!(err instanceof FormulaError)) {
    throw new Error(`Expected a FormulaError, got ${String(err)}`);
  }
  return err;
}

export function token(type: TokenType, value: string, index = 0): Token {
  return { type, value, raw: value, position: { index, line: 1, column: index + 1 } };
}

/** Same tree without source positions, for structural comparison. */
export function stripPositions(node: AstNode): AstNode {
  switch (node.type) {
    case 'number':
    case 'boolean':
      return node;
    case 'variable':
      return { type: 'variable', name: node.name };
    case 'unary':
      return { type: 'unary', operator: node.operator, operand: stripPositions(node.operand) };
    case 'binary':
      return { type: 'binary', operator: node.operator, left: stripPositions(node.left), right: stripPositions(node.right) };
    case 'call':
      return { type: 'call', name: node.name, args: node.args.map(stripPositions) };
    case 'conditional':
      return {
        type: 'conditional',
        condition: stripPositions(node.condition),
        whenTrue: stripPositions(node.whenTrue),
        whenFalse: stripPositions(node.whenFalse),
      };
  }
}

// ── Small grammars ──

/** S → C C ; C → c C | d */
export function twoCGrammar(): Grammar {
  return new Grammar({
    terminals: ['c', 'd'],
    nonTerminals: ['S', 'C'],
    startSymbol: 'S',
    productions: [
      { id: 0, lhs: 'S', rhs: ['C', 'C'] },
      { id: 1, lhs: 'C', rhs: ['c', 'C'] },
      { id: 2, lhs: 'C', rhs: ['d'] },
    ],
  });
}

/** LR(1) but not LALR(1): merging the two `c` states adds a reduce-reduce conflict. */
export function lrButNotLalrGrammar(): Grammar {
  return new Grammar({
    terminals: ['a', 'b', 'c', 'd', 'e'],
    nonTerminals: ['S', 'A', 'B'],
    startSymbol: 'S',
    productions: [
      { id: 0, lhs: 'S', rhs: ['a', 'A', 'd'] },
      { id: 1, lhs: 'S', rhs: ['b', 'B', 'd'] },
      { id: 2, lhs: 'S', rhs: ['a', 'B', 'e'] },
      { id: 3, lhs: 'S', rhs: ['b', 'A', 'e'] },
      { id: 4, lhs: 'A', rhs: ['c'] },
      { id: 5, lhs: 'B', rhs: ['c'] },
    ],
  });
}
