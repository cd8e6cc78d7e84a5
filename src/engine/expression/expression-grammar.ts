// =============================================================================
// Expression Grammar
// The formula language: precedence is encoded in the nonterminal layering
// =============================================================================

import {
  AstBuilder, AstBuilderRegistry, argsMultiple, argsSingle, binaryOp, booleanLiteral,
  conditional, functionCall, functionCallEmpty, identity, numberLiteral, parenthesized,
  unaryOp, variable,
} from './ast-builders';
import { Grammar, Production } from './grammar';
import { TokenType } from './token-types';

export enum NonTerminal {
  EXPR = 'Expr',
  AND_EXPR = 'AndExpr',
  COMP_EXPR = 'CompExpr',
  ARITH_EXPR = 'ArithExpr',
  TERM = 'Term',
  FACTOR = 'Factor',
  PRIMARY = 'Primary',
  ARGS = 'Args',
}

interface Rule {
  lhs: NonTerminal;
  rhs: Array<NonTerminal | TokenType>;
  builder: AstBuilder;
}

const N = NonTerminal;
const T = TokenType;

// Production id = position in this list. Ids are part of the table format; append only.
const RULES: readonly Rule[] = [
  { lhs: N.EXPR, rhs: [N.EXPR, T.OR, N.AND_EXPR], builder: binaryOp('||') },
  { lhs: N.EXPR, rhs: [N.AND_EXPR], builder: identity },
  { lhs: N.AND_EXPR, rhs: [N.AND_EXPR, T.AND, N.COMP_EXPR], builder: binaryOp('&&') },
  { lhs: N.AND_EXPR, rhs: [N.COMP_EXPR], builder: identity },
  { lhs: N.COMP_EXPR, rhs: [N.COMP_EXPR, T.EQUAL, N.ARITH_EXPR], builder: binaryOp('==') },
  { lhs: N.COMP_EXPR, rhs: [N.COMP_EXPR, T.NOT_EQUAL, N.ARITH_EXPR], builder: binaryOp('!=') },
  { lhs: N.COMP_EXPR, rhs: [N.COMP_EXPR, T.LESS, N.ARITH_EXPR], builder: binaryOp('<') },
  { lhs: N.COMP_EXPR, rhs: [N.COMP_EXPR, T.LESS_EQUAL, N.ARITH_EXPR], builder: binaryOp('<=') },
  { lhs: N.COMP_EXPR, rhs: [N.COMP_EXPR, T.GREATER, N.ARITH_EXPR], builder: binaryOp('>') },
  { lhs: N.COMP_EXPR, rhs: [N.COMP_EXPR, T.GREATER_EQUAL, N.ARITH_EXPR], builder: binaryOp('>=') },
  { lhs: N.COMP_EXPR, rhs: [N.ARITH_EXPR], builder: identity },
  { lhs: N.ARITH_EXPR, rhs: [N.ARITH_EXPR, T.PLUS, N.TERM], builder: binaryOp('+') },
  { lhs: N.ARITH_EXPR, rhs: [N.ARITH_EXPR, T.MINUS, N.TERM], builder: binaryOp('-') },
  { lhs: N.ARITH_EXPR, rhs: [N.TERM], builder: identity },
  { lhs: N.TERM, rhs: [N.TERM, T.MULTIPLY, N.FACTOR], builder: binaryOp('*') },
  { lhs: N.TERM, rhs: [N.TERM, T.DIVIDE, N.FACTOR], builder: binaryOp('/') },
  { lhs: N.TERM, rhs: [N.TERM, T.MODULO, N.FACTOR], builder: binaryOp('%') },
  { lhs: N.TERM, rhs: [N.FACTOR], builder: identity },
  { lhs: N.FACTOR, rhs: [N.PRIMARY, T.POWER, N.FACTOR], builder: binaryOp('^') },
  { lhs: N.FACTOR, rhs: [N.PRIMARY], builder: identity },
  { lhs: N.PRIMARY, rhs: [T.LEFT_PAREN, N.EXPR, T.RIGHT_PAREN], builder: parenthesized },
  { lhs: N.PRIMARY, rhs: [T.MINUS, N.PRIMARY], builder: unaryOp('-') },
  { lhs: N.PRIMARY, rhs: [T.PLUS, N.PRIMARY], builder: unaryOp('+') },
  { lhs: N.PRIMARY, rhs: [T.NOT, N.PRIMARY], builder: unaryOp('!') },
  { lhs: N.PRIMARY, rhs: [T.NUMBER], builder: numberLiteral },
  { lhs: N.PRIMARY, rhs: [T.VARIABLE], builder: variable },
  { lhs: N.PRIMARY, rhs: [T.IDENTIFIER], builder: variable },
  { lhs: N.PRIMARY, rhs: [T.TRUE], builder: booleanLiteral(true) },
  { lhs: N.PRIMARY, rhs: [T.FALSE], builder: booleanLiteral(false) },
  { lhs: N.PRIMARY, rhs: [T.IDENTIFIER, T.LEFT_PAREN, N.ARGS, T.RIGHT_PAREN], builder: functionCall },
  { lhs: N.PRIMARY, rhs: [T.IDENTIFIER, T.LEFT_PAREN, T.RIGHT_PAREN], builder: functionCallEmpty },
  {
    lhs: N.PRIMARY,
    rhs: [T.IF, T.LEFT_PAREN, N.EXPR, T.COMMA, N.EXPR, T.COMMA, N.EXPR, T.RIGHT_PAREN],
    builder: conditional,
  },
  { lhs: N.ARGS, rhs: [N.EXPR], builder: argsSingle },
  { lhs: N.ARGS, rhs: [N.ARGS, T.COMMA, N.EXPR], builder: argsMultiple },
];

export interface ExpressionGrammar {
  grammar: Grammar;
  builders: AstBuilderRegistry;
}

/**
 * Build the formula grammar and its builder registry. The registry is
 * checked against the grammar before it is returned.
 */
export function createExpressionGrammar(): ExpressionGrammar {
  const productions: Production[] = RULES.map((rule, id) => ({ id, lhs: rule.lhs, rhs: rule.rhs }));

  const grammar = new Grammar({
    terminals: Object.values(TokenType).filter((t) => t !== TokenType.EOF),
    nonTerminals: Object.values(NonTerminal),
    startSymbol: NonTerminal.EXPR,
    productions,
    endMarker: TokenType.EOF,
  });

  const builders = new AstBuilderRegistry();
  RULES.forEach((rule, id) => builders.register(id, rule.builder));
  builders.validate(grammar);

  return { grammar, builders };
}
