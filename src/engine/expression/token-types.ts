// =============================================================================
// Token Types
// Terminal vocabulary shared by the lexer, the grammar and the parser
// =============================================================================

import type { SourcePosition } from '../errors';

export enum TokenType {
  // Literals & names
  NUMBER = 'NUMBER',
  IDENTIFIER = 'IDENTIFIER',
  VARIABLE = 'VARIABLE',

  // Arithmetic
  PLUS = 'PLUS',
  MINUS = 'MINUS',
  MULTIPLY = 'MULTIPLY',
  DIVIDE = 'DIVIDE',
  MODULO = 'MODULO',
  POWER = 'POWER',

  // Comparison
  EQUAL = 'EQUAL',
  NOT_EQUAL = 'NOT_EQUAL',
  LESS = 'LESS',
  LESS_EQUAL = 'LESS_EQUAL',
  GREATER = 'GREATER',
  GREATER_EQUAL = 'GREATER_EQUAL',

  // Logical
  AND = 'AND',
  OR = 'OR',
  NOT = 'NOT',

  // Delimiters
  LEFT_PAREN = 'LEFT_PAREN',
  RIGHT_PAREN = 'RIGHT_PAREN',
  COMMA = 'COMMA',

  // Keywords
  IF = 'IF',
  TRUE = 'TRUE',
  FALSE = 'FALSE',

  EOF = 'EOF',
}

export interface Token {
  readonly type: TokenType;
  /** Semantic text: the name of a delimited variable, the digits of a number. */
  readonly value: string;
  /** Exact source slice the token was read from. */
  readonly raw: string;
  readonly position: SourcePosition;
}

export const IDENTIFIER_START = /[\p{L}_]/u;
export const IDENTIFIER_PART = /[\p{L}\p{N}_]/u;

/** Case-insensitive keywords recognised in identifier position. */
export const KEYWORDS: ReadonlyMap<string, TokenType> = new Map([
  ['if', TokenType.IF],
  ['true', TokenType.TRUE],
  ['false', TokenType.FALSE],
  ['and', TokenType.AND],
  ['or', TokenType.OR],
  ['not', TokenType.NOT],
  ['mod', TokenType.MODULO],
]);

/** Display form used in grammar dumps and parse error messages. */
export const TOKEN_SYMBOLS: Readonly<Record<TokenType, string>> = {
  [TokenType.NUMBER]: 'NUMBER',
  [TokenType.IDENTIFIER]: 'IDENTIFIER',
  [TokenType.VARIABLE]: 'VARIABLE',
  [TokenType.PLUS]: '+',
  [TokenType.MINUS]: '-',
  [TokenType.MULTIPLY]: '*',
  [TokenType.DIVIDE]: '/',
  [TokenType.MODULO]: '%',
  [TokenType.POWER]: '^',
  [TokenType.EQUAL]: '==',
  [TokenType.NOT_EQUAL]: '!=',
  [TokenType.LESS]: '<',
  [TokenType.LESS_EQUAL]: '<=',
  [TokenType.GREATER]: '>',
  [TokenType.GREATER_EQUAL]: '>=',
  [TokenType.AND]: '&&',
  [TokenType.OR]: '||',
  [TokenType.NOT]: '!',
  [TokenType.LEFT_PAREN]: '(',
  [TokenType.RIGHT_PAREN]: ')',
  [TokenType.COMMA]: ',',
  [TokenType.IF]: 'IF',
  [TokenType.TRUE]: 'TRUE',
  [TokenType.FALSE]: 'FALSE',
  [TokenType.EOF]: '$',
};

export function isTokenType(symbol: string): symbol is TokenType {
  return Object.prototype.hasOwnProperty.call(TOKEN_SYMBOLS, symbol);
}

export function describeTokenType(type: TokenType): string {
  return TOKEN_SYMBOLS[type];
}
