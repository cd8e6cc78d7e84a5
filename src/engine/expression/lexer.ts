// =============================================================================
// Lexer
// Turns formula text into positioned tokens, lazily or all at once
// =============================================================================

import { LexError, SourcePosition, limitDetails } from '../errors';
import { IDENTIFIER_PART, IDENTIFIER_START, KEYWORDS, Token, TokenType } from './token-types';

export interface TokenizerOptions {
  maxFormulaLength?: number;
  maxTokenCount?: number;
}

const WHITESPACE = new Set([' ', '\t', '\n', '\r', '\f']);

const SINGLE_CHAR_TOKENS: ReadonlyMap<string, TokenType> = new Map([
  ['+', TokenType.PLUS],
  ['-', TokenType.MINUS],
  ['*', TokenType.MULTIPLY],
  ['/', TokenType.DIVIDE],
  ['%', TokenType.MODULO],
  ['^', TokenType.POWER],
  ['(', TokenType.LEFT_PAREN],
  [')', TokenType.RIGHT_PAREN],
  [',', TokenType.COMMA],
  ['<', TokenType.LESS],
  ['>', TokenType.GREATER],
  ['!', TokenType.NOT],
  ['=', TokenType.EQUAL],
]);

const DOUBLE_CHAR_TOKENS: ReadonlyMap<string, TokenType> = new Map([
  ['==', TokenType.EQUAL],
  ['!=', TokenType.NOT_EQUAL],
  ['<=', TokenType.LESS_EQUAL],
  ['>=', TokenType.GREATER_EQUAL],
  ['&&', TokenType.AND],
  ['||', TokenType.OR],
]);

const NUMBER_PATTERN = /^\d+(\.\d+)?([eE][+-]?\d+)?$/;
const NUMBER_RUN_CHAR = /[0-9A-Za-z_.]/;
const DIGIT = /[0-9]/;

export class Tokenizer {
  private readonly maxFormulaLength: number;
  private readonly maxTokenCount: number;

  constructor(options: TokenizerOptions = {}) {
    this.maxFormulaLength = options.maxFormulaLength ?? Number.POSITIVE_INFINITY;
    this.maxTokenCount = options.maxTokenCount ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Tokenize the whole input. The returned list always ends with EOF.
   */
  tokenize(input: string): Token[] {
    return [...this.stream(input)];
  }

  /**
   * Lazy variant of {@link tokenize}; yields the same tokens, EOF last.
   * The length limit is checked before the first token is produced.
   */
  *stream(input: string): Generator<Token, void, undefined> {
    if (input.length > this.maxFormulaLength) {
      throw new LexError(
        'TooLarge',
        `Formula is ${input.length} characters long; the limit is ${this.maxFormulaLength}`,
        { details: limitDetails(this.maxFormulaLength, input.length) },
      );
    }

    const scanner = new Scanner(input);
    let count = 0;

    while (true) {
      scanner.skipWhitespace();
      if (scanner.atEnd()) {
        yield { type: TokenType.EOF, value: '', raw: '', position: scanner.position() };
        return;
      }

      const token = this.readToken(scanner);
      count++;
      if (count > this.maxTokenCount) {
        throw new LexError('TooLarge', `Formula has more than ${this.maxTokenCount} tokens`, {
          position: token.position,
          details: limitDetails(this.maxTokenCount, count),
        });
      }
      yield token;
    }
  }

  private readToken(scanner: Scanner): Token {
    const ch = scanner.peek();

    if (DIGIT.test(ch)) return this.readNumber(scanner);
    if (IDENTIFIER_START.test(ch)) return this.readIdentifier(scanner);
    if (ch === '{') return this.readVariable(scanner, 1);
    if (ch === '$') {
      if (scanner.peek(1) === '{') return this.readVariable(scanner, 2);
      throw unexpectedCharacter(ch, scanner.position());
    }

    return this.readOperator(scanner);
  }

  private readNumber(scanner: Scanner): Token {
    const start = scanner.position();
    let text = '';

    // Take the whole alphanumeric run so "12abc" or "1.2.3" fails as one number
    while (!scanner.atEnd()) {
      const ch = scanner.peek();
      const previous = text[text.length - 1];
      const exponentSign = (ch === '+' || ch === '-') && (previous === 'e' || previous === 'E') && DIGIT.test(text[0] ?? '');
      if (!NUMBER_RUN_CHAR.test(ch) && !exponentSign) break;
      text += scanner.advance();
    }

    if (!NUMBER_PATTERN.test(text) || !Number.isFinite(Number(text))) {
      throw new LexError('InvalidNumberFormat', `Invalid number format: "${text}"`, {
        position: start,
        details: { text },
      });
    }

    return { type: TokenType.NUMBER, value: text, raw: text, position: start };
  }

  private readIdentifier(scanner: Scanner): Token {
    const start = scanner.position();
    let text = scanner.advance();
    while (!scanner.atEnd() && IDENTIFIER_PART.test(scanner.peek())) {
      text += scanner.advance();
    }

    const keyword = KEYWORDS.get(text.toLowerCase());
    return { type: keyword ?? TokenType.IDENTIFIER, value: text, raw: text, position: start };
  }

  /**
   * Read `{name}` or `${name}`; `openLength` is the size of the opening delimiter.
   */
  private readVariable(scanner: Scanner, openLength: number): Token {
    const start = scanner.position();
    let raw = '';
    for (let i = 0; i < openLength; i++) raw += scanner.advance();

    let name = '';
    while (true) {
      if (scanner.atEnd()) {
        throw new LexError('UnclosedVariable', `Variable "${raw}${name}" is missing its closing "}"`, {
          position: start,
          details: { text: raw + name },
        });
      }
      const ch = scanner.advance();
      raw += ch;
      if (ch === '}') break;
      name += ch;
    }

    // braces delimit the name, so it may start with a digit
    if (name.length === 0 || ![...name].every((c) => IDENTIFIER_PART.test(c))) {
      throw new LexError('InvalidTokenSequence', `Invalid variable name "${name}" in "${raw}"`, {
        position: start,
        details: { text: raw, name },
      });
    }

    return { type: TokenType.VARIABLE, value: name, raw, position: start };
  }

  private readOperator(scanner: Scanner): Token {
    const start = scanner.position();
    const pair = scanner.peek() + scanner.peek(1);

    const double = DOUBLE_CHAR_TOKENS.get(pair);
    if (double) {
      scanner.advance();
      scanner.advance();
      return { type: double, value: pair, raw: pair, position: start };
    }

    const ch = scanner.peek();
    const single = SINGLE_CHAR_TOKENS.get(ch);
    if (single) {
      scanner.advance();
      return { type: single, value: ch, raw: ch, position: start };
    }

    throw unexpectedCharacter(ch, start);
  }
}

function unexpectedCharacter(ch: string, position: SourcePosition): LexError {
  return new LexError(
    'UnexpectedCharacter',
    `Unexpected character "${ch}" at line ${position.line}, column ${position.column}`,
    { position, details: { character: ch } },
  );
}

// ── Scanner ──

class Scanner {
  private index = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly input: string) {}

  atEnd(): boolean {
    return this.index >= this.input.length;
  }

  peek(offset = 0): string {
    return this.input[this.index + offset] ?? '';
  }

  advance(): string {
    const ch = this.input[this.index];
    this.index++;
    if (ch === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  skipWhitespace(): void {
    while (!this.atEnd() && WHITESPACE.has(this.peek())) this.advance();
  }

  position(): SourcePosition {
    return { index: this.index, line: this.line, column: this.column };
  }
}
