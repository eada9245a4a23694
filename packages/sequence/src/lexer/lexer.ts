import { I64_MAX } from '../limits.js';
import { LexerError, type LexerErrorKind } from './lexer-error.js';
import { createSpan, type Span, type Token } from './token.js';
import { isOperatorChar, TokenType, type Operator } from './token-types.js';

/**
 * Lexer for sequence expressions
 *
 * Scans code points left to right with one character of lookahead. The only
 * state besides the cursor is whether the scan is inside `{ }`, which decides
 * whether `s:`, `m:` and `@` are legal.
 */
export class Lexer {
  private chars: string[] = [];
  private input: string = '';
  private position: number = 0;
  private inBrace: boolean = false;

  /**
   * Tokenize an expression string
   */
  tokenize(input: string): Token[] {
    this.input = input;
    this.chars = Array.from(input);
    this.position = 0;
    this.inBrace = false;

    const tokens: Token[] = [];

    while (!this.isAtEnd()) {
      this.skipWhitespace();
      if (this.isAtEnd()) break;

      tokens.push(this.nextToken());
    }

    return tokens;
  }

  private isAtEnd(): boolean {
    return this.position >= this.chars.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.chars[this.position];
  }

  private peekNext(): string {
    if (this.position + 1 >= this.chars.length) return '\0';
    return this.chars[this.position + 1];
  }

  private advance(): string {
    const char = this.chars[this.position];
    this.position++;
    return char;
  }

  /** 1-based position of the next unread character */
  private column(): number {
    return this.position + 1;
  }

  private error(kind: LexerErrorKind, span: Span): never {
    throw new LexerError(kind, this.input, span);
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
        this.advance();
      } else {
        break;
      }
    }
  }

  private nextToken(): Token {
    const start = this.column();
    const char = this.peek();

    if (this.isDigit(char)) {
      return this.number(start);
    }

    if (char === '.') {
      return this.range(start);
    }

    if (char === 's' || char === 'm') {
      return this.rangeArgument(char, start);
    }

    if (isOperatorChar(char)) {
      this.advance();
      return this.operator(char, start);
    }

    this.advance();

    switch (char) {
      case ',':
        return { type: TokenType.COMMA, span: createSpan(start) };
      case '(':
        return { type: TokenType.LPAREN, span: createSpan(start) };
      case ')':
        return { type: TokenType.RPAREN, span: createSpan(start) };
      case '{':
        this.inBrace = true;
        return { type: TokenType.LBRACE, span: createSpan(start) };
      case '}':
        this.inBrace = false;
        return { type: TokenType.RBRACE, span: createSpan(start) };
      case '@':
        if (!this.inBrace) {
          this.error('MisplacedRngSyntax', createSpan(start));
        }
        return { type: TokenType.RANGE_MUTATION_ARG, span: createSpan(start) };
      default:
        this.error('InvalidToken', createSpan(start));
    }
  }

  private isDigit(char: string): boolean {
    return char >= '0' && char <= '9';
  }

  private isAlphaNumeric(char: string): boolean {
    return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || this.isDigit(char) || char === '_';
  }

  private operator(operator: Operator, start: number): Token {
    return { type: TokenType.OPERATOR, operator, span: createSpan(start) };
  }

  private number(start: number): Token {
    let digits = '';

    while (!this.isAtEnd() && (this.isDigit(this.peek()) || this.peek() === '_')) {
      const char = this.advance();
      if (char !== '_') {
        digits += char;
      }
    }

    // A literal glued to letters (0x1F, 12abc) is one malformed word, not two tokens
    if (this.isAlphaNumeric(this.peek())) {
      while (!this.isAtEnd() && this.isAlphaNumeric(this.peek())) {
        this.advance();
      }
      this.error('MalformedNumber', createSpan(start, this.position));
    }

    const span = createSpan(start, this.position);
    const value = BigInt(digits);
    if (value > I64_MAX) {
      this.error('NumberTooLarge', span);
    }

    return { type: TokenType.INT, value, span };
  }

  /**
   * `..` or `..=`, read as one run of dots and equals signs
   */
  private range(start: number): Token {
    let dots = 0;
    let inclusive = false;

    while (!this.isAtEnd() && (this.peek() === '.' || this.peek() === '=')) {
      const char = this.peek();

      if (char === '.') {
        if (inclusive) {
          this.error('UnexpectedEqual', createSpan(start, this.column()));
        }
        dots++;
      } else {
        if (inclusive) {
          this.error('UnexpectedEqual', createSpan(start, this.column()));
        }
        inclusive = true;
      }

      this.advance();
    }

    const span = createSpan(start, this.position);

    if (dots !== 2) {
      this.error('InvalidRange', span);
    }

    return {
      type: inclusive ? TokenType.RANGE_INCLUSIVE : TokenType.RANGE_EXCLUSIVE,
      span,
    };
  }

  /**
   * `s:` (step) or `m:` (mutation)
   */
  private rangeArgument(letter: 's' | 'm', start: number): Token {
    if (!this.inBrace) {
      this.error('MisplacedRngSyntax', createSpan(start));
    }

    if (this.peekNext() !== ':') {
      this.error('MissingColon', createSpan(start));
    }

    this.advance(); // consume letter
    this.advance(); // consume ':'

    return {
      type: letter === 's' ? TokenType.RANGE_STEP : TokenType.RANGE_MUTATION,
      span: createSpan(start, start + 1),
    };
  }
}

/**
 * Tokenize `input`, throwing a {@link LexerError} on the first invalid character
 */
export function lex(input: string): Token[] {
  return new Lexer().tokenize(input);
}
