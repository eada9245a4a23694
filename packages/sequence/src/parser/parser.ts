import { mergeSpans, type Span, type Token } from '../lexer/token.js';
import { isSignOperator, TokenType } from '../lexer/token-types.js';
import type { IntNode, MathExprNode, Node, PostfixItem, RangeExprNode, ValueNode } from './ast.js';
import { ParserError, type ParserErrorKind } from './parser-error.js';
import { reduceToPostfix, type ReduceOptions } from './shunting-yard.js';

/**
 * Parser for sequence expressions
 *
 * Grammar:
 *   sequence   := item (','? item)*
 *   item       := range | value (op expr)?
 *   value      := signed_int | '(' expr ')'
 *   signed_int := ('+'|'-')* INT
 *   range      := '{' expr rangeop expr (',' ('s:' expr | 'm:' expr))* '}'
 *
 * Arithmetic is handed to the shunting-yard reducer; everything else is a
 * single left-to-right pass over the tokens.
 */
export class Parser {
  private tokens: readonly Token[] = [];
  private current: number = 0;
  private input: string = '';

  /**
   * Parse the tokens of `input` into one node per item
   */
  parse(input: string, tokens: readonly Token[]): Node[] {
    this.input = input;
    this.tokens = tokens;
    this.current = 0;

    const nodes: Node[] = [];

    while (!this.isAtEnd()) {
      nodes.push(this.item());
      this.advancePastComma();
    }

    return nodes;
  }

  // Token navigation

  private peek(): Token | undefined {
    return this.tokens[this.current];
  }

  private isAtEnd(): boolean {
    return this.current >= this.tokens.length;
  }

  private advance(): Token {
    const token = this.tokens[this.current];
    this.current++;
    return token;
  }

  private check(type: Token['type']): boolean {
    return this.peek()?.type === type;
  }

  private error(kind: ParserErrorKind, span: Span): ParserError {
    return new ParserError(kind, this.input, span);
  }

  /**
   * Zero or one comma may separate items; a doubled or trailing comma may not
   */
  private advancePastComma(): void {
    const comma = this.peek();
    if (comma?.type !== TokenType.COMMA) return;
    this.advance();

    const next = this.peek();
    if (!next) {
      throw this.error('UnexpectedComma', comma.span);
    }
    if (next.type === TokenType.COMMA) {
      throw this.error('UnexpectedComma', next.span);
    }
  }

  // Items

  /**
   * A value followed by a math operator continues as one arithmetic item
   * (`1 + 2 - 3`); a range cannot be an operand
   */
  private item(): Node {
    const start = this.current;
    const node = this.primary();

    const next = this.peek();
    if (next?.type !== TokenType.OPERATOR) {
      return node;
    }
    if (node.type === 'RangeExpr') {
      throw this.error('UnexpectedMathOp', next.span);
    }

    this.current = start;
    return this.mathExpr({ mode: 'item' });
  }

  private primary(): Node {
    const token = this.advanceGuard();

    switch (token.type) {
      case TokenType.COMMA:
        throw this.error('UnexpectedComma', token.span);
      case TokenType.INT:
        return this.signedInt();
      case TokenType.OPERATOR:
        if (isSignOperator(token.operator)) {
          return this.signedInt();
        }
        throw this.error('UnexpectedMathOp', token.span);
      case TokenType.LPAREN:
        return this.mathExpr({ mode: 'group' });
      case TokenType.LBRACE:
        return this.range();
      default:
        throw this.error('InvalidInt', token.span);
    }
  }

  private advanceGuard(): Token {
    const token = this.peek();
    if (!token) {
      throw new Error('Parser read past the end of the token list');
    }
    return token;
  }

  /**
   * A run of signs followed by an integer; the sign is the parity of the minuses
   */
  private signedInt(): IntNode {
    const first = this.advanceGuard();
    let negative = false;
    let lastSign: Token | null = null;

    let token = this.peek();
    while (token?.type === TokenType.OPERATOR && isSignOperator(token.operator)) {
      if (token.operator === '-') {
        negative = !negative;
      }
      lastSign = this.advance();
      token = this.peek();
    }

    if (!token) {
      throw this.error('IncompleteInt', (lastSign ?? first).span);
    }
    if (token.type !== TokenType.INT) {
      throw this.error('InvalidInt', token.span);
    }

    this.advance();
    return {
      type: 'Int',
      value: negative ? -token.value : token.value,
      span: mergeSpans(first.span, token.span),
    };
  }

  private mathExpr(options: ReduceOptions): MathExprNode {
    const result = reduceToPostfix(this.input, this.tokens, this.current, options);
    this.current = result.next;
    return { type: 'MathExpr', postfix: result.postfix, span: result.span };
  }

  /**
   * Open expression used for range bounds and steps; a bare signed integer stays an Int node
   */
  private value(): ValueNode {
    return foldSignedInt(this.mathExpr({ mode: 'open' }));
  }

  private range(): RangeExprNode {
    const lbrace = this.advance();

    this.expectMore(lbrace);
    const start = this.value();

    const op = this.peek();
    if (!op) {
      throw this.error('UnclosedRange', lbrace.span);
    }
    if (op.type !== TokenType.RANGE_EXCLUSIVE && op.type !== TokenType.RANGE_INCLUSIVE) {
      throw this.error('MissingRangeOp', op.span);
    }
    this.advance();

    this.expectMore(lbrace);
    const end = this.value();

    let step: ValueNode | null = null;
    let mutation: MathExprNode | null = null;

    while (true) {
      const token = this.peek();
      if (!token) {
        throw this.error('UnclosedRange', lbrace.span);
      }

      if (token.type === TokenType.RBRACE) {
        this.advance();
        return {
          type: 'RangeExpr',
          start,
          end,
          inclusive: op.type === TokenType.RANGE_INCLUSIVE,
          step,
          mutation,
          span: mergeSpans(lbrace.span, token.span),
        };
      }

      if (token.type !== TokenType.COMMA) {
        throw this.error('InvalidRangeArg', token.span);
      }
      this.advance();

      const marker = this.peek();
      if (!marker) {
        throw this.error('UnclosedRange', lbrace.span);
      }

      switch (marker.type) {
        case TokenType.RANGE_STEP:
          if (step) {
            throw this.error('DuplicateRangeArg', marker.span);
          }
          this.advance();
          this.expectArgument(marker, lbrace);
          step = this.value();
          break;

        case TokenType.RANGE_MUTATION:
          if (mutation) {
            throw this.error('DuplicateRangeArg', marker.span);
          }
          this.advance();
          this.expectArgument(marker, lbrace);
          mutation = this.mutation(marker);
          break;

        case TokenType.COMMA:
          throw this.error('UnexpectedComma', marker.span);

        case TokenType.RBRACE:
          throw this.error('UnexpectedComma', token.span);

        default:
          throw this.error('InvalidRangeArg', marker.span);
      }
    }
  }

  private expectMore(lbrace: Token): void {
    if (this.isAtEnd()) {
      throw this.error('UnclosedRange', lbrace.span);
    }
  }

  /**
   * `s:` and `m:` must be followed by an expression
   */
  private expectArgument(marker: Token, lbrace: Token): void {
    this.expectMore(lbrace);
    if (this.check(TokenType.COMMA) || this.check(TokenType.RBRACE)) {
      throw this.error('IncompleteMathExpr', marker.span);
    }
  }

  /**
   * Without an `@`, the running value is the implicit left operand (`m:*2`)
   */
  private mutation(marker: Token): MathExprNode {
    const explicit = this.mutationUsesPlaceholder();
    return this.mathExpr({
      mode: 'open',
      allowPlaceholder: true,
      implicitLeft: explicit ? undefined : { type: 'Placeholder', span: marker.span },
    });
  }

  private mutationUsesPlaceholder(): boolean {
    let depth = 0;

    for (let i = this.current; i < this.tokens.length; i++) {
      const token = this.tokens[i];
      switch (token.type) {
        case TokenType.LPAREN:
          depth++;
          break;
        case TokenType.RPAREN:
          depth--;
          break;
        case TokenType.RANGE_MUTATION_ARG:
          return true;
        case TokenType.COMMA:
        case TokenType.RBRACE:
          if (depth <= 0) return false;
          break;
      }
    }

    return false;
  }
}

/**
 * Collapse a postfix list that is only a signed literal into an Int node
 */
function foldSignedInt(expr: MathExprNode): ValueNode {
  const [first, ...rest] = expr.postfix;
  if (first?.type !== 'Operand' || !rest.every(isUnary)) {
    return expr;
  }

  const negative = rest.filter((item) => item.operator === '-').length % 2 === 1;
  return { type: 'Int', value: negative ? -first.value : first.value, span: expr.span };
}

function isUnary(item: PostfixItem): item is Extract<PostfixItem, { type: 'Unary' }> {
  return item.type === 'Unary';
}

/**
 * Parse the tokens of `input`, throwing a {@link ParserError} on the first structural error
 */
export function parse(input: string, tokens: readonly Token[]): Node[] {
  return new Parser().parse(input, tokens);
}
