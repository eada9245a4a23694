import { mergeSpans, type Span, type Token } from '../lexer/token.js';
import { isSignOperator, TokenType } from '../lexer/token-types.js';
import { MAX_PAREN_DEPTH } from '../limits.js';
import type { BinaryItem, PlaceholderItem, PostfixItem, UnaryItem } from './ast.js';
import { ParserError, type ParserErrorKind } from './parser-error.js';
import { associativityOf, precedenceOf } from './precedence.js';

/**
 * How the end of an expression is found
 *
 * - `group`: the expression is exactly one parenthesized group and ends at the
 *   `)` that closes its first `(`
 * - `open`: the expression ends at the first `,`, `}`, `..` or `..=` outside
 *   any parentheses, or at the end of input
 * - `item`: a top-level item; ends at the first `,` outside any parentheses,
 *   where another item starts in place of an operator, or at the end of input
 */
export type ExpressionMode = 'group' | 'open' | 'item';

export interface ReduceOptions {
  mode: ExpressionMode;
  /** Whether `@` may appear as an operand */
  allowPlaceholder?: boolean;
  /** Operand already on the output stack before the first token (implicit mutation operand) */
  implicitLeft?: PlaceholderItem;
}

export interface PostfixResult {
  postfix: PostfixItem[];
  /** Index of the first token after the expression */
  next: number;
  span: Span;
}

interface LParenEntry {
  type: 'LParen';
  span: Span;
}

type StackEntry = UnaryItem | BinaryItem | LParenEntry;

/** What was consumed last while an operand is expected */
type OperandContext = 'start' | 'lparen' | 'unary' | 'binary';

const OPEN_TERMINATORS: ReadonlySet<string> = new Set([
  TokenType.COMMA,
  TokenType.RBRACE,
  TokenType.RANGE_EXCLUSIVE,
  TokenType.RANGE_INCLUSIVE,
]);

const ITEM_TERMINATORS: ReadonlySet<string> = new Set([
  TokenType.COMMA,
  TokenType.INT,
  TokenType.LPAREN,
  TokenType.LBRACE,
]);

/**
 * First parenthesis without a partner in `tokens[start..]`, or null
 *
 * An excess `)` is reported as soon as it is seen; otherwise the outermost
 * `(` still open when the scan ends.
 */
export function findUnmatchedParen(tokens: readonly Token[], start: number = 0): Token | null {
  const open: Token[] = [];

  for (let i = start; i < tokens.length; i++) {
    const token = tokens[i];
    if (token.type === TokenType.LPAREN) {
      open.push(token);
    } else if (token.type === TokenType.RPAREN) {
      if (open.pop() === undefined) {
        return token;
      }
    }
  }

  return open.length > 0 ? open[0] : null;
}

/**
 * Reduce the arithmetic expression starting at `tokens[start]` to postfix order
 *
 * Shunting-yard over an operator stack and an output stack. Nesting is
 * tracked with a depth counter rather than recursion, capped at
 * {@link MAX_PAREN_DEPTH}.
 */
export function reduceToPostfix(
  input: string,
  tokens: readonly Token[],
  start: number,
  options: ReduceOptions,
): PostfixResult {
  const error = (kind: ParserErrorKind, span: Span): ParserError => new ParserError(kind, input, span);

  const unmatched = findUnmatchedParen(tokens, start);
  if (unmatched) {
    throw error('UnmatchedParen', unmatched.span);
  }

  const output: PostfixItem[] = [];
  const operators: StackEntry[] = [];
  let index = start;
  let depth = 0;
  let expectOperand = true;
  let context: OperandContext = 'start';
  let previous: Token | null = null;

  if (options.implicitLeft) {
    output.push(options.implicitLeft);
    expectOperand = false;
  }

  const operandError = (token: Token | undefined): ParserError => {
    switch (context) {
      case 'unary':
        // A sign run must end in a number
        if (!token) return error('IncompleteInt', spanOf(previous));
        return error('InvalidInt', token.span);
      case 'binary':
        if (!token || token.type === TokenType.RPAREN || (depth === 0 && OPEN_TERMINATORS.has(token.type))) {
          return error('IncompleteMathExpr', spanOf(previous));
        }
        return error('InvalidMathExpr', token.span);
      default:
        if (!token) {
          throw new Error('Expression reduction started past the end of input');
        }
        return error('InvalidMathExpr', token.span);
    }
  };

  while (true) {
    const token: Token | undefined = tokens[index];

    if (expectOperand) {
      if (!token) {
        throw operandError(token);
      }

      switch (token.type) {
        case TokenType.INT:
          output.push({ type: 'Operand', value: token.value, span: token.span });
          expectOperand = false;
          break;

        case TokenType.RANGE_MUTATION_ARG:
          if (!options.allowPlaceholder) {
            throw error('InvalidMathExpr', token.span);
          }
          output.push({ type: 'Placeholder', span: token.span });
          expectOperand = false;
          break;

        case TokenType.OPERATOR:
          if (!isSignOperator(token.operator)) {
            throw error('UnexpectedMathOp', token.span);
          }
          // Prefix operators never pop: nothing to their left is complete yet
          operators.push({ type: 'Unary', operator: token.operator, span: token.span });
          context = 'unary';
          break;

        case TokenType.LPAREN: {
          depth++;
          if (depth > MAX_PAREN_DEPTH) {
            throw error('TooManyParen', token.span);
          }
          const closing = tokens[index + 1];
          if (closing?.type === TokenType.RPAREN) {
            throw error('EmptyParen', mergeSpans(token.span, closing.span));
          }
          operators.push({ type: 'LParen', span: token.span });
          context = 'lparen';
          break;
        }

        default:
          throw operandError(token);
      }

      previous = token;
      index++;
      continue;
    }

    if (!token) {
      break;
    }

    if (token.type === TokenType.OPERATOR) {
      const incoming: BinaryItem = { type: 'Binary', operator: token.operator, span: token.span };

      while (operators.length > 0) {
        const top = operators[operators.length - 1];
        if (top.type === 'LParen') break;

        const higher = precedenceOf(top) > precedenceOf(incoming);
        const equalLeft =
          precedenceOf(top) === precedenceOf(incoming) && associativityOf(incoming) === 'left';
        if (!higher && !equalLeft) break;

        output.push(top);
        operators.pop();
      }

      operators.push(incoming);
      expectOperand = true;
      context = 'binary';
      previous = token;
      index++;
      continue;
    }

    if (token.type === TokenType.RPAREN) {
      if (depth === 0) {
        throw error('UnmatchedParen', token.span);
      }

      let entry = operators.pop();
      while (entry && entry.type !== 'LParen') {
        output.push(entry);
        entry = operators.pop();
      }

      depth--;
      previous = token;
      index++;

      if (options.mode === 'group' && depth === 0) {
        break;
      }
      continue;
    }

    if (options.mode === 'open' && depth === 0 && OPEN_TERMINATORS.has(token.type)) {
      break;
    }
    if (options.mode === 'item' && depth === 0 && ITEM_TERMINATORS.has(token.type)) {
      break;
    }

    throw error('InvalidMathOp', token.span);
  }

  while (operators.length > 0) {
    const entry = operators.pop();
    if (!entry || entry.type === 'LParen') {
      throw new Error('Unbalanced parenthesis survived the pre-scan');
    }
    output.push(entry);
  }

  if (index === start) {
    throw new Error('Expression reduction consumed no tokens');
  }

  return {
    postfix: output,
    next: index,
    span: mergeSpans(tokens[start].span, tokens[index - 1].span),
  };
}

function spanOf(item: { span: Span } | null): Span {
  if (!item) {
    throw new Error('Expected a consumed token before the error position');
  }
  return item.span;
}
