import { SequenceLimitError } from '../errors.js';
import type { Span } from '../lexer/token.js';
import type { Operator } from '../lexer/token-types.js';
import { isI64, type SequenceLimits } from '../limits.js';
import type { MathExprNode, Node, PostfixItem, ValueNode } from '../parser/ast.js';
import { ParserError, type ParserErrorKind } from '../parser/parser-error.js';
import { materializeRange } from '../range/materialize.js';

/**
 * Interpreter for parsed sequence nodes
 *
 * Folds postfix expressions over a bigint stack and expands ranges, in input
 * order, into one flat list of integers.
 */
export class Interpreter {
  private readonly input: string;
  private readonly limits: SequenceLimits;

  constructor(input: string, limits: SequenceLimits) {
    this.input = input;
    this.limits = limits;
  }

  /**
   * Evaluate every node and concatenate the results
   */
  run(nodes: readonly Node[]): bigint[] {
    const output: bigint[] = [];

    const emit = (value: bigint, span: Span): void => {
      if (output.length >= this.limits.maxSequenceLength) {
        throw new SequenceLimitError('SequenceTooLong', this.input, span, this.limits.maxSequenceLength);
      }
      output.push(value);
    };

    for (const node of nodes) {
      switch (node.type) {
        case 'Int':
        case 'MathExpr':
          emit(this.value(node), node.span);
          break;
        case 'RangeExpr':
          materializeRange(node, this, (value) => emit(value, node.span));
          break;
      }
    }

    return output;
  }

  /**
   * Value of an integer or arithmetic node
   */
  value(node: ValueNode): bigint {
    return node.type === 'Int' ? node.value : this.expression(node);
  }

  /**
   * Evaluate a postfix expression; `placeholder` is the running value of a mutation
   */
  expression(node: MathExprNode, placeholder?: bigint): bigint {
    const stack: bigint[] = [];

    for (const item of node.postfix) {
      switch (item.type) {
        case 'Operand':
          stack.push(item.value);
          break;

        case 'Placeholder':
          if (placeholder === undefined) {
            throw new Error('Placeholder evaluated outside a range mutation');
          }
          stack.push(placeholder);
          break;

        case 'Unary': {
          const operand = pop(stack);
          stack.push(item.operator === '-' ? this.checked(-operand, item) : operand);
          break;
        }

        case 'Binary': {
          const right = pop(stack);
          const left = pop(stack);
          stack.push(this.binary(item.operator, left, right, item));
          break;
        }
      }
    }

    if (stack.length !== 1) {
      throw new Error(`Postfix expression left ${stack.length} values on the stack`);
    }
    return stack[0];
  }

  private binary(operator: Operator, left: bigint, right: bigint, item: PostfixItem): bigint {
    switch (operator) {
      case '+':
        return this.checked(left + right, item);
      case '-':
        return this.checked(left - right, item);
      case '*':
        return this.checked(left * right, item);
      case '/':
        if (right === 0n) throw this.fault('DivisionByZero', item.span);
        // bigint division truncates toward zero
        return this.checked(left / right, item);
      case '%':
        if (right === 0n) throw this.fault('DivisionByZero', item.span);
        return left % right;
      case '^': {
        if (right < 0n) throw this.fault('NegativeExponent', item.span);
        const result = power(left, right);
        if (result === null) throw this.fault('IntegerOverflow', item.span);
        return result;
      }
    }
  }

  private checked(value: bigint, item: PostfixItem): bigint {
    if (!isI64(value)) {
      throw this.fault('IntegerOverflow', item.span);
    }
    return value;
  }

  fault(kind: ParserErrorKind, span: Span): ParserError {
    return new ParserError(kind, this.input, span);
  }
}

function pop(stack: bigint[]): bigint {
  const value = stack.pop();
  if (value === undefined) {
    throw new Error('Postfix expression is missing an operand');
  }
  return value;
}

/**
 * `base ^ exponent` for a non-negative exponent, or null when it leaves the i64 range
 */
export function power(base: bigint, exponent: bigint): bigint | null {
  if (exponent === 0n) return 1n;
  if (base === 0n || base === 1n) return base;
  if (base === -1n) return exponent % 2n === 0n ? 1n : -1n;
  // |base| >= 2 overflows past 2^63
  if (exponent > 63n) return null;

  const result = base ** exponent;
  return isI64(result) ? result : null;
}

/**
 * Evaluate parsed nodes into integers, enforcing the sequence length limit
 */
export function evaluateNodes(input: string, nodes: readonly Node[], limits: SequenceLimits): bigint[] {
  return new Interpreter(input, limits).run(nodes);
}
