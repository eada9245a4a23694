import { SequenceError } from '../errors.js';
import { spanText, type Span } from './token.js';

export type LexerErrorKind =
  | 'InvalidToken'
  | 'MissingColon'
  | 'InvalidRange'
  | 'UnexpectedEqual'
  | 'MalformedNumber'
  | 'NumberTooLarge'
  | 'MisplacedRngSyntax';

const MESSAGES: Record<LexerErrorKind, (text: string) => string> = {
  InvalidToken: (text) => `Invalid token '${text}'`,
  MissingColon: (text) => `Expected a trailing ':' after '${text}'`,
  InvalidRange: () => 'Invalid range syntax',
  UnexpectedEqual: () => "Unexpected '='",
  MalformedNumber: (text) => `Malformed number '${text}'`,
  NumberTooLarge: () => 'Number does not fit in a 64-bit signed integer',
  MisplacedRngSyntax: (text) => `Character '${text}' can only be used when defining number ranges`,
};

/**
 * Error thrown during lexical analysis
 */
export class LexerError extends SequenceError {
  readonly kind: LexerErrorKind;

  constructor(kind: LexerErrorKind, input: string, span: Span) {
    super(MESSAGES[kind](spanText(input, span)), input, span);
    this.kind = kind;
  }
}
