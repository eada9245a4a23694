export { lex, Lexer } from './lexer.js';
export { LexerError } from './lexer-error.js';
export type { LexerErrorKind } from './lexer-error.js';
export { isOperatorChar, isSignOperator, Operator, TokenType } from './token-types.js';
export { createSpan, formatSpan, mergeSpans, spanText } from './token.js';
export type { IntToken, OperatorToken, PunctuationToken, PunctuationTokenType, Span, Token } from './token.js';
