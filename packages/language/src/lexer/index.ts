export { Lexer, readToken } from './lexer.js';
export { LexerError } from './lexer-error.js';
export { getTokenKindDesc, TokenKind } from './token-kinds.js';
export { createToken, getTokenDesc, type Token } from './token.js';
