/**
 * Token kinds for the query lexer
 *
 * The display strings are part of every syntax error message.
 */

export const TokenKind = {
  EOF: 'EOF',
  BANG: '!',
  DOLLAR: '$',
  PAREN_L: '(',
  PAREN_R: ')',
  SPREAD: '...',
  COLON: ':',
  EQUALS: '=',
  AT: '@',
  BRACKET_L: '[',
  BRACKET_R: ']',
  BRACE_L: '{',
  PIPE: '|',
  BRACE_R: '}',
  NAME: 'Name',
  VARIABLE: 'Variable',
  INT: 'Int',
  FLOAT: 'Float',
  STRING: 'String',
} as const;

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind];

export function getTokenKindDesc(kind: TokenKind): string {
  return kind;
}
