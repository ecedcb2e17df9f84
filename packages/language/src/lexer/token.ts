import { getTokenKindDesc, type TokenKind } from './token-kinds.js';

/**
 * A token produced by the lexer
 *
 * `start` and `end` are character offsets into the source body; `end` is exclusive.
 */
export interface Token {
  readonly kind: TokenKind;
  readonly start: number;
  readonly end: number;
  /** Decoded literal for names, variables, numbers and strings */
  readonly value?: string;
}

export function createToken(kind: TokenKind, start: number, end: number, value?: string): Token {
  return Object.freeze(value === undefined ? { kind, start, end } : { kind, start, end, value });
}

/**
 * Describe a token for error messages, e.g. `Name "dog"`
 */
export function getTokenDesc(token: Token): string {
  return token.value ? `${getTokenKindDesc(token.kind)} "${token.value}"` : getTokenKindDesc(token.kind);
}
