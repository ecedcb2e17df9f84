import type { Source } from '../source.js';
import { LexerError } from './lexer-error.js';
import { TokenKind } from './token-kinds.js';
import { createToken, type Token } from './token.js';

/**
 * Sequential cursor over a source
 *
 * Scanning itself is done by `readToken`, which holds no state; the lexer only
 * remembers where the previous token ended so callers can pull tokens one at a
 * time, or rewind by passing an explicit position.
 */
export class Lexer {
  readonly source: Source;
  private prevPosition: number = 0;

  constructor(source: Source) {
    this.source = source;
  }

  /**
   * Read the next token, resuming after the previous one unless `resetPosition`
   * is given.
   */
  nextToken(resetPosition?: number): Token {
    const token = readToken(this.source, resetPosition ?? this.prevPosition);
    this.prevPosition = token.end;
    return token;
  }
}

const PUNCTUATORS: ReadonlyMap<number, TokenKind> = new Map([
  [0x21, TokenKind.BANG], // !
  [0x24, TokenKind.DOLLAR], // $
  [0x28, TokenKind.PAREN_L], // (
  [0x29, TokenKind.PAREN_R], // )
  [0x3a, TokenKind.COLON], // :
  [0x3d, TokenKind.EQUALS], // =
  [0x40, TokenKind.AT], // @
  [0x5b, TokenKind.BRACKET_L], // [
  [0x5d, TokenKind.BRACKET_R], // ]
  [0x7b, TokenKind.BRACE_L], // {
  [0x7c, TokenKind.PIPE], // |
  [0x7d, TokenKind.BRACE_R], // }
]);

const ESCAPED_CHARACTERS: ReadonlyMap<number, string> = new Map([
  [0x22, '"'],
  [0x2f, '/'],
  [0x5c, '\\'],
  [0x62, '\b'],
  [0x66, '\f'],
  [0x6e, '\n'],
  [0x72, '\r'],
  [0x74, '\t'],
]);

const DOT = 0x2e;
const MINUS = 0x2d;
const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const HASH = 0x23;
const ZERO = 0x30;
const LOWER_E = 0x65;
const LOWER_U = 0x75;

/** -1 past the end of the body */
function charCodeAt(body: string, position: number): number {
  return position < body.length ? body.charCodeAt(position) : -1;
}

function isDigit(code: number): boolean {
  return code >= 0x30 && code <= 0x39;
}

function isNameStart(code: number): boolean {
  return (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a) || code === 0x5f;
}

function isNameContinue(code: number): boolean {
  return isNameStart(code) || isDigit(code);
}

function isLineTerminator(code: number): boolean {
  return code === 0x0a || code === 0x0d || code === 0x2028 || code === 0x2029;
}

function printCharCode(code: number): string {
  return code < 0 ? '<EOF>' : JSON.stringify(String.fromCodePoint(code));
}

/**
 * Read the token that starts at or after `fromPosition`.
 *
 * Whitespace and comments are skipped first; the returned token never starts
 * before the first significant character.
 */
export function readToken(source: Source, fromPosition: number): Token {
  const body = source.body;
  const position = positionAfterWhitespace(body, fromPosition);

  if (position >= body.length) {
    return createToken(TokenKind.EOF, position, position);
  }

  const code = body.charCodeAt(position);

  const punctuator = PUNCTUATORS.get(code);
  if (punctuator !== undefined) {
    return createToken(punctuator, position, position + 1);
  }

  if (code === DOT) {
    return readSpread(source, position);
  }

  if (isNameStart(code)) {
    return readName(source, position);
  }

  if (code === MINUS || isDigit(code)) {
    return readNumber(source, position);
  }

  if (code === QUOTE) {
    return readString(source, position);
  }

  // Astral characters are rendered whole, not as a lone surrogate
  const codePoint = body.codePointAt(position) ?? code;
  throw new LexerError(source, position, `Unexpected character ${printCharCode(codePoint)}`);
}

/**
 * Offset of the first character at or after `start` that is neither
 * whitespace nor part of a comment.
 */
function positionAfterWhitespace(body: string, start: number): number {
  let position = start;

  while (position < body.length) {
    const code = body.charCodeAt(position);

    if (
      code === 0x20 || // space
      code === 0x2c || // comma
      code === 0xa0 ||
      code === 0x2028 ||
      code === 0x2029 ||
      (code > 0x08 && code < 0x0e) // tab, newlines, vertical tab, form feed
    ) {
      position++;
    } else if (code === HASH) {
      position++;
      while (position < body.length && !isLineTerminator(body.charCodeAt(position))) {
        position++;
      }
    } else {
      break;
    }
  }

  return position;
}

/**
 * Exactly three dots. A shorter run fails on its last dot.
 */
function readSpread(source: Source, start: number): Token {
  const body = source.body;
  let position = start;
  while (position - start < 3 && charCodeAt(body, position) === DOT) {
    position++;
  }

  if (position - start === 3) {
    return createToken(TokenKind.SPREAD, start, position);
  }

  throw new LexerError(source, position - 1, `Unexpected character ${printCharCode(DOT)}`);
}

/**
 * [_A-Za-z][_0-9A-Za-z]*
 */
function readName(source: Source, start: number): Token {
  const body = source.body;
  let end = start + 1;
  while (end < body.length && isNameContinue(body.charCodeAt(end))) {
    end++;
  }
  return createToken(TokenKind.NAME, start, end, body.slice(start, end));
}

/**
 * Int:   -?(0|[1-9][0-9]*)
 * Float: -?(0|[1-9][0-9]*)(\.[0-9]+)?(e-?[0-9]+)?  with a fraction or an exponent
 */
function readNumber(source: Source, start: number): Token {
  const body = source.body;
  let position = start;
  let code = charCodeAt(body, position);
  let isFloat = false;

  if (code === MINUS) {
    code = charCodeAt(body, ++position);
  }

  if (code === ZERO) {
    code = charCodeAt(body, ++position);
    if (isDigit(code)) {
      throw new LexerError(
        source,
        position,
        `Invalid number, unexpected digit after 0: ${printCharCode(code)}`,
      );
    }
  } else {
    position = readDigits(source, position);
    code = charCodeAt(body, position);
  }

  if (code === DOT) {
    isFloat = true;
    position = readDigits(source, position + 1);
    code = charCodeAt(body, position);
  }

  if (code === LOWER_E) {
    isFloat = true;
    code = charCodeAt(body, ++position);
    if (code === MINUS) {
      ++position;
    }
    position = readDigits(source, position);
  }

  const kind = isFloat ? TokenKind.FLOAT : TokenKind.INT;
  return createToken(kind, start, position, body.slice(start, position));
}

/**
 * One or more digits starting at `start`; returns the offset after the last.
 */
function readDigits(source: Source, start: number): number {
  const body = source.body;
  const code = charCodeAt(body, start);
  if (!isDigit(code)) {
    throw new LexerError(
      source,
      start,
      `Invalid number, expected digit but got: ${printCharCode(code)}`,
    );
  }

  let position = start + 1;
  while (isDigit(charCodeAt(body, position))) {
    position++;
  }
  return position;
}

/**
 * "([^"\\\u000A\u000D\u2028\u2029]|(\\(u[0-9a-fA-F]{4}|["\\/bfnrt])))*"
 */
function readString(source: Source, start: number): Token {
  const body = source.body;
  let position = start + 1;
  let chunkStart = position;
  let value = '';

  while (position < body.length) {
    const code = body.charCodeAt(position);

    if (code === QUOTE) {
      value += body.slice(chunkStart, position);
      return createToken(TokenKind.STRING, start, position + 1, value);
    }

    if (isLineTerminator(code)) {
      break;
    }

    if (code === BACKSLASH) {
      value += body.slice(chunkStart, position);
      const escape = charCodeAt(body, position + 1);
      const escaped = ESCAPED_CHARACTERS.get(escape);

      if (escaped !== undefined) {
        value += escaped;
        position += 2;
      } else if (escape === LOWER_U) {
        const charCode = uniCharCode(
          charCodeAt(body, position + 2),
          charCodeAt(body, position + 3),
          charCodeAt(body, position + 4),
          charCodeAt(body, position + 5),
        );
        if (charCode < 0) {
          throw new LexerError(
            source,
            position + 1,
            `Bad character escape sequence: \\u${body.slice(position + 2, hexRunEnd(body, position + 2))}`,
          );
        }
        value += String.fromCharCode(charCode);
        position += 6;
      } else {
        throw new LexerError(
          source,
          position + 1,
          `Bad character escape sequence: \\${body.charAt(position + 1)}`,
        );
      }

      chunkStart = position;
      continue;
    }

    position++;
  }

  throw new LexerError(source, position, 'Unterminated string');
}

/**
 * Four hex digits to the code unit they spell; negative if any is not a hex
 * digit.
 */
function uniCharCode(a: number, b: number, c: number, d: number): number {
  return (charToHex(a) << 12) | (charToHex(b) << 8) | (charToHex(c) << 4) | charToHex(d);
}

/** End of the run of up to four hex digits starting at `start` */
function hexRunEnd(body: string, start: number): number {
  let end = start;
  while (end < start + 4 && charToHex(charCodeAt(body, end)) >= 0) {
    end++;
  }
  return end;
}

function charToHex(code: number): number {
  if (code >= 0x30 && code <= 0x39) return code - 0x30; // 0-9
  if (code >= 0x41 && code <= 0x46) return code - 0x37; // A-F
  if (code >= 0x61 && code <= 0x66) return code - 0x57; // a-f
  return -1;
}
