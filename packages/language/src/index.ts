/**
 * @querycheck/language
 *
 * Lexing, parsing and traversal of executable query documents.
 */

export { LanguageError } from './errors.js';
export {
  createToken,
  getTokenDesc,
  getTokenKindDesc,
  Lexer,
  LexerError,
  readToken,
  TokenKind,
  type Token,
} from './lexer/index.js';
export * from './parser/index.js';
export { print } from './printer.js';
export { getLocation, Source, type SourceLocation } from './source.js';
export {
  BREAK,
  childEntries,
  visit,
  type ASTParent,
  type VisitFn,
  type Visitor,
  type VisitResult,
} from './visitor.js';
