/**
 * Error types for the query language front end
 *
 * All errors carry the source and the character offset they point at.
 */

import { getLocation, type Source, type SourceLocation } from './source.js';

/**
 * Base class for lexical and syntactic errors
 */
export abstract class LanguageError extends Error {
  /** The source that failed to tokenize or parse */
  readonly source: Source;
  /** 0-based character offset where the error occurred */
  readonly position: number;
  /** Line and column of `position` */
  readonly location: SourceLocation;
  /** The message without the location prefix */
  readonly description: string;

  constructor(source: Source, position: number, description: string) {
    const location = getLocation(source, position);
    super(`Syntax Error ${source.name} (${location.line}:${location.column}) ${description}`);
    this.name = this.constructor.name;
    this.source = source;
    this.position = position;
    this.location = location;
    this.description = description;
  }
}
