import { LanguageError } from '../errors.js';

/**
 * Error thrown when a token does not fit the grammar
 */
export class ParserError extends LanguageError {}
