import { LanguageError } from '../errors.js';

/**
 * Error thrown during lexical analysis
 */
export class LexerError extends LanguageError {}
