export * from './ast.js';
export { parse, parseType, parseValue, Parser, type ParseOptions } from './parser.js';
export { ParserError } from './parser-error.js';
