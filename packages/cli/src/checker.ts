/**
 * Document checking
 *
 * Parses one document and validates it, turning syntax and validation errors
 * alike into diagnostics.
 */

import { LanguageError, parse, Source, type DocumentNode } from '@querycheck/language';
import type { GraphQLSchema } from '@querycheck/schema';
import { specifiedRules, validate, type ValidateOptions } from '@querycheck/validation';

export const DiagnosticCode = {
  SYNTAX_ERROR: 'SYNTAX_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
} as const;

export type DiagnosticCode = (typeof DiagnosticCode)[keyof typeof DiagnosticCode];

export interface Diagnostic {
  line: number;
  column: number;
  code: DiagnosticCode;
  message: string;
}

export interface FileResult {
  path: string;
  diagnostics: Diagnostic[];
}

export function checkDocument(
  body: string,
  name: string,
  schema: GraphQLSchema,
  options: ValidateOptions = {},
): Diagnostic[] {
  let document: DocumentNode;
  try {
    document = parse(new Source(body, name));
  } catch (error) {
    if (error instanceof LanguageError) {
      return [{ ...error.location, code: DiagnosticCode.SYNTAX_ERROR, message: error.description }];
    }
    throw error;
  }

  return validate(schema, document, specifiedRules, options).map((error) => {
    const [location = { line: 1, column: 1 }] = error.locations;
    return {
      line: location.line,
      column: location.column,
      code: DiagnosticCode.VALIDATION_ERROR,
      message: error.message,
    };
  });
}
