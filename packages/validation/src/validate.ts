/**
 * Document validation
 */

import { visit, type DocumentNode } from '@querycheck/language';
import type { Logger } from '@querycheck/logger';
import { GraphQLSchema, TypeInfo } from '@querycheck/schema';
import type { RuleFactory } from './rule.js';
import { specifiedRules } from './rules/index.js';
import { ValidationContext } from './validation-context.js';
import type { ValidationError } from './validation-error.js';
import { ValidationVisitor } from './validation-visitor.js';

export interface ValidateOptions {
  /** Receives debug events for the run and each rule */
  logger?: Logger;
  /** Stop once this many errors have been collected */
  maxErrors?: number;
}

/**
 * Check a document against a schema.
 *
 * Each rule walks the whole document on its own; the errors of all rules
 * are returned in rule order. An empty result means the document is valid.
 *
 * @throws Error when the schema or document is missing
 *
 * @example
 * ```ts
 * const errors = validate(schema, parse('{ dog { name } }'));
 * // errors => []
 * ```
 */
export function validate(
  schema: GraphQLSchema | undefined,
  document: DocumentNode | undefined,
  rules: readonly RuleFactory[] = specifiedRules,
  options: ValidateOptions = {},
): readonly ValidationError[] {
  if (!schema) {
    throw new Error('Must provide schema');
  }
  if (!document) {
    throw new Error('Must provide document');
  }
  if (!(schema instanceof GraphQLSchema)) {
    throw new Error('Schema must be an instance of GraphQLSchema');
  }

  const { logger, maxErrors } = options;
  if (maxErrors !== undefined && (!Number.isInteger(maxErrors) || maxErrors < 1)) {
    throw new Error(`maxErrors must be a positive integer, got ${maxErrors}`);
  }

  const typeInfo = new TypeInfo(schema);
  const context = new ValidationContext(schema, document, typeInfo);
  const errors: ValidationError[] = [];

  logger?.debug('validation_started', {
    rules: rules.length,
    definitions: document.definitions.length,
  });

  for (const createRule of rules) {
    const rule = createRule(context);
    const ruleErrors: ValidationError[] = [];
    visit(document, new ValidationVisitor(rule, context, typeInfo, ruleErrors));

    if (!typeInfo.isAtRoot()) {
      throw new Error(`Type context left unbalanced after ${rule.name}`);
    }

    logger?.debug('validation_rule_completed', { rule: rule.name, errors: ruleErrors.length });
    errors.push(...ruleErrors);

    if (maxErrors !== undefined && errors.length >= maxErrors) {
      logger?.debug('validation_truncated', { max_errors: maxErrors });
      errors.length = maxErrors;
      break;
    }
  }

  logger?.debug('validation_completed', { errors: errors.length });
  return errors;
}
