/**
 * @querycheck/validation
 *
 * Rule-driven validation of query documents against a schema.
 */

export {
  BaseRule,
  CONTINUE,
  report,
  ruleFactory,
  SKIP,
  type RuleClass,
  type RuleFactory,
  type RuleHook,
  type RuleOutcome,
  type ValidationRule,
} from './rule.js';
export * from './rules/index.js';
export { validate, type ValidateOptions } from './validate.js';
export { ValidationContext } from './validation-context.js';
export { ValidationError } from './validation-error.js';
export { ValidationVisitor } from './validation-visitor.js';
