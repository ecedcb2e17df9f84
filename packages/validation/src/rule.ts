/**
 * Validation rule contract
 */

import type { ASTNode, ASTParent } from '@querycheck/language';
import type { ValidationContext } from './validation-context.js';
import type { ValidationError } from './validation-error.js';

// ============================================================================
// Outcomes
// ============================================================================

/**
 * What a rule hook asks of the traversal: descend into the node's children,
 * skip them, or skip them and record errors.
 */
export type RuleOutcome =
  | { readonly kind: 'continue' }
  | { readonly kind: 'skip' }
  | { readonly kind: 'report'; readonly errors: readonly ValidationError[] };

export const CONTINUE: RuleOutcome = Object.freeze({ kind: 'continue' });

export const SKIP: RuleOutcome = Object.freeze({ kind: 'skip' });

export function report(errors: ValidationError | readonly ValidationError[]): RuleOutcome {
  return { kind: 'report', errors: isErrorList(errors) ? errors : [errors] };
}

function isErrorList(errors: ValidationError | readonly ValidationError[]): errors is readonly ValidationError[] {
  return Array.isArray(errors);
}

// ============================================================================
// Rules
// ============================================================================

export type RuleHook = (
  node: ASTNode,
  key: string | number | undefined,
  parent: ASTParent | undefined,
  path: ReadonlyArray<string | number>,
  ancestors: readonly ASTParent[],
) => RuleOutcome;

export interface ValidationRule {
  readonly name: string;
  /**
   * When true, fragment definitions are not walked where they are declared;
   * each is walked in place at every spread that reaches it.
   */
  readonly visitsSpreadFragments: boolean;
  enter: RuleHook;
  leave: RuleHook;
}

/** Builds a fresh rule instance for one traversal */
export type RuleFactory = (context: ValidationContext) => ValidationRule;

/**
 * Rule with no-op hooks. Subclasses override what they need.
 */
export abstract class BaseRule implements ValidationRule {
  readonly visitsSpreadFragments: boolean = false;
  protected readonly context: ValidationContext;

  constructor(context: ValidationContext) {
    this.context = context;
  }

  get name(): string {
    return this.constructor.name;
  }

  enter(
    _node: ASTNode,
    _key: string | number | undefined,
    _parent: ASTParent | undefined,
    _path: ReadonlyArray<string | number>,
    _ancestors: readonly ASTParent[],
  ): RuleOutcome {
    return CONTINUE;
  }

  leave(
    _node: ASTNode,
    _key: string | number | undefined,
    _parent: ASTParent | undefined,
    _path: ReadonlyArray<string | number>,
    _ancestors: readonly ASTParent[],
  ): RuleOutcome {
    return CONTINUE;
  }
}

export type RuleClass = new (context: ValidationContext) => ValidationRule;

export function ruleFactory(Rule: RuleClass): RuleFactory {
  return (context) => new Rule(context);
}
