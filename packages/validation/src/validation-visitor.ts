/**
 * ValidationVisitor
 *
 * Binds one rule to a traversal. Keeps TypeInfo in step with the walk, turns
 * rule outcomes into traversal control and collects reported errors.
 */

import { Kind, visit, type ASTNode, type ASTParent, type Visitor, type VisitResult } from '@querycheck/language';
import type { TypeInfo } from '@querycheck/schema';
import type { RuleOutcome, ValidationRule } from './rule.js';
import type { ValidationContext } from './validation-context.js';
import type { ValidationError } from './validation-error.js';

export class ValidationVisitor implements Visitor {
  private readonly rule: ValidationRule;
  private readonly context: ValidationContext;
  private readonly typeInfo: TypeInfo;
  private readonly errors: ValidationError[];
  private readonly visitsSpreadFragments: boolean;
  /** Fragments whose inlined walk is in progress */
  private readonly inlining = new Set<string>();

  constructor(rule: ValidationRule, context: ValidationContext, typeInfo: TypeInfo, errors: ValidationError[]) {
    this.rule = rule;
    this.context = context;
    this.typeInfo = typeInfo;
    this.errors = errors;
    this.visitsSpreadFragments = rule.visitsSpreadFragments;
  }

  enter(
    node: ASTNode,
    key: string | number | undefined,
    parent: ASTParent | undefined,
    path: ReadonlyArray<string | number>,
    ancestors: readonly ASTParent[],
  ): VisitResult {
    this.typeInfo.enter(node);

    let descend: boolean;
    if (node.kind === Kind.FRAGMENT_DEFINITION && key !== undefined && this.visitsSpreadFragments) {
      // walked from each spread instead
      descend = false;
    } else {
      descend = this.apply(this.rule.enter(node, key, parent, path, ancestors));
      if (descend && this.visitsSpreadFragments && node.kind === Kind.FRAGMENT_SPREAD) {
        this.inlineFragment(node.name.value);
      }
    }

    if (!descend) {
      // no leave follows a skipped node
      this.typeInfo.leave(node);
      return false;
    }
    return undefined;
  }

  leave(
    node: ASTNode,
    key: string | number | undefined,
    parent: ASTParent | undefined,
    path: ReadonlyArray<string | number>,
    ancestors: readonly ASTParent[],
  ): VisitResult {
    this.apply(this.rule.leave(node, key, parent, path, ancestors));
    this.typeInfo.leave(node);
    return undefined;
  }

  /** Records reported errors; true when the walk should descend */
  private apply(outcome: RuleOutcome): boolean {
    switch (outcome.kind) {
      case 'continue':
        return true;
      case 'skip':
        return false;
      case 'report':
        this.errors.push(...outcome.errors);
        return false;
    }
  }

  private inlineFragment(name: string): void {
    // A spread of a fragment already being inlined would never end
    if (this.inlining.has(name)) return;

    const fragment = this.context.getFragment(name);
    if (!fragment) return;

    this.inlining.add(name);
    visit(fragment, this);
    this.inlining.delete(name);
  }
}
