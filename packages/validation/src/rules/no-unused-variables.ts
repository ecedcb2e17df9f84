import { Kind, type ASTNode, type VariableDefinitionNode } from '@querycheck/language';
import { BaseRule, CONTINUE, report, SKIP, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function unusedVariableMessage(variableName: string): string {
  return `Variable "$${variableName}" is never used.`;
}

/**
 * Every variable an operation defines is used by it or the fragments it
 * spreads
 */
export class NoUnusedVariables extends BaseRule {
  readonly visitsSpreadFragments = true;
  private visitedFragmentNames = new Set<string>();
  private variableDefs: VariableDefinitionNode[] = [];
  private usedVariableNames = new Set<string>();

  enter(node: ASTNode): RuleOutcome {
    switch (node.kind) {
      case Kind.OPERATION_DEFINITION:
        this.visitedFragmentNames = new Set();
        this.variableDefs = [];
        this.usedVariableNames = new Set();
        return CONTINUE;
      case Kind.VARIABLE_DEFINITION:
        this.variableDefs.push(node);
        return SKIP;
      case Kind.VARIABLE:
        this.usedVariableNames.add(node.name.value);
        return CONTINUE;
      case Kind.FRAGMENT_SPREAD: {
        const fragmentName = node.name.value;
        if (this.visitedFragmentNames.has(fragmentName)) {
          return SKIP;
        }
        this.visitedFragmentNames.add(fragmentName);
        return CONTINUE;
      }
      default:
        return CONTINUE;
    }
  }

  leave(node: ASTNode): RuleOutcome {
    if (node.kind !== Kind.OPERATION_DEFINITION) {
      return CONTINUE;
    }
    const errors = this.variableDefs
      .filter((definition) => !this.usedVariableNames.has(definition.variable.name.value))
      .map((definition) => new ValidationError(unusedVariableMessage(definition.variable.name.value), definition));
    return errors.length > 0 ? report(errors) : CONTINUE;
  }
}
