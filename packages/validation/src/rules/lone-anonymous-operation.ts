import { Kind, type ASTNode } from '@querycheck/language';
import { BaseRule, CONTINUE, report, SKIP, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function anonOperationNotAloneMessage(): string {
  return 'This anonymous operation must be the only defined operation.';
}

/**
 * An anonymous operation is the only operation in its document
 */
export class LoneAnonymousOperation extends BaseRule {
  private operationCount = 0;

  enter(node: ASTNode): RuleOutcome {
    switch (node.kind) {
      case Kind.DOCUMENT:
        this.operationCount = node.definitions.filter(
          (definition) => definition.kind === Kind.OPERATION_DEFINITION,
        ).length;
        return CONTINUE;
      case Kind.OPERATION_DEFINITION:
        if (!node.name && this.operationCount > 1) {
          return report(new ValidationError(anonOperationNotAloneMessage(), node));
        }
        return SKIP;
      case Kind.FRAGMENT_DEFINITION:
        return SKIP;
      default:
        return CONTINUE;
    }
  }
}
