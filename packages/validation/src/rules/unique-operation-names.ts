import { Kind, type ASTNode, type NameNode } from '@querycheck/language';
import { BaseRule, CONTINUE, report, SKIP, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function duplicateOperationNameMessage(operationName: string): string {
  return `There can only be one operation named "${operationName}".`;
}

/**
 * Every named operation has a unique name
 */
export class UniqueOperationNames extends BaseRule {
  private readonly knownOperationNames = new Map<string, NameNode>();

  enter(node: ASTNode): RuleOutcome {
    if (node.kind === Kind.OPERATION_DEFINITION) {
      const name = node.name;
      if (name) {
        const known = this.knownOperationNames.get(name.value);
        if (known) {
          return report(new ValidationError(duplicateOperationNameMessage(name.value), [known, name]));
        }
        this.knownOperationNames.set(name.value, name);
      }
      return SKIP;
    }
    if (node.kind === Kind.FRAGMENT_DEFINITION) {
      return SKIP;
    }
    return CONTINUE;
  }
}
