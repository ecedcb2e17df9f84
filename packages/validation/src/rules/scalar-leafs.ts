import { Kind, type ASTNode } from '@querycheck/language';
import { getNamedType, isLeafType } from '@querycheck/schema';
import { BaseRule, CONTINUE, report, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function noSubselectionAllowedMessage(field: string, type: string): string {
  return `Field "${field}" of type ${type} must not have a sub selection.`;
}

export function requiredSubselectionMessage(field: string, type: string): string {
  return `Field "${field}" of type ${type} must have a sub selection.`;
}

/**
 * Leaf fields have no selection set; all other fields have one
 */
export class ScalarLeafs extends BaseRule {
  enter(node: ASTNode): RuleOutcome {
    if (node.kind !== Kind.FIELD) {
      return CONTINUE;
    }

    const type = this.context.getType();
    if (!type) {
      return CONTINUE;
    }

    if (isLeafType(getNamedType(type))) {
      if (node.selectionSet) {
        return report(
          new ValidationError(noSubselectionAllowedMessage(node.name.value, String(type)), node.selectionSet),
        );
      }
    } else if (!node.selectionSet) {
      return report(new ValidationError(requiredSubselectionMessage(node.name.value, String(type)), node));
    }
    return CONTINUE;
  }
}
