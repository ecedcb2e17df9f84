import { Kind, type ASTNode } from '@querycheck/language';
import { BaseRule, CONTINUE, report, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function undefinedFieldMessage(fieldName: string, type: string): string {
  return `Cannot query field "${fieldName}" on ${type}.`;
}

/**
 * Selected fields exist on the type they are selected from
 */
export class FieldsOnCorrectType extends BaseRule {
  enter(node: ASTNode): RuleOutcome {
    if (node.kind === Kind.FIELD) {
      const parentType = this.context.getParentType();
      if (parentType && !this.context.getFieldDef()) {
        return report(new ValidationError(undefinedFieldMessage(node.name.value, parentType.name), node));
      }
    }
    return CONTINUE;
  }
}
