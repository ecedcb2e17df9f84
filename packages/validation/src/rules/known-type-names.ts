import { Kind, type ASTNode } from '@querycheck/language';
import { BaseRule, CONTINUE, report, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function unknownTypeMessage(typeName: string): string {
  return `Unknown type "${typeName}".`;
}

/**
 * Variable types and type conditions name types the schema defines
 */
export class KnownTypeNames extends BaseRule {
  enter(node: ASTNode): RuleOutcome {
    if (node.kind === Kind.NAMED_TYPE) {
      const typeName = node.name.value;
      if (!this.context.schema.getType(typeName)) {
        return report(new ValidationError(unknownTypeMessage(typeName), node));
      }
    }
    return CONTINUE;
  }
}
