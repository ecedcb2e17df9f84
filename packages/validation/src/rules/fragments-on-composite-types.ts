import { Kind, print, type ASTNode } from '@querycheck/language';
import { isCompositeType, typeFromAST } from '@querycheck/schema';
import { BaseRule, CONTINUE, report, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function inlineFragmentOnNonCompositeErrorMessage(type: string): string {
  return `Fragment cannot condition on non composite type "${type}".`;
}

export function fragmentOnNonCompositeErrorMessage(fragmentName: string, type: string): string {
  return `Fragment "${fragmentName}" cannot condition on non composite type "${type}".`;
}

/**
 * Fragments condition on objects, interfaces or unions
 */
export class FragmentsOnCompositeTypes extends BaseRule {
  enter(node: ASTNode): RuleOutcome {
    if (node.kind !== Kind.INLINE_FRAGMENT && node.kind !== Kind.FRAGMENT_DEFINITION) {
      return CONTINUE;
    }

    const type = typeFromAST(this.context.schema, node.typeCondition);
    if (!type || isCompositeType(type)) {
      return CONTINUE;
    }

    const typeName = print(node.typeCondition);
    const message =
      node.kind === Kind.INLINE_FRAGMENT
        ? inlineFragmentOnNonCompositeErrorMessage(typeName)
        : fragmentOnNonCompositeErrorMessage(node.name.value, typeName);
    return report(new ValidationError(message, node.typeCondition));
  }
}
