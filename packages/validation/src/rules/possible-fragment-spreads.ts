import { Kind, type ASTNode } from '@querycheck/language';
import { doTypesOverlap, isCompositeType, typeFromAST, type GraphQLCompositeType } from '@querycheck/schema';
import { BaseRule, CONTINUE, report, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function typeIncompatibleSpreadMessage(fragmentName: string, parentType: string, fragmentType: string): string {
  return (
    `Fragment "${fragmentName}" cannot be spread here as objects of ` +
    `type "${parentType}" can never be of type "${fragmentType}".`
  );
}

export function typeIncompatibleAnonSpreadMessage(parentType: string, fragmentType: string): string {
  return (
    `Fragment cannot be spread here as objects of ` +
    `type "${parentType}" can never be of type "${fragmentType}".`
  );
}

/**
 * A fragment is only spread where some object could satisfy both its type
 * condition and the enclosing type
 */
export class PossibleFragmentSpreads extends BaseRule {
  enter(node: ASTNode): RuleOutcome {
    if (node.kind === Kind.INLINE_FRAGMENT) {
      const fragmentType = this.context.getType();
      const parentType = this.context.getParentType();
      if (
        isCompositeType(fragmentType) &&
        parentType &&
        !doTypesOverlap(this.context.schema, fragmentType, parentType)
      ) {
        return report(
          new ValidationError(typeIncompatibleAnonSpreadMessage(parentType.name, fragmentType.name), node),
        );
      }
    }

    if (node.kind === Kind.FRAGMENT_SPREAD) {
      const fragmentName = node.name.value;
      const fragmentType = this.fragmentType(fragmentName);
      const parentType = this.context.getParentType();
      if (fragmentType && parentType && !doTypesOverlap(this.context.schema, fragmentType, parentType)) {
        return report(
          new ValidationError(typeIncompatibleSpreadMessage(fragmentName, parentType.name, fragmentType.name), node),
        );
      }
    }

    return CONTINUE;
  }

  private fragmentType(name: string): GraphQLCompositeType | undefined {
    const fragment = this.context.getFragment(name);
    const type = fragment && typeFromAST(this.context.schema, fragment.typeCondition);
    return isCompositeType(type) ? type : undefined;
  }
}
