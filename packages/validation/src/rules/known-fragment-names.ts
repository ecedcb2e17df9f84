import { Kind, type ASTNode } from '@querycheck/language';
import { BaseRule, CONTINUE, report, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function unknownFragmentMessage(fragmentName: string): string {
  return `Unknown fragment "${fragmentName}".`;
}

/**
 * Every spread names a fragment defined in the document
 */
export class KnownFragmentNames extends BaseRule {
  enter(node: ASTNode): RuleOutcome {
    if (node.kind === Kind.FRAGMENT_SPREAD) {
      const fragmentName = node.name.value;
      if (!this.context.getFragment(fragmentName)) {
        return report(new ValidationError(unknownFragmentMessage(fragmentName), node.name));
      }
    }
    return CONTINUE;
  }
}
