import { Kind, type ASTNode, type NameNode } from '@querycheck/language';
import { BaseRule, CONTINUE, report, SKIP, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function duplicateFragmentNameMessage(fragmentName: string): string {
  return `There can only be one fragment named "${fragmentName}".`;
}

/**
 * Every fragment definition has a unique name
 */
export class UniqueFragmentNames extends BaseRule {
  private readonly knownFragmentNames = new Map<string, NameNode>();

  enter(node: ASTNode): RuleOutcome {
    if (node.kind === Kind.OPERATION_DEFINITION) {
      return SKIP;
    }
    if (node.kind === Kind.FRAGMENT_DEFINITION) {
      const name = node.name;
      const known = this.knownFragmentNames.get(name.value);
      if (known) {
        return report(new ValidationError(duplicateFragmentNameMessage(name.value), [known, name]));
      }
      this.knownFragmentNames.set(name.value, name);
      return SKIP;
    }
    return CONTINUE;
  }
}
