import { Kind, type ASTNode, type NameNode } from '@querycheck/language';
import { BaseRule, CONTINUE, report, SKIP, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function duplicateArgMessage(argName: string): string {
  return `There can be only one argument named "${argName}".`;
}

/**
 * No field or directive is passed the same argument twice
 */
export class UniqueArgumentNames extends BaseRule {
  private knownArgNames = new Map<string, NameNode>();

  enter(node: ASTNode): RuleOutcome {
    switch (node.kind) {
      case Kind.FIELD:
      case Kind.DIRECTIVE:
        this.knownArgNames = new Map();
        return CONTINUE;
      case Kind.ARGUMENT: {
        const argName = node.name.value;
        const known = this.knownArgNames.get(argName);
        if (known) {
          return report(new ValidationError(duplicateArgMessage(argName), [known, node.name]));
        }
        this.knownArgNames.set(argName, node.name);
        return SKIP;
      }
      default:
        return CONTINUE;
    }
  }
}
