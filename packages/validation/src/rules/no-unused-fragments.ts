import { Kind, type ASTNode, type FragmentDefinitionNode, type OperationDefinitionNode } from '@querycheck/language';
import { BaseRule, CONTINUE, report, SKIP, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';
import { getFragmentSpreads } from './ast-helpers.js';

export function unusedFragMessage(fragmentName: string): string {
  return `Fragment "${fragmentName}" is never used.`;
}

/**
 * Every fragment is reachable from some operation
 */
export class NoUnusedFragments extends BaseRule {
  private readonly operationDefs: OperationDefinitionNode[] = [];
  private readonly fragmentDefs: FragmentDefinitionNode[] = [];

  enter(node: ASTNode): RuleOutcome {
    switch (node.kind) {
      case Kind.OPERATION_DEFINITION:
        this.operationDefs.push(node);
        return SKIP;
      case Kind.FRAGMENT_DEFINITION:
        this.fragmentDefs.push(node);
        return SKIP;
      default:
        return CONTINUE;
    }
  }

  leave(node: ASTNode): RuleOutcome {
    if (node.kind !== Kind.DOCUMENT) {
      return CONTINUE;
    }

    const used = new Set<string>();
    const pending = this.operationDefs.flatMap((operation) => getFragmentSpreads(operation.selectionSet));
    let spread = pending.pop();
    while (spread) {
      const fragmentName = spread.name.value;
      if (!used.has(fragmentName)) {
        used.add(fragmentName);
        const fragment = this.context.getFragment(fragmentName);
        if (fragment) pending.push(...getFragmentSpreads(fragment.selectionSet));
      }
      spread = pending.pop();
    }

    const errors = this.fragmentDefs
      .filter((fragment) => !used.has(fragment.name.value))
      .map((fragment) => new ValidationError(unusedFragMessage(fragment.name.value), fragment));
    return errors.length > 0 ? report(errors) : CONTINUE;
  }
}
