import { Kind, type ASTNode, type FragmentDefinitionNode, type FragmentSpreadNode } from '@querycheck/language';
import { BaseRule, CONTINUE, report, SKIP, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';
import { getFragmentSpreads } from './ast-helpers.js';

export function cycleErrorMessage(fragmentName: string, spreadNames: readonly string[]): string {
  const via = spreadNames.length > 0 ? ` via ${spreadNames.join(', ')}.` : '.';
  return `Cannot spread fragment "${fragmentName}" within itself${via}`;
}

/**
 * No fragment spreads itself, directly or through other fragments
 */
export class NoFragmentCycles extends BaseRule {
  private readonly visitedFragments = new Set<string>();
  /** Spreads followed from the fragment where the current search began */
  private readonly spreadPath: FragmentSpreadNode[] = [];
  /** Position in `spreadPath` at which each fragment on the path was entered */
  private readonly spreadPathIndexByName = new Map<string, number>();

  enter(node: ASTNode): RuleOutcome {
    if (node.kind === Kind.OPERATION_DEFINITION) {
      return SKIP;
    }
    if (node.kind === Kind.FRAGMENT_DEFINITION) {
      const errors: ValidationError[] = [];
      if (!this.visitedFragments.has(node.name.value)) {
        this.detectCycles(node, errors);
      }
      return errors.length > 0 ? report(errors) : SKIP;
    }
    return CONTINUE;
  }

  private detectCycles(fragment: FragmentDefinitionNode, errors: ValidationError[]): void {
    const fragmentName = fragment.name.value;
    this.visitedFragments.add(fragmentName);

    const spreads = getFragmentSpreads(fragment.selectionSet);
    if (spreads.length === 0) return;

    this.spreadPathIndexByName.set(fragmentName, this.spreadPath.length);

    for (const spread of spreads) {
      const spreadName = spread.name.value;
      const cycleIndex = this.spreadPathIndexByName.get(spreadName);

      if (cycleIndex === undefined) {
        this.spreadPath.push(spread);
        if (!this.visitedFragments.has(spreadName)) {
          const spreadFragment = this.context.getFragment(spreadName);
          if (spreadFragment) this.detectCycles(spreadFragment, errors);
        }
        this.spreadPath.pop();
      } else {
        const cyclePath = this.spreadPath.slice(cycleIndex);
        errors.push(
          new ValidationError(
            cycleErrorMessage(
              spreadName,
              cyclePath.map((s) => s.name.value),
            ),
            [...cyclePath, spread],
          ),
        );
      }
    }

    this.spreadPathIndexByName.delete(fragmentName);
  }
}
