import {
  Kind,
  visit,
  type ASTNode,
  type ASTParent,
  type FragmentSpreadNode,
  type SelectionSetNode,
} from '@querycheck/language';

export function isNode(value: ASTParent | undefined): value is ASTNode {
  return value !== undefined && !Array.isArray(value);
}

/**
 * The node owning the list a node sits in, e.g. the field of a directive
 */
export function listOwner(ancestors: readonly ASTParent[]): ASTNode | undefined {
  const owner = ancestors.at(-1);
  return isNode(owner) ? owner : undefined;
}

/** Spreads anywhere under a selection set, fragments not followed */
export function getFragmentSpreads(selectionSet: SelectionSetNode): FragmentSpreadNode[] {
  const spreads: FragmentSpreadNode[] = [];
  visit(selectionSet, {
    enter(node) {
      if (node.kind === Kind.FRAGMENT_SPREAD) spreads.push(node);
    },
  });
  return spreads;
}
