/**
 * Errors reported by validation rules
 */

import { getLocation, type ASTNode, type SourceLocation } from '@querycheck/language';

/**
 * A rule violation. Returned from `validate()`, never thrown.
 */
export class ValidationError extends Error {
  /** Nodes the error is about, in the order the rule found them */
  readonly nodes: readonly ASTNode[];
  /** 1-based positions of `nodes` that carry a location */
  readonly locations: readonly SourceLocation[];

  constructor(message: string, nodes: ASTNode | readonly ASTNode[] = []) {
    super(message);
    this.name = this.constructor.name;
    this.nodes = isNodeList(nodes) ? nodes : [nodes];
    this.locations = this.nodes.flatMap((node) => (node.loc ? [getLocation(node.loc.source, node.loc.start)] : []));
  }

  toJSON(): { message: string; locations: readonly SourceLocation[] } {
    return { message: this.message, locations: this.locations };
  }
}

function isNodeList(nodes: ASTNode | readonly ASTNode[]): nodes is readonly ASTNode[] {
  return Array.isArray(nodes);
}
