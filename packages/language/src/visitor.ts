/**
 * Depth-first traversal of query ASTs
 */

import { Kind, type ASTNode } from './parser/ast.js';

/** Returned from a visit function to stop the whole traversal */
export const BREAK: unique symbol = Symbol('BREAK');

/**
 * `false` from `enter` skips the node's children and its `leave`.
 */
export type VisitResult = void | boolean | typeof BREAK;

export type ASTParent = ASTNode | readonly ASTNode[];

export type VisitFn = (
  node: ASTNode,
  key: string | number | undefined,
  parent: ASTParent | undefined,
  path: ReadonlyArray<string | number>,
  ancestors: readonly ASTParent[],
) => VisitResult;

export interface Visitor {
  enter?: VisitFn;
  leave?: VisitFn;
}

type ChildEntry = readonly [key: string, child: ASTParent | undefined];

/**
 * Child slots of a node, in source order
 */
export function childEntries(node: ASTNode): ChildEntry[] {
  switch (node.kind) {
    case Kind.DOCUMENT:
      return [['definitions', node.definitions]];
    case Kind.OPERATION_DEFINITION:
      return [
        ['name', node.name],
        ['variableDefinitions', node.variableDefinitions],
        ['directives', node.directives],
        ['selectionSet', node.selectionSet],
      ];
    case Kind.VARIABLE_DEFINITION:
      return [
        ['variable', node.variable],
        ['type', node.type],
        ['defaultValue', node.defaultValue],
      ];
    case Kind.VARIABLE:
      return [['name', node.name]];
    case Kind.SELECTION_SET:
      return [['selections', node.selections]];
    case Kind.FIELD:
      return [
        ['alias', node.alias],
        ['name', node.name],
        ['arguments', node.arguments],
        ['directives', node.directives],
        ['selectionSet', node.selectionSet],
      ];
    case Kind.ARGUMENT:
      return [
        ['name', node.name],
        ['value', node.value],
      ];
    case Kind.FRAGMENT_SPREAD:
      return [
        ['name', node.name],
        ['directives', node.directives],
      ];
    case Kind.INLINE_FRAGMENT:
      return [
        ['typeCondition', node.typeCondition],
        ['directives', node.directives],
        ['selectionSet', node.selectionSet],
      ];
    case Kind.FRAGMENT_DEFINITION:
      return [
        ['name', node.name],
        ['typeCondition', node.typeCondition],
        ['directives', node.directives],
        ['selectionSet', node.selectionSet],
      ];
    case Kind.LIST:
      return [['values', node.values]];
    case Kind.OBJECT:
      return [['fields', node.fields]];
    case Kind.OBJECT_FIELD:
      return [
        ['name', node.name],
        ['value', node.value],
      ];
    case Kind.DIRECTIVE:
      return [
        ['name', node.name],
        ['arguments', node.arguments],
      ];
    case Kind.NAMED_TYPE:
      return [['name', node.name]];
    case Kind.LIST_TYPE:
    case Kind.NON_NULL_TYPE:
      return [['type', node.type]];
    case Kind.NAME:
    case Kind.INT:
    case Kind.FLOAT:
    case Kind.STRING:
    case Kind.BOOLEAN:
    case Kind.ENUM:
      return [];
  }
}

function isNodeList(value: ASTParent): value is readonly ASTNode[] {
  return Array.isArray(value);
}

/**
 * Walk `root` depth first, calling `enter` before and `leave` after each
 * node's children.
 *
 * `path` holds the keys from `root` to the node; `ancestors` holds every node
 * and list above `parent`. Both are live: copy them to keep them past the call.
 *
 * @example
 * ```ts
 * const names: string[] = [];
 * visit(parse('{ a { b } }'), {
 *   enter(node) {
 *     if (node.kind === Kind.FIELD) names.push(node.name.value);
 *   },
 * });
 * // names => ['a', 'b']
 * ```
 */
export function visit(root: ASTNode, visitor: Visitor): void {
  const path: Array<string | number> = [];
  const ancestors: ASTParent[] = [];

  function walk(
    node: ASTNode,
    key: string | number | undefined,
    parent: ASTParent | undefined,
  ): typeof BREAK | undefined {
    if (key !== undefined) path.push(key);

    const result = visitor.enter?.(node, key, parent, path, ancestors);
    if (result === BREAK) return BREAK;

    if (result !== false) {
      if (parent !== undefined) ancestors.push(parent);

      for (const [childKey, child] of childEntries(node)) {
        if (child === undefined) continue;

        if (isNodeList(child)) {
          path.push(childKey);
          ancestors.push(node);
          for (let index = 0; index < child.length; index++) {
            if (walk(child[index], index, child) === BREAK) return BREAK;
          }
          ancestors.pop();
          path.pop();
        } else if (walk(child, childKey, node) === BREAK) {
          return BREAK;
        }
      }

      if (parent !== undefined) ancestors.pop();

      if (visitor.leave?.(node, key, parent, path, ancestors) === BREAK) return BREAK;
    }

    if (key !== undefined) path.pop();
    return undefined;
  }

  walk(root, undefined, undefined);
}
