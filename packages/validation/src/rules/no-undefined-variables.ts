import { Kind, type ASTNode, type ASTParent, type OperationDefinitionNode } from '@querycheck/language';
import { BaseRule, CONTINUE, report, SKIP, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';
import { isNode } from './ast-helpers.js';

export function undefinedVarMessage(variableName: string): string {
  return `Variable "$${variableName}" is not defined.`;
}

export function undefinedVarByOpMessage(variableName: string, operationName: string): string {
  return `Variable "$${variableName}" is not defined by operation "${operationName}".`;
}

/**
 * Every variable used by an operation, including inside the fragments it
 * spreads, is defined by that operation
 */
export class NoUndefinedVariables extends BaseRule {
  readonly visitsSpreadFragments = true;
  private operation?: OperationDefinitionNode;
  private visitedFragmentNames = new Set<string>();
  private definedVariableNames = new Set<string>();

  enter(
    node: ASTNode,
    _key: string | number | undefined,
    parent: ASTParent | undefined,
    _path: ReadonlyArray<string | number>,
    ancestors: readonly ASTParent[],
  ): RuleOutcome {
    switch (node.kind) {
      case Kind.OPERATION_DEFINITION:
        this.operation = node;
        this.visitedFragmentNames = new Set();
        this.definedVariableNames = new Set();
        return CONTINUE;
      case Kind.VARIABLE_DEFINITION:
        this.definedVariableNames.add(node.variable.name.value);
        return CONTINUE;
      case Kind.VARIABLE: {
        const variableName = node.name.value;
        if (this.definedVariableNames.has(variableName)) {
          return CONTINUE;
        }
        const withinFragment = [...ancestors, parent].some(
          (ancestor) => isNode(ancestor) && ancestor.kind === Kind.FRAGMENT_DEFINITION,
        );
        const operation = this.operation;
        if (withinFragment && operation?.name) {
          return report(
            new ValidationError(undefinedVarByOpMessage(variableName, operation.name.value), [node, operation]),
          );
        }
        return report(new ValidationError(undefinedVarMessage(variableName), node));
      }
      case Kind.FRAGMENT_SPREAD: {
        const fragmentName = node.name.value;
        if (this.visitedFragmentNames.has(fragmentName)) {
          return SKIP;
        }
        this.visitedFragmentNames.add(fragmentName);
        return CONTINUE;
      }
      default:
        return CONTINUE;
    }
  }
}
