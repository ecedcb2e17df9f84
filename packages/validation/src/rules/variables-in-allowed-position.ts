import { Kind, type ASTNode, type VariableDefinitionNode } from '@querycheck/language';
import {
  GraphQLNonNull,
  isTypeSubTypeOf,
  typeFromAST,
  type GraphQLType,
} from '@querycheck/schema';
import { BaseRule, CONTINUE, report, SKIP, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function badVarPosMessage(variableName: string, varType: string, expectedType: string): string {
  return `Variable "$${variableName}" of type "${varType}" used in position expecting type "${expectedType}".`;
}

/**
 * Variables are only used where a value of their type is accepted
 */
export class VariablesInAllowedPosition extends BaseRule {
  readonly visitsSpreadFragments = true;
  private varDefs = new Map<string, VariableDefinitionNode>();
  private visitedFragmentNames = new Set<string>();

  enter(node: ASTNode): RuleOutcome {
    switch (node.kind) {
      case Kind.OPERATION_DEFINITION:
        this.varDefs = new Map();
        this.visitedFragmentNames = new Set();
        return CONTINUE;
      case Kind.VARIABLE_DEFINITION:
        this.varDefs.set(node.variable.name.value, node);
        return SKIP;
      case Kind.VARIABLE: {
        const variableName = node.name.value;
        const varDef = this.varDefs.get(variableName);
        const varType = varDef && typeFromAST(this.context.schema, varDef.type);
        const inputType = this.context.getInputType();
        if (
          varDef &&
          varType &&
          inputType &&
          !isTypeSubTypeOf(this.context.schema, effectiveType(varType, varDef), inputType)
        ) {
          return report(
            new ValidationError(badVarPosMessage(variableName, String(varType), String(inputType)), node),
          );
        }
        return CONTINUE;
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

/** A variable with a default value is never null */
function effectiveType(varType: GraphQLType, varDef: VariableDefinitionNode): GraphQLType {
  return !varDef.defaultValue || varType instanceof GraphQLNonNull ? varType : new GraphQLNonNull(varType);
}
