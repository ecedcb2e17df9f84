import { Kind, print, type ASTNode } from '@querycheck/language';
import { isInputType, typeFromAST } from '@querycheck/schema';
import { BaseRule, CONTINUE, report, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function nonInputTypeOnVarMessage(variableName: string, typeName: string): string {
  return `Variable "$${variableName}" cannot be non-input type "${typeName}".`;
}

/**
 * Variables are declared with scalar, enum or input object types
 */
export class VariablesAreInputTypes extends BaseRule {
  enter(node: ASTNode): RuleOutcome {
    if (node.kind === Kind.VARIABLE_DEFINITION) {
      const type = typeFromAST(this.context.schema, node.type);
      // unknown types are reported by KnownTypeNames
      if (type && !isInputType(type)) {
        return report(
          new ValidationError(nonInputTypeOnVarMessage(node.variable.name.value, print(node.type)), node.type),
        );
      }
    }
    return CONTINUE;
  }
}
