import { Kind, type ArgumentNode, type ASTNode } from '@querycheck/language';
import { GraphQLNonNull, type GraphQLArgument } from '@querycheck/schema';
import { BaseRule, CONTINUE, report, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

export function missingFieldArgMessage(fieldName: string, argName: string, type: string): string {
  return `Field "${fieldName}" argument "${argName}" of type "${type}" is required but not provided.`;
}

export function missingDirectiveArgMessage(directiveName: string, argName: string, type: string): string {
  return `Directive "@${directiveName}" argument "${argName}" of type "${type}" is required but not provided.`;
}

/**
 * Non-null arguments of fields and directives are always passed
 */
export class ProvidedNonNullArguments extends BaseRule {
  leave(node: ASTNode): RuleOutcome {
    if (node.kind === Kind.FIELD) {
      const fieldDef = this.context.getFieldDef();
      if (!fieldDef) return CONTINUE;
      const errors = missingArguments(fieldDef.args, node.arguments).map(
        (argDef) =>
          new ValidationError(missingFieldArgMessage(node.name.value, argDef.name, String(argDef.type)), node),
      );
      return errors.length > 0 ? report(errors) : CONTINUE;
    }

    if (node.kind === Kind.DIRECTIVE) {
      const directive = this.context.getDirective();
      if (!directive) return CONTINUE;
      const errors = missingArguments(directive.args, node.arguments).map(
        (argDef) =>
          new ValidationError(missingDirectiveArgMessage(node.name.value, argDef.name, String(argDef.type)), node),
      );
      return errors.length > 0 ? report(errors) : CONTINUE;
    }

    return CONTINUE;
  }
}

function missingArguments(argDefs: readonly GraphQLArgument[], argNodes: readonly ArgumentNode[]): GraphQLArgument[] {
  const provided = new Set(argNodes.map((arg) => arg.name.value));
  return argDefs.filter((argDef) => argDef.type instanceof GraphQLNonNull && !provided.has(argDef.name));
}
