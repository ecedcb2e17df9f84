import { Kind, type ASTNode, type ASTParent } from '@querycheck/language';
import { BaseRule, CONTINUE, report, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';
import { listOwner } from './ast-helpers.js';

export function unknownArgMessage(argName: string, fieldName: string, typeName: string): string {
  return `Unknown argument "${argName}" on field "${fieldName}" of type "${typeName}".`;
}

export function unknownDirectiveArgMessage(argName: string, directiveName: string): string {
  return `Unknown argument "${argName}" on directive "@${directiveName}".`;
}

/**
 * Arguments are defined by the field or directive they are passed to
 */
export class KnownArgumentNames extends BaseRule {
  enter(
    node: ASTNode,
    _key: string | number | undefined,
    _parent: ASTParent | undefined,
    _path: ReadonlyArray<string | number>,
    ancestors: readonly ASTParent[],
  ): RuleOutcome {
    if (node.kind !== Kind.ARGUMENT) {
      return CONTINUE;
    }

    const argName = node.name.value;
    const argumentOf = listOwner(ancestors);

    if (argumentOf?.kind === Kind.FIELD) {
      const fieldDef = this.context.getFieldDef();
      const parentType = this.context.getParentType();
      if (fieldDef && parentType && !fieldDef.args.some((arg) => arg.name === argName)) {
        return report(new ValidationError(unknownArgMessage(argName, fieldDef.name, parentType.name), node));
      }
    } else if (argumentOf?.kind === Kind.DIRECTIVE) {
      const directive = this.context.getDirective();
      if (directive && !directive.args.some((arg) => arg.name === argName)) {
        return report(new ValidationError(unknownDirectiveArgMessage(argName, directive.name), node));
      }
    }
    return CONTINUE;
  }
}
