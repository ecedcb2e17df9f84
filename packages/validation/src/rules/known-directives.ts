import { Kind, type ASTNode, type ASTParent, type OperationType } from '@querycheck/language';
import { DirectiveLocation } from '@querycheck/schema';
import { BaseRule, CONTINUE, report, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';
import { listOwner } from './ast-helpers.js';

export function unknownDirectiveMessage(directiveName: string): string {
  return `Unknown directive "${directiveName}".`;
}

export function misplacedDirectiveMessage(directiveName: string, location: string): string {
  return `Directive "${directiveName}" may not be used on ${location}.`;
}

/**
 * Directives are defined by the schema and used where they are allowed
 */
export class KnownDirectives extends BaseRule {
  enter(
    node: ASTNode,
    _key: string | number | undefined,
    _parent: ASTParent | undefined,
    _path: ReadonlyArray<string | number>,
    ancestors: readonly ASTParent[],
  ): RuleOutcome {
    if (node.kind !== Kind.DIRECTIVE) {
      return CONTINUE;
    }

    const directiveName = node.name.value;
    const directive = this.context.schema.getDirective(directiveName);
    if (!directive) {
      return report(new ValidationError(unknownDirectiveMessage(directiveName), node));
    }

    const location = directiveLocation(listOwner(ancestors));
    if (location && !directive.locations.includes(location)) {
      return report(new ValidationError(misplacedDirectiveMessage(directiveName, location), node));
    }
    return CONTINUE;
  }
}

const OPERATION_LOCATIONS: Record<OperationType, DirectiveLocation> = {
  query: DirectiveLocation.QUERY,
  mutation: DirectiveLocation.MUTATION,
  subscription: DirectiveLocation.SUBSCRIPTION,
};

function directiveLocation(appliedTo: ASTNode | undefined): DirectiveLocation | undefined {
  if (!appliedTo) return undefined;
  switch (appliedTo.kind) {
    case Kind.OPERATION_DEFINITION:
      return OPERATION_LOCATIONS[appliedTo.operation];
    case Kind.FIELD:
      return DirectiveLocation.FIELD;
    case Kind.FRAGMENT_SPREAD:
      return DirectiveLocation.FRAGMENT_SPREAD;
    case Kind.INLINE_FRAGMENT:
      return DirectiveLocation.INLINE_FRAGMENT;
    case Kind.FRAGMENT_DEFINITION:
      return DirectiveLocation.FRAGMENT_DEFINITION;
    default:
      return undefined;
  }
}
