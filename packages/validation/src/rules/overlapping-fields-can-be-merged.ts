import {
  Kind,
  print,
  type ArgumentNode,
  type ASTNode,
  type DirectiveNode,
  type FieldNode,
  type SelectionSetNode,
} from '@querycheck/language';
import {
  getNamedType,
  GraphQLInterfaceType,
  GraphQLObjectType,
  typeFromAST,
  type GraphQLField,
  type GraphQLType,
} from '@querycheck/schema';
import { BaseRule, CONTINUE, report, type RuleOutcome } from '../rule.js';
import { ValidationError } from '../validation-error.js';

/** Why two fields sharing a response name conflict, possibly through subfields */
export type ConflictReason = readonly [responseName: string, reason: string | readonly ConflictReason[]];

type Conflict = readonly [reason: ConflictReason, fields: readonly FieldNode[]];

interface FieldAndDef {
  node: FieldNode;
  def?: GraphQLField;
}

type FieldMap = Map<string, FieldAndDef[]>;

export function fieldsConflictMessage(responseName: string, reason: ConflictReason[1]): string {
  return `Fields "${responseName}" conflict because ${reasonMessage(reason)}.`;
}

function reasonMessage(reason: ConflictReason[1]): string {
  if (typeof reason === 'string') {
    return reason;
  }
  return reason
    .map(([responseName, subreason]) => `subfields "${responseName}" conflict because ${reasonMessage(subreason)}`)
    .join(' and ');
}

/**
 * Fields selected under the same response name, through aliases or
 * fragments, can be merged: same field, same arguments and directives,
 * compatible types and mergeable subselections.
 */
export class OverlappingFieldsCanBeMerged extends BaseRule {
  private readonly comparedPairs = new PairSet();

  // Checked on leave so the deepest conflicts are reported first
  leave(node: ASTNode): RuleOutcome {
    if (node.kind !== Kind.SELECTION_SET) {
      return CONTINUE;
    }

    const fieldMap = this.collectFields(this.context.getParentType(), node, new Set(), new Map());
    const conflicts = this.findConflicts(fieldMap);
    if (conflicts.length === 0) {
      return CONTINUE;
    }
    return report(
      conflicts.map(
        ([[responseName, reason], fields]) => new ValidationError(fieldsConflictMessage(responseName, reason), fields),
      ),
    );
  }

  private findConflicts(fieldMap: FieldMap): Conflict[] {
    const conflicts: Conflict[] = [];
    for (const [responseName, fields] of fieldMap) {
      for (let i = 0; i < fields.length; i++) {
        for (let j = i + 1; j < fields.length; j++) {
          const conflict = this.findConflict(responseName, fields[i], fields[j]);
          if (conflict) conflicts.push(conflict);
        }
      }
    }
    return conflicts;
  }

  private findConflict(responseName: string, field1: FieldAndDef, field2: FieldAndDef): Conflict | undefined {
    const { node: node1, def: def1 } = field1;
    const { node: node2, def: def2 } = field2;
    if (node1 === node2 || this.comparedPairs.has(node1, node2)) {
      return undefined;
    }
    this.comparedPairs.add(node1, node2);

    const name1 = node1.name.value;
    const name2 = node2.name.value;
    if (name1 !== name2) {
      return [[responseName, `${name1} and ${name2} are different fields`], [node1, node2]];
    }

    const type1 = def1?.type;
    const type2 = def2?.type;
    if (type1 && type2 && !sameType(type1, type2)) {
      return [[responseName, `they return differing types ${String(type1)} and ${String(type2)}`], [node1, node2]];
    }

    if (!sameArguments(node1.arguments, node2.arguments)) {
      return [[responseName, 'they have differing arguments'], [node1, node2]];
    }

    if (!sameDirectives(node1.directives, node2.directives)) {
      return [[responseName, 'they have differing directives'], [node1, node2]];
    }

    if (node1.selectionSet && node2.selectionSet) {
      const visitedFragments = new Set<string>();
      const subfieldMap: FieldMap = new Map();
      this.collectFields(type1 && getNamedType(type1), node1.selectionSet, visitedFragments, subfieldMap);
      this.collectFields(type2 && getNamedType(type2), node2.selectionSet, visitedFragments, subfieldMap);

      const conflicts = this.findConflicts(subfieldMap);
      if (conflicts.length > 0) {
        return [
          [responseName, conflicts.map(([reason]) => reason)],
          [node1, node2, ...conflicts.flatMap(([, fields]) => fields)],
        ];
      }
    }

    return undefined;
  }

  /**
   * Fields selected by a selection set, keyed by response name, following
   * inline fragments and each named fragment once
   */
  private collectFields(
    parentType: GraphQLType | undefined,
    selectionSet: SelectionSetNode,
    visitedFragments: Set<string>,
    fieldMap: FieldMap,
  ): FieldMap {
    for (const selection of selectionSet.selections) {
      switch (selection.kind) {
        case Kind.FIELD: {
          const fieldName = selection.name.value;
          const responseName = selection.alias?.value ?? fieldName;
          const fields = fieldMap.get(responseName) ?? [];
          fields.push({ node: selection, def: fieldOf(parentType, fieldName) });
          fieldMap.set(responseName, fields);
          break;
        }
        case Kind.INLINE_FRAGMENT: {
          const fragmentType = typeFromAST(this.context.schema, selection.typeCondition);
          this.collectFields(fragmentType, selection.selectionSet, visitedFragments, fieldMap);
          break;
        }
        case Kind.FRAGMENT_SPREAD: {
          const fragmentName = selection.name.value;
          if (visitedFragments.has(fragmentName)) break;
          visitedFragments.add(fragmentName);
          const fragment = this.context.getFragment(fragmentName);
          if (!fragment) break;
          const fragmentType = typeFromAST(this.context.schema, fragment.typeCondition);
          this.collectFields(fragmentType, fragment.selectionSet, visitedFragments, fieldMap);
          break;
        }
      }
    }
    return fieldMap;
  }
}

function fieldOf(parentType: GraphQLType | undefined, fieldName: string): GraphQLField | undefined {
  if (parentType instanceof GraphQLObjectType || parentType instanceof GraphQLInterfaceType) {
    const fields = parentType.getFields();
    return Object.hasOwn(fields, fieldName) ? fields[fieldName] : undefined;
  }
  return undefined;
}

function sameType(type1: GraphQLType, type2: GraphQLType): boolean {
  return String(type1) === String(type2);
}

function sameArguments(arguments1: readonly ArgumentNode[], arguments2: readonly ArgumentNode[]): boolean {
  if (arguments1.length !== arguments2.length) return false;
  return arguments1.every((argument1) => {
    const argument2 = arguments2.find((argument) => argument.name.value === argument1.name.value);
    return argument2 !== undefined && print(argument1.value) === print(argument2.value);
  });
}

function sameDirectives(directives1: readonly DirectiveNode[], directives2: readonly DirectiveNode[]): boolean {
  if (directives1.length !== directives2.length) return false;
  return directives1.every((directive1) => {
    const directive2 = directives2.find((directive) => directive.name.value === directive1.name.value);
    return directive2 !== undefined && sameArguments(directive1.arguments, directive2.arguments);
  });
}

/** Unordered pairs of field nodes */
class PairSet {
  private readonly pairs = new Map<FieldNode, Set<FieldNode>>();

  has(a: FieldNode, b: FieldNode): boolean {
    return this.pairs.get(a)?.has(b) ?? false;
  }

  add(a: FieldNode, b: FieldNode): void {
    this.addDirected(a, b);
    this.addDirected(b, a);
  }

  private addDirected(from: FieldNode, to: FieldNode): void {
    const set = this.pairs.get(from);
    if (set) {
      set.add(to);
    } else {
      this.pairs.set(from, new Set([to]));
    }
  }
}
