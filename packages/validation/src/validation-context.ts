/**
 * ValidationContext
 *
 * Shared by every rule in one `validate()` call. Holds the schema and
 * document, an index of fragment definitions by name, and forwards to the
 * TypeInfo driven by the current traversal.
 */

import { Kind, type DocumentNode, type FragmentDefinitionNode } from '@querycheck/language';
import type {
  GraphQLArgument,
  GraphQLCompositeType,
  GraphQLDirective,
  GraphQLField,
  GraphQLInputType,
  GraphQLOutputType,
  GraphQLSchema,
  TypeInfo,
} from '@querycheck/schema';

export class ValidationContext {
  readonly schema: GraphQLSchema;
  readonly document: DocumentNode;
  private readonly typeInfo: TypeInfo;
  private readonly fragments = new Map<string, FragmentDefinitionNode>();
  private fragmentsIndexed = false;
  private indexBuilds = 0;

  constructor(schema: GraphQLSchema, document: DocumentNode, typeInfo: TypeInfo) {
    this.schema = schema;
    this.document = document;
    this.typeInfo = typeInfo;
  }

  /** Number of times the fragment index was built; at most one */
  get fragmentIndexBuilds(): number {
    return this.indexBuilds;
  }

  /**
   * The fragment definition named `name`. With duplicate names the last
   * definition wins.
   */
  getFragment(name: string): FragmentDefinitionNode | undefined {
    if (!this.fragmentsIndexed) {
      for (const definition of this.document.definitions) {
        if (definition.kind === Kind.FRAGMENT_DEFINITION) {
          this.fragments.set(definition.name.value, definition);
        }
      }
      this.fragmentsIndexed = true;
      this.indexBuilds++;
    }
    return this.fragments.get(name);
  }

  getType(): GraphQLOutputType | undefined {
    return this.typeInfo.getType();
  }

  getParentType(): GraphQLCompositeType | undefined {
    return this.typeInfo.getParentType();
  }

  getInputType(): GraphQLInputType | undefined {
    return this.typeInfo.getInputType();
  }

  getFieldDef(): GraphQLField | undefined {
    return this.typeInfo.getFieldDef();
  }

  getDirective(): GraphQLDirective | undefined {
    return this.typeInfo.getDirective();
  }

  getArgument(): GraphQLArgument | undefined {
    return this.typeInfo.getArgument();
  }
}
