/**
 * Directive definitions
 */

import {
  argumentsFromConfig,
  GraphQLNonNull,
  type ArgumentConfig,
  type GraphQLArgument,
} from './definition.js';
import { GraphQLBoolean } from './scalars.js';

/**
 * Places in a query document a directive may appear
 */
export const DirectiveLocation = {
  QUERY: 'QUERY',
  MUTATION: 'MUTATION',
  SUBSCRIPTION: 'SUBSCRIPTION',
  FIELD: 'FIELD',
  FRAGMENT_DEFINITION: 'FRAGMENT_DEFINITION',
  FRAGMENT_SPREAD: 'FRAGMENT_SPREAD',
  INLINE_FRAGMENT: 'INLINE_FRAGMENT',
} as const;

export type DirectiveLocation = (typeof DirectiveLocation)[keyof typeof DirectiveLocation];

export function isDirectiveLocation(value: string): value is DirectiveLocation {
  return Object.values<string>(DirectiveLocation).includes(value);
}

export interface DirectiveConfig {
  name: string;
  locations: DirectiveLocation[];
  args?: Record<string, ArgumentConfig>;
  description?: string;
}

export class GraphQLDirective {
  readonly name: string;
  readonly description?: string;
  readonly locations: readonly DirectiveLocation[];
  readonly args: readonly GraphQLArgument[];

  constructor(config: DirectiveConfig) {
    if (config.locations.length === 0) {
      throw new Error(`Directive @${config.name} must declare at least one location.`);
    }
    this.name = config.name;
    this.description = config.description;
    this.locations = config.locations;
    this.args = argumentsFromConfig(config.args);
  }

  toString(): string {
    return `@${this.name}`;
  }
}

export const GraphQLIncludeDirective = new GraphQLDirective({
  name: 'include',
  description: 'Directs the executor to include this field or fragment only when the `if` argument is true.',
  locations: [
    DirectiveLocation.FIELD,
    DirectiveLocation.FRAGMENT_SPREAD,
    DirectiveLocation.INLINE_FRAGMENT,
  ],
  args: {
    if: { type: new GraphQLNonNull(GraphQLBoolean), description: 'Included when true.' },
  },
});

export const GraphQLSkipDirective = new GraphQLDirective({
  name: 'skip',
  description: 'Directs the executor to skip this field or fragment when the `if` argument is true.',
  locations: [
    DirectiveLocation.FIELD,
    DirectiveLocation.FRAGMENT_SPREAD,
    DirectiveLocation.INLINE_FRAGMENT,
  ],
  args: {
    if: { type: new GraphQLNonNull(GraphQLBoolean), description: 'Skipped when true.' },
  },
});

export const specifiedDirectives: readonly GraphQLDirective[] = Object.freeze([
  GraphQLIncludeDirective,
  GraphQLSkipDirective,
]);
