import { ruleFactory, type RuleFactory } from '../rule.js';
import { ArgumentsOfCorrectType } from './arguments-of-correct-type.js';
import { DefaultValuesOfCorrectType } from './default-values-of-correct-type.js';
import { FieldsOnCorrectType } from './fields-on-correct-type.js';
import { FragmentsOnCompositeTypes } from './fragments-on-composite-types.js';
import { KnownArgumentNames } from './known-argument-names.js';
import { KnownDirectives } from './known-directives.js';
import { KnownFragmentNames } from './known-fragment-names.js';
import { KnownTypeNames } from './known-type-names.js';
import { LoneAnonymousOperation } from './lone-anonymous-operation.js';
import { NoFragmentCycles } from './no-fragment-cycles.js';
import { NoUndefinedVariables } from './no-undefined-variables.js';
import { NoUnusedFragments } from './no-unused-fragments.js';
import { NoUnusedVariables } from './no-unused-variables.js';
import { OverlappingFieldsCanBeMerged } from './overlapping-fields-can-be-merged.js';
import { PossibleFragmentSpreads } from './possible-fragment-spreads.js';
import { ProvidedNonNullArguments } from './provided-non-null-arguments.js';
import { ScalarLeafs } from './scalar-leafs.js';
import { UniqueArgumentNames } from './unique-argument-names.js';
import { UniqueFragmentNames } from './unique-fragment-names.js';
import { UniqueOperationNames } from './unique-operation-names.js';
import { VariablesAreInputTypes } from './variables-are-input-types.js';
import { VariablesInAllowedPosition } from './variables-in-allowed-position.js';

export * from './arguments-of-correct-type.js';
export * from './default-values-of-correct-type.js';
export * from './fields-on-correct-type.js';
export * from './fragments-on-composite-types.js';
export * from './known-argument-names.js';
export * from './known-directives.js';
export * from './known-fragment-names.js';
export * from './known-type-names.js';
export * from './lone-anonymous-operation.js';
export * from './no-fragment-cycles.js';
export * from './no-undefined-variables.js';
export * from './no-unused-fragments.js';
export * from './no-unused-variables.js';
export * from './overlapping-fields-can-be-merged.js';
export * from './possible-fragment-spreads.js';
export * from './provided-non-null-arguments.js';
export * from './scalar-leafs.js';
export * from './unique-argument-names.js';
export * from './unique-fragment-names.js';
export * from './unique-operation-names.js';
export * from './variables-are-input-types.js';
export * from './variables-in-allowed-position.js';

/**
 * The rules `validate()` runs by default, in order
 */
export const specifiedRules: readonly RuleFactory[] = Object.freeze(
  [
    UniqueOperationNames,
    LoneAnonymousOperation,
    KnownTypeNames,
    FragmentsOnCompositeTypes,
    VariablesAreInputTypes,
    ScalarLeafs,
    FieldsOnCorrectType,
    UniqueFragmentNames,
    KnownFragmentNames,
    NoUnusedFragments,
    PossibleFragmentSpreads,
    NoFragmentCycles,
    NoUndefinedVariables,
    NoUnusedVariables,
    KnownDirectives,
    KnownArgumentNames,
    UniqueArgumentNames,
    ArgumentsOfCorrectType,
    ProvidedNonNullArguments,
    DefaultValuesOfCorrectType,
    VariablesInAllowedPosition,
    OverlappingFieldsCanBeMerged,
  ].map(ruleFactory),
);
