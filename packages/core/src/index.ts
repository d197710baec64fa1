// @routeforge/core entry point
//
// - High-level facades Pattern/Parse/Combine via ./api.js.
// - Low-level building blocks: part and policy builders, the merge and
//   combination engines, route-value dictionaries, errors, diagnostics,
//   options and route-definition documents (used by the CLI).

export * from './api.js';

// Model
export {
  RoutePatternLiteralPart,
  RoutePatternSeparatorPart,
  RoutePatternParameterPart,
  RoutePatternPathSegment,
  hasRouteDefault,
  isParameterPart,
} from './pattern/parts.js';
export type { ParameterKind, RoutePatternPart } from './pattern/parts.js';
export { RoutePattern, summarizePattern } from './pattern/route-pattern.js';
export {
  isRouteConstraint,
  isOutboundParameterTransformer,
  isParameterPolicy,
  policyReferencesEqual,
  describePolicyReference,
} from './pattern/policy.js';
export type {
  RouteDirection,
  RouteConstraint,
  OutboundParameterTransformer,
  ParameterPolicy,
  ParameterPolicyReference,
  ResolvedPolicyReference,
  RegexPolicyReference,
  NamedPolicyReference,
} from './pattern/policy.js';

// Builders
export {
  INVALID_PARAMETER_NAME_CHARS,
  literalPart,
  separatorPart,
  parameterPart,
  segment,
} from './builder/part-builders.js';
export type { ParameterPartOptions } from './builder/part-builders.js';
export {
  classifyPolicyValue,
  constraint,
  parameterPolicy,
} from './builder/policy-builder.js';
export type { PolicyValue, PolicyValueClass } from './builder/policy-builder.js';

// Engines
export { buildPattern } from './transform/pattern-merger.js';
export type {
  PatternInput,
  PatternBuildResult,
} from './transform/pattern-merger.js';
export { combinePatterns } from './transform/pattern-combiner.js';

// Route values
export {
  RouteValueDictionary,
  RouteValueEqualityComparer,
  emptyRouteValues,
  fromRouteValues,
  toRouteValueString,
} from './values/route-values.js';
export type {
  ReadonlyRouteValueDictionary,
  RouteValueComparer,
  RouteValueInput,
} from './values/route-values.js';

// Options
export { DEFAULT_OPTIONS, resolveOptions } from './types/options.js';
export type {
  PatternOptions,
  ResolvedPatternOptions,
} from './types/options.js';

// Errors
export { ErrorCode, EXIT_CODES, getExitCode } from './errors/codes.js';
export type { Severity } from './errors/codes.js';
export {
  RoutePatternError,
  InvalidArgumentError,
  InvalidOperationError,
  RoutePatternParseError,
  ConfigError,
  isRoutePatternError,
} from './types/errors.js';
export type {
  ErrorContext,
  SerializedError,
  UserError,
  RoutePatternErrorParams,
} from './types/errors.js';
export { ErrorPresenter } from './errors/presenter.js';
export type {
  CLIErrorView,
  PresenterOptions,
  ProductionView,
} from './errors/presenter.js';
export {
  calculateDistance,
  didYouMean,
  suggestRequiredValueFix,
} from './errors/suggestions.js';
export { Ok, Err, ok, err, isOk, isErr } from './types/result.js';
export type { Result } from './types/result.js';

// Diagnostics
export { DIAGNOSTIC_CODES } from './diag/codes.js';
export type { DiagnosticCode, PatternNote } from './diag/codes.js';

// Route-definition documents
export {
  ROUTE_DEFINITION_SCHEMA,
  parseRouteDefinition,
  compileRouteDefinition,
} from './definition/route-definition.js';
export type {
  RouteDefinition,
  PartDefinition,
  PolicyDefinition,
} from './definition/route-definition.js';
