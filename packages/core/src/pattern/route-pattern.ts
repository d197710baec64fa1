import type { RoutePatternSummary } from '@routeforge/shared';
import type {
  RoutePatternParameterPart,
  RoutePatternPathSegment,
} from './parts.js';
import {
  describePolicyReference,
  type ParameterPolicyReference,
} from './policy.js';
import type { ReadonlyRouteValueDictionary } from '../values/route-values.js';

/**
 * Canonical, immutable route pattern. Built by the merge engine or the
 * combination engine; every view of defaults and policies agrees with the
 * parameter parts.
 */
export class RoutePattern {
  readonly parameters: readonly RoutePatternParameterPart[];
  readonly pathSegments: readonly RoutePatternPathSegment[];

  constructor(
    public readonly rawText: string | undefined,
    public readonly defaults: ReadonlyRouteValueDictionary,
    public readonly parameterPolicies: ReadonlyRouteValueDictionary<
      readonly ParameterPolicyReference[]
    >,
    public readonly requiredValues: ReadonlyRouteValueDictionary,
    parameters: readonly RoutePatternParameterPart[],
    pathSegments: readonly RoutePatternPathSegment[]
  ) {
    this.parameters = Object.isFrozen(parameters)
      ? parameters
      : Object.freeze(parameters.slice());
    this.pathSegments = Object.isFrozen(pathSegments)
      ? pathSegments
      : Object.freeze(pathSegments.slice());
  }

  /**
   * Case-insensitive lookup of a parameter part by name.
   */
  getParameter(name: string): RoutePatternParameterPart | undefined {
    const folded = name.toLowerCase();
    return this.parameters.find(
      (parameter) => parameter.name.toLowerCase() === folded
    );
  }

  /**
   * Template text rebuilt from the segments, ignoring `rawText`.
   */
  toTemplate(): string {
    return this.pathSegments.map((segment) => segment.toString()).join('/');
  }

  toString(): string {
    return this.rawText ?? this.toTemplate();
  }
}

/**
 * JSON-safe view of a pattern for tooling and the CLI.
 */
export function summarizePattern(pattern: RoutePattern): RoutePatternSummary {
  const parameterPolicies: Record<string, string[]> = {};
  for (const [name, references] of pattern.parameterPolicies) {
    parameterPolicies[name] = references.map(describePolicyReference);
  }

  return {
    rawText: pattern.rawText ?? null,
    template: pattern.toTemplate(),
    parameters: pattern.parameters.map((parameter) => ({
      name: parameter.name,
      kind: parameter.parameterKind,
      ...(parameter.hasDefault ? { default: parameter.defaultValue } : {}),
      policies: parameter.policies.map(describePolicyReference),
      encodeSlashes: parameter.encodeSlashes,
    })),
    defaults: pattern.defaults.toObject(),
    parameterPolicies,
    requiredValues: pattern.requiredValues.toObject(),
    segmentCount: pattern.pathSegments.length,
  };
}
