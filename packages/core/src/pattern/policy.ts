import type { ReadonlyRouteValueDictionary } from '../values/route-values.js';

export type RouteDirection = 'incoming' | 'outgoing';

/**
 * A policy that accepts or rejects a parameter value at match time.
 */
export interface RouteConstraint {
  match(
    routeKey: string,
    values: ReadonlyRouteValueDictionary,
    direction: RouteDirection
  ): boolean;
}

/**
 * A policy that rewrites a parameter value when a link is generated.
 */
export interface OutboundParameterTransformer {
  transformOutbound(value: unknown): string | undefined;
}

export type ParameterPolicy = RouteConstraint | OutboundParameterTransformer;

/**
 * Reference to a parameter policy stored on a pattern. Resolution and
 * execution belong to the matcher; the pattern only carries the reference.
 */
export type ParameterPolicyReference =
  | ResolvedPolicyReference
  | RegexPolicyReference
  | NamedPolicyReference;

export interface ResolvedPolicyReference {
  readonly kind: 'resolved';
  readonly policy: ParameterPolicy;
}

export interface RegexPolicyReference {
  readonly kind: 'regex';
  /** Anchored source, e.g. `^(\d+)$` */
  readonly pattern: string;
}

export interface NamedPolicyReference {
  readonly kind: 'named';
  readonly name: string;
}

export function isRouteConstraint(value: unknown): value is RouteConstraint {
  return (
    typeof value === 'object' &&
    value !== null &&
    'match' in value &&
    typeof value.match === 'function'
  );
}

export function isOutboundParameterTransformer(
  value: unknown
): value is OutboundParameterTransformer {
  return (
    typeof value === 'object' &&
    value !== null &&
    'transformOutbound' in value &&
    typeof value.transformOutbound === 'function'
  );
}

export function isParameterPolicy(value: unknown): value is ParameterPolicy {
  return isRouteConstraint(value) || isOutboundParameterTransformer(value);
}

/**
 * Two references are the same when they point at the same policy instance,
 * or carry the same regex source or policy name.
 */
export function policyReferencesEqual(
  a: ParameterPolicyReference,
  b: ParameterPolicyReference
): boolean {
  switch (a.kind) {
    case 'resolved':
      return b.kind === 'resolved' && a.policy === b.policy;
    case 'regex':
      return b.kind === 'regex' && a.pattern === b.pattern;
    case 'named':
      return b.kind === 'named' && a.name === b.name;
  }
}

/**
 * Text used when a reference is rendered back into template syntax.
 */
export function describePolicyReference(
  reference: ParameterPolicyReference
): string {
  switch (reference.kind) {
    case 'named':
      return reference.name;
    case 'regex':
      return `regex(${reference.pattern})`;
    case 'resolved': {
      const ctor = reference.policy.constructor;
      return typeof ctor === 'function' && ctor.name && ctor.name !== 'Object'
        ? ctor.name
        : '<policy>';
    }
  }
}
