import { ErrorCode } from '../errors/codes.js';
import { InvalidArgumentError, InvalidOperationError } from '../types/errors.js';
import {
  isParameterPolicy,
  isRouteConstraint,
  type NamedPolicyReference,
  type ParameterPolicy,
  type ParameterPolicyReference,
  type RegexPolicyReference,
  type ResolvedPolicyReference,
  type RouteConstraint,
} from '../pattern/policy.js';
import { describeValue } from '../util/describe-value.js';

/**
 * What callers may pass as an out-of-line policy for one parameter.
 */
export type PolicyValue =
  | ParameterPolicy
  | string
  | Iterable<ParameterPolicy | string>;

export type PolicyValueClass =
  | { kind: 'policy'; policy: ParameterPolicy }
  | { kind: 'text'; text: string }
  | { kind: 'collection'; items: unknown[] }
  | { kind: 'invalid'; value: unknown };

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

/**
 * Sort a raw policy value into the shapes the merge engine understands.
 * Strings are checked before iterables since a string is iterable too.
 */
export function classifyPolicyValue(value: unknown): PolicyValueClass {
  if (isParameterPolicy(value)) return { kind: 'policy', policy: value };
  if (typeof value === 'string') return { kind: 'text', text: value };
  if (isIterable(value)) return { kind: 'collection', items: Array.from(value) };
  return { kind: 'invalid', value };
}

function resolved(policy: ParameterPolicy): ParameterPolicyReference {
  const reference: ResolvedPolicyReference = { kind: 'resolved', policy };
  return Object.freeze(reference);
}

function assertText(text: string, argument: string): string {
  if (text.length === 0) {
    throw new InvalidArgumentError({
      message: `Value for '${argument}' cannot be null or empty.`,
      context: { argument, value: text },
    });
  }
  return text;
}

/**
 * Anchored regex reference. An empty text is allowed here and matches only
 * the empty value; `constraint()` rejects it before getting this far.
 */
export function regexReference(text: string): ParameterPolicyReference {
  const reference: RegexPolicyReference = {
    kind: 'regex',
    pattern: `^(${text})$`,
  };
  return Object.freeze(reference);
}

/**
 * Constraint entry point: a route constraint is kept as is, a string
 * becomes an anchored regex constraint.
 */
export function constraint(
  value: RouteConstraint | string
): ParameterPolicyReference;
export function constraint(value: unknown): ParameterPolicyReference;
export function constraint(value: unknown): ParameterPolicyReference {
  const classified = classifyPolicyValue(value);
  if (classified.kind === 'policy' && isRouteConstraint(classified.policy)) {
    return resolved(classified.policy);
  }
  if (classified.kind === 'text') {
    return regexReference(assertText(classified.text, 'constraint'));
  }
  throw new InvalidOperationError({
    message: `The constraint reference ${describeValue(value)} is invalid. A constraint must be a string or an object implementing 'RouteConstraint'.`,
    errorCode: ErrorCode.INVALID_POLICY_REFERENCE,
    context: { value, expected: 'RouteConstraint' },
  });
}

/**
 * Named policy entry point: a policy object is kept as is, a string is a
 * name resolved later by the matcher's policy factory.
 */
export function parameterPolicy(
  value: ParameterPolicy | string
): ParameterPolicyReference;
export function parameterPolicy(value: unknown): ParameterPolicyReference;
export function parameterPolicy(value: unknown): ParameterPolicyReference {
  const classified = classifyPolicyValue(value);
  if (classified.kind === 'policy') {
    return resolved(classified.policy);
  }
  if (classified.kind === 'text') {
    const name = assertText(classified.text, 'parameterPolicy');
    const reference: NamedPolicyReference = { kind: 'named', name };
    return Object.freeze(reference);
  }
  throw new InvalidOperationError({
    message: `The parameter policy reference ${describeValue(value)} is invalid. A parameter policy must be a string or an object implementing 'ParameterPolicy'.`,
    errorCode: ErrorCode.INVALID_POLICY_REFERENCE,
    context: { value, expected: 'ParameterPolicy' },
  });
}
