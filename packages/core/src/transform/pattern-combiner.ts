import { isDeepStrictEqual } from 'node:util';

import { ErrorCode } from '../errors/codes.js';
import {
  InvalidOperationError,
  RoutePatternParseError,
} from '../types/errors.js';
import type {
  RoutePatternParameterPart,
  RoutePatternPathSegment,
} from '../pattern/parts.js';
import { RoutePattern } from '../pattern/route-pattern.js';
import {
  RouteValueDictionary,
  emptyRouteValues,
  type ReadonlyRouteValueDictionary,
} from '../values/route-values.js';
import { describeValue } from '../util/describe-value.js';

type DictionaryName = 'defaults' | 'requiredValues' | 'parameterPolicies';

/**
 * Concatenate two canonical patterns, e.g. a route group prefix and a
 * route inside it. Neither input is modified.
 */
export function combinePatterns(
  left: RoutePattern,
  right: RoutePattern
): RoutePattern;
export function combinePatterns(
  left: RoutePattern | null | undefined,
  right: RoutePattern | null | undefined
): RoutePattern | undefined;
export function combinePatterns(
  left: RoutePattern | null | undefined,
  right: RoutePattern | null | undefined
): RoutePattern | undefined {
  if (!left) return right ?? undefined;
  if (!right) return left;

  const rawText = joinRawText(left.rawText, right.rawText);

  // Parameters first: a name on both sides is a duplicate, whatever its
  // defaults or policies say
  const parameters = combineLists(
    left.parameters,
    right.parameters,
    (list) => checkDuplicateParameters(list, rawText)
  );

  const defaults = combineDictionaries(
    left.defaults,
    right.defaults,
    rawText,
    'defaults'
  );
  const requiredValues = combineDictionaries(
    left.requiredValues,
    right.requiredValues,
    rawText,
    'requiredValues'
  );
  const parameterPolicies = combineDictionaries(
    left.parameterPolicies,
    right.parameterPolicies,
    rawText,
    'parameterPolicies'
  );

  const pathSegments = combineLists<RoutePatternPathSegment>(
    left.pathSegments,
    right.pathSegments
  );

  return new RoutePattern(
    rawText,
    defaults,
    parameterPolicies,
    requiredValues,
    parameters,
    pathSegments
  );
}

/**
 * One slash at the join, however many either side brings.
 */
function joinRawText(
  left: string | undefined,
  right: string | undefined
): string {
  return `${(left ?? '').replace(/\/+$/, '')}/${(right ?? '').replace(/^\/+/, '')}`;
}

function combineLists<T>(
  left: readonly T[],
  right: readonly T[],
  check?: (combined: readonly T[]) => void
): readonly T[] {
  if (left.length === 0) return right;
  if (right.length === 0) return left;

  const combined = Object.freeze([...left, ...right]);
  check?.(combined);
  return combined;
}

function checkDuplicateParameters(
  parameters: readonly RoutePatternParameterPart[],
  rawText: string
): void {
  const seen = new Set<string>();
  for (const parameter of parameters) {
    const folded = parameter.name.toLowerCase();
    if (seen.has(folded)) {
      throw new RoutePatternParseError({
        message: `The route parameter name '${parameter.name}' appears more than one time in the route template '${rawText}'.`,
        context: { pattern: rawText, key: parameter.name },
      });
    }
    seen.add(folded);
  }
}

function combineDictionaries<V>(
  left: ReadonlyRouteValueDictionary<V>,
  right: ReadonlyRouteValueDictionary<V>,
  rawText: string,
  dictionaryName: DictionaryName
): ReadonlyRouteValueDictionary<V> {
  if (left.size === 0 && right.size === 0) return emptyRouteValues();
  if (left.size === 0) return right;
  if (right.size === 0) return left;

  const combined = new RouteValueDictionary<V>();
  for (const [key, value] of left) {
    combined.add(key, value);
  }
  for (const [key, value] of right) {
    if (combined.has(key)) {
      const existing = combined.get(key);
      if (!isDeepStrictEqual(existing, value)) {
        throw new InvalidOperationError({
          message: `The route pattern '${rawText}' has a conflicting value for the key '${key}' in the '${dictionaryName}' dictionary: ${describeValue(existing)} and ${describeValue(value)}.`,
          errorCode: ErrorCode.DICTIONARY_CONFLICT,
          context: {
            pattern: rawText,
            dictionary: dictionaryName,
            key,
            value: existing,
            conflictingValue: value,
          },
        });
      }
      continue;
    }
    combined.add(key, value);
  }
  return combined.freeze();
}
