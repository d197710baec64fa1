import { ErrorCode } from '../errors/codes.js';
import { InvalidArgumentError } from '../types/errors.js';
import {
  RoutePatternLiteralPart,
  RoutePatternParameterPart,
  RoutePatternPathSegment,
  RoutePatternSeparatorPart,
  hasRouteDefault,
  type ParameterKind,
  type RoutePatternPart,
} from '../pattern/parts.js';
import type { ParameterPolicyReference } from '../pattern/policy.js';

/**
 * Characters reserved by the template grammar; never valid in a name.
 */
export const INVALID_PARAMETER_NAME_CHARS: readonly string[] = [
  '/',
  '{',
  '}',
  '?',
  '*',
];

const PARAMETER_KINDS: readonly ParameterKind[] = [
  'standard',
  'optional',
  'catch-all',
];

export interface ParameterPartOptions {
  default?: unknown;
  parameterKind?: ParameterKind;
  policies?: Iterable<ParameterPolicyReference>;
  /** Percent-encode `/` in values when rendering (default: true) */
  encodeSlashes?: boolean;
}

function assertNonEmpty(value: unknown, argument: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new InvalidArgumentError({
      message: `Value for '${argument}' cannot be null or empty.`,
      context: { argument, value },
    });
  }
  return value;
}

export function literalPart(content: string): RoutePatternLiteralPart {
  const text = assertNonEmpty(content, 'content');
  if (text.includes('?')) {
    throw new InvalidArgumentError({
      message: `The literal section '${text}' is invalid. Literal sections cannot contain the '?' character.`,
      errorCode: ErrorCode.INVALID_LITERAL,
      context: { argument: 'content', value: text },
    });
  }
  return new RoutePatternLiteralPart(text);
}

export function separatorPart(content: string): RoutePatternSeparatorPart {
  return new RoutePatternSeparatorPart(assertNonEmpty(content, 'content'));
}

export function parameterPart(
  parameterName: string,
  options: ParameterPartOptions = {}
): RoutePatternParameterPart {
  const name = assertNonEmpty(parameterName, 'parameterName');
  const reserved = INVALID_PARAMETER_NAME_CHARS.find((ch) => name.includes(ch));
  if (reserved !== undefined) {
    throw new InvalidArgumentError({
      message: `The route parameter name '${name}' is invalid. Route parameter names cannot contain '${reserved}'; the characters ${INVALID_PARAMETER_NAME_CHARS.map((ch) => `'${ch}'`).join(', ')} are reserved by the template syntax.`,
      errorCode: ErrorCode.INVALID_PARAMETER_NAME,
      context: { argument: 'parameterName', key: name, value: reserved },
    });
  }

  const parameterKind = options.parameterKind ?? 'standard';
  if (!PARAMETER_KINDS.includes(parameterKind)) {
    throw new InvalidArgumentError({
      message: `Unknown parameter kind '${String(parameterKind)}' for route parameter '${name}'.`,
      context: { argument: 'parameterKind', key: name, value: parameterKind },
    });
  }

  if (hasRouteDefault(options.default) && parameterKind === 'optional') {
    throw new InvalidArgumentError({
      message: `An optional parameter cannot have a default value (parameter '${name}').`,
      errorCode: ErrorCode.OPTIONAL_WITH_DEFAULT,
      context: {
        argument: 'parameterKind',
        key: name,
        value: options.default,
      },
    });
  }

  return new RoutePatternParameterPart(
    name,
    options.default,
    parameterKind,
    Array.from(options.policies ?? []),
    options.encodeSlashes ?? true
  );
}

/**
 * Group parts into one path segment. Adjacency rules belong to the
 * tokenizer; only emptiness is checked here.
 */
export function segment(
  parts: Iterable<RoutePatternPart>
): RoutePatternPathSegment {
  const list = Array.from(parts);
  if (list.length === 0) {
    throw new InvalidArgumentError({
      message: 'A path segment must contain at least one part.',
      context: { argument: 'parts' },
    });
  }
  return new RoutePatternPathSegment(list);
}
