import { InvalidArgumentError } from './types/errors.js';
import type { PatternOptions } from './types/options.js';
import type { RoutePatternPathSegment } from './pattern/parts.js';
import type { RoutePattern } from './pattern/route-pattern.js';
import {
  buildPattern,
  type PatternInput,
} from './transform/pattern-merger.js';
import { combinePatterns } from './transform/pattern-combiner.js';
import type { RouteValueInput } from './values/route-values.js';

// High-level facades. They return only the pattern; use buildPattern() to
// also receive the merge notes.

export interface PatternExtras {
  defaults?: RouteValueInput | null;
  parameterPolicies?: RouteValueInput | null;
  requiredValues?: RouteValueInput | null;
}

/**
 * Template tokenizer supplied by the host router. Its grammar is not part
 * of this package; it only has to hand back already-valid segments.
 */
export interface RouteTemplateTokenizer {
  tokenize(template: string): {
    rawText: string;
    segments: Iterable<RoutePatternPathSegment>;
  };
}

/**
 * Build a canonical pattern from segments and optional out-of-line data.
 */
export function Pattern(
  input: PatternInput,
  options?: PatternOptions
): RoutePattern {
  return buildPattern(input, options).pattern;
}

/**
 * Tokenize a template with the supplied tokenizer, then merge.
 */
export function Parse(
  template: string,
  tokenizer: RouteTemplateTokenizer,
  extras: PatternExtras = {},
  options?: PatternOptions
): RoutePattern {
  if (typeof template !== 'string' || template.length === 0) {
    throw new InvalidArgumentError({
      message: "Value for 'pattern' cannot be null or empty.",
      context: { argument: 'pattern', value: template },
    });
  }

  const { rawText, segments } = tokenizer.tokenize(template);
  return buildPattern({ rawText, segments, ...extras }, options).pattern;
}

/**
 * Combine a group pattern with a pattern nested inside it.
 */
export function Combine(left: RoutePattern, right: RoutePattern): RoutePattern;
export function Combine(
  left: RoutePattern | null | undefined,
  right: RoutePattern | null | undefined
): RoutePattern | undefined;
export function Combine(
  left: RoutePattern | null | undefined,
  right: RoutePattern | null | undefined
): RoutePattern | undefined {
  return combinePatterns(left, right);
}
