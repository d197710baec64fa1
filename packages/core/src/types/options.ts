/**
 * Configuration options for building route patterns
 *
 * All options are optional with conservative defaults.
 */

import { ConfigError } from './errors.js';
import {
  RouteValueEqualityComparer,
  type RouteValueComparer,
} from '../values/route-values.js';

export interface PatternOptions {
  /**
   * Equality used to match required values against defaults and to detect
   * the "no value" sentinel (default: RouteValueEqualityComparer)
   */
  valueComparer?: RouteValueComparer;
  /** Collect diagnostic notes while merging (default: true) */
  collectNotes?: boolean;
}

export interface ResolvedPatternOptions {
  valueComparer: RouteValueComparer;
  collectNotes: boolean;
}

export const DEFAULT_OPTIONS: Readonly<ResolvedPatternOptions> = Object.freeze(
  {
    valueComparer: RouteValueEqualityComparer,
    collectNotes: true,
  }
);

/**
 * Fill in defaults and reject option values of the wrong shape.
 */
export function resolveOptions(
  options: PatternOptions = {}
): ResolvedPatternOptions {
  const valueComparer = options.valueComparer ?? DEFAULT_OPTIONS.valueComparer;
  if (
    typeof valueComparer !== 'object' ||
    valueComparer === null ||
    typeof valueComparer.equals !== 'function'
  ) {
    throw new ConfigError({
      message: 'valueComparer must be an object with an equals(left, right) method',
      context: { setting: 'valueComparer', value: valueComparer },
    });
  }

  const collectNotes = options.collectNotes ?? DEFAULT_OPTIONS.collectNotes;
  if (typeof collectNotes !== 'boolean') {
    throw new ConfigError({
      message: 'collectNotes must be a boolean',
      context: { setting: 'collectNotes', value: collectNotes },
    });
  }

  return { valueComparer, collectNotes };
}
