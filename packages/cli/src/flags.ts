import {
  ConfigError,
  ErrorCode,
  type PatternOptions,
} from '@routeforge/core';

export type OutputFormat = 'json' | 'template';

/**
 * Commander option bag shared by `compile` and `combine`
 */
export interface CliOptions {
  out?: string;
  /** `--no-notes` sets this to false */
  notes?: boolean;
  debugPasses?: boolean;
}

export function resolveOutputFormat(out: string | undefined): OutputFormat {
  const value = (out ?? 'json').toLowerCase();
  if (value === 'json' || value === 'template') return value;
  throw new ConfigError({
    message: `Invalid --out value '${out}'. Expected json|template.`,
    errorCode: ErrorCode.CONFIGURATION_ERROR,
    context: { setting: 'out', value: out },
  });
}

/**
 * Map CLI flags onto the merge engine options
 */
export function parsePatternOptions(options: CliOptions): PatternOptions {
  return { collectNotes: options.notes !== false };
}
