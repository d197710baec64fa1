// Shared types for routeforge packages

export type ParameterKindName = 'standard' | 'optional' | 'catch-all';

/**
 * JSON-safe view of one parameter part.
 */
export interface ParameterSummary {
  name: string;
  kind: ParameterKindName;
  default?: unknown;
  policies: string[];
  encodeSlashes: boolean;
}

/**
 * JSON-safe view of a canonical route pattern, as printed by the CLI.
 */
export interface RoutePatternSummary {
  rawText: string | null;
  template: string;
  parameters: ParameterSummary[];
  defaults: Record<string, unknown>;
  parameterPolicies: Record<string, string[]>;
  requiredValues: Record<string, unknown>;
  segmentCount: number;
}

/**
 * A diagnostic note rendered for humans.
 */
export interface NoteSummary {
  code: string;
  key: string;
  details?: unknown;
}
