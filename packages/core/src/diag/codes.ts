/**
 * Diagnostic note codes emitted while building a pattern.
 * Notes are informational; failures are always thrown as errors.
 */
export const DIAGNOSTIC_CODES = {
  /** An out-of-line default was pushed into a parameter part */
  DEFAULT_APPLIED: 'DEFAULT_APPLIED',
  /** An inline default was copied into the flat defaults */
  DEFAULT_HOISTED: 'DEFAULT_HOISTED',
  /** Inline policies were appended to an out-of-line policy list */
  POLICIES_MERGED: 'POLICIES_MERGED',
  /** An out-of-line default names no parameter; it stays a route value */
  UNBOUND_DEFAULT: 'UNBOUND_DEFAULT',
  /** An out-of-line policy names no parameter */
  UNBOUND_POLICY: 'UNBOUND_POLICY',
  /** A required value is satisfied by a matching default, not a parameter */
  REQUIRED_VALUE_BY_DEFAULT: 'REQUIRED_VALUE_BY_DEFAULT',
} as const;

export type DiagnosticCode =
  (typeof DIAGNOSTIC_CODES)[keyof typeof DIAGNOSTIC_CODES];

export interface PatternNote {
  code: DiagnosticCode;
  /** Parameter or dictionary key the note is about */
  key: string;
  details?: unknown;
}
