import { isDeepStrictEqual } from 'node:util';

import { DIAGNOSTIC_CODES } from '../diag/codes.js';
import type { DiagnosticCode, PatternNote } from '../diag/codes.js';
import { ErrorCode } from '../errors/codes.js';
import { suggestRequiredValueFix } from '../errors/suggestions.js';
import {
  InvalidOperationError,
  RoutePatternParseError,
} from '../types/errors.js';
import { resolveOptions, type PatternOptions } from '../types/options.js';
import {
  classifyPolicyValue,
  parameterPolicy,
  regexReference,
} from '../builder/policy-builder.js';
import {
  RoutePatternParameterPart,
  RoutePatternPathSegment,
  hasRouteDefault,
  isParameterPart,
  type RoutePatternPart,
} from '../pattern/parts.js';
import {
  policyReferencesEqual,
  type ParameterPolicyReference,
} from '../pattern/policy.js';
import { RoutePattern } from '../pattern/route-pattern.js';
import {
  RouteValueDictionary,
  emptyRouteValues,
  fromRouteValues,
  toRouteValueString,
  type ReadonlyRouteValueDictionary,
  type RouteValueComparer,
  type RouteValueInput,
} from '../values/route-values.js';
import { describeValue } from '../util/describe-value.js';

export interface PatternInput {
  /** Template text, kept for diagnostics only */
  rawText?: string | null;
  segments: Iterable<RoutePatternPathSegment>;
  defaults?: RouteValueInput | null;
  /** Values are a policy, a regex string, or an iterable of either */
  parameterPolicies?: RouteValueInput | null;
  requiredValues?: RouteValueInput | null;
}

export interface PatternBuildResult {
  pattern: RoutePattern;
  notes: PatternNote[];
}

/**
 * Merge inline parameter data with out-of-line defaults, policies and
 * required values into one canonical pattern.
 */
export function buildPattern(
  input: PatternInput,
  options?: PatternOptions
): PatternBuildResult {
  const merger = new PatternMerger(input, options);
  return merger.run();
}

class PatternMerger {
  private readonly rawText: string | undefined;
  private readonly sourceSegments: RoutePatternPathSegment[];
  private readonly comparer: RouteValueComparer;
  private readonly collectNotes: boolean;

  // Working views. The flat dictionaries are authoritative; parameter parts
  // are rebuilt from them.
  private defaults: RouteValueDictionary | undefined;
  private policies:
    | RouteValueDictionary<ParameterPolicyReference[]>
    | undefined;
  private readonly requiredValues: RouteValueDictionary | undefined;

  private readonly parameters: RoutePatternParameterPart[] = [];
  private readonly parameterNames = new Set<string>();
  private readonly notes: PatternNote[] = [];

  constructor(input: PatternInput, options?: PatternOptions) {
    const resolved = resolveOptions(options);
    this.comparer = resolved.valueComparer;
    this.collectNotes = resolved.collectNotes;
    this.rawText = input.rawText ?? undefined;
    this.sourceSegments = Array.from(input.segments);

    if (input.defaults) {
      const defaults = fromRouteValues(input.defaults, 'defaults');
      if (defaults.size > 0) this.defaults = defaults;
    }

    if (input.parameterPolicies) {
      const raw = fromRouteValues(input.parameterPolicies, 'parameterPolicies');
      if (raw.size > 0) {
        const policies = new RouteValueDictionary<ParameterPolicyReference[]>();
        for (const [key, value] of raw) {
          policies.add(key, this.toPolicyReferences(key, value));
        }
        this.policies = policies;
      }
    }

    if (input.requiredValues) {
      this.requiredValues = fromRouteValues(
        input.requiredValues,
        'requiredValues'
      );
    }
  }

  run(): PatternBuildResult {
    const segments = this.sourceSegments.map((segment) =>
      this.visitSegment(segment)
    );

    this.noteUnboundValues();
    this.validateRequiredValues();

    const pattern = new RoutePattern(
      this.rawText,
      this.defaults?.freeze() ?? emptyRouteValues(),
      this.freezePolicies(),
      this.requiredValues && this.requiredValues.size > 0
        ? this.requiredValues.freeze()
        : emptyRouteValues(),
      Object.freeze(this.parameters.slice()),
      Object.freeze(segments)
    );
    return { pattern, notes: this.notes.slice() };
  }

  private get label(): string {
    return (
      this.rawText ??
      this.sourceSegments.map((segment) => segment.toString()).join('/')
    );
  }

  private addNote(code: DiagnosticCode, key: string, details?: unknown): void {
    if (!this.collectNotes) return;
    this.notes.push(
      details === undefined ? { code, key } : { code, key, details }
    );
  }

  private toPolicyReferences(
    key: string,
    value: unknown
  ): ParameterPolicyReference[] {
    const classified = classifyPolicyValue(value);
    switch (classified.kind) {
      case 'policy':
        return [parameterPolicy(classified.policy)];
      case 'text':
        // Bare strings are regex constraints, not policy names; '' stays `^()$`
        return [regexReference(classified.text)];
      case 'collection':
        return classified.items.map((item) => {
          const inner = classifyPolicyValue(item);
          if (inner.kind === 'policy') return parameterPolicy(inner.policy);
          if (inner.kind === 'text') return regexReference(inner.text);
          throw this.invalidPolicyReference(key, item);
        });
      case 'invalid':
        throw this.invalidPolicyReference(key, classified.value);
    }
  }

  private invalidPolicyReference(
    key: string,
    value: unknown
  ): InvalidOperationError {
    return new InvalidOperationError({
      message: `The constraint entry '${key}' - ${describeValue(value)} on the route pattern '${this.label}' must have a string value or be of a type which implements 'RouteConstraint'.`,
      errorCode: ErrorCode.INVALID_POLICY_REFERENCE,
      context: {
        pattern: this.label,
        key,
        value,
        expected: 'RouteConstraint',
      },
    });
  }

  private visitSegment(
    segment: RoutePatternPathSegment
  ): RoutePatternPathSegment {
    let updatedParts: RoutePatternPart[] | undefined;
    for (let i = 0; i < segment.parts.length; i++) {
      const part = segment.parts[i];
      if (part === undefined) continue;
      if (isParameterPart(part)) this.claimParameterName(part.name);

      const updatedPart = this.visitPart(part);
      if (updatedPart !== part) {
        updatedParts ??= segment.parts.slice();
        updatedParts[i] = updatedPart;
      }
      if (isParameterPart(updatedPart)) this.parameters.push(updatedPart);
    }

    // Segment has not changed
    if (!updatedParts) return segment;
    return new RoutePatternPathSegment(updatedParts);
  }

  private claimParameterName(name: string): void {
    const folded = name.toLowerCase();
    if (this.parameterNames.has(folded)) {
      throw new RoutePatternParseError({
        message: `The route parameter name '${name}' appears more than one time in the route template '${this.label}'.`,
        context: { pattern: this.label, key: name },
      });
    }
    this.parameterNames.add(folded);
  }

  private visitPart(part: RoutePatternPart): RoutePatternPart {
    if (!isParameterPart(part)) return part;

    const name = part.name;
    let effectiveDefault = part.defaultValue;

    if (this.defaults?.has(name)) {
      const outOfLine = this.defaults.get(name);
      if (part.hasDefault && !isDeepStrictEqual(outOfLine, part.defaultValue)) {
        throw new InvalidOperationError({
          message: `The route parameter '${name}' has both an inline default value (${describeValue(part.defaultValue)}) and an explicit default value (${describeValue(outOfLine)}) specified in route pattern '${this.label}'. A route parameter cannot contain an inline default value when a different default value is specified explicitly.`,
          errorCode: ErrorCode.DEFAULT_CONFLICT,
          context: {
            pattern: this.label,
            key: name,
            value: outOfLine,
            conflictingValue: part.defaultValue,
          },
        });
      }

      if (part.isOptional) {
        throw new InvalidOperationError({
          message: `An optional parameter cannot have a default value: '${name}' in route pattern '${this.label}' is optional but a default of ${describeValue(outOfLine)} was supplied.`,
          errorCode: ErrorCode.OPTIONAL_DEFAULT,
          context: { pattern: this.label, key: name, value: outOfLine },
        });
      }

      if (!part.hasDefault && hasRouteDefault(outOfLine)) {
        this.addNote(DIAGNOSTIC_CODES.DEFAULT_APPLIED, name, {
          value: outOfLine,
        });
      }
      effectiveDefault = outOfLine;
    }

    if (part.hasDefault) {
      const defaults = (this.defaults ??= new RouteValueDictionary<unknown>());
      if (!defaults.has(name)) {
        this.addNote(DIAGNOSTIC_CODES.DEFAULT_HOISTED, name, {
          value: part.defaultValue,
        });
      }
      defaults.set(name, part.defaultValue);
    }

    const inlinePolicies = part.policies;
    let references = this.policies?.get(name);
    if (references === undefined && inlinePolicies.length > 0) {
      references = [];
      this.policies ??= new RouteValueDictionary<ParameterPolicyReference[]>();
      this.policies.set(name, references);
    } else if (references !== undefined && inlinePolicies.length > 0) {
      this.addNote(DIAGNOSTIC_CODES.POLICIES_MERGED, name, {
        outOfLine: references.length,
        inline: inlinePolicies.length,
      });
    }

    if (references !== undefined && inlinePolicies.length > 0) {
      const outOfLine = references.slice();
      for (const reference of inlinePolicies) {
        if (!outOfLine.some((other) => policyReferencesEqual(other, reference))) {
          references.push(reference);
        }
      }
    }

    const mergedPolicies = references ?? [];
    if (
      sameDefault(part.defaultValue, effectiveDefault) &&
      samePolicies(inlinePolicies, mergedPolicies)
    ) {
      // Part has not changed
      return part;
    }

    return new RoutePatternParameterPart(
      name,
      hasRouteDefault(effectiveDefault) ? effectiveDefault : part.defaultValue,
      part.parameterKind,
      mergedPolicies,
      part.encodeSlashes
    );
  }

  private noteUnboundValues(): void {
    if (!this.collectNotes) return;
    for (const key of this.defaults?.keys() ?? []) {
      if (!this.parameterNames.has(key.toLowerCase())) {
        this.addNote(DIAGNOSTIC_CODES.UNBOUND_DEFAULT, key);
      }
    }
    for (const key of this.policies?.keys() ?? []) {
      if (!this.parameterNames.has(key.toLowerCase())) {
        this.addNote(DIAGNOSTIC_CODES.UNBOUND_POLICY, key);
      }
    }
  }

  /**
   * Each required value is either null-ish, names a parameter, or matches a
   * default under the same key.
   */
  private validateRequiredValues(): void {
    if (!this.requiredValues) return;

    for (const [key, value] of this.requiredValues) {
      if (this.comparer.equals('', value)) continue;
      if (this.parameterNames.has(key.toLowerCase())) continue;

      if (
        this.defaults?.has(key) &&
        this.comparer.equals(value, this.defaults.get(key))
      ) {
        this.addNote(DIAGNOSTIC_CODES.REQUIRED_VALUE_BY_DEFAULT, key, {
          value,
        });
        continue;
      }

      throw new InvalidOperationError({
        message: `No corresponding parameter or default value could be found for the required value '${key}=${toRouteValueString(value)}' in route pattern '${this.label}'. A non-null required value must correspond to a route parameter or the route pattern must have a matching default value.`,
        errorCode: ErrorCode.UNSATISFIED_REQUIRED_VALUE,
        context: { pattern: this.label, key, value },
        suggestions: suggestRequiredValueFix(
          key,
          this.parameters.map((parameter) => parameter.name),
          Array.from(this.defaults?.keys() ?? [])
        ),
      });
    }
  }

  private freezePolicies(): ReadonlyRouteValueDictionary<
    readonly ParameterPolicyReference[]
  > {
    if (!this.policies || this.policies.size === 0) return emptyRouteValues();
    const frozen = new RouteValueDictionary<
      readonly ParameterPolicyReference[]
    >();
    for (const [key, references] of this.policies) {
      frozen.add(key, Object.freeze(references.slice()));
    }
    return frozen.freeze();
  }
}

function sameDefault(a: unknown, b: unknown): boolean {
  if (!hasRouteDefault(a) && !hasRouteDefault(b)) return true;
  return isDeepStrictEqual(a, b);
}

function samePolicies(
  a: readonly ParameterPolicyReference[],
  b: readonly ParameterPolicyReference[]
): boolean {
  if (a.length !== b.length) return false;
  return a.every((reference, i) => {
    const other = b[i];
    return other !== undefined && policyReferencesEqual(reference, other);
  });
}
