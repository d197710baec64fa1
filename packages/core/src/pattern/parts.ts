import {
  describePolicyReference,
  type ParameterPolicyReference,
} from './policy.js';
import { toRouteValueString } from '../values/route-values.js';

export type ParameterKind = 'standard' | 'optional' | 'catch-all';

export type RoutePatternPart =
  | RoutePatternLiteralPart
  | RoutePatternSeparatorPart
  | RoutePatternParameterPart;

/**
 * Fixed text inside a segment, e.g. `users` or the `.` in `{name}.{ext}`.
 */
export class RoutePatternLiteralPart {
  readonly kind = 'literal' as const;

  constructor(public readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

/**
 * Text that ends a preceding optional parameter, e.g. the `.` in
 * `{name}.{ext?}`.
 */
export class RoutePatternSeparatorPart {
  readonly kind = 'separator' as const;

  constructor(public readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

export class RoutePatternParameterPart {
  readonly kind = 'parameter' as const;
  readonly policies: readonly ParameterPolicyReference[];

  constructor(
    public readonly name: string,
    public readonly defaultValue: unknown,
    public readonly parameterKind: ParameterKind,
    policies: readonly ParameterPolicyReference[],
    public readonly encodeSlashes: boolean = true
  ) {
    this.policies = Object.freeze(policies.slice());
  }

  get hasDefault(): boolean {
    return hasRouteDefault(this.defaultValue);
  }

  get isOptional(): boolean {
    return this.parameterKind === 'optional';
  }

  get isCatchAll(): boolean {
    return this.parameterKind === 'catch-all';
  }

  toString(): string {
    let text = '{';
    if (this.isCatchAll) {
      text += this.encodeSlashes ? '*' : '**';
    }
    text += this.name;
    for (const policy of this.policies) {
      text += `:${describePolicyReference(policy)}`;
    }
    if (this.hasDefault) {
      text += `=${toRouteValueString(this.defaultValue)}`;
    }
    if (this.isOptional) {
      text += '?';
    }
    return `${text}}`;
  }
}

/**
 * One `/`-delimited section of a template.
 */
export class RoutePatternPathSegment {
  readonly parts: readonly RoutePatternPart[];

  constructor(parts: readonly RoutePatternPart[]) {
    this.parts = Object.freeze(parts.slice());
  }

  get isSimple(): boolean {
    return this.parts.length === 1;
  }

  toString(): string {
    return this.parts.map((part) => part.toString()).join('');
  }
}

/**
 * `undefined` and `null` both mean "no default".
 */
export function hasRouteDefault(value: unknown): boolean {
  return value !== undefined && value !== null;
}

export function isParameterPart(
  part: RoutePatternPart
): part is RoutePatternParameterPart {
  return part.kind === 'parameter';
}
