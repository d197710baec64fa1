import Ajv, { type ErrorObject } from 'ajv';

import { ErrorCode } from '../errors/codes.js';
import { ConfigError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';
import type { PatternOptions } from '../types/options.js';
import {
  literalPart,
  parameterPart,
  segment,
  separatorPart,
} from '../builder/part-builders.js';
import { constraint, parameterPolicy } from '../builder/policy-builder.js';
import type { ParameterKind, RoutePatternPart } from '../pattern/parts.js';
import type { ParameterPolicyReference } from '../pattern/policy.js';
import {
  buildPattern,
  type PatternBuildResult,
} from '../transform/pattern-merger.js';

export type PolicyDefinition = { named: string } | { constraint: string };

export type PartDefinition =
  | { literal: string }
  | { separator: string }
  | {
      parameter: string;
      default?: unknown;
      kind?: ParameterKind;
      policies?: PolicyDefinition[];
      encodeSlashes?: boolean;
    };

/**
 * An already-tokenized route as stored in a JSON file.
 */
export interface RouteDefinition {
  rawText?: string;
  segments: PartDefinition[][];
  defaults?: Record<string, unknown>;
  /** Strings are regex constraints */
  parameterPolicies?: Record<string, string | string[]>;
  requiredValues?: Record<string, unknown>;
}

const nonEmptyString = { type: 'string', minLength: 1 } as const;

export const ROUTE_DEFINITION_SCHEMA = {
  type: 'object',
  required: ['segments'],
  additionalProperties: false,
  properties: {
    rawText: { type: 'string' },
    segments: {
      type: 'array',
      items: {
        type: 'array',
        minItems: 1,
        items: {
          oneOf: [
            {
              type: 'object',
              required: ['literal'],
              additionalProperties: false,
              properties: { literal: nonEmptyString },
            },
            {
              type: 'object',
              required: ['separator'],
              additionalProperties: false,
              properties: { separator: nonEmptyString },
            },
            {
              type: 'object',
              required: ['parameter'],
              additionalProperties: false,
              properties: {
                parameter: nonEmptyString,
                default: {},
                kind: { enum: ['standard', 'optional', 'catch-all'] },
                encodeSlashes: { type: 'boolean' },
                policies: {
                  type: 'array',
                  items: {
                    oneOf: [
                      {
                        type: 'object',
                        required: ['named'],
                        additionalProperties: false,
                        properties: { named: nonEmptyString },
                      },
                      {
                        type: 'object',
                        required: ['constraint'],
                        additionalProperties: false,
                        properties: { constraint: nonEmptyString },
                      },
                    ],
                  },
                },
              },
            },
          ],
        },
      },
    },
    defaults: { type: 'object' },
    parameterPolicies: {
      type: 'object',
      additionalProperties: {
        oneOf: [
          nonEmptyString,
          { type: 'array', items: nonEmptyString },
        ],
      },
    },
    requiredValues: { type: 'object' },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strictTypes: false });
const validateDocument = ajv.compile<RouteDefinition>(ROUTE_DEFINITION_SCHEMA);

function invalidDefinition(
  message: string,
  extra: { errors?: ErrorObject[]; cause?: Error } = {}
): ConfigError {
  return new ConfigError({
    message,
    errorCode: ErrorCode.INVALID_DEFINITION,
    context: { setting: 'definition', errors: extra.errors },
    cause: extra.cause,
  });
}

/**
 * Validate a route-definition document (parsed JSON, or JSON text).
 */
export function parseRouteDefinition(
  input: unknown
): Result<RouteDefinition, ConfigError> {
  let document: unknown = input;
  if (typeof input === 'string') {
    try {
      document = JSON.parse(input);
    } catch (error) {
      return err(
        invalidDefinition('Route definition is not valid JSON', {
          cause: error instanceof Error ? error : undefined,
        })
      );
    }
  }

  if (!validateDocument(document)) {
    const errors = validateDocument.errors ?? [];
    return err(
      invalidDefinition(
        `Invalid route definition: ${ajv.errorsText(errors, { dataVar: 'definition' })}`,
        { errors: errors.slice() }
      )
    );
  }
  return ok(document);
}

function toPolicyReference(policy: PolicyDefinition): ParameterPolicyReference {
  return 'named' in policy
    ? parameterPolicy(policy.named)
    : constraint(policy.constraint);
}

function toPart(definition: PartDefinition): RoutePatternPart {
  if ('literal' in definition) return literalPart(definition.literal);
  if ('separator' in definition) return separatorPart(definition.separator);
  return parameterPart(definition.parameter, {
    default: definition.default,
    parameterKind: definition.kind,
    policies: (definition.policies ?? []).map(toPolicyReference),
    encodeSlashes: definition.encodeSlashes,
  });
}

/**
 * Build parts through the builders, then run the merge engine.
 */
export function compileRouteDefinition(
  definition: RouteDefinition,
  options?: PatternOptions
): PatternBuildResult {
  return buildPattern(
    {
      rawText: definition.rawText,
      segments: definition.segments.map((parts) => segment(parts.map(toPart))),
      defaults: definition.defaults,
      parameterPolicies: definition.parameterPolicies,
      requiredValues: definition.requiredValues,
    },
    options
  );
}
