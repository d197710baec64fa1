/**
 * Error hierarchy for routeforge
 * Provides structured error handling with context and suggestions
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  pattern?: string; // Raw text of the route pattern being built or combined
  key?: string; // Parameter name or dictionary key at fault
  value?: unknown; // Problematic value (may contain PII)
  conflictingValue?: unknown; // The other side of a conflict
  dictionary?: string; // 'defaults' | 'requiredValues' | 'parameterPolicies'
  argument?: string; // Name of the rejected argument
  expected?: string; // Capability the value was expected to have
  // Allow extras for callers that attach their own details
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  pattern?: string;
  key?: string;
}

export interface RoutePatternErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
  suggestions?: string[];
}

type SubclassParams = Omit<RoutePatternErrorParams, 'errorCode'> & {
  errorCode?: ErrorCode;
};

const SENSITIVE_KEYS = new Set([
  'password',
  'apiKey',
  'secret',
  'token',
  'ssn',
  'creditCard',
]);

/**
 * Base error class for all routeforge errors
 */
export abstract class RoutePatternError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: RoutePatternErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;
    if (params.suggestions && params.suggestions.length > 0) {
      this.suggestions = params.suggestions;
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and applies basic PII redaction to context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context:
        env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      pattern: this.context?.pattern,
      key: this.context?.key,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context) return context;

    const redacted: ErrorContext = { ...context };
    if ('value' in redacted) {
      redacted.value = redactValue(redacted.value);
    }
    if ('conflictingValue' in redacted) {
      redacted.conflictingValue = redactValue(redacted.conflictingValue);
    }
    return redacted;
  }
}

function redactValue(val: unknown): unknown {
  if (val && typeof val === 'object') {
    if (Array.isArray(val)) return val.map(redactValue);
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(val)) {
      out[k] = SENSITIVE_KEYS.has(k) ? '[REDACTED]' : redactValue(v);
    }
    return out;
  }
  return val;
}

/**
 * Null/empty inputs and local syntax violations caught by the part builders
 */
export class InvalidArgumentError extends RoutePatternError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVALID_ARGUMENT,
    });
  }

  get argument(): string | undefined {
    return this.context?.argument;
  }
}

/**
 * Conflicts and unsatisfiable input detected while merging or combining
 */
export class InvalidOperationError extends RoutePatternError {
  constructor(params: RoutePatternErrorParams) {
    super(params);
  }

  get key(): string | undefined {
    return this.context?.key;
  }
}

/**
 * Structural errors of a route template; always carries the raw text
 */
export class RoutePatternParseError extends RoutePatternError {
  constructor(
    params: Omit<SubclassParams, 'context'> & {
      context: ErrorContext & { pattern: string };
    }
  ) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.DUPLICATE_PARAMETER,
    });
  }

  get pattern(): string {
    return this.context?.pattern ?? '';
  }
}

/**
 * Configuration and route-definition document errors
 */
export class ConfigError extends RoutePatternError {
  constructor(params: SubclassParams & { context?: { setting?: string } }) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    const setting = this.context?.setting;
    return typeof setting === 'string' ? setting : undefined;
  }
}

export function isRoutePatternError(
  error: unknown
): error is RoutePatternError {
  return error instanceof RoutePatternError;
}
