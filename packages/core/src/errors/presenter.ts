/**
 * ErrorPresenter - pure presentation layer for RoutePatternError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type {
  ErrorContext,
  RoutePatternError,
  SerializedError,
} from '../types/errors.js';
import { describeValue } from '../util/describe-value.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
  redactKeys?: string[];
  requestId?: string;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  key?: string;
  excerpt?: string;
  workaround?: string;
  colors: boolean;
  terminalWidth: number;
}

export type ProductionView = SerializedError & { requestId?: string };

const DEFAULT_REDACT_KEYS = [
  'password',
  'apiKey',
  'secret',
  'token',
  'ssn',
  'creditCard',
];

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: RoutePatternError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      key: error.context?.key,
      excerpt: this.#formatExcerpt(error.context),
      workaround: error.suggestions?.[0],
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth ?? process.stdout.columns ?? 80,
    };
  }

  formatForProduction(error: RoutePatternError): ProductionView {
    const base = this.#applyAdditionalRedaction(error.toJSON('prod'));
    const requestId = this.options.requestId ?? process.env.REQUEST_ID;
    return requestId ? { ...base, requestId } : base;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx?.pattern) return undefined;
    const where = ctx.dictionary ? ` (${ctx.dictionary})` : '';
    return `Pattern: '${ctx.pattern}'${where}`;
  }

  #formatExcerpt(ctx?: ErrorContext): string | undefined {
    if (!ctx || !('value' in ctx)) return undefined;
    if (ctx.conflictingValue !== undefined) {
      return `${describeValue(ctx.value)} vs ${describeValue(ctx.conflictingValue)}`;
    }
    return describeValue(ctx.value);
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (opt === undefined) return this.env === 'dev';
    return opt;
  }

  #applyAdditionalRedaction(view: SerializedError): SerializedError {
    if (!view.context) return view;
    const keys = new Set(this.options.redactKeys ?? DEFAULT_REDACT_KEYS);
    const redactor = (val: unknown): unknown => {
      if (val && typeof val === 'object') {
        if (Array.isArray(val)) return val.map(redactor);
        const out: Record<string, unknown> = {};
        for (const [k, v] of Object.entries(val)) {
          out[k] = keys.has(k) ? '[REDACTED]' : redactor(v);
        }
        return out;
      }
      return val;
    };
    const context: ErrorContext = { ...view.context };
    if ('value' in context) context.value = redactor(context.value);
    if ('conflictingValue' in context) {
      context.conflictingValue = redactor(context.conflictingValue);
    }
    return { ...view, context };
  }
}

export default ErrorPresenter;
