/**
 * Error hierarchy for wordhop
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
  input?: string; // Raw word or line that was rejected
  position?: number; // Character index (words) or 1-based line number (pair lists)
  setting?: string; // Option name for configuration errors
  value?: unknown; // Raw flag value or file path; withheld in prod
  valueExcerpt?: string; // Safe excerpt of value
  suggestion?: string;
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
  input?: string;
}

export interface LadderErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

const REDACTED = '[REDACTED]';

/**
 * Base error class for all wordhop errors
 */
export abstract class LadderError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: LadderErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and replaces context.value, which may hold local
   *   paths, with a marker
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
      input: this.context?.input,
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
      redacted.value = REDACTED;
    }
    return redacted;
  }
}

/**
 * Word encoding errors (empty input, letters outside a..z, excess length)
 */
export class WordError extends LadderError {
  constructor(params: {
    message: string;
    errorCode: ErrorCode;
    context: ErrorContext & { input: string };
    cause?: Error;
  }) {
    super(params);
  }

  get input(): string | undefined {
    return this.context?.input;
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends LadderError {
  constructor(params: {
    message: string;
    context?: ErrorContext & { setting?: string };
    severity?: Severity;
    cause?: Error;
  }) {
    super({ ...params, errorCode: ErrorCode.CONFIGURATION_ERROR });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Pair list parse errors (malformed lines, schema violations)
 */
export class ParseError extends LadderError {
  constructor(params: {
    message: string;
    context?: ErrorContext & { input?: string; position?: number };
    cause?: Error;
  }) {
    super({ ...params, errorCode: ErrorCode.PARSE_ERROR });
  }

  get position(): number | undefined {
    return this.context?.position;
  }
}

/**
 * Internal invariant violations; always an implementation bug
 */
export class InvariantError extends LadderError {
  constructor(message: string, context?: ErrorContext) {
    super({ message, errorCode: ErrorCode.INTERNAL_ERROR, context });
  }
}

/**
 * Utility functions for error handling
 */
export function isLadderError(error: unknown): error is LadderError {
  return error instanceof LadderError;
}
