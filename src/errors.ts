/**
 * Error hierarchy for code-audit.
 *
 * Extraction problems are not errors: they surface as the `failure` variant of
 * `ExtractedResult`.
 */

export type ErrorCategory =
  | 'VALIDATION'
  | 'CONFIGURATION'
  | 'AUTH'
  | 'NETWORK'
  | 'GATEWAY'
  | 'CANCELLED'
  | 'UNKNOWN';

export interface ErrorContext {
  category: ErrorCategory;
  retryable: boolean;
  [key: string]: unknown;
}

export class CodeAuditError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CodeAuditError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      retryable: context.retryable ?? false,
      ...context,
    };
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Malformed analysis input (the only failure the orchestrator surfaces)
 */
export class ValidationError extends CodeAuditError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'E1001', { category: 'VALIDATION', retryable: false, issues });
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class ConfigurationError extends CodeAuditError {
  constructor(message: string, issues: string[] = []) {
    super(message, 'E1002', { category: 'CONFIGURATION', retryable: false, issues });
    this.name = 'ConfigurationError';
  }
}

/**
 * Credential exchange failed
 */
export class AuthError extends CodeAuditError {
  constructor(message: string, cause?: unknown) {
    super(message, 'E2001', { category: 'AUTH', retryable: false }, { cause });
    this.name = 'AuthError';
  }
}

/**
 * Retries exhausted on network/auth faults
 */
export class TransportError extends CodeAuditError {
  public readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super(message, 'E2002', { category: 'NETWORK', retryable: true, attempts }, { cause });
    this.name = 'TransportError';
    this.attempts = attempts;
  }
}

/**
 * The gateway answered with a non-success status
 */
export class GatewayError extends CodeAuditError {
  public readonly status: number;
  public readonly bodyExcerpt: string;
  public readonly attempts: number;

  constructor(status: number, bodyExcerpt: string, attempts: number, detail?: string) {
    super(
      `Gateway returned ${status}${detail ? ` (${detail})` : ''}: ${bodyExcerpt}`,
      'E2003',
      { category: 'GATEWAY', retryable: false, status, attempts },
    );
    this.name = 'GatewayError';
    this.status = status;
    this.bodyExcerpt = bodyExcerpt;
    this.attempts = attempts;
  }
}

export class CancelledError extends CodeAuditError {
  constructor(message = 'Operation was cancelled') {
    super(message, 'E2004', { category: 'CANCELLED', retryable: false });
    this.name = 'CancelledError';
  }
}

export function isCodeAuditError(err: unknown): err is CodeAuditError {
  return err instanceof CodeAuditError;
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Number of attempts recorded on a transport-level error, if any. */
export function attemptsOf(err: unknown): number | undefined {
  if (err instanceof TransportError || err instanceof GatewayError) {
    return err.attempts;
  }
  return undefined;
}
