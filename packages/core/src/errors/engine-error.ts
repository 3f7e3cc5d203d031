/**
 * Engine error types
 * Every error carries the identifiers a reviewer needs to act on it
 */

export type EngineErrorCode =
  | 'TRANSIENT_ORACLE_FAILURE'
  | 'ORACLE_TIMEOUT'
  | 'INVALID_ORACLE_RESPONSE'
  | 'FINGERPRINT_FAILURE'
  | 'GROUPING_CONFLICT'
  | 'PROVENANCE_CYCLE'
  | 'MISSING_REFERENCE'
  | 'MISSING_ATTRIBUTE'
  | 'INVALID_DERIVATION'
  | 'INVALID_RULE'
  | 'INVALID_CONFIG'
  | 'LOAN_NOT_FOUND'
  | 'STORE_ERROR'
  | 'UNKNOWN';

/** Identifiers attached to an error for remediation */
export interface EngineErrorContext {
  loanId?: string;
  documentId?: string;
  page?: number;
  attributeName?: string;
  ruleCode?: string;
  [key: string]: unknown;
}

export interface EngineErrorDetails {
  /** Error code for programmatic handling */
  code: EngineErrorCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  context?: EngineErrorContext;
}

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly suggestion?: string;
  readonly context: EngineErrorContext;

  constructor(details: EngineErrorDetails) {
    super(details.message);
    this.name = 'EngineError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context ?? {};

    if (details.cause) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    Error.captureStackTrace(this, EngineError);
  }

  /**
   * Format error for reviewers and MCP clients
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    const refs = [
      this.context.loanId ? `loan=${this.context.loanId}` : undefined,
      this.context.documentId ? `document=${this.context.documentId}` : undefined,
      this.context.page !== undefined ? `page=${this.context.page}` : undefined,
      this.context.attributeName ? `attribute=${this.context.attributeName}` : undefined,
      this.context.ruleCode ? `rule=${this.context.ruleCode}` : undefined,
    ].filter((v): v is string => v !== undefined);

    if (refs.length > 0) {
      parts.push(`Reference: ${refs.join(' ')}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Helper to wrap unknown errors as EngineError
 */
export function wrapError(
  error: unknown,
  defaultCode: EngineErrorCode = 'UNKNOWN',
  context?: EngineErrorContext
): EngineError {
  if (error instanceof EngineError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new EngineError({
    code: defaultCode,
    message,
    cause,
    context,
  });
}
