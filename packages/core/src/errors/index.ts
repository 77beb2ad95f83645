/**
 * Error hierarchy shared by every workspace package.
 *
 * Fallible operations return neverthrow Results carrying one of these errors;
 * throwing is reserved for invalid static configuration at construction time.
 */

export interface ErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  chainId?: number | undefined;
  requestId?: string | undefined;
}

/**
 * Base domain error. Subclasses pin a stable `code` and a `severity`.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly chainId?: number | undefined;
  readonly requestId?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: ErrorContext) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.chainId = context?.chainId;
    this.requestId = context?.requestId;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      chainId: this.chainId,
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      requestId: this.requestId,
      severity: this.severity,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Input rejected at a validation boundary (addresses, CLI options, registry files).
 */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
  readonly severity = 'error' as const;
}

/**
 * Configuration could not be loaded or failed schema validation.
 */
export class ConfigError extends DomainError {
  readonly code = 'CONFIG_ERROR';
  readonly severity = 'error' as const;

  constructor(
    message: string,
    public readonly issues: string[] = [],
    context?: ErrorContext
  ) {
    super(message, context);
  }
}
