/**
 * @fileoverview Wayfarer error hierarchy
 *
 * Every failure that crosses a component boundary is one of these typed
 * errors, so the session loop and the CLI can label it without string
 * inspection.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class WayfarerError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// STORE ERRORS
// ============================================================================

export type StoreKind = 'vector' | 'graph';
export type StoreOperation = 'connect' | 'query' | 'describe' | 'close';

export class StoreError extends WayfarerError {
  readonly code = 'STORE_ERROR';

  constructor(
    readonly store: StoreKind,
    readonly operation: StoreOperation,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`${store === 'vector' ? 'Vector index' : 'Graph store'} ${operation} failed: ${message}`);
    this.name = 'StoreError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        store: this.store,
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// PROVIDER ERRORS
// ============================================================================

export type ProviderKind = 'llm' | 'embedding';
export type ProviderErrorReason =
  | 'auth_failed'
  | 'rate_limit'
  | 'network_error'
  | 'invalid_response'
  | 'unavailable';

export class ProviderError extends WayfarerError {
  readonly code = 'PROVIDER_ERROR';

  constructor(
    readonly provider: ProviderKind,
    readonly reason: ProviderErrorReason,
    readonly retryable: boolean,
    message: string,
  ) {
    super(`Provider ${provider} ${reason}: ${message}`);
    this.name = 'ProviderError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        provider: this.provider,
        reason: this.reason,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends WayfarerError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigError extends WayfarerError {
  readonly code = 'CONFIG_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKeys: string[],
    message: string,
  ) {
    super(`Configuration error (${configKeys.join(', ')}): ${message}`);
    this.name = 'ConfigError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKeys: this.configKeys,
      },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isWayfarerError(error: unknown): error is WayfarerError {
  return error instanceof WayfarerError;
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
