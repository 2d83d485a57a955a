/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { ValidationError, isConfigError, isProviderError, isStoreError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'CONFIG_INVALID'
  | 'STORE_UNAVAILABLE'
  | 'PROVIDER_UNAVAILABLE'
  | 'QUERY_FAILED';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `wayfarer help <command>` for usage information.',
  CONFIG_INVALID: 'Check wayfarer.yaml and the WAYFARER_*, PINECONE_*, NEO4J_* and OPENROUTER_* environment variables.',
  STORE_UNAVAILABLE: 'Run `wayfarer check` to see whether the vector index and graph database are reachable.',
  PROVIDER_UNAVAILABLE: 'Verify the API keys and base URLs for the language model and embedding providers.',
  QUERY_FAILED: 'Try again, or set WAYFARER_LOG_LEVEL=debug for more detail.',
};

export const EXIT_CODES: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  CONFIG_INVALID: 3,
  STORE_UNAVAILABLE: 4,
  PROVIDER_UNAVAILABLE: 5,
  QUERY_FAILED: 1,
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/**
 * Map any thrown value onto a CLI error code.
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  const message = getErrorMessage(error);
  if (isStoreError(error)) {
    return createError('STORE_UNAVAILABLE', message, { store: error.store, operation: error.operation });
  }
  if (isProviderError(error)) {
    return createError('PROVIDER_UNAVAILABLE', message, { provider: error.provider, reason: error.reason });
  }
  if (isConfigError(error)) {
    return createError('CONFIG_INVALID', message, { keys: error.configKeys });
  }
  if (error instanceof ValidationError) {
    return createError('INVALID_ARGUMENT', message, { field: error.field });
  }
  return createError('QUERY_FAILED', message);
}

export function formatError(error: unknown): string {
  const cliError = toCliError(error);
  const lines = [`Error [${cliError.code}]: ${cliError.message}`];
  if (cliError.suggestion) {
    lines.push('', `Suggestion: ${cliError.suggestion}`);
  }
  return lines.join('\n');
}

export function getExitCode(error: unknown): number {
  return EXIT_CODES[toCliError(error).code];
}
