/**
 * Integration Error Classes
 * Shared error hierarchy for the CLF and Shopify clients
 */

export type IntegrationErrorCode =
  | 'NETWORK_ERROR'
  | 'TIMEOUT'
  | 'AUTH_FAILED'
  | 'TOKEN_LIMIT_EXCEEDED'
  | 'MALFORMED_RESPONSE'
  | 'SHOPIFY_API_ERROR'
  | 'VALIDATION_REJECTED';

export class IntegrationError extends Error {
  constructor(
    message: string,
    public readonly code: IntegrationErrorCode,
    public readonly operation: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'IntegrationError';
  }
}

// ============================================================================
// Transport Errors
// ============================================================================

export class NetworkError extends IntegrationError {
  constructor(
    operation: string,
    message: string,
    public readonly causeCode?: string
  ) {
    super(`${operation}: network error: ${message}`, 'NETWORK_ERROR', operation);
    this.name = 'NetworkError';
  }
}

export class TransportTimeoutError extends IntegrationError {
  constructor(
    operation: string,
    public readonly attempts: number
  ) {
    super(`${operation}: connection timed out after ${attempts} attempts`, 'TIMEOUT', operation);
    this.name = 'TransportTimeoutError';
  }
}

// ============================================================================
// Authentication Errors
// ============================================================================

export class AuthenticationFailedError extends IntegrationError {
  constructor(operation: string, reason: string, statusCode?: number) {
    super(`${operation}: authentication failed: ${reason}`, 'AUTH_FAILED', operation, statusCode);
    this.name = 'AuthenticationFailedError';
  }
}

export class TokenLimitExceededError extends IntegrationError {
  constructor(public readonly limit: number) {
    super(`Token generation limit of ${limit} attempts exceeded`, 'TOKEN_LIMIT_EXCEEDED', 'GetAuthenticationToken');
    this.name = 'TokenLimitExceededError';
  }
}

// ============================================================================
// Payload Errors
// ============================================================================

export class MalformedResponseError extends IntegrationError {
  constructor(operation: string, detail: string) {
    super(`${operation}: malformed response: ${detail}`, 'MALFORMED_RESPONSE', operation);
    this.name = 'MalformedResponseError';
  }
}

// ============================================================================
// Shopify Errors
// ============================================================================

export class ShopifyApiError extends IntegrationError {
  constructor(operation: string, statusCode: number, body?: string) {
    const detail = body ? `: ${truncate(body)}` : '';
    super(`${operation}: HTTP ${statusCode}${detail}`, 'SHOPIFY_API_ERROR', operation, statusCode);
    this.name = 'ShopifyApiError';
  }
}

export class ShopifyValidationError extends IntegrationError {
  constructor(operation: string, body?: string) {
    const detail = body ? `: ${truncate(body)}` : '';
    super(`${operation}: rejected by Shopify${detail}`, 'VALIDATION_REJECTED', operation, 422);
    this.name = 'ShopifyValidationError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isIntegrationError(error: unknown): error is IntegrationError {
  return error instanceof IntegrationError;
}

/**
 * Flatten an unknown thrown value into log fields
 */
export function describeError(error: unknown): { errorType: string; errorMessage: string; code?: string } {
  if (error instanceof IntegrationError) {
    return { errorType: error.name, errorMessage: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { errorType: error.name, errorMessage: error.message };
  }
  return { errorType: typeof error, errorMessage: String(error) };
}

export function truncate(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}... (truncated)` : text;
}
