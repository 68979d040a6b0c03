/**
 * Distro Sync - Integrations Package
 * API connectors for the CLF distributor (SOAP) and the Shopify storefront (REST)
 *
 * @packageDocumentation
 */

// ============================================================================
// Clients
// ============================================================================

export * from './clf/index.js';
export * from './shopify/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  IntegrationError,
  NetworkError,
  TransportTimeoutError,
  AuthenticationFailedError,
  TokenLimitExceededError,
  MalformedResponseError,
  ShopifyApiError,
  ShopifyValidationError,
  isIntegrationError,
  describeError,
  type IntegrationErrorCode,
} from './errors.js';

// ============================================================================
// Utilities
// ============================================================================

export * from './utils/index.js';
