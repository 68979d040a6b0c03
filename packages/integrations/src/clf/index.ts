/**
 * CLF Integration
 * Exports for the CLF Web Ordering distributor client
 */

export { ClfApiClient, type ClfClientOptions } from './client.js';
export { TokenManager, MAX_TOKEN_ATTEMPTS, type TokenManagerOptions } from './token-manager.js';
export {
  AUTH_REQUIRED_MARKER,
  CLF_NAMESPACE,
  detectExpiry,
  escapeXml,
  parseEnvelope,
  readResult,
} from './soap.js';
export type {
  AuthenticatedResult,
  ClfClientConfig,
  ClfOperation,
  ClfProductData,
  ClfProductRecord,
  TokenState,
} from './types.js';
