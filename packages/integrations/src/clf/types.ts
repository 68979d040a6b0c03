/**
 * CLF Web Ordering Types
 */

import type { TransportPolicy } from '../utils/retry.js';

export type ClfOperation =
  | 'GetAuthenticationToken'
  | 'GetProductCodes'
  | 'GetProductStock'
  | 'GetProductData';

export interface ClfClientConfig {
  /** Full URL of the CLF web service endpoint */
  baseUrl: string;
  username: string;
  password: string;
  /** Per-call timeout in milliseconds */
  timeout?: number;
  /** Connect-timeout retry policy */
  transport?: Partial<TransportPolicy>;
  /** Lifetime ceiling on token requests (default 20) */
  maxTokenAttempts?: number;
}

export type TokenState = 'no_token' | 'authenticating' | 'authenticated' | 'blocked';

/**
 * Outcome of one authenticated call: either the server rejected the token in
 * band, or the call produced a value
 */
export type AuthenticatedResult<T> = { expired: true } | { expired: false; value: T };

export interface ClfProductData {
  code: string;
  barcode: string;
  /** Manufacturer's suggested retail price, as sent */
  price: string;
}

export interface ClfProductRecord {
  code: string;
  stock: number | null;
  barcode: string | null;
  price: string | null;
}
