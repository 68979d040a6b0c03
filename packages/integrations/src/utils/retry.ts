/**
 * Transport Retry Wrapper
 * Retries an outbound call on connect timeouts only. The per-call timeout
 * itself is set on each client's axios instance
 */

import pRetry, { AbortError } from 'p-retry';
import { isAxiosError } from 'axios';
import type { Logger } from 'pino';
import { IntegrationError, NetworkError, TransportTimeoutError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

export interface TransportPolicy {
  /** Total attempts for a connect timeout, including the first */
  maxAttempts: number;
  /** Fixed delay between attempts in milliseconds */
  retryDelayMs: number;
}

export interface SendOptions {
  /** Operation name used in errors and logs */
  operation: string;
  /** Product code, SKU or item id the call is about */
  identifier?: string;
  policy?: Partial<TransportPolicy>;
  logger?: Logger;
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_TRANSPORT_POLICY: TransportPolicy = {
  maxAttempts: 3,
  retryDelayMs: 5000,
};

const CONNECT_TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

// ============================================================================
// Error Classification
// ============================================================================

/**
 * True when the server never answered in time. A response, whatever its
 * status, is never a timeout.
 */
export function isConnectTimeout(error: unknown): boolean {
  if (isAxiosError(error)) {
    return error.response === undefined && error.code !== undefined && CONNECT_TIMEOUT_CODES.has(error.code);
  }
  return error instanceof Error && 'code' in error && typeof error.code === 'string' && CONNECT_TIMEOUT_CODES.has(error.code);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Map what the HTTP client threw onto the integration error kinds
 */
export function classifyTransportError(error: unknown, operation: string, attempts: number): Error {
  if (error instanceof IntegrationError) {
    return error;
  }
  if (isConnectTimeout(error)) {
    return new TransportTimeoutError(operation, attempts);
  }
  if (isAxiosError(error) && error.response === undefined) {
    return new NetworkError(operation, error.message, error.code);
  }
  return toError(error);
}

// ============================================================================
// Retry Function
// ============================================================================

/**
 * Execute one outbound call. Connect timeouts are retried with a fixed delay up
 * to `maxAttempts`; every other failure propagates on the first occurrence.
 */
export async function sendWithRetry<T>(send: () => Promise<T>, options: SendOptions): Promise<T> {
  const policy = { ...DEFAULT_TRANSPORT_POLICY, ...options.policy };
  const { operation, identifier, logger } = options;
  let attempts = 0;

  try {
    return await pRetry(
      async () => {
        attempts++;
        try {
          return await send();
        } catch (error) {
          if (isConnectTimeout(error)) {
            throw toError(error);
          }
          throw new AbortError(toError(error));
        }
      },
      {
        retries: Math.max(0, policy.maxAttempts - 1),
        minTimeout: policy.retryDelayMs,
        maxTimeout: policy.retryDelayMs,
        factor: 1,
        randomize: false,
        onFailedAttempt: (error) => {
          const context = {
            operation,
            identifier,
            attempt: error.attemptNumber,
            maxAttempts: policy.maxAttempts,
          };
          if (error.retriesLeft > 0) {
            logger?.warn({ ...context, delayMs: policy.retryDelayMs }, 'Connect timeout, retrying');
          } else {
            logger?.warn(context, 'Connect timeout, retries exhausted');
          }
        },
      }
    );
  } catch (error) {
    throw classifyTransportError(error, operation, attempts);
  }
}
