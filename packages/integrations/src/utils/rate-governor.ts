/**
 * Rate Governor
 * Adaptive inter-call delay driven by Shopify's call-limit header, plus the
 * 429 / 5xx retry policy for storefront calls
 */

import type { AxiosResponse } from 'axios';
import type { Logger } from 'pino';
import { TransportTimeoutError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

export interface RateGovernorOptions {
  /** Delay before the first call */
  initialDelayMs: number;
  /** Floor applied while usage is low */
  minDelayMs: number;
  /** Cap applied while usage is above the high-water mark */
  maxDelayMs: number;
  /** Cap applied while usage is moderate */
  moderateDelayCapMs: number;
  highWaterMark: number;
  lowWaterMark: number;
  /** Rolling quota window; counters reset once it elapses */
  windowMs: number;
  /** Pause after the quota is exhausted */
  cooldownMs: number;
  /** Attempts for a rate-limited or failing call, including the first */
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface RateState {
  callsUsed: number;
  callsAllowed: number;
  windowStartedAt: number;
  delayMs: number;
}

export interface CallLimit {
  used: number;
  allowed: number;
}

export interface RateGovernorDependencies {
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface GovernedCallContext {
  operation: string;
  identifier?: string;
}

type ResponseHeaders = AxiosResponse['headers'];

// ============================================================================
// Constants
// ============================================================================

export const CALL_LIMIT_HEADER = 'x-shopify-shop-api-call-limit';
export const RETRY_AFTER_HEADER = 'retry-after';

export const DEFAULT_RATE_GOVERNOR_OPTIONS: RateGovernorOptions = {
  initialDelayMs: 500,
  minDelayMs: 500,
  maxDelayMs: 2000,
  moderateDelayCapMs: 1000,
  highWaterMark: 0.8,
  lowWaterMark: 0.5,
  windowMs: 1000,
  cooldownMs: 1000,
  maxAttempts: 5,
  backoffBaseMs: 1000,
  backoffMaxMs: 16000,
};

const HIGH_USAGE_FACTOR = 1.5;
const MODERATE_USAGE_FACTOR = 1.2;
const LOW_USAGE_FACTOR = 0.8;

// ============================================================================
// Header Parsing
// ============================================================================

export function readHeader(headers: ResponseHeaders, name: string): string | undefined {
  const value: unknown = headers[name];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

/**
 * Parse a `used/allowed` pair such as `32/40`
 */
export function parseCallLimit(value: string | undefined): CallLimit | null {
  if (!value) return null;
  const match = /^\s*(\d+)\s*\/\s*(\d+)\s*$/.exec(value);
  if (!match) return null;
  const used = parseInt(match[1], 10);
  const allowed = parseInt(match[2], 10);
  if (allowed <= 0) return null;
  return { used, allowed };
}

/**
 * Parse `Retry-After` seconds into milliseconds
 */
export function parseRetryAfter(value: string | undefined): number | null {
  if (!value) return null;
  const seconds = Number(value.trim());
  if (!Number.isFinite(seconds) || seconds < 0) return null;
  return Math.round(seconds * 1000);
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Rate Governor Class
// ============================================================================

export class RateGovernor {
  private readonly options: RateGovernorOptions;
  private readonly logger?: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly state: RateState;

  constructor(options?: Partial<RateGovernorOptions>, deps: RateGovernorDependencies = {}) {
    this.options = { ...DEFAULT_RATE_GOVERNOR_OPTIONS, ...options };
    this.logger = deps.logger;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? Date.now;
    this.state = {
      callsUsed: 0,
      callsAllowed: 0,
      windowStartedAt: this.now(),
      delayMs: this.options.initialDelayMs,
    };
  }

  getState(): Readonly<RateState> {
    return { ...this.state };
  }

  /**
   * Wait out the current inter-call delay
   */
  async throttle(): Promise<void> {
    if (this.state.delayMs > 0) {
      await this.sleep(this.state.delayMs);
    }
  }

  /**
   * Fold one response's call-limit header into the rate state
   */
  async observe(headers: ResponseHeaders): Promise<void> {
    this.resetIfWindowElapsed();

    const limit = parseCallLimit(readHeader(headers, CALL_LIMIT_HEADER));
    if (!limit) return;

    this.state.callsUsed = limit.used;
    this.state.callsAllowed = limit.allowed;

    if (limit.used >= limit.allowed) {
      this.logger?.warn(
        { callsUsed: limit.used, callsAllowed: limit.allowed, cooldownMs: this.options.cooldownMs },
        'Shopify call quota exhausted, cooling down'
      );
      this.resetCounters();
      await this.sleep(this.options.cooldownMs);
      return;
    }

    this.state.delayMs = this.adjustDelay(limit.used / limit.allowed);
  }

  /**
   * Run a storefront call under the governor: throttle, send, observe, and
   * retry 429 / 5xx responses. Once attempts are exhausted the last response is
   * returned; a thrown transport error is rethrown.
   *
   * 429s without `Retry-After`, 5xx responses and thrown network errors share
   * one exponential backoff that keeps doubling across the call's attempts. A
   * `TransportTimeoutError` has already spent the transport's connect-timeout
   * budget and is rethrown at once.
   */
  async execute(send: () => Promise<AxiosResponse>, context: GovernedCallContext): Promise<AxiosResponse> {
    const { maxAttempts, backoffMaxMs } = this.options;
    let backoffMs = this.options.backoffBaseMs;

    for (let attempt = 1; ; attempt++) {
      await this.throttle();

      let response: AxiosResponse;
      try {
        response = await send();
      } catch (error) {
        if (error instanceof TransportTimeoutError || attempt >= maxAttempts) {
          throw error;
        }
        this.logger?.warn(
          {
            ...context,
            attempt,
            maxAttempts,
            delayMs: backoffMs,
            error: error instanceof Error ? error.message : String(error),
          },
          'Storefront request failed, retrying'
        );
        await this.sleep(backoffMs);
        backoffMs = Math.min(backoffMs * 2, backoffMaxMs);
        continue;
      }

      await this.observe(response.headers);

      if (!isRetryableStatus(response.status)) {
        return response;
      }

      if (attempt >= maxAttempts) {
        this.logger?.warn(
          { ...context, status: response.status, attempts: attempt },
          'Storefront retries exhausted, returning last response'
        );
        return response;
      }

      const retryAfterMs =
        response.status === 429 ? parseRetryAfter(readHeader(response.headers, RETRY_AFTER_HEADER)) : null;
      const delayMs = retryAfterMs ?? backoffMs;
      if (retryAfterMs === null) {
        backoffMs = Math.min(backoffMs * 2, backoffMaxMs);
      }

      this.logger?.warn(
        { ...context, status: response.status, attempt, maxAttempts, delayMs },
        response.status === 429 ? 'Shopify rate limited, retrying' : 'Shopify server error, retrying'
      );
      await this.sleep(delayMs);
    }
  }

  private adjustDelay(ratio: number): number {
    const { delayMs } = this.state;
    const { highWaterMark, lowWaterMark, maxDelayMs, moderateDelayCapMs, minDelayMs } = this.options;

    if (ratio > highWaterMark) {
      return Math.min(delayMs * HIGH_USAGE_FACTOR, maxDelayMs);
    }
    if (ratio >= lowWaterMark) {
      return Math.min(delayMs * MODERATE_USAGE_FACTOR, moderateDelayCapMs);
    }
    return Math.max(delayMs * LOW_USAGE_FACTOR, minDelayMs);
  }

  private resetIfWindowElapsed(): void {
    if (this.now() - this.state.windowStartedAt > this.options.windowMs) {
      this.resetCounters();
    }
  }

  private resetCounters(): void {
    this.state.callsUsed = 0;
    this.state.callsAllowed = 0;
    this.state.windowStartedAt = this.now();
  }
}
