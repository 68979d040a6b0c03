/**
 * Token Lifecycle Manager
 * Owns the CLF authentication token, the lifetime attempt ceiling and the
 * renew-once protocol for in-band expiry
 */

import type { Logger } from 'pino';
import { AuthenticationFailedError, TokenLimitExceededError, describeError } from '../errors.js';
import type { AuthenticatedResult, TokenState } from './types.js';

export const MAX_TOKEN_ATTEMPTS = 20;

const TOKEN_OPERATION = 'GetAuthenticationToken';

export interface TokenManagerOptions {
  maxAttempts?: number;
  logger?: Logger;
}

export class TokenManager {
  private readonly requestToken: () => Promise<string>;
  private readonly maxAttempts: number;
  private readonly logger?: Logger;
  private token: string | null = null;
  private attemptCount = 0;
  private currentState: TokenState = 'no_token';

  constructor(requestToken: () => Promise<string>, options: TokenManagerOptions = {}) {
    this.requestToken = requestToken;
    this.maxAttempts = options.maxAttempts ?? MAX_TOKEN_ATTEMPTS;
    this.logger = options.logger;
  }

  get state(): TokenState {
    return this.currentState;
  }

  get attempts(): number {
    return this.attemptCount;
  }

  get limit(): number {
    return this.maxAttempts;
  }

  get currentToken(): string | null {
    return this.token;
  }

  /**
   * Request a fresh token. Counts against the lifetime ceiling; at the ceiling
   * it fails without calling the service.
   */
  async acquire(): Promise<string> {
    if (this.attemptCount >= this.maxAttempts) {
      this.block();
      throw new TokenLimitExceededError(this.maxAttempts);
    }

    this.attemptCount++;
    this.currentState = 'authenticating';
    this.logger?.info(
      { attempt: this.attemptCount, maxAttempts: this.maxAttempts },
      'Starting authentication token retrieval'
    );

    try {
      const token = await this.requestToken();
      if (token.length === 0) {
        throw new AuthenticationFailedError(TOKEN_OPERATION, 'empty token');
      }
      this.token = token;
      this.currentState = 'authenticated';
      this.logger?.info({ attempt: this.attemptCount }, 'Authentication token retrieved successfully');
      return token;
    } catch (error) {
      this.token = null;
      this.currentState = 'no_token';
      this.logger?.error(
        { attempt: this.attemptCount, maxAttempts: this.maxAttempts, ...describeError(error) },
        'Authentication token retrieval failed'
      );
      if (error instanceof AuthenticationFailedError) {
        throw error;
      }
      throw new AuthenticationFailedError(TOKEN_OPERATION, describeError(error).errorMessage);
    }
  }

  /**
   * Current token, acquiring one when none is held
   */
  async ensure(): Promise<string> {
    if (this.currentState === 'blocked') {
      throw new TokenLimitExceededError(this.maxAttempts);
    }
    return this.token ?? this.acquire();
  }

  /**
   * Run an authenticated call. When the service reports the token stale, the
   * token is renewed once and the same call repeated once; a second rejection
   * is an authentication failure.
   */
  async withToken<T>(operation: string, call: (token: string) => Promise<AuthenticatedResult<T>>): Promise<T> {
    const token = await this.ensure();
    const first = await call(token);
    if (!first.expired) {
      return first.value;
    }

    this.logger?.warn({ operation, attempts: this.attemptCount }, 'Authentication token expired, will refresh and retry');
    this.invalidate(token);

    const fresh = await this.acquire();
    const second = await call(fresh);
    if (!second.expired) {
      return second.value;
    }

    this.invalidate(fresh);
    throw new AuthenticationFailedError(operation, 'token rejected again after renewal');
  }

  private invalidate(token: string): void {
    if (this.token === token) {
      this.token = null;
      this.currentState = 'no_token';
    }
  }

  private block(): void {
    if (this.currentState !== 'blocked') {
      this.logger?.error({ maxAttempts: this.maxAttempts }, 'Token generation limit exceeded');
    }
    this.token = null;
    this.currentState = 'blocked';
  }
}
