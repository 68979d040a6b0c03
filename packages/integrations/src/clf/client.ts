/**
 * CLF Web Ordering API Client
 * SOAP calls for authentication, product codes, stock levels and product data
 */

import axios from 'axios';
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import type { Logger } from 'pino';
import { sendWithRetry } from '../utils/retry.js';
import { createLogger } from '../utils/logger.js';
import { AuthenticationFailedError, MalformedResponseError, describeError, truncate } from '../errors.js';
import { TokenManager } from './token-manager.js';
import {
  CLF_NAMESPACE,
  authenticationEnvelope,
  childOf,
  detectExpiry,
  findAll,
  findFirst,
  parseEnvelope,
  parseXml,
  productCodesEnvelope,
  productDataEnvelope,
  productStockEnvelope,
  readResult,
  textOf,
} from './soap.js';
import type { AuthenticatedResult, ClfClientConfig, ClfOperation, ClfProductData, TokenState } from './types.js';

const DEFAULT_TIMEOUT_MS = 30000;
const INTEGER_PATTERN = /^[+-]?\d+$/;

export interface ClfClientOptions {
  /** Replaces the HTTP transport; tests pass an in-process adapter */
  adapter?: AxiosAdapter;
  logger?: Logger;
}

export class ClfApiClient {
  private readonly config: Required<Pick<ClfClientConfig, 'timeout'>> & ClfClientConfig;
  private readonly httpClient: AxiosInstance;
  private readonly tokens: TokenManager;
  private readonly logger: Logger;

  constructor(config: ClfClientConfig, options: ClfClientOptions = {}) {
    this.config = {
      timeout: DEFAULT_TIMEOUT_MS,
      ...config,
    };
    this.logger = options.logger ?? createLogger('clf');

    this.httpClient = axios.create({
      timeout: this.config.timeout,
      responseType: 'text',
      headers: {
        'Content-Type': 'text/xml; charset=utf-8',
      },
      // Status codes are interpreted per operation, never by the transport
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });

    this.tokens = new TokenManager(() => this.requestToken(), {
      maxAttempts: this.config.maxTokenAttempts,
      logger: this.logger,
    });
  }

  // ============================================================================
  // Token State
  // ============================================================================

  get tokenState(): TokenState {
    return this.tokens.state;
  }

  get tokenAttempts(): number {
    return this.tokens.attempts;
  }

  get tokenLimit(): number {
    return this.tokens.limit;
  }

  isBlocked(): boolean {
    return this.tokens.state === 'blocked';
  }

  /**
   * Request a new token, counting against the lifetime ceiling
   */
  async getAuthenticationToken(): Promise<string> {
    return this.tokens.acquire();
  }

  // ============================================================================
  // Product Operations
  // ============================================================================

  /**
   * All distributor product codes; empty when the payload is unusable
   */
  async listProductCodes(): Promise<string[]> {
    const operation: ClfOperation = 'GetProductCodes';
    this.logger.info({ operation }, 'Starting product codes retrieval');

    return this.authenticatedCall(operation, undefined, (token) => productCodesEnvelope(token), [], (result) => {
      if (result === null) {
        this.logger.warn({ operation }, 'No product codes found');
        return [];
      }

      const inner = parseXml(result, operation, 'product codes payload');
      const codes: string[] = [];
      for (const codeNode of findAll(inner, 'Code')) {
        const code = textOf(childOf(codeNode, 'sku')) ?? textOf(codeNode);
        if (code === null) {
          this.logger.warn({ operation }, 'Product code entry without a sku');
          continue;
        }
        codes.push(code.trim());
      }

      this.logger.info({ operation, count: codes.length }, `Successfully retrieved ${codes.length} product codes`);
      return codes;
    });
  }

  /**
   * Stock level for one product code; null when missing or not an integer
   */
  async getStock(code: string): Promise<number | null> {
    const operation: ClfOperation = 'GetProductStock';
    this.logger.info({ operation, code }, `Retrieving stock for product code: ${code}`);

    return this.authenticatedCall(operation, code, (token) => productStockEnvelope(token, code), null, (result) => {
      if (result === null) {
        this.logger.error({ operation, code }, `No GetProductStockResult element found for product: ${code}`);
        return null;
      }

      const inner = parseXml(result, operation, 'stock payload');
      const fromProduct = textOf(childOf(findFirst(inner, 'Product'), 'stock'));
      const raw = fromProduct ?? textOf(findFirst(inner, 'stock'));

      if (raw === null) {
        this.logger.error({ operation, code }, `Stock level not found for product: ${code}`);
        return null;
      }

      const trimmed = raw.trim();
      if (!INTEGER_PATTERN.test(trimmed)) {
        this.logger.error({ operation, code, value: raw }, `Invalid stock value for product ${code}: ${raw}`);
        return null;
      }

      const stock = parseInt(trimmed, 10);
      this.logger.info({ operation, code, stock }, `Stock level for product ${code}: ${stock}`);
      return stock;
    });
  }

  /**
   * Barcode and price for one product code
   */
  async getProductData(code: string): Promise<ClfProductData | null> {
    const operation: ClfOperation = 'GetProductData';
    this.logger.info({ operation, code }, `Retrieving price and barcode for product code: ${code}`);

    return this.authenticatedCall(operation, code, (token) => productDataEnvelope(token, code), null, (result) => {
      if (result === null) {
        this.logger.error({ operation, code }, `No product data found for product: ${code}`);
        return null;
      }

      const inner = parseXml(result, operation, 'product data payload');
      for (const product of findAll(inner, 'Product')) {
        const price = textOf(childOf(product, 'msrp'));
        const barcode = textOf(childOf(product, 'barcode'));

        if (price !== null && barcode !== null) {
          this.logger.info({ operation, code, price, barcode }, `Retrieved data for product ${code}`);
          return { code, barcode: barcode.trim(), price: price.trim() };
        }
        this.logger.error({ operation, code, hasPrice: price !== null, hasBarcode: barcode !== null }, 'Missing price or barcode');
      }

      this.logger.error({ operation, code }, `No product data found for product: ${code}`);
      return null;
    });
  }

  async getBarcode(code: string): Promise<string | null> {
    const data = await this.getProductData(code);
    return data?.barcode ?? null;
  }

  // ============================================================================
  // Helper Methods
  // ============================================================================

  /**
   * Shared path of every token-bearing operation: build, send, parse the
   * envelope, renew once on in-band expiry, then parse the inner payload.
   * Unusable payloads are logged and yield `fallback`; transport errors and
   * authentication failures propagate.
   */
  private async authenticatedCall<T>(
    operation: ClfOperation,
    identifier: string | undefined,
    buildEnvelope: (token: string) => string,
    fallback: T,
    parseResult: (result: string | null) => T
  ): Promise<T> {
    return this.tokens.withToken(operation, async (token): Promise<AuthenticatedResult<T>> => {
      const response = await this.post(operation, buildEnvelope(token), identifier);
      const body = bodyText(response.data);

      if (response.status !== 200) {
        this.logger.error(
          { operation, code: identifier, status: response.status, response: truncate(body) },
          `${operation} request failed with status code: ${response.status}`
        );
        return { expired: false, value: fallback };
      }

      try {
        const envelope = parseEnvelope(body, operation);
        if (detectExpiry(envelope)) {
          return { expired: true };
        }
        return { expired: false, value: parseResult(readResult(envelope, operation)) };
      } catch (error) {
        if (error instanceof MalformedResponseError) {
          this.logger.error({ operation, code: identifier, ...describeError(error) }, `XML parsing error in ${operation}`);
          return { expired: false, value: fallback };
        }
        throw error;
      }
    });
  }

  private async requestToken(): Promise<string> {
    const operation: ClfOperation = 'GetAuthenticationToken';

    let response: AxiosResponse;
    try {
      response = await this.post(operation, authenticationEnvelope(this.config.username, this.config.password));
    } catch (error) {
      throw new AuthenticationFailedError(operation, describeError(error).errorMessage);
    }

    this.logger.info({ operation, status: response.status }, 'Authentication request sent');
    if (response.status !== 200) {
      throw new AuthenticationFailedError(operation, `HTTP ${response.status}`, response.status);
    }

    let token: string | null;
    try {
      token = readResult(parseEnvelope(bodyText(response.data), operation), operation);
    } catch (error) {
      throw new AuthenticationFailedError(operation, describeError(error).errorMessage);
    }

    const trimmed = token?.trim() ?? '';
    if (trimmed.length === 0) {
      throw new AuthenticationFailedError(operation, 'token not found in response');
    }
    return trimmed;
  }

  private async post(operation: ClfOperation, envelope: string, identifier?: string): Promise<AxiosResponse> {
    return sendWithRetry(
      () =>
        this.httpClient.post(this.config.baseUrl, envelope, {
          headers: { SOAPAction: `"${CLF_NAMESPACE}/${operation}"` },
        }),
      {
        operation,
        identifier,
        policy: this.config.transport,
        logger: this.logger,
      }
    );
  }
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return '';
}
