/**
 * CLF API Client Tests
 * Runs against the in-process CLF mock server
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ClfApiClient } from '../clf/client.js';
import { AUTH_REQUIRED_MARKER, detectExpiry, parseEnvelope, productStockEnvelope } from '../clf/soap.js';
import { ClfMockServer, envelope } from '../__mocks__/clf-mock.js';
import { createLogger, createSilentLogger, LogCounter } from '../utils/logger.js';
import {
  AuthenticationFailedError,
  MalformedResponseError,
  NetworkError,
  TokenLimitExceededError,
  TransportTimeoutError,
} from '../errors.js';
import type { ClfClientConfig } from '../clf/types.js';

const config: ClfClientConfig = {
  baseUrl: 'https://clf.test/WebOrdering.asmx',
  username: 'test-user',
  password: 'test-secret',
  transport: { retryDelayMs: 0 },
};

describe('CLF SOAP helpers', () => {
  it('should escape the product code inside the embedded document', () => {
    const xml = productStockEnvelope('token-1', 'A&B');

    expect(xml).toContain('<AuthenticationToken>token-1</AuthenticationToken>');
    expect(xml).toContain('<productCodesXml>&lt;ProductCodes&gt;&lt;Code&gt;A&amp;amp;B&lt;/Code&gt;&lt;/ProductCodes&gt;</productCodesXml>');
  });

  it('should detect the re-authentication marker in the header', () => {
    const expired = parseEnvelope(envelope('GetProductStock', '', AUTH_REQUIRED_MARKER), 'GetProductStock');
    const other = parseEnvelope(envelope('GetProductStock', '', 'Unknown product'), 'GetProductStock');
    const plain = parseEnvelope(envelope('GetProductStock', '<Products />'), 'GetProductStock');

    expect(detectExpiry(expired)).toBe(true);
    expect(detectExpiry(other)).toBe(false);
    expect(detectExpiry(plain)).toBe(false);
  });

  it('should reject a document that is not well-formed', () => {
    expect(() => parseEnvelope('<Envelope><Body>', 'GetProductCodes')).toThrow(MalformedResponseError);
    expect(() => parseEnvelope('<Other />', 'GetProductCodes')).toThrow(MalformedResponseError);
  });
});

describe('ClfApiClient', () => {
  let server: ClfMockServer;
  let client: ClfApiClient;

  beforeEach(() => {
    server = new ClfMockServer({
      products: {
        A1: { stock: '42', barcode: '5012345678900', msrp: '9.99' },
        A2: { stock: 'abc', barcode: '5012345678917' },
        A3: { msrp: '4.50' },
      },
    });
    client = new ClfApiClient(config, { adapter: server.adapter, logger: createSilentLogger() });
  });

  // ============================================================================
  // Authentication
  // ============================================================================

  describe('getAuthenticationToken', () => {
    it('should return the issued token', async () => {
      await expect(client.getAuthenticationToken()).resolves.toBe('token-1');
      expect(client.tokenState).toBe('authenticated');
      expect(client.tokenAttempts).toBe(1);
    });

    it('should fail on rejected credentials', async () => {
      const rejected = new ClfApiClient(
        { ...config, password: 'wrong-secret' },
        { adapter: server.adapter, logger: createSilentLogger() }
      );

      await expect(rejected.getAuthenticationToken()).rejects.toBeInstanceOf(AuthenticationFailedError);
      expect(rejected.tokenState).toBe('no_token');
    });

    it('should fail on a non-200 token response', async () => {
      server.failNext('GetAuthenticationToken', { status: 500, data: 'Server Error' });

      const error = await client.getAuthenticationToken().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthenticationFailedError);
      expect(error).toMatchObject({ statusCode: 500 });
    });

    it('should fail fast once the token ceiling is reached', async () => {
      const limited = new ClfApiClient(
        { ...config, password: 'wrong-secret', maxTokenAttempts: 2 },
        { adapter: server.adapter, logger: createSilentLogger() }
      );

      await expect(limited.getStock('A1')).rejects.toBeInstanceOf(AuthenticationFailedError);
      await expect(limited.getStock('A1')).rejects.toBeInstanceOf(AuthenticationFailedError);
      await expect(limited.getStock('A1')).rejects.toBeInstanceOf(TokenLimitExceededError);
      await expect(limited.listProductCodes()).rejects.toBeInstanceOf(TokenLimitExceededError);

      expect(limited.isBlocked()).toBe(true);
      expect(server.callCount('GetAuthenticationToken')).toBe(2);
      expect(server.callCount('GetProductStock')).toBe(0);
    });
  });

  // ============================================================================
  // Product Codes
  // ============================================================================

  describe('listProductCodes', () => {
    it('should list every product code', async () => {
      await expect(client.listProductCodes()).resolves.toEqual(['A1', 'A2', 'A3']);
    });

    it('should authenticate once and reuse the token', async () => {
      await client.listProductCodes();
      await client.getStock('A1');

      expect(server.issuedTokens).toEqual(['token-1']);
      const stockRequest = server.transport.requests[2];
      expect(stockRequest.body).toContain('<AuthenticationToken>token-1</AuthenticationToken>');
    });

    it('should return an empty list when the service has no products', async () => {
      const empty = new ClfMockServer();
      const emptyClient = new ClfApiClient(config, { adapter: empty.adapter, logger: createSilentLogger() });

      await expect(emptyClient.listProductCodes()).resolves.toEqual([]);
    });

    it('should propagate a network failure', async () => {
      await client.getAuthenticationToken();
      server.failNext('GetProductCodes', { fail: 'network', code: 'ECONNREFUSED' });

      await expect(client.listProductCodes()).rejects.toBeInstanceOf(NetworkError);
      expect(server.callCount('GetProductCodes')).toBe(1);
    });
  });

  // ============================================================================
  // Stock
  // ============================================================================

  describe('getStock', () => {
    it('should parse an integer stock level', async () => {
      await expect(client.getStock('A1')).resolves.toBe(42);
    });

    it('should log and return null for a non-numeric stock value', async () => {
      const counter = new LogCounter();
      const counted = new ClfApiClient(config, {
        adapter: server.adapter,
        logger: createLogger('clf-test', { level: 'warn' }, counter),
      });

      await expect(counted.getStock('A2')).resolves.toBeNull();
      expect(counter.getCounts()).toEqual({ warnings: 0, errors: 1 });
    });

    it('should return null when the stock element is missing', async () => {
      await expect(client.getStock('A3')).resolves.toBeNull();
      await expect(client.getStock('UNKNOWN')).resolves.toBeNull();
    });

    it('should return null on a non-200 response', async () => {
      await client.getAuthenticationToken();
      server.failNext('GetProductStock', { status: 500, data: 'Server Error' });

      await expect(client.getStock('A1')).resolves.toBeNull();
    });

    it('should return null on a malformed envelope', async () => {
      await client.getAuthenticationToken();
      server.failNext('GetProductStock', { status: 200, data: '<soap:Envelope><soap:Body>' });

      await expect(client.getStock('A1')).resolves.toBeNull();
    });

    it('should return null on a malformed inner document', async () => {
      await client.getAuthenticationToken();
      server.failNext('GetProductStock', { status: 200, data: envelope('GetProductStock', '<Products><Product>') });

      await expect(client.getStock('A1')).resolves.toBeNull();
    });

    it('should raise a timeout error after three timed-out attempts', async () => {
      await client.getAuthenticationToken();
      server.failNext('GetProductStock', { fail: 'timeout' }, 3);

      const error = await client.getStock('A1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportTimeoutError);
      expect(error).toMatchObject({ attempts: 3 });
      expect(server.callCount('GetProductStock')).toBe(3);
    });

    it('should recover from a timeout within the attempt budget', async () => {
      await client.getAuthenticationToken();
      server.failNext('GetProductStock', { fail: 'timeout' }, 2);

      await expect(client.getStock('A1')).resolves.toBe(42);
      expect(server.callCount('GetProductStock')).toBe(3);
    });

    it('should re-authenticate exactly once when the token expires', async () => {
      await expect(client.getStock('A1')).resolves.toBe(42);
      server.expireToken();

      await expect(client.getStock('A1')).resolves.toBe(42);

      expect(server.issuedTokens).toEqual(['token-1', 'token-2']);
      expect(server.callCount('GetAuthenticationToken')).toBe(2);
      expect(server.callCount('GetProductStock')).toBe(3);
      expect(client.tokenAttempts).toBe(2);
    });

    it('should fail when the renewed token is rejected too', async () => {
      server.rejectAllTokens();

      await expect(client.getStock('A1')).rejects.toBeInstanceOf(AuthenticationFailedError);

      expect(server.issuedTokens).toEqual(['token-1', 'token-2']);
      expect(server.callCount('GetProductStock')).toBe(2);
    });
  });

  // ============================================================================
  // Product Data
  // ============================================================================

  describe('getProductData', () => {
    it('should return barcode and price', async () => {
      await expect(client.getProductData('A1')).resolves.toEqual({
        code: 'A1',
        barcode: '5012345678900',
        price: '9.99',
      });
    });

    it('should return null when price or barcode is missing', async () => {
      await expect(client.getProductData('A2')).resolves.toBeNull();
      await expect(client.getProductData('A3')).resolves.toBeNull();
    });

    it('should expose the barcode on its own', async () => {
      await expect(client.getBarcode('A1')).resolves.toBe('5012345678900');
      await expect(client.getBarcode('A3')).resolves.toBeNull();
    });
  });
});
