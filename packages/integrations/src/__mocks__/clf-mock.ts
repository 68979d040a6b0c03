/**
 * Mock CLF Web Ordering Service
 * Simulates the SOAP endpoint, including server-side token invalidation
 */

import { escapeXml, AUTH_REQUIRED_MARKER, CLF_NAMESPACE } from '../clf/soap.js';
import type { ClfOperation } from '../clf/types.js';
import { createMockTransport } from './http.js';
import type { MockOutcome, MockTransport, RecordedRequest } from './http.js';

export interface MockClfProduct {
  /** Raw text of the `stock` element; omitted means no element */
  stock?: string;
  barcode?: string;
  msrp?: string;
}

export interface ClfMockOptions {
  username?: string;
  password?: string;
  products?: Record<string, MockClfProduct>;
}

const OPERATIONS: ClfOperation[] = ['GetAuthenticationToken', 'GetProductCodes', 'GetProductStock', 'GetProductData'];

export class ClfMockServer {
  readonly transport: MockTransport;
  readonly products: Map<string, MockClfProduct>;
  readonly issuedTokens: string[] = [];

  private readonly username: string;
  private readonly password: string;
  private validToken: string | null = null;
  private expireEveryToken = false;
  private readonly failures = new Map<ClfOperation, MockOutcome[]>();
  private readonly calls = new Map<ClfOperation, number>();

  constructor(options: ClfMockOptions = {}) {
    this.username = options.username ?? 'test-user';
    this.password = options.password ?? 'test-secret';
    this.products = new Map(Object.entries(options.products ?? {}));
    this.transport = createMockTransport((request) => this.handle(request));
  }

  get adapter() {
    return this.transport.adapter;
  }

  /** Invalidate the current token server-side */
  expireToken(): void {
    this.validToken = null;
  }

  /** Reject every token, including freshly issued ones */
  rejectAllTokens(): void {
    this.expireEveryToken = true;
  }

  /** Answer the next `times` calls of `operation` with `outcome` */
  failNext(operation: ClfOperation, outcome: MockOutcome, times = 1): void {
    const queue = this.failures.get(operation) ?? [];
    for (let i = 0; i < times; i++) queue.push(outcome);
    this.failures.set(operation, queue);
  }

  callCount(operation: ClfOperation): number {
    return this.calls.get(operation) ?? 0;
  }

  // ============================================================================
  // Request Handling
  // ============================================================================

  private handle(request: RecordedRequest): MockOutcome {
    const operation = OPERATIONS.find((op) => request.body.includes(`<${op} xmlns`));
    if (!operation) {
      return { status: 500, data: 'Unknown SOAP operation' };
    }
    this.calls.set(operation, this.callCount(operation) + 1);

    const injected = this.failures.get(operation)?.shift();
    if (injected) {
      return injected;
    }

    if (operation === 'GetAuthenticationToken') {
      return this.authenticate(request.body);
    }

    const token = /<AuthenticationToken>(.*?)<\/AuthenticationToken>/.exec(request.body)?.[1];
    if (this.expireEveryToken || token === undefined || token !== this.validToken) {
      return ok(envelope(operation, '', AUTH_REQUIRED_MARKER));
    }

    const code = /&lt;Code&gt;(.*?)&lt;\/Code&gt;/.exec(request.body)?.[1] ?? '';
    switch (operation) {
      case 'GetProductCodes':
        return ok(envelope(operation, this.productCodesXml()));
      case 'GetProductStock':
        return ok(envelope(operation, this.stockXml(code)));
      case 'GetProductData':
        return ok(envelope(operation, this.productDataXml(code)));
    }
  }

  private authenticate(body: string): MockOutcome {
    const username = /<Username>(.*?)<\/Username>/.exec(body)?.[1];
    const password = /<Password>(.*?)<\/Password>/.exec(body)?.[1];
    if (username !== this.username || password !== this.password) {
      return ok(envelope('GetAuthenticationToken', ''));
    }
    const token = `token-${this.issuedTokens.length + 1}`;
    this.issuedTokens.push(token);
    this.validToken = token;
    return ok(envelope('GetAuthenticationToken', token, undefined, false));
  }

  private productCodesXml(): string {
    const codes = [...this.products.keys()].map((code) => `<Code><sku>${code}</sku></Code>`).join('');
    return `<ProductCodes>${codes}</ProductCodes>`;
  }

  private stockXml(code: string): string {
    const product = this.products.get(code);
    if (!product) return '<Products />';
    const stock = product.stock === undefined ? '' : `<stock>${product.stock}</stock>`;
    return `<Products><Product><code>${code}</code>${stock}</Product></Products>`;
  }

  private productDataXml(code: string): string {
    const product = this.products.get(code);
    if (!product) return '<Products />';
    const msrp = product.msrp === undefined ? '' : `<msrp>${product.msrp}</msrp>`;
    const barcode = product.barcode === undefined ? '' : `<barcode>${product.barcode}</barcode>`;
    return `<Products><Product><code>${code}</code>${msrp}${barcode}</Product></Products>`;
  }
}

// ============================================================================
// Envelope Helpers
// ============================================================================

function ok(data: string): MockOutcome {
  return { status: 200, data, headers: { 'Content-Type': 'text/xml; charset=utf-8' } };
}

/**
 * Build a response envelope. The result is escaped, as the service sends its
 * inner documents as text.
 */
export function envelope(operation: ClfOperation, result: string, errorMessage?: string, escape = true): string {
  const header = errorMessage
    ? `<soap:Header><WebServiceHeader xmlns="${CLF_NAMESPACE}"><ErrorMessage>${errorMessage}</ErrorMessage></WebServiceHeader></soap:Header>`
    : '';
  const content = escape ? escapeXml(result) : result;
  return [
    '<?xml version="1.0" encoding="utf-8"?>',
    '<soap:Envelope xmlns:soap="http://schemas.xmlsoap.org/soap/envelope/">',
    header,
    `<soap:Body><${operation}Response xmlns="${CLF_NAMESPACE}"><${operation}Result>${content}</${operation}Result></${operation}Response></soap:Body>`,
    '</soap:Envelope>',
  ].join('');
}
