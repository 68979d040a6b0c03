/**
 * Mock Shopify Admin REST API
 * Simulates product lookup and inventory level updates for testing
 */

import { createMockTransport } from './http.js';
import type { MockOutcome, MockTransport, RecordedRequest } from './http.js';

export interface MockShopifyVariant {
  id: number;
  sku: string;
  inventory_item_id: number;
  inventory_quantity: number;
}

export interface MockShopifyProduct {
  id: number;
  title: string;
  variants: MockShopifyVariant[];
}

type Route = 'products' | 'inventory';

export class ShopifyMockServer {
  readonly transport: MockTransport;
  readonly products: MockShopifyProduct[];
  readonly levels = new Map<number, number>();
  /** Inventory items with tracking disabled; updates answer 422 */
  readonly untracked = new Set<number>();
  /** Value sent in X-Shopify-Shop-Api-Call-Limit, if any */
  callLimit: string | undefined;

  private readonly queued = new Map<Route, MockOutcome[]>();

  constructor(products: MockShopifyProduct[] = []) {
    this.products = products;
    for (const product of products) {
      for (const variant of product.variants) {
        this.levels.set(variant.inventory_item_id, variant.inventory_quantity);
      }
    }
    this.transport = createMockTransport((request) => this.handle(request));
  }

  get adapter() {
    return this.transport.adapter;
  }

  /** Answer the next `times` calls to `route` with `outcome` */
  queue(route: Route, outcome: MockOutcome, times = 1): void {
    const pending = this.queued.get(route) ?? [];
    for (let i = 0; i < times; i++) pending.push(outcome);
    this.queued.set(route, pending);
  }

  requestsTo(route: Route): RecordedRequest[] {
    return this.transport.requests.filter((request) => routeOf(request) === route);
  }

  private handle(request: RecordedRequest): MockOutcome {
    const route = routeOf(request);
    if (!route) {
      return { status: 404, data: { errors: 'Not Found' } };
    }

    const queued = this.queued.get(route)?.shift();
    if (queued) {
      return queued;
    }

    return route === 'products' ? this.findProducts(request) : this.setLevel(request);
  }

  private findProducts(request: RecordedRequest): MockOutcome {
    const sku = readSku(request.params);
    const products = this.products.filter((product) => product.variants.some((variant) => variant.sku === sku));
    return this.reply({ status: 200, data: { products } });
  }

  private setLevel(request: RecordedRequest): MockOutcome {
    const body: unknown = JSON.parse(request.body);
    if (!isLevelRequest(body)) {
      return this.reply({ status: 400, data: { errors: 'Bad Request' } });
    }
    if (this.untracked.has(body.inventory_item_id)) {
      return this.reply({
        status: 422,
        data: { errors: ['Inventory item does not have inventory tracking enabled'] },
      });
    }
    this.levels.set(body.inventory_item_id, body.available);
    return this.reply({
      status: 200,
      data: {
        inventory_level: {
          inventory_item_id: body.inventory_item_id,
          location_id: body.location_id,
          available: body.available,
          updated_at: '2024-01-01T00:00:00Z',
        },
      },
    });
  }

  private reply(outcome: { status: number; data: unknown }): MockOutcome {
    return this.callLimit === undefined
      ? outcome
      : { ...outcome, headers: { 'X-Shopify-Shop-Api-Call-Limit': this.callLimit } };
  }
}

function routeOf(request: RecordedRequest): Route | null {
  if (request.method === 'GET' && request.url === '/products.json') return 'products';
  if (request.method === 'POST' && request.url === '/inventory_levels/set.json') return 'inventory';
  return null;
}

function readSku(params: unknown): string | undefined {
  if (typeof params === 'object' && params !== null && 'sku' in params && typeof params.sku === 'string') {
    return params.sku;
  }
  return undefined;
}

function isLevelRequest(
  body: unknown
): body is { location_id: number; inventory_item_id: number; available: number } {
  return (
    typeof body === 'object' &&
    body !== null &&
    'location_id' in body &&
    typeof body.location_id === 'number' &&
    'inventory_item_id' in body &&
    typeof body.inventory_item_id === 'number' &&
    'available' in body &&
    typeof body.available === 'number'
  );
}
