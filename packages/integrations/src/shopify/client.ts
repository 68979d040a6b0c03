/**
 * Shopify Admin REST API Client
 * SKU lookup and inventory level updates under the adaptive rate governor
 */

import axios from 'axios';
import type { AxiosAdapter, AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import PQueue from 'p-queue';
import type { Logger } from 'pino';
import { RateGovernor } from '../utils/rate-governor.js';
import type { RateState } from '../utils/rate-governor.js';
import { sendWithRetry } from '../utils/retry.js';
import { createLogger } from '../utils/logger.js';
import { ShopifyApiError, ShopifyValidationError, describeError } from '../errors.js';
import {
  DEFAULT_SHOPIFY_API_VERSION,
  shopifyInventoryLevelResponseSchema,
  shopifyProductsResponseSchema,
} from './types.js';
import type { ShopifyClientConfig, ShopifyInventoryLevel, ShopifyVariantRef } from './types.js';

const DEFAULT_TIMEOUT_MS = 30000;

export interface ShopifyClientOptions {
  /** Replaces the HTTP transport; tests pass an in-process adapter */
  adapter?: AxiosAdapter;
  logger?: Logger;
  /** Receives one record per successful inventory update */
  updateLog?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export class ShopifyApiClient {
  private readonly config: Required<Pick<ShopifyClientConfig, 'apiVersion' | 'timeout'>> & ShopifyClientConfig;
  private readonly httpClient: AxiosInstance;
  private readonly governor: RateGovernor;
  private readonly queue: PQueue;
  private readonly logger: Logger;
  private readonly updateLog: Logger;

  constructor(config: ShopifyClientConfig, options: ShopifyClientOptions = {}) {
    this.config = {
      apiVersion: DEFAULT_SHOPIFY_API_VERSION,
      timeout: DEFAULT_TIMEOUT_MS,
      ...config,
    };
    this.logger = options.logger ?? createLogger('shopify');
    this.updateLog = options.updateLog ?? this.logger;

    this.httpClient = axios.create({
      baseURL: `https://${normalizeShopDomain(this.config.shopUrl)}/admin/api/${this.config.apiVersion}`,
      timeout: this.config.timeout,
      headers: {
        'X-Shopify-Access-Token': this.config.accessToken,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });

    this.governor = new RateGovernor(this.config.rateLimits, {
      logger: this.logger,
      sleep: options.sleep,
      now: options.now,
    });

    // Storefront calls are strictly one at a time
    this.queue = new PQueue({ concurrency: 1 });
  }

  getRateState(): Readonly<RateState> {
    return this.governor.getState();
  }

  // ============================================================================
  // Product Operations
  // ============================================================================

  /**
   * Resolve a SKU to its product, variant and inventory item. Null when the
   * shop has no variant with that SKU.
   */
  async findBySku(sku: string): Promise<ShopifyVariantRef | null> {
    const operation = 'findBySku';
    const response = await this.request(operation, sku, {
      method: 'GET',
      url: '/products.json',
      params: { sku },
    });

    if (response.status === 404) {
      this.logger.info({ operation, sku }, 'Product not found');
      return null;
    }
    if (response.status !== 200) {
      throw new ShopifyApiError(operation, response.status, bodyText(response.data));
    }

    const parsed = shopifyProductsResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      this.logger.error({ operation, sku, issues: parsed.error.issues.length }, 'Unexpected products payload');
      return null;
    }

    for (const product of parsed.data.products) {
      const variant = product.variants.find((v) => v.sku === sku);
      if (variant) {
        this.logger.info(
          { operation, sku, productId: product.id, inventoryQuantity: variant.inventory_quantity ?? null },
          'Product found'
        );
        return {
          sku,
          productId: product.id,
          variantId: variant.id,
          inventoryItemId: variant.inventory_item_id,
          inventoryQuantity: variant.inventory_quantity ?? null,
        };
      }
    }

    this.logger.info({ operation, sku }, 'Product not found');
    return null;
  }

  // ============================================================================
  // Inventory Operations
  // ============================================================================

  /**
   * Set the available quantity of an inventory item at the configured location.
   * A 422 (tracking disabled, invalid item) is terminal.
   */
  async setInventory(inventoryItemId: number, quantity: number, productId: number): Promise<ShopifyInventoryLevel> {
    const operation = 'setInventory';
    const response = await this.request(operation, String(productId), {
      method: 'POST',
      url: '/inventory_levels/set.json',
      data: {
        location_id: this.config.locationId,
        inventory_item_id: inventoryItemId,
        available: quantity,
      },
    });

    if (response.status === 422) {
      throw new ShopifyValidationError(operation, bodyText(response.data));
    }
    if (response.status !== 200) {
      throw new ShopifyApiError(operation, response.status, bodyText(response.data));
    }

    const parsed = shopifyInventoryLevelResponseSchema.safeParse(response.data);
    const level: ShopifyInventoryLevel = parsed.success
      ? {
          inventoryItemId: parsed.data.inventory_level.inventory_item_id,
          locationId: parsed.data.inventory_level.location_id,
          available: parsed.data.inventory_level.available ?? quantity,
          updatedAt: parsed.data.inventory_level.updated_at ?? null,
        }
      : { inventoryItemId, locationId: this.config.locationId, available: quantity, updatedAt: null };

    this.updateLog.info(
      { productId, inventoryItemId, quantity: level.available, updatedAt: level.updatedAt ?? new Date().toISOString() },
      `Inventory level updated successfully for product: ${productId}`
    );
    return level;
  }

  // ============================================================================
  // Helper Methods
  // ============================================================================

  private async request(operation: string, identifier: string, config: AxiosRequestConfig): Promise<AxiosResponse> {
    return this.queue.add(
      () =>
        this.governor.execute(
          () =>
            sendWithRetry(() => this.httpClient.request(config), {
              operation,
              identifier,
              policy: this.config.transport,
              logger: this.logger,
            }),
          { operation, identifier }
        ),
      { throwOnTimeout: true }
    );
  }
}

export function normalizeShopDomain(shopUrl: string): string {
  return shopUrl.replace(/^https?:\/\//i, '').replace(/\/+$/, '');
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  try {
    return JSON.stringify(data);
  } catch (error) {
    return describeError(error).errorMessage;
  }
}
