/**
 * Shopify Admin REST API Types
 */

import { z } from 'zod';
import type { RateGovernorOptions } from '../utils/rate-governor.js';
import type { TransportPolicy } from '../utils/retry.js';

export const DEFAULT_SHOPIFY_API_VERSION = '2023-04';

export interface ShopifyClientConfig {
  /** Shop domain, e.g. `example.myshopify.com` (a scheme is tolerated) */
  shopUrl: string;
  accessToken: string;
  /** Location whose available quantity is set */
  locationId: number;
  apiVersion?: string;
  /** Per-call timeout in milliseconds */
  timeout?: number;
  transport?: Partial<TransportPolicy>;
  rateLimits?: Partial<RateGovernorOptions>;
}

/**
 * Storefront identifiers resolved from a SKU
 */
export interface ShopifyVariantRef {
  sku: string;
  productId: number;
  variantId: number;
  inventoryItemId: number;
  inventoryQuantity: number | null;
}

export interface ShopifyInventoryLevel {
  inventoryItemId: number;
  locationId: number;
  available: number;
  updatedAt: string | null;
}

// ============================================================================
// Response Schemas
// ============================================================================

export const shopifyVariantSchema = z.object({
  id: z.number(),
  sku: z.string().nullable().optional(),
  inventory_item_id: z.number(),
  inventory_quantity: z.number().nullable().optional(),
});

export const shopifyProductSchema = z.object({
  id: z.number(),
  title: z.string().optional(),
  variants: z.array(shopifyVariantSchema),
});

export const shopifyProductsResponseSchema = z.object({
  products: z.array(shopifyProductSchema),
});

export const shopifyInventoryLevelResponseSchema = z.object({
  inventory_level: z.object({
    inventory_item_id: z.number(),
    location_id: z.number(),
    available: z.number().nullable(),
    updated_at: z.string().nullable().optional(),
  }),
});

export type ShopifyProduct = z.infer<typeof shopifyProductSchema>;
export type ShopifyVariant = z.infer<typeof shopifyVariantSchema>;
