/**
 * Shopify Integration
 * Exports for the Shopify Admin REST client
 */

export { ShopifyApiClient, normalizeShopDomain, type ShopifyClientOptions } from './client.js';
export {
  DEFAULT_SHOPIFY_API_VERSION,
  type ShopifyClientConfig,
  type ShopifyInventoryLevel,
  type ShopifyProduct,
  type ShopifyVariant,
  type ShopifyVariantRef,
} from './types.js';
