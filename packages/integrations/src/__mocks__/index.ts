/**
 * Test doubles for the integration clients
 */

export * from './http.js';
export { ClfMockServer, envelope, type ClfMockOptions, type MockClfProduct } from './clf-mock.js';
export { ShopifyMockServer, type MockShopifyProduct, type MockShopifyVariant } from './shopify-mock.js';
