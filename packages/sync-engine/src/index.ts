/**
 * Distro Sync - Sync Engine
 * Sequential inventory sync from the CLF distributor into a Shopify storefront
 *
 * - InventorySyncRunner: walks every distributor product code through to the storefront
 * - SkuMapper: static barcode to SKU lookup
 * - SyncRunEventBus / RunStatsCollector: run events and the statistics folded from them
 *
 * @packageDocumentation
 */

// ============================================================================
// Runner
// ============================================================================

export {
  InventorySyncRunner,
  DEFAULT_UPDATE_RETRY_DELAY_MS,
  type InventorySyncRunnerDependencies,
} from './runner.js';

// ============================================================================
// Event Bus & Statistics
// ============================================================================

export { SyncRunEventBus, type SyncRunEventMap } from './events.js';
export { RunStatsCollector } from './stats.js';

// ============================================================================
// Services
// ============================================================================

export {
  SkuMapper,
  skuMappingSchema,
  type SkuMapping,
  type SkuMapperOptions,
} from './services/skuMapper.js';

// ============================================================================
// Types
// ============================================================================

export type * from './types.js';
