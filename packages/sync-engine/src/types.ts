/**
 * Sync Engine Types
 * Run statistics, runner dependencies and run events
 */

import type { ClfProductData, ShopifyInventoryLevel, ShopifyVariantRef, Logger, LogCounts } from '@distro-sync/integrations';

// ============================================================================
// Collaborators
// ============================================================================

/** The distributor operations a run depends on */
export interface DistributorSource {
  listProductCodes(): Promise<string[]>;
  getStock(code: string): Promise<number | null>;
  getProductData(code: string): Promise<ClfProductData | null>;
}

/** The storefront operations a run depends on */
export interface StorefrontTarget {
  findBySku(sku: string): Promise<ShopifyVariantRef | null>;
  setInventory(inventoryItemId: number, quantity: number, productId: number): Promise<ShopifyInventoryLevel>;
}

export interface SkuLookup {
  skuForBarcode(barcode: string): string | null;
}

// ============================================================================
// Run Statistics
// ============================================================================

export type AbortReason = 'token_limit' | 'fatal_error';

export interface RunStatistics {
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  /** Distributor codes that reached an outcome */
  codesProcessed: number;
  /** Codes whose barcode mapped to a storefront SKU */
  skusProcessed: number;
  productsUpdated: number;
  updatedSkus: string[];
  errorCount: number;
  warningCount: number;
  aborted: boolean;
  abortReason?: AbortReason;
}

export interface InventorySyncRunnerOptions {
  /** Wait before the single retry of a failed inventory update */
  updateRetryDelayMs?: number;
  /** Warning and error totals; defaults to counting skipped and failed codes */
  logCounts?: () => LogCounts;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

// ============================================================================
// Run Outcomes
// ============================================================================

export type SkipReason = 'no_barcode' | 'unmapped' | 'no_stock' | 'not_on_storefront';

export interface ProductUpdate {
  code: string;
  sku: string;
  productId: number;
  inventoryItemId: number;
  quantity: number;
  /** 2 when the update only succeeded on its retry */
  attempts: number;
}

export interface ProductSkip {
  code: string;
  sku: string | null;
  barcode: string | null;
  reason: SkipReason;
}

export interface ProductFailure {
  code: string;
  sku: string | null;
  operation: string;
  errorType: string;
  error: string;
}

// ============================================================================
// Event Types
// ============================================================================

export interface RunStartedEvent {
  type: 'run:started';
  payload: { startedAt: Date };
  timestamp: Date;
}

export interface ProductUpdatedEvent {
  type: 'product:updated';
  payload: ProductUpdate;
  timestamp: Date;
}

export interface ProductSkippedEvent {
  type: 'product:skipped';
  payload: ProductSkip;
  timestamp: Date;
}

export interface ProductFailedEvent {
  type: 'product:failed';
  payload: ProductFailure;
  timestamp: Date;
}

export interface RunAbortedEvent {
  type: 'run:aborted';
  payload: { reason: AbortReason; error: string };
  timestamp: Date;
}

export interface RunCompletedEvent {
  type: 'run:completed';
  payload: RunStatistics;
  timestamp: Date;
}

export type SyncRunEvent =
  | RunStartedEvent
  | ProductUpdatedEvent
  | ProductSkippedEvent
  | ProductFailedEvent
  | RunAbortedEvent
  | RunCompletedEvent;

export type SyncRunEventType = SyncRunEvent['type'];
