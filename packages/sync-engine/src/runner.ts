/**
 * Inventory Sync Runner
 * One sequential pass over every distributor product code: stock and product
 * data from the distributor, barcode to SKU mapping, then the storefront update.
 */

import {
  ShopifyValidationError,
  TokenLimitExceededError,
  TransportTimeoutError,
  createLogger,
  describeError,
  isIntegrationError,
} from '@distro-sync/integrations';
import type { ClfProductRecord, Logger, LogCounts, ShopifyVariantRef } from '@distro-sync/integrations';
import { SyncRunEventBus } from './events.js';
import { RunStatsCollector } from './stats.js';
import type {
  AbortReason,
  DistributorSource,
  InventorySyncRunnerOptions,
  RunStatistics,
  SkuLookup,
  StorefrontTarget,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_UPDATE_RETRY_DELAY_MS = 60000;

// ============================================================================
// Runner Dependencies
// ============================================================================

export interface InventorySyncRunnerDependencies {
  distributor: DistributorSource;
  storefront: StorefrontTarget;
  mapper: SkuLookup;
  eventBus?: SyncRunEventBus;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// Inventory Sync Runner Class
// ============================================================================

export class InventorySyncRunner {
  private readonly distributor: DistributorSource;
  private readonly storefront: StorefrontTarget;
  private readonly mapper: SkuLookup;
  private readonly eventBus: SyncRunEventBus;
  private readonly logger: Logger;
  private readonly updateRetryDelayMs: number;
  private readonly logCounts?: () => LogCounts;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(deps: InventorySyncRunnerDependencies, options: InventorySyncRunnerOptions = {}) {
    this.distributor = deps.distributor;
    this.storefront = deps.storefront;
    this.mapper = deps.mapper;
    this.logger = options.logger ?? createLogger('sync-runner');
    this.eventBus = deps.eventBus ?? new SyncRunEventBus();
    this.updateRetryDelayMs = options.updateRetryDelayMs ?? DEFAULT_UPDATE_RETRY_DELAY_MS;
    this.logCounts = options.logCounts;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  get events(): SyncRunEventBus {
    return this.eventBus;
  }

  /**
   * Process every product code once. Per-code failures are logged and the run
   * continues; only the token ceiling stops it early.
   */
  async run(): Promise<RunStatistics> {
    const collector = new RunStatsCollector(this.eventBus);
    const startedAt = this.now();

    this.logger.info('Starting stock update process');
    this.eventBus.emitRunStarted(startedAt);

    try {
      await this.processAll();
    } catch (error) {
      if (error instanceof TokenLimitExceededError) {
        this.abort('token_limit', error);
      } else {
        this.logger.error({ ...describeError(error) }, 'Critical error, run stopped');
        this.abort('fatal_error', error);
      }
    }

    const stats = collector.snapshot(this.now(), this.logCounts?.());
    collector.detach();

    this.eventBus.emitRunCompleted(stats);
    this.logger.info(
      {
        durationMs: stats.durationMs,
        codesProcessed: stats.codesProcessed,
        skusProcessed: stats.skusProcessed,
        productsUpdated: stats.productsUpdated,
        aborted: stats.aborted,
      },
      stats.aborted ? 'Stock update process stopped' : 'Stock update process completed'
    );
    return stats;
  }

  // ============================================================================
  // Processing
  // ============================================================================

  private async processAll(): Promise<void> {
    const codes = await this.distributor.listProductCodes();
    if (codes.length === 0) {
      this.logger.error({ operation: 'GetProductCodes' }, 'Failed to retrieve product codes');
      return;
    }

    this.logger.info({ count: codes.length }, `Retrieved ${codes.length} product codes to process`);

    for (const code of codes) {
      await this.processCode(code);
    }
  }

  /**
   * Carry one product code through to the storefront. Everything but the
   * token ceiling is caught here.
   */
  private async processCode(code: string): Promise<void> {
    let stage = 'GetProductStock';
    let sku: string | null = null;

    try {
      const record = await this.fetchRecord(code, (next) => {
        stage = next;
      });

      if (record.barcode === null) {
        this.logger.warn({ code }, `No barcode for product code: ${code}`);
        this.eventBus.emitProductSkipped({ code, sku, barcode: null, reason: 'no_barcode' });
        return;
      }

      sku = this.mapper.skuForBarcode(record.barcode);
      if (sku === null) {
        this.logger.warn({ code, barcode: record.barcode }, `Barcode not found in SKU mapping: ${record.barcode}`);
        this.eventBus.emitProductSkipped({ code, sku, barcode: record.barcode, reason: 'unmapped' });
        return;
      }

      if (record.stock === null) {
        this.logger.warn({ code, sku }, `Stock level unavailable, skipping update for SKU: ${sku}`);
        this.eventBus.emitProductSkipped({ code, sku, barcode: record.barcode, reason: 'no_stock' });
        return;
      }

      stage = 'findBySku';
      const ref = await this.storefront.findBySku(sku);
      if (ref === null) {
        this.logger.error(
          { code, sku, barcode: record.barcode },
          `Failed to get product/inventory IDs for barcode: ${record.barcode}`
        );
        this.eventBus.emitProductSkipped({ code, sku, barcode: record.barcode, reason: 'not_on_storefront' });
        return;
      }

      stage = 'setInventory';
      const attempts = await this.updateInventory(code, ref, record.stock);
      this.eventBus.emitProductUpdated({
        code,
        sku,
        productId: ref.productId,
        inventoryItemId: ref.inventoryItemId,
        quantity: record.stock,
        attempts,
      });
    } catch (error) {
      if (error instanceof TokenLimitExceededError) {
        throw error;
      }

      const described = describeError(error);
      const operation = isIntegrationError(error) ? error.operation : stage;
      this.logger.error(
        {
          code,
          sku,
          operation,
          ...(error instanceof TransportTimeoutError ? { attempts: error.attempts } : {}),
          ...described,
        },
        `Processing error for product code ${code}`
      );
      this.eventBus.emitProductFailed({
        code,
        sku,
        operation,
        errorType: described.errorType,
        error: described.errorMessage,
      });
    }
  }

  private async fetchRecord(code: string, enter: (stage: string) => void): Promise<ClfProductRecord> {
    enter('GetProductStock');
    const stock = await this.distributor.getStock(code);

    enter('GetProductData');
    const data = await this.distributor.getProductData(code);

    return { code, stock, barcode: data?.barcode ?? null, price: data?.price ?? null };
  }

  /**
   * Set the storefront quantity, retrying once after a fixed delay. A
   * validation rejection is final. Resolves to the attempts used.
   */
  private async updateInventory(code: string, ref: ShopifyVariantRef, quantity: number): Promise<number> {
    try {
      await this.storefront.setInventory(ref.inventoryItemId, quantity, ref.productId);
      return 1;
    } catch (error) {
      if (error instanceof ShopifyValidationError || error instanceof TokenLimitExceededError) {
        throw error;
      }
      this.logger.warn(
        { code, sku: ref.sku, productId: ref.productId, delayMs: this.updateRetryDelayMs, ...describeError(error) },
        `Retrying update after ${Math.round(this.updateRetryDelayMs / 1000)}s delay for product: ${ref.productId}`
      );
    }

    await this.sleep(this.updateRetryDelayMs);
    await this.storefront.setInventory(ref.inventoryItemId, quantity, ref.productId);
    return 2;
  }

  private abort(reason: AbortReason, error: unknown): void {
    const { errorMessage } = describeError(error);
    if (reason === 'token_limit') {
      this.logger.error({ reason, error: errorMessage }, 'Token generation limit exceeded. Run stopped.');
    }
    this.eventBus.emitRunAborted(reason, errorMessage);
  }
}
