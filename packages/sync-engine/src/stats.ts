/**
 * Run Statistics Collector
 * Folds run events into the statistics record handed to the report
 */

import type { LogCounts } from '@distro-sync/integrations';
import type { SyncRunEventBus } from './events.js';
import type {
  AbortReason,
  ProductFailedEvent,
  ProductSkippedEvent,
  ProductUpdatedEvent,
  RunAbortedEvent,
  RunStartedEvent,
  RunStatistics,
} from './types.js';

export class RunStatsCollector {
  private startedAt: Date | null = null;
  private codesProcessed = 0;
  private skusProcessed = 0;
  private failures = 0;
  private skips = 0;
  private readonly updatedSkus: string[] = [];
  private abortReason: AbortReason | undefined;

  private readonly eventBus: SyncRunEventBus;

  private readonly handleStarted = (event: RunStartedEvent): void => {
    this.startedAt = event.payload.startedAt;
  };

  private readonly handleUpdated = (event: ProductUpdatedEvent): void => {
    this.codesProcessed++;
    this.skusProcessed++;
    this.updatedSkus.push(event.payload.sku);
  };

  private readonly handleSkipped = (event: ProductSkippedEvent): void => {
    this.codesProcessed++;
    this.skips++;
    if (event.payload.sku !== null) this.skusProcessed++;
  };

  private readonly handleFailed = (event: ProductFailedEvent): void => {
    this.codesProcessed++;
    this.failures++;
    if (event.payload.sku !== null) this.skusProcessed++;
  };

  private readonly handleAborted = (event: RunAbortedEvent): void => {
    this.abortReason = event.payload.reason;
  };

  constructor(eventBus: SyncRunEventBus) {
    this.eventBus = eventBus;
    eventBus
      .onRunStarted(this.handleStarted)
      .onProductUpdated(this.handleUpdated)
      .onProductSkipped(this.handleSkipped)
      .onProductFailed(this.handleFailed)
      .onRunAborted(this.handleAborted);
  }

  /**
   * Stop listening to the bus
   */
  detach(): void {
    this.eventBus
      .off('run:started', this.handleStarted)
      .off('product:updated', this.handleUpdated)
      .off('product:skipped', this.handleSkipped)
      .off('product:failed', this.handleFailed)
      .off('run:aborted', this.handleAborted);
  }

  /**
   * Statistics as of `finishedAt`. Without log counts, failed codes count as
   * errors and skipped codes as warnings.
   */
  snapshot(finishedAt: Date, logCounts?: LogCounts): RunStatistics {
    const startedAt = this.startedAt ?? finishedAt;
    const stats: RunStatistics = {
      startedAt,
      finishedAt,
      durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
      codesProcessed: this.codesProcessed,
      skusProcessed: this.skusProcessed,
      productsUpdated: this.updatedSkus.length,
      updatedSkus: [...this.updatedSkus],
      errorCount: logCounts?.errors ?? this.failures,
      warningCount: logCounts?.warnings ?? this.skips,
      aborted: this.abortReason !== undefined,
    };
    if (this.abortReason !== undefined) {
      stats.abortReason = this.abortReason;
    }
    return stats;
  }
}
