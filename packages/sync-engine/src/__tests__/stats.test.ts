/**
 * Event Bus & Run Statistics Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { SyncRunEventBus } from '../events.js';
import { RunStatsCollector } from '../stats.js';

describe('SyncRunEventBus', () => {
  it('should deliver typed events to their subscribers', () => {
    const bus = new SyncRunEventBus();
    const listener = vi.fn();
    bus.onProductSkipped(listener);

    bus.emitProductSkipped({ code: 'A1', sku: null, barcode: '999', reason: 'unmapped' });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0]).toMatchObject({
      type: 'product:skipped',
      payload: { code: 'A1', reason: 'unmapped' },
    });
  });
});

describe('RunStatsCollector', () => {
  it('should fold outcomes into the run statistics', () => {
    const bus = new SyncRunEventBus();
    const collector = new RunStatsCollector(bus);

    bus.emitRunStarted(new Date('2024-03-01T06:00:00Z'));
    bus.emitProductUpdated({ code: 'A1', sku: 'SKU-1', productId: 1, inventoryItemId: 101, quantity: 4, attempts: 1 });
    bus.emitProductSkipped({ code: 'A2', sku: null, barcode: '999', reason: 'unmapped' });
    bus.emitProductSkipped({ code: 'A3', sku: 'SKU-3', barcode: '333', reason: 'no_stock' });
    bus.emitProductFailed({ code: 'A4', sku: 'SKU-4', operation: 'findBySku', errorType: 'ShopifyApiError', error: 'HTTP 500' });

    const stats = collector.snapshot(new Date('2024-03-01T06:00:10Z'));

    expect(stats).toEqual({
      startedAt: new Date('2024-03-01T06:00:00Z'),
      finishedAt: new Date('2024-03-01T06:00:10Z'),
      durationMs: 10000,
      codesProcessed: 4,
      skusProcessed: 3,
      productsUpdated: 1,
      updatedSkus: ['SKU-1'],
      errorCount: 1,
      warningCount: 2,
      aborted: false,
    });
  });

  it('should record why a run was stopped', () => {
    const bus = new SyncRunEventBus();
    const collector = new RunStatsCollector(bus);

    bus.emitRunAborted('token_limit', 'Token generation limit of 20 attempts exceeded');

    expect(collector.snapshot(new Date(), { warnings: 0, errors: 3 })).toMatchObject({
      aborted: true,
      abortReason: 'token_limit',
      errorCount: 3,
    });
  });

  it('should stop counting once detached', () => {
    const bus = new SyncRunEventBus();
    const collector = new RunStatsCollector(bus);
    collector.detach();

    bus.emitProductSkipped({ code: 'A1', sku: null, barcode: null, reason: 'no_barcode' });

    expect(collector.snapshot(new Date()).codesProcessed).toBe(0);
    expect(bus.listenerCount('product:skipped')).toBe(0);
  });
});
