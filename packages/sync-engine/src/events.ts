/**
 * Sync Run Event Bus
 * Typed EventEmitter carrying the outcome of every product code in a run
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from '@distro-sync/integrations';
import type {
  SyncRunEvent,
  RunStartedEvent,
  ProductUpdatedEvent,
  ProductSkippedEvent,
  ProductFailedEvent,
  RunAbortedEvent,
  RunCompletedEvent,
  ProductUpdate,
  ProductSkip,
  ProductFailure,
  RunStatistics,
  AbortReason,
} from './types.js';

// ============================================================================
// Event Type Mapping
// ============================================================================

export interface SyncRunEventMap {
  'run:started': (event: RunStartedEvent) => void;
  'product:updated': (event: ProductUpdatedEvent) => void;
  'product:skipped': (event: ProductSkippedEvent) => void;
  'product:failed': (event: ProductFailedEvent) => void;
  'run:aborted': (event: RunAbortedEvent) => void;
  'run:completed': (event: RunCompletedEvent) => void;
}

// ============================================================================
// Typed Event Bus
// ============================================================================

export class SyncRunEventBus extends EventEmitter<SyncRunEventMap> {
  private readonly logger?: Logger;

  /** Every event is traced at debug level on `logger` */
  constructor(logger?: Logger) {
    super();
    this.logger = logger;
  }

  emitRunStarted(startedAt: Date): void {
    const event: RunStartedEvent = { type: 'run:started', payload: { startedAt }, timestamp: new Date() };
    this.trace(event);
    this.emit('run:started', event);
  }

  emitProductUpdated(payload: ProductUpdate): void {
    const event: ProductUpdatedEvent = { type: 'product:updated', payload, timestamp: new Date() };
    this.trace(event);
    this.emit('product:updated', event);
  }

  emitProductSkipped(payload: ProductSkip): void {
    const event: ProductSkippedEvent = { type: 'product:skipped', payload, timestamp: new Date() };
    this.trace(event);
    this.emit('product:skipped', event);
  }

  emitProductFailed(payload: ProductFailure): void {
    const event: ProductFailedEvent = { type: 'product:failed', payload, timestamp: new Date() };
    this.trace(event);
    this.emit('product:failed', event);
  }

  emitRunAborted(reason: AbortReason, error: string): void {
    const event: RunAbortedEvent = { type: 'run:aborted', payload: { reason, error }, timestamp: new Date() };
    this.trace(event);
    this.emit('run:aborted', event);
  }

  emitRunCompleted(payload: RunStatistics): void {
    const event: RunCompletedEvent = { type: 'run:completed', payload, timestamp: new Date() };
    this.trace(event);
    this.emit('run:completed', event);
  }

  onRunStarted(listener: (event: RunStartedEvent) => void): this {
    return this.on('run:started', listener);
  }

  onProductUpdated(listener: (event: ProductUpdatedEvent) => void): this {
    return this.on('product:updated', listener);
  }

  onProductSkipped(listener: (event: ProductSkippedEvent) => void): this {
    return this.on('product:skipped', listener);
  }

  onProductFailed(listener: (event: ProductFailedEvent) => void): this {
    return this.on('product:failed', listener);
  }

  onRunAborted(listener: (event: RunAbortedEvent) => void): this {
    return this.on('run:aborted', listener);
  }

  private trace(event: SyncRunEvent): void {
    this.logger?.debug({ event: event.type, payload: event.payload }, `[SyncRunEventBus] ${event.type}`);
  }
}
