/**
 * Run Log Files Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createRunId, createRunLogs, formatDateStamp, runLogFiles } from '../logging/run-logs.js';

function records(content: string): Array<Record<string, unknown>> {
  return content
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line) => {
      const record: unknown = JSON.parse(line);
      return typeof record === 'object' && record !== null ? Object.fromEntries(Object.entries(record)) : {};
    });
}

describe('run log names', () => {
  it('should stamp the local date', () => {
    expect(formatDateStamp(new Date(2024, 0, 5, 23, 59))).toBe('20240105');
  });

  it('should create a short hex run id', () => {
    expect(createRunId()).toMatch(/^[0-9a-f]{4}$/);
  });

  it('should name the three run files', () => {
    expect(runLogFiles('logs', new Date(2024, 5, 1), 'ab12')).toEqual({
      general: join('logs', 'LOGS_20240601_ab12.txt'),
      crash: join('logs', 'CRASH_LOGS_20240601_ab12.txt'),
      updates: join('logs', 'UPDATED_PRODUCTS_LOGS_20240601_ab12.txt'),
    });
  });
});

describe('createRunLogs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'distro-sync-run-logs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should route records by level and count warnings and errors', async () => {
    const logs = createRunLogs({ dir: join(dir, 'logs'), now: new Date(2024, 5, 1), runId: 'ab12' });

    logs.logger.debug('hidden');
    logs.logger.info('Starting stock update process');
    logs.logger.warn('Barcode not found in SKU mapping: 222');
    logs.logger.error('Processing error for product code A3');
    logs.updateLog.info('Inventory level updated successfully for product: 1');
    logs.close();

    expect(logs.files.general).toBe(join(dir, 'logs', 'LOGS_20240601_ab12.txt'));

    const general = records(await readFile(logs.files.general, 'utf8'));
    expect(general.map((record) => record.msg)).toEqual([
      'Starting stock update process',
      'Barcode not found in SKU mapping: 222',
      'Processing error for product code A3',
    ]);
    expect(typeof general[0]?.time).toBe('string');

    const crash = records(await readFile(logs.files.crash, 'utf8'));
    expect(crash.map((record) => record.msg)).toEqual(['Processing error for product code A3']);

    const updates = records(await readFile(logs.files.updates, 'utf8'));
    expect(updates).toHaveLength(1);
    expect(updates[0]?.msg).toBe('Inventory level updated successfully for product: 1');
    expect(updates[0]?.name).toBe('updates');

    expect(logs.counter.getCounts()).toEqual({ warnings: 1, errors: 1 });
  });

  it('should honour the configured level', async () => {
    const logs = createRunLogs({ dir, level: 'debug', now: new Date(2024, 5, 1), runId: 'cd34' });

    logs.logger.debug('Retrieving stock for product code: A1');
    logs.close();

    const general = records(await readFile(logs.files.general, 'utf8'));
    expect(general.map((record) => record.msg)).toEqual(['Retrieving stock for product code: A1']);
  });
});
