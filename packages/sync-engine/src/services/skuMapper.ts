/**
 * SKU Mapper Service
 * Resolves distributor barcodes to storefront SKUs from a static lookup table
 * of the form `{ "<storefront SKU>": "<distributor barcode>" }`
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { createLogger, describeError } from '@distro-sync/integrations';
import type { Logger } from '@distro-sync/integrations';
import type { SkuLookup } from '../types.js';

export const skuMappingSchema = z.record(z.string(), z.string());

export type SkuMapping = z.infer<typeof skuMappingSchema>;

export interface SkuMapperOptions {
  logger?: Logger;
}

// ============================================================================
// SKU Mapper Service
// ============================================================================

export class SkuMapper implements SkuLookup {
  private readonly skuByBarcode = new Map<string, string>();
  private readonly barcodeBySku = new Map<string, string>();
  private duplicateCount = 0;

  constructor(mapping: SkuMapping = {}) {
    for (const [sku, barcode] of Object.entries(mapping)) {
      const key = barcode.trim();
      this.barcodeBySku.set(sku, key);
      // First SKU in file order wins for a shared barcode
      if (this.skuByBarcode.has(key)) {
        this.duplicateCount++;
        continue;
      }
      this.skuByBarcode.set(key, sku);
    }
  }

  /**
   * Load the table from a JSON file. A missing or unreadable file yields an
   * empty mapping and a logged warning.
   */
  static async fromFile(path: string, options: SkuMapperOptions = {}): Promise<SkuMapper> {
    const logger = options.logger ?? createLogger('sku-mapper');

    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      logger.warn({ path, ...describeError(error) }, 'SKU mapping file could not be read, using an empty mapping');
      return new SkuMapper();
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn({ path, ...describeError(error) }, 'SKU mapping file is not valid JSON, using an empty mapping');
      return new SkuMapper();
    }

    const parsed = skuMappingSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn(
        { path, issues: parsed.error.issues.map((issue) => issue.path.join('.')) },
        'SKU mapping file must map SKUs to barcode strings, using an empty mapping'
      );
      return new SkuMapper();
    }

    const mapper = new SkuMapper(parsed.data);
    logger.info({ path, entries: mapper.size, duplicateBarcodes: mapper.duplicates }, 'Loaded SKU mapping');
    return mapper;
  }

  get size(): number {
    return this.barcodeBySku.size;
  }

  /** Barcodes that appear under more than one SKU, beyond their first */
  get duplicates(): number {
    return this.duplicateCount;
  }

  skuForBarcode(barcode: string): string | null {
    return this.skuByBarcode.get(barcode.trim()) ?? null;
  }
}
