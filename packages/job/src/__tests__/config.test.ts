/**
 * Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError, loadConfig, toClfConfig, toShopifyConfig } from '../config/index.js';

const baseEnv = {
  CLF_BASE_URL: 'https://clf.example.test/service.asmx',
  CLF_USERNAME: 'test-user',
  CLF_PASSWORD: 'test-secret',
  SHOPIFY_SHOP_URL: 'test-shop.myshopify.com',
  SHOPIFY_ACCESS_TOKEN: 'test-token',
  SHOPIFY_LOCATION_ID: '12345',
};

function configError(run: () => unknown): ConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  it('should apply defaults to a minimal environment', () => {
    const config = loadConfig(baseEnv);

    expect(config.SHOPIFY_LOCATION_ID).toBe(12345);
    expect(config.SHOPIFY_API_VERSION).toBe('2023-04');
    expect(config.SKU_MAPPING_PATH).toBe('data/productId_sku_dict.json');
    expect(config.HTTP_TIMEOUT_MS).toBe(30000);
    expect(config.UPDATE_RETRY_DELAY_MS).toBe(60000);
    expect(config.LOG_DIR).toBe('logs');
    expect(config.LOG_LEVEL).toBe('info');
    expect(config.LOG_RETENTION_DAYS).toBe(60);
    expect(config.RESEND_API_KEY).toBeUndefined();
    expect(config.EMAIL_TO).toBeUndefined();
  });

  it('should treat empty values as unset', () => {
    const config = loadConfig({ ...baseEnv, LOG_DIR: '', LOG_RETENTION_DAYS: '' });

    expect(config.LOG_DIR).toBe('logs');
    expect(config.LOG_RETENTION_DAYS).toBe(60);
  });

  it('should coerce numeric settings', () => {
    const config = loadConfig({ ...baseEnv, UPDATE_RETRY_DELAY_MS: '0', HTTP_TIMEOUT_MS: '5000' });

    expect(config.UPDATE_RETRY_DELAY_MS).toBe(0);
    expect(config.HTTP_TIMEOUT_MS).toBe(5000);
  });

  it('should list every missing required key', () => {
    const error = configError(() => loadConfig({ SHOPIFY_LOCATION_ID: '1' }));

    expect(error.issues).toEqual(
      expect.arrayContaining([
        'CLF_BASE_URL: Required',
        'CLF_USERNAME: Required',
        'CLF_PASSWORD: Required',
        'SHOPIFY_SHOP_URL: Required',
        'SHOPIFY_ACCESS_TOKEN: Required',
      ])
    );
    expect(error.issues).toHaveLength(5);
  });

  it('should reject a non-numeric location id', () => {
    const error = configError(() => loadConfig({ ...baseEnv, SHOPIFY_LOCATION_ID: 'main' }));

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^SHOPIFY_LOCATION_ID: /);
  });

  it('should reject an unknown log level', () => {
    const error = configError(() => loadConfig({ ...baseEnv, LOG_LEVEL: 'verbose' }));

    expect(error.issues[0]).toMatch(/^LOG_LEVEL: /);
  });

  describe('credentials file', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'distro-sync-config-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should fill values the environment leaves unset', async () => {
      const path = join(dir, 'credentials.json');
      await writeFile(
        path,
        JSON.stringify({
          clf: { baseUrl: 'https://clf.example.test/file.asmx', username: 'file-user', password: 'test-secret' },
          shopify: { shopUrl: 'file-shop', accessToken: 'file-token', locationId: 777 },
          email: { apiKey: 'test-resend-key', to: 'ops@example.test' },
        })
      );

      const config = loadConfig({ CREDENTIALS_FILE: path, SHOPIFY_LOCATION_ID: '888', CLF_USERNAME: '' });

      expect(config.CLF_BASE_URL).toBe('https://clf.example.test/file.asmx');
      expect(config.CLF_USERNAME).toBe('file-user');
      expect(config.SHOPIFY_SHOP_URL).toBe('file-shop');
      expect(config.SHOPIFY_LOCATION_ID).toBe(888);
      expect(config.RESEND_API_KEY).toBe('test-resend-key');
      expect(config.EMAIL_TO).toBe('ops@example.test');
    });

    it('should report an unreadable file', () => {
      const path = join(dir, 'missing.json');
      const error = configError(() => loadConfig({ ...baseEnv, CREDENTIALS_FILE: path }));

      expect(error.issues).toHaveLength(1);
      expect(error.issues[0]).toMatch(/^CREDENTIALS_FILE: cannot read /);
    });

    it('should report a file with the wrong shape', async () => {
      const path = join(dir, 'credentials.json');
      await writeFile(path, JSON.stringify({ clf: { username: 5 } }));

      const error = configError(() => loadConfig({ ...baseEnv, CREDENTIALS_FILE: path }));

      expect(error.issues).toEqual(['CREDENTIALS_FILE.clf.username: Expected string, received number']);
    });
  });
});

describe('client settings', () => {
  it('should map the configuration onto both clients', () => {
    const config = loadConfig({ ...baseEnv, HTTP_TIMEOUT_MS: '1000', SHOPIFY_API_VERSION: '2024-01' });

    expect(toClfConfig(config)).toEqual({
      baseUrl: 'https://clf.example.test/service.asmx',
      username: 'test-user',
      password: 'test-secret',
      timeout: 1000,
    });
    expect(toShopifyConfig(config)).toEqual({
      shopUrl: 'test-shop.myshopify.com',
      accessToken: 'test-token',
      locationId: 12345,
      apiVersion: '2024-01',
      timeout: 1000,
    });
  });
});
