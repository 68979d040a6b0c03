import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { DEFAULT_SHOPIFY_API_VERSION } from '@distro-sync/integrations';
import type { ClfClientConfig, ShopifyClientConfig } from '@distro-sync/integrations';

// Environment configuration schema
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // CLF distributor
  CLF_BASE_URL: z.string().url(),
  CLF_USERNAME: z.string().min(1),
  CLF_PASSWORD: z.string().min(1),

  // Shopify storefront
  SHOPIFY_SHOP_URL: z.string().min(1),
  SHOPIFY_ACCESS_TOKEN: z.string().min(1),
  SHOPIFY_LOCATION_ID: z.coerce.number().int().positive(),
  SHOPIFY_API_VERSION: z.string().default(DEFAULT_SHOPIFY_API_VERSION),

  // Sync
  SKU_MAPPING_PATH: z.string().default('data/productId_sku_dict.json'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  UPDATE_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(60000),

  // Logs
  LOG_DIR: z.string().default('logs'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  LOG_RETENTION_DAYS: z.coerce.number().int().positive().default(60),

  // Email (Resend)
  RESEND_API_KEY: z.string().optional(),
  EMAIL_FROM: z.string().default('Inventory Sync <inventory-sync@localhost>'),
  EMAIL_TO: z.string().optional(),
});

export type Config = z.infer<typeof envSchema>;

// Optional JSON credentials file; values fill whatever the environment leaves unset
const credentialsFileSchema = z.object({
  clf: z
    .object({
      baseUrl: z.string(),
      username: z.string(),
      password: z.string(),
    })
    .partial()
    .optional(),
  shopify: z
    .object({
      shopUrl: z.string(),
      accessToken: z.string(),
      locationId: z.union([z.string(), z.number()]),
      apiVersion: z.string(),
    })
    .partial()
    .optional(),
  email: z
    .object({
      apiKey: z.string(),
      from: z.string(),
      to: z.string(),
    })
    .partial()
    .optional(),
});

export type CredentialsFile = z.infer<typeof credentialsFileSchema>;

type EnvValues = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function readCredentialsFile(path: string): CredentialsFile {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`CREDENTIALS_FILE: cannot read ${path}: ${reason}`]);
  }

  const result = credentialsFileSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `CREDENTIALS_FILE.${issue.path.join('.')}: ${issue.message}`));
  }
  return result.data;
}

export function credentialsToEnv(credentials: CredentialsFile): EnvValues {
  const locationId = credentials.shopify?.locationId;
  return {
    CLF_BASE_URL: credentials.clf?.baseUrl,
    CLF_USERNAME: credentials.clf?.username,
    CLF_PASSWORD: credentials.clf?.password,
    SHOPIFY_SHOP_URL: credentials.shopify?.shopUrl,
    SHOPIFY_ACCESS_TOKEN: credentials.shopify?.accessToken,
    SHOPIFY_LOCATION_ID: locationId === undefined ? undefined : String(locationId),
    SHOPIFY_API_VERSION: credentials.shopify?.apiVersion,
    RESEND_API_KEY: credentials.email?.apiKey,
    EMAIL_FROM: credentials.email?.from,
    EMAIL_TO: credentials.email?.to,
  };
}

function definedValues(values: EnvValues): Record<string, string> {
  const defined: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value !== '') {
      defined[key] = value;
    }
  }
  return defined;
}

/**
 * Parse and validate the job configuration. Throws a ConfigError naming every
 * invalid or missing key.
 */
export function loadConfig(env: EnvValues = process.env): Config {
  const fromFile = env.CREDENTIALS_FILE ? credentialsToEnv(readCredentialsFile(env.CREDENTIALS_FILE)) : {};
  const result = envSchema.safeParse({ ...definedValues(fromFile), ...definedValues(env) });

  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  return result.data;
}

// ============================================================================
// Client Settings
// ============================================================================

export function toClfConfig(config: Config): ClfClientConfig {
  return {
    baseUrl: config.CLF_BASE_URL,
    username: config.CLF_USERNAME,
    password: config.CLF_PASSWORD,
    timeout: config.HTTP_TIMEOUT_MS,
  };
}

export function toShopifyConfig(config: Config): ShopifyClientConfig {
  return {
    shopUrl: config.SHOPIFY_SHOP_URL,
    accessToken: config.SHOPIFY_ACCESS_TOKEN,
    locationId: config.SHOPIFY_LOCATION_ID,
    apiVersion: config.SHOPIFY_API_VERSION,
    timeout: config.HTTP_TIMEOUT_MS,
  };
}
