/**
 * Distro Sync - Batch Job
 * Wires configuration, run log files, both API clients and the sync runner
 * into one run, then mails the report.
 *
 * @packageDocumentation
 */

import { ClfApiClient, ShopifyApiClient } from '@distro-sync/integrations';
import type { ClfClientOptions, Logger, ShopifyClientOptions } from '@distro-sync/integrations';
import { InventorySyncRunner, SkuMapper, SyncRunEventBus } from '@distro-sync/sync-engine';
import type { RunStatistics } from '@distro-sync/sync-engine';
import { toClfConfig, toShopifyConfig } from './config/index.js';
import type { Config } from './config/index.js';
import { cleanOldLogs } from './logging/retention.js';
import type { CleanLogsResult } from './logging/retention.js';
import { createRunLogs } from './logging/run-logs.js';
import type { RunLogFiles } from './logging/run-logs.js';
import { EmailService } from './services/email.js';

export * from './config/index.js';
export * from './logging/run-logs.js';
export * from './logging/retention.js';
export * from './services/email.js';

export interface RunSyncOptions {
  /** Replaces the distributor HTTP transport */
  clfAdapter?: ClfClientOptions['adapter'];
  /** Replaces the storefront HTTP transport */
  shopifyAdapter?: ShopifyClientOptions['adapter'];
  sleep?: (ms: number) => Promise<void>;
  /** Mirror the run log to stdout */
  console?: boolean;
  now?: () => Date;
  runId?: string;
  mailer?: EmailService;
}

export interface SyncJobResult {
  stats: RunStatistics;
  files: RunLogFiles;
  reportSent: boolean;
}

/**
 * One complete sync run. Per-product failures end up in the statistics and
 * the log files; the promise rejects only when the log files cannot be opened.
 */
export async function runSync(config: Config, options: RunSyncOptions = {}): Promise<SyncJobResult> {
  const now = options.now ?? (() => new Date());
  const logs = createRunLogs({
    dir: config.LOG_DIR,
    level: config.LOG_LEVEL,
    console: options.console,
    now: now(),
    runId: options.runId,
  });

  try {
    const { logger } = logs;
    const mapper = await SkuMapper.fromFile(config.SKU_MAPPING_PATH, { logger: logger.child({ name: 'sku-mapper' }) });

    const distributor = new ClfApiClient(toClfConfig(config), {
      adapter: options.clfAdapter,
      logger: logger.child({ name: 'clf' }),
    });
    const storefront = new ShopifyApiClient(toShopifyConfig(config), {
      adapter: options.shopifyAdapter,
      logger: logger.child({ name: 'shopify' }),
      updateLog: logs.updateLog,
      sleep: options.sleep,
    });

    const runner = new InventorySyncRunner(
      { distributor, storefront, mapper, eventBus: new SyncRunEventBus(logger.child({ name: 'events' })) },
      {
        logger: logger.child({ name: 'sync-runner' }),
        updateRetryDelayMs: config.UPDATE_RETRY_DELAY_MS,
        logCounts: () => logs.counter.getCounts(),
        sleep: options.sleep,
        now,
      }
    );

    const stats = await runner.run();
    logs.flush();

    const mailer =
      options.mailer ??
      new EmailService(
        { apiKey: config.RESEND_API_KEY, from: config.EMAIL_FROM, to: config.EMAIL_TO },
        logger.child({ name: 'email' })
      );
    const reportSent = await mailer.sendRunReport(stats, [logs.files.general, logs.files.crash, logs.files.updates]);

    return { stats, files: logs.files, reportSent };
  } finally {
    logs.close();
  }
}

/**
 * Delete run log files older than the configured retention window
 */
export async function cleanLogs(config: Config, logger?: Logger): Promise<CleanLogsResult> {
  return cleanOldLogs({ dir: config.LOG_DIR, retentionDays: config.LOG_RETENTION_DAYS, logger });
}
