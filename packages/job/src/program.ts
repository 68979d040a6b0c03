/**
 * Command definitions for the distro-sync CLI
 */

import { Command } from 'commander';
import { createLogger, describeError } from '@distro-sync/integrations';
import type { Logger } from '@distro-sync/integrations';
import { ConfigError, loadConfig } from './config/index.js';
import type { Config } from './config/index.js';
import { cleanLogs, runSync } from './index.js';
import type { CleanLogsResult, RunSyncOptions, SyncJobResult } from './index.js';

export interface ProgramDependencies {
  env?: Record<string, string | undefined>;
  logger?: Logger;
  runSync?: (config: Config, options?: RunSyncOptions) => Promise<SyncJobResult>;
  cleanLogs?: (config: Config, logger?: Logger) => Promise<CleanLogsResult>;
  /** Receives the process exit code */
  setExitCode?: (code: number) => void;
}

export function createProgram(deps: ProgramDependencies = {}): Command {
  const logger = deps.logger ?? createLogger('distro-sync');
  const sync = deps.runSync ?? runSync;
  const clean = deps.cleanLogs ?? cleanLogs;
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const configure = (): Config | null => {
    try {
      return loadConfig(deps.env ?? process.env);
    } catch (error) {
      if (error instanceof ConfigError) {
        logger.error({ issues: error.issues }, 'Invalid configuration');
        setExitCode(1);
        return null;
      }
      throw error;
    }
  };

  const program = new Command();

  program
    .name('distro-sync')
    .description('Sync CLF distributor stock levels into a Shopify storefront')
    .version('1.0.0');

  // =============================================================================
  // Run Command
  // =============================================================================

  program
    .command('run', { isDefault: true })
    .description('Run one inventory sync and mail the report')
    .option('--console', 'Mirror the run log to stdout', false)
    .action(async (opts: { console: boolean }) => {
      const config = configure();
      if (!config) return;

      try {
        const { stats, files, reportSent } = await sync(config, { console: opts.console });
        logger.info(
          {
            productsUpdated: stats.productsUpdated,
            errors: stats.errorCount,
            warnings: stats.warningCount,
            aborted: stats.aborted,
            reportSent,
            log: files.general,
          },
          'Sync run finished'
        );
        if (stats.abortReason === 'token_limit') {
          setExitCode(2);
        }
      } catch (error) {
        logger.error({ ...describeError(error) }, 'Sync run could not start');
        setExitCode(1);
      }
    });

  // =============================================================================
  // Clean Logs Command
  // =============================================================================

  program
    .command('clean-logs')
    .description('Delete run log files older than LOG_RETENTION_DAYS')
    .action(async () => {
      const config = configure();
      if (!config) return;

      const result = await clean(config, logger);
      logger.info({ ...result }, `Removed ${result.filesDeleted} log files`);
    });

  return program;
}
