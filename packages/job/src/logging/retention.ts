/**
 * Log retention sweep
 * Deletes run log files whose name carries a YYYYMMDD date older than the
 * retention window
 */

import { readdir, stat, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger, describeError } from '@distro-sync/integrations';
import type { Logger } from '@distro-sync/integrations';

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /(\d{4})(\d{2})(\d{2})/;

export interface CleanLogsOptions {
  dir: string;
  retentionDays: number;
  now?: Date;
  logger?: Logger;
}

export interface CleanLogsResult {
  filesDeleted: number;
  bytesFreed: number;
}

/**
 * Local-midnight date from the first eight-digit run in a file name
 */
export function extractFileDate(filename: string): Date | null {
  const match = DATE_PATTERN.exec(filename);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

/** Whole days elapsed between the file's date and `now` */
export function ageInDays(fileDate: Date, now: Date): number {
  return Math.floor((now.getTime() - fileDate.getTime()) / DAY_MS);
}

export async function cleanOldLogs(options: CleanLogsOptions): Promise<CleanLogsResult> {
  const { dir, retentionDays } = options;
  const now = options.now ?? new Date();
  const logger = options.logger ?? createLogger('logs-cleaner');
  const result: CleanLogsResult = { filesDeleted: 0, bytesFreed: 0 };

  logger.info({ dir, retentionDays }, `Starting logs cleanup process. Retention period: ${retentionDays} days`);

  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    logger.warn({ dir, ...describeError(error) }, 'Log directory could not be read');
    return result;
  }

  for (const filename of entries.filter((entry) => entry.endsWith('.txt')).sort()) {
    const fileDate = extractFileDate(filename);
    if (!fileDate) {
      logger.warn({ filename }, `Could not extract date from filename: ${filename}`);
      continue;
    }

    const age = ageInDays(fileDate, now);
    if (age <= retentionDays) continue;

    const path = join(dir, filename);
    try {
      const { size } = await stat(path);
      await unlink(path);
      result.filesDeleted++;
      result.bytesFreed += size;
      logger.info({ filename, ageDays: age, sizeKb: Number((size / 1024).toFixed(2)) }, `Deleted log file: ${filename}`);
    } catch (error) {
      logger.error({ filename, ...describeError(error) }, `Error processing file ${filename}`);
    }
  }

  if (result.filesDeleted > 0) {
    logger.info(
      { filesDeleted: result.filesDeleted, kbFreed: Number((result.bytesFreed / 1024).toFixed(2)) },
      'Logs cleanup completed'
    );
  } else {
    logger.info('No files were old enough to be deleted');
  }

  return result;
}
