/**
 * Run log files
 * One set of pino destinations per run: the general log, the crash log
 * (errors only) and the ledger of updated products
 */

import { randomBytes } from 'node:crypto';
import { join } from 'node:path';
import { destination, multistream, pino, stdTimeFunctions } from 'pino';
import type { Level, Logger, StreamEntry } from 'pino';
import { LogCounter } from '@distro-sync/integrations';

export interface RunLogFiles {
  general: string;
  crash: string;
  updates: string;
}

export interface RunLogsOptions {
  dir: string;
  level?: Level;
  /** Also write every record to stdout */
  console?: boolean;
  now?: Date;
  /** Distinguishes runs started on the same day */
  runId?: string;
}

export interface RunLogs {
  logger: Logger;
  /** Writes to the updated-products ledger only */
  updateLog: Logger;
  counter: LogCounter;
  files: RunLogFiles;
  /** Write buffered records to disk */
  flush(): void;
  /** Flush and release the log files */
  close(): void;
}

export function formatDateStamp(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}${month}${day}`;
}

export function createRunId(): string {
  return randomBytes(2).toString('hex');
}

export function runLogFiles(dir: string, date: Date, runId: string): RunLogFiles {
  const suffix = `${formatDateStamp(date)}_${runId}.txt`;
  return {
    general: join(dir, `LOGS_${suffix}`),
    crash: join(dir, `CRASH_LOGS_${suffix}`),
    updates: join(dir, `UPDATED_PRODUCTS_LOGS_${suffix}`),
  };
}

export function createRunLogs(options: RunLogsOptions): RunLogs {
  const level = options.level ?? 'info';
  const files = runLogFiles(options.dir, options.now ?? new Date(), options.runId ?? createRunId());

  const general = destination({ dest: files.general, sync: true, mkdir: true });
  const crash = destination({ dest: files.crash, sync: true, mkdir: true });
  const updates = destination({ dest: files.updates, sync: true, mkdir: true });
  const counter = new LogCounter();

  const consoleStreams: StreamEntry[] = options.console ? [{ level, stream: process.stdout }] : [];
  const mainStreams: StreamEntry[] = [
    { level, stream: general },
    { level: 'error', stream: crash },
    { level: 'warn', stream: counter },
    ...consoleStreams,
  ];
  const updateStreams: StreamEntry[] = [{ level: 'info', stream: updates }, ...consoleStreams];

  const loggerOptions = { level, timestamp: stdTimeFunctions.isoTime };
  const logger = pino(loggerOptions, multistream(mainStreams));
  const updateLog = pino({ ...loggerOptions, level: 'info', name: 'updates' }, multistream(updateStreams));

  return {
    logger,
    updateLog,
    counter,
    files,
    flush: () => {
      for (const stream of [general, crash, updates]) {
        stream.flushSync();
      }
    },
    close: () => {
      for (const stream of [general, crash, updates]) {
        stream.flushSync();
        stream.end();
      }
    },
  };
}
