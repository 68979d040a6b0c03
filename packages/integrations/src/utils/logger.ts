/**
 * Logger helpers
 * pino loggers shared by the API clients and the sync runner
 */

import { pino } from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';

export type { Logger };

const WARN_LEVEL = 40;
const ERROR_LEVEL = 50;

/**
 * Create a named logger. Without a destination it writes JSON lines to stdout.
 */
export function createLogger(name: string, options?: LoggerOptions, destination?: DestinationStream): Logger {
  const merged: LoggerOptions = { name, level: 'info', ...options };
  return destination ? pino(merged, destination) : pino(merged);
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

// ============================================================================
// Log Counter
// ============================================================================

export interface LogCounts {
  warnings: number;
  errors: number;
}

/**
 * Destination stream that tallies warning and error records. Attach it to a
 * multistream at level `warn`; run statistics read the totals.
 */
export class LogCounter implements DestinationStream {
  private warnings = 0;
  private errors = 0;

  write(msg: string): void {
    const level = readLevel(msg);
    if (level === null) return;
    if (level >= ERROR_LEVEL) {
      this.errors++;
    } else if (level >= WARN_LEVEL) {
      this.warnings++;
    }
  }

  getCounts(): LogCounts {
    return { warnings: this.warnings, errors: this.errors };
  }
}

function readLevel(line: string): number | null {
  try {
    const record: unknown = JSON.parse(line);
    if (typeof record === 'object' && record !== null && 'level' in record && typeof record.level === 'number') {
      return record.level;
    }
    return null;
  } catch {
    return null;
  }
}
