import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { Resend } from 'resend';
import { createLogger, describeError } from '@distro-sync/integrations';
import type { Logger } from '@distro-sync/integrations';
import type { RunStatistics } from '@distro-sync/sync-engine';

export interface EmailSettings {
  /** Without a key the report is logged instead of sent */
  apiKey?: string;
  from: string;
  to?: string;
}

export interface EmailAttachment {
  filename: string;
  content: Buffer;
}

export interface SendEmailOptions {
  to: string;
  subject: string;
  html: string;
  text: string;
  attachments?: EmailAttachment[];
}

export type EmailContent = Omit<SendEmailOptions, 'to' | 'attachments'>;

export class EmailService {
  private readonly resend: Resend | null;
  private readonly settings: EmailSettings;
  private readonly logger: Logger;

  constructor(settings: EmailSettings, logger?: Logger) {
    this.settings = settings;
    this.logger = logger ?? createLogger('email');
    this.resend = settings.apiKey ? new Resend(settings.apiKey) : null;
  }

  async sendEmail(options: SendEmailOptions): Promise<boolean> {
    if (!this.resend) {
      this.logger.warn(
        { subject: options.subject, to: options.to, attachments: options.attachments?.length ?? 0 },
        'Email not configured (RESEND_API_KEY missing), report not sent'
      );
      return false;
    }

    try {
      const { error } = await this.resend.emails.send({
        from: this.settings.from,
        to: options.to,
        subject: options.subject,
        html: options.html,
        text: options.text,
        attachments: options.attachments,
      });

      if (error) {
        this.logger.error({ subject: options.subject, error: error.message }, 'Failed to send email');
        return false;
      }

      this.logger.info({ subject: options.subject, to: options.to }, 'Email sent');
      return true;
    } catch (err) {
      this.logger.error({ subject: options.subject, ...describeError(err) }, 'Email service error');
      return false;
    }
  }

  /**
   * Mail the run statistics with the run's log files attached. A failed
   * report never fails the run.
   */
  async sendRunReport(stats: RunStatistics, logFiles: string[]): Promise<boolean> {
    const to = this.settings.to;
    const content = runReportEmail(stats);
    if (!to) {
      this.logger.warn({ subject: content.subject }, 'No report recipient configured (EMAIL_TO), report not sent');
      return false;
    }

    const attachments = await this.loadAttachments(logFiles);
    return this.sendEmail({ ...content, to, attachments });
  }

  private async loadAttachments(paths: string[]): Promise<EmailAttachment[]> {
    const attachments: EmailAttachment[] = [];
    for (const path of paths) {
      try {
        attachments.push({ filename: basename(path), content: await readFile(path) });
      } catch (error) {
        this.logger.warn({ path, ...describeError(error) }, `Failed to attach ${basename(path)}`);
      }
    }
    return attachments;
  }
}

// ─── Email Templates ────────────────────────────────────────

export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

function summaryRows(stats: RunStatistics): Array<[string, string]> {
  return [
    ['Products updated', String(stats.productsUpdated)],
    ['SKUs processed', String(stats.skusProcessed)],
    ['Product codes processed', String(stats.codesProcessed)],
    ['Errors', String(stats.errorCount)],
    ['Warnings', String(stats.warningCount)],
    ['Started', formatTimestamp(stats.startedAt)],
    ['Finished', formatTimestamp(stats.finishedAt)],
    ['Duration', formatDuration(stats.durationMs)],
  ];
}

function layout(banner: { text: string; background: string; color: string }, intro: string, rows: Array<[string, string]>): string {
  const tableRows = rows
    .map(
      ([label, value]) =>
        `<tr><td style="padding: 6px 12px; color: #666;">${label}</td><td style="padding: 6px 12px; color: #1a1a1a; font-weight: 600;">${value}</td></tr>`
    )
    .join('');
  return `
      <div style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 560px; margin: 0 auto; padding: 40px 20px;">
        <div style="background: ${banner.background}; border-radius: 8px; padding: 16px; margin-bottom: 24px;">
          <p style="margin: 0; color: ${banner.color}; font-weight: 600;">${banner.text}</p>
        </div>
        <p style="color: #333; font-size: 16px; line-height: 1.5;">${intro}</p>
        <table style="border-collapse: collapse; width: 100%; font-size: 14px;">${tableRows}</table>
        <p style="color: #666; font-size: 14px; line-height: 1.5;">Please find the detailed logs attached.</p>
        <hr style="border: none; border-top: 1px solid #eee; margin: 32px 0;" />
        <p style="color: #999; font-size: 12px; text-align: center;">Inventory Sync - CLF to Shopify</p>
      </div>
    `;
}

function textBody(intro: string, rows: Array<[string, string]>): string {
  const lines = rows.map(([label, value]) => `- ${label}: ${value}`);
  return `${intro}\n\nSummary:\n${lines.join('\n')}\n\nPlease find the detailed logs attached.`;
}

export function completionEmail(stats: RunStatistics): EmailContent {
  const clean = stats.errorCount === 0;
  const subject = clean ? 'Stock Update - Completed Successfully' : 'Stock Update - Completed With Errors';
  const intro = clean
    ? 'The stock update run has completed successfully.'
    : `The stock update run has completed with ${stats.errorCount} errors.`;
  const banner = clean
    ? { text: 'Completed', background: '#D4EDDA', color: '#155724' }
    : { text: 'Completed with errors', background: '#FFF3CD', color: '#856404' };
  const rows = summaryRows(stats);

  return { subject, html: layout(banner, intro, rows), text: textBody(intro, rows) };
}

function stoppedEmail(stats: RunStatistics, subject: string, intro: string, reason: string): EmailContent {
  const rows = summaryRows(stats);
  rows.push(['Reason', reason]);

  return {
    subject,
    html: layout({ text: 'Stopped', background: '#F8D7DA', color: '#721C24' }, intro, rows),
    text: textBody(intro, rows),
  };
}

export function tokenLimitEmail(stats: RunStatistics): EmailContent {
  return stoppedEmail(
    stats,
    'Stock Update - Stopped (Token Limit Exceeded)',
    'The stock update run has been stopped because the CLF token generation limit was exceeded.',
    'Token generation limit exceeded'
  );
}

export function fatalErrorEmail(stats: RunStatistics): EmailContent {
  return stoppedEmail(
    stats,
    'Stock Update - Stopped (Critical Error)',
    'The stock update run stopped after a critical error.',
    'Critical error'
  );
}

export function runReportEmail(stats: RunStatistics): EmailContent {
  switch (stats.abortReason) {
    case 'token_limit':
      return tokenLimitEmail(stats);
    case 'fatal_error':
      return fatalErrorEmail(stats);
    default:
      return completionEmail(stats);
  }
}
