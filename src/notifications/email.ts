import type { TrackerSettings } from '../types/index.js';
import type { ClosingCommentPeriod } from '../sources/federal-register.js';
import { escapeLinkText, markdownToHtml } from '../digest/markdown-html.js';
import { createChildLogger, type ComponentLogger } from '../utils/logger.js';

export const SENDGRID_API_URL = 'https://api.sendgrid.com/v3/mail/send';

/** Comment periods at or under this many days are flagged urgent */
const URGENT_DAYS = 3;

export interface EmailResult {
  success: boolean;
  statusCode: number | null;
  message: string;
}

export interface EmailClientOptions {
  apiKey: string | undefined;
  apiUrl?: string;
  timeoutMs?: number;
  logger?: ComponentLogger;
}

type NotificationSettings = TrackerSettings['notifications'];

/**
 * Wrap rendered markdown in a minimal HTML document
 */
export function renderEmailHtml(markdown: string): string {
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<body style="font-family: Arial, sans-serif; max-width: 720px; margin: 0 auto;">',
    markdownToHtml(markdown),
    '</body>',
    '</html>',
  ].join('\n');
}

/**
 * Markdown body for a comment deadline alert
 */
export function formatCommentAlert(periods: readonly ClosingCommentPeriod[]): string {
  const lines = ['# Comment Periods Closing Soon', ''];
  for (const { document, daysRemaining } of periods) {
    const flag = daysRemaining <= URGENT_DAYS ? '**URGENT** ' : '';
    lines.push(`- ${flag}[${escapeLinkText(document.title)}](${document.htmlUrl})`);
    lines.push(`  - Closes: ${document.commentsCloseOn ?? 'unknown'} (${daysRemaining} days)`);
    if (document.agencies.length > 0) {
      lines.push(`  - Agencies: ${document.agencies.join(', ')}`);
    }
  }
  return lines.join('\n') + '\n';
}

/**
 * Sends digests and alerts through the SendGrid v3 mail API
 */
export class EmailClient {
  private readonly apiKey: string | undefined;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: ComponentLogger;

  constructor(options: EmailClientOptions) {
    this.apiKey = options.apiKey;
    this.apiUrl = options.apiUrl ?? SENDGRID_API_URL;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.logger = options.logger ?? createChildLogger('email');
  }

  get isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  async sendDigest(settings: NotificationSettings, subject: string, markdown: string): Promise<EmailResult> {
    return this.send(settings, subject, markdown);
  }

  async sendCommentAlert(settings: NotificationSettings, periods: readonly ClosingCommentPeriod[]): Promise<EmailResult> {
    if (periods.length === 0) {
      return { success: true, statusCode: null, message: 'No closing comment periods' };
    }
    const urgent = periods.some((period) => period.daysRemaining <= URGENT_DAYS);
    const subject = `${urgent ? 'URGENT: ' : ''}${periods.length} comment period(s) closing soon`;
    return this.send(settings, subject, formatCommentAlert(periods));
  }

  private async send(settings: NotificationSettings, subject: string, markdown: string): Promise<EmailResult> {
    if (!this.apiKey) {
      this.logger.warn('SENDGRID_API_KEY is not set, skipping email');
      return { success: false, statusCode: null, message: 'SENDGRID_API_KEY is not set' };
    }
    if (settings.email_recipients.length === 0) {
      this.logger.warn('No email recipients configured, skipping email');
      return { success: false, statusCode: null, message: 'No email recipients configured' };
    }

    const payload = {
      personalizations: [{ to: settings.email_recipients.map((email) => ({ email })) }],
      from: { email: settings.from_email, name: 'Legislative Tracker' },
      subject,
      content: [
        { type: 'text/plain', value: markdown },
        { type: 'text/html', value: renderEmailHtml(markdown) },
      ],
    };

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(this.apiUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        this.logger.error({ status: response.status, body }, 'Email send failed');
        return { success: false, statusCode: response.status, message: body || response.statusText };
      }

      this.logger.info({ subject, recipients: settings.email_recipients.length }, 'Email sent');
      return { success: true, statusCode: response.status, message: 'Email sent' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ error: message }, 'Email send failed');
      return { success: false, statusCode: null, message };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
