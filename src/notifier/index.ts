/**
 * Notifier Module
 *
 * Sends one birthday email per match and reports how many went out.
 *
 * Responsibilities:
 * - Skip delivery entirely when there is nobody to greet
 * - Run dry when SMTP credentials are missing, logging who would have been greeted
 * - Render and send each message through an EmailAdapter
 * - Isolate failures: one bad recipient never stops the others
 *
 * Usage from an orchestrator node:
 * const { notify } = await import('birthday-mailer-etl/notifier');
 * const result = await notify(matches, config.smtp, { senderName: config.senderName });
 */

import { createEmailAdapter, type EmailAdapter } from '../adapters/index.js';
import { hasSmtpCredentials, type SmtpTransportConfig } from '../config/index.js';
import { DeliveryError } from '../errors/index.js';
import { defaultLogger, type Logger } from '../logger/index.js';
import { renderBirthdayEmail } from '../renderers/index.js';
import type { BirthdayMatch, DeliveryResult, RecipientOutcome } from '../types/index.js';

export interface NotifyOptions {
  /** Used instead of building an SMTP adapter from the transport config */
  adapter?: EmailAdapter | undefined;
  /** Parallel deliveries. 1 sends strictly in order. */
  concurrency?: number | undefined;
  senderName?: string | undefined;
  logger?: Logger;
}

// ============================================================================
// Concurrency pool
// ============================================================================

/**
 * Process items with bounded parallelism. Results land in input order.
 * `processor` must not reject.
 */
async function runWithConcurrency<T, R>(
  items: readonly T[],
  maxConcurrency: number,
  processor: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let nextIndex = 0;

  async function processNext(): Promise<void> {
    while (nextIndex < items.length) {
      const currentIndex = nextIndex++;
      const item = items[currentIndex];
      if (item !== undefined) {
        results[currentIndex] = await processor(item, currentIndex);
      }
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(maxConcurrency, items.length)) }, () =>
    processNext()
  );

  await Promise.all(workers);
  return results;
}

// ============================================================================
// Delivery
// ============================================================================

function failed(
  match: BirthdayMatch,
  reason: RecipientOutcome['reason'],
  error: string | null
): RecipientOutcome {
  return { name: match.name, email: match.email, status: 'failed', reason, error, messageId: null };
}

async function deliverOne(
  match: BirthdayMatch,
  adapter: EmailAdapter,
  senderName: string | undefined,
  logger: Logger
): Promise<RecipientOutcome> {
  const label = match.name ?? 'Friend';

  if (!match.email) {
    logger.warn(`No email address for ${label}, skipping`);
    return failed(match, 'missing_email', 'No email address');
  }

  try {
    const rendered = renderBirthdayEmail(match.name, { senderName });
    const result = await adapter.sendEmail({
      to: [match.email],
      subject: rendered.subject,
      textBody: rendered.textBody,
      htmlBody: rendered.htmlBody,
    });

    if (!result.success) {
      throw new DeliveryError(match.email, result.error ?? 'Delivery failed');
    }

    return {
      name: match.name,
      email: match.email,
      status: 'sent',
      reason: null,
      error: null,
      messageId: result.messageId ?? null,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Error processing email for ${label}: ${message}`, { email: match.email });
    return failed(match, 'delivery_error', message);
  }
}

function countOutcomes(recipients: RecipientOutcome[]): { success: number; failed: number } {
  const success = recipients.filter((outcome) => outcome.status === 'sent').length;
  return { success, failed: recipients.length - success };
}

/**
 * Send a birthday email to every match
 *
 * @param matches - Today's birthday matches
 * @param transport - SMTP settings; missing credentials mean a dry run
 * @param options - Adapter override, concurrency, sender name and logger
 */
export async function notify(
  matches: BirthdayMatch[],
  transport: SmtpTransportConfig,
  options: NotifyOptions = {}
): Promise<DeliveryResult> {
  const logger = options.logger ?? defaultLogger;
  logger.info('Starting email sending task');

  if (matches.length === 0) {
    logger.info('No birthdays today. No emails to send.');
    return { success: 0, failed: 0, status: 'no_recipients', message: 'No birthdays today', recipients: [] };
  }

  if (!hasSmtpCredentials(transport)) {
    logger.error('SMTP credentials not configured. Please set SMTP environment variables.');
    logger.info('Emails would have been sent to:');
    for (const match of matches) {
      logger.info(`  - ${match.name ?? 'Unknown'} (${match.email ?? 'No email'})`);
    }
    const recipients = matches.map((match) => failed(match, 'configuration_error', 'SMTP not configured'));
    return {
      success: 0,
      failed: recipients.length,
      status: 'not_configured',
      message: 'SMTP not configured',
      recipients,
    };
  }

  const ownedAdapter = options.adapter
    ? null
    : createEmailAdapter(transport, { senderName: options.senderName, logger });
  const adapter = options.adapter ?? ownedAdapter;
  if (!adapter) {
    const recipients = matches.map((match) => failed(match, 'configuration_error', 'SMTP not configured'));
    return { success: 0, failed: recipients.length, status: 'not_configured', message: 'SMTP not configured', recipients };
  }

  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
  logger.info(`Preparing to send ${matches.length} birthday emails`, { concurrency });

  let recipients: RecipientOutcome[];
  try {
    recipients = await runWithConcurrency(matches, concurrency, (match) =>
      deliverOne(match, adapter, options.senderName, logger)
    );
  } finally {
    ownedAdapter?.close();
  }

  const counts = countOutcomes(recipients);
  logger.info(`Email sending complete. Success: ${counts.success}, Failed: ${counts.failed}`);

  return {
    ...counts,
    status: 'completed',
    message: `Sent ${counts.success} of ${recipients.length} birthday emails`,
    recipients,
  };
}
