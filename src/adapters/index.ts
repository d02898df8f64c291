/**
 * Email Adapters Module
 *
 * Responsibilities:
 * - Define the EmailAdapter seam the notifier sends through
 * - Deliver mail over SMTP with nodemailer (STARTTLS on 587, implicit TLS on 465)
 * - Report per-message success or failure without throwing
 *
 * Usage from an orchestrator node:
 * const { createEmailAdapter } = await import('birthday-mailer-etl/adapters');
 * const adapter = createEmailAdapter(config.smtp, { senderName: 'HR Team' });
 */

import nodemailer from 'nodemailer';
import type { SendMailOptions } from 'nodemailer';
import type { SmtpTransportConfig } from '../config/index.js';
import { defaultLogger, type Logger } from '../logger/index.js';

// ============================================================================
// EMAIL ADAPTER TYPES
// ============================================================================

export interface EmailMessage {
  to: string[];
  subject: string;
  textBody: string;
  htmlBody?: string | undefined;
}

export interface EmailResult {
  success: boolean;
  messageId?: string;
  error?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Email Adapter Interface
 *
 * - Send a plain-text message with an optional HTML alternative
 * - Support multiple recipients
 * - Report delivery success or failure; never throw for a failed send
 */
export interface EmailAdapter {
  sendEmail(message: EmailMessage): Promise<EmailResult>;

  /**
   * Release pooled connections once a batch is done
   */
  close(): void;
}

/**
 * The slice of a nodemailer transporter the SMTP adapter relies on
 */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId?: string }>;
  close(): void;
}

export interface SmtpAdapterConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  fromEmail: string;
  fromName?: string | undefined;
  timeoutMs?: number | undefined;
}

// ============================================================================
// SMTP EMAIL ADAPTER IMPLEMENTATION
// ============================================================================

/**
 * SmtpEmailAdapter
 *
 * Sends mail through a nodemailer SMTP transport. Connection, greeting and
 * socket timeouts all use `timeoutMs`, so a hung server fails one message.
 */
export class SmtpEmailAdapter implements EmailAdapter {
  private fromEmail: string;
  private fromName: string | undefined;
  private host: string;
  private transport: MailTransport;
  private logger: Logger;

  constructor(config: SmtpAdapterConfig, logger: Logger = defaultLogger, transport?: MailTransport) {
    if (!config.user || !config.password) {
      throw new Error('SMTP user and password are required');
    }
    if (!config.fromEmail) {
      throw new Error('From email is required');
    }
    this.fromEmail = config.fromEmail;
    this.fromName = config.fromName;
    this.host = config.host;
    this.logger = logger;

    const timeout = config.timeoutMs ?? 30000;
    this.transport =
      transport ??
      nodemailer.createTransport({
        host: config.host,
        port: config.port,
        secure: config.port === 465,
        requireTLS: config.port !== 465,
        auth: { user: config.user, pass: config.password },
        connectionTimeout: timeout,
        greetingTimeout: timeout,
        socketTimeout: timeout,
      });
  }

  async sendEmail(message: EmailMessage): Promise<EmailResult> {
    try {
      const info = await this.transport.sendMail({
        from: this.fromName ? { name: this.fromName, address: this.fromEmail } : this.fromEmail,
        to: message.to,
        subject: message.subject,
        text: message.textBody,
        ...(message.htmlBody ? { html: message.htmlBody } : {}),
      });

      const messageId = info.messageId ?? `smtp-${Date.now()}`;
      this.logger.info('Email sent successfully', { messageId, to: message.to });

      return {
        success: true,
        messageId,
        metadata: {
          provider: 'smtp',
          host: this.host,
          sentAt: new Date().toISOString(),
        },
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to send email via SMTP', { to: message.to, error: errorMessage });

      return {
        success: false,
        error: errorMessage,
        metadata: {
          provider: 'smtp',
          failedAt: new Date().toISOString(),
        },
      };
    }
  }

  close(): void {
    this.transport.close();
  }
}

// ============================================================================
// ADAPTER FACTORY
// ============================================================================

/**
 * Build an SMTP adapter from transport configuration.
 * Returns null when the user or password is missing.
 */
export function createEmailAdapter(
  smtp: SmtpTransportConfig,
  options: { senderName?: string | undefined; logger?: Logger } = {}
): EmailAdapter | null {
  const logger = options.logger ?? defaultLogger;

  if (!smtp.user || !smtp.password) {
    logger.warn('SMTP credentials not configured - email delivery disabled');
    return null;
  }

  return new SmtpEmailAdapter(
    {
      host: smtp.host,
      port: smtp.port,
      user: smtp.user,
      password: smtp.password,
      fromEmail: smtp.from ?? smtp.user,
      fromName: options.senderName,
      timeoutMs: smtp.timeoutMs,
    },
    logger
  );
}
