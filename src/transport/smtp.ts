import path from 'node:path';
import nodemailer, { SendMailOptions } from 'nodemailer';
import { SmtpConfig } from '../config.js';
import { errorMessage } from '../core/errors.js';
import { DeliveryResult, MailTransport } from '../core/transport.js';
import { OutboundMessage } from '../core/types.js';

/** The slice of a nodemailer transporter this module uses. */
export interface Mailer {
  sendMail(mail: SendMailOptions): Promise<{ messageId?: string }>;
  verify(): Promise<true>;
  close(): void;
}

const PERMANENT_CODES = new Set(['EAUTH', 'EENVELOPE', 'EMESSAGE', 'ENOENT', 'EACCES', 'EISDIR']);
const TRANSIENT_CODES = new Set([
  'ECONNECTION',
  'ETIMEDOUT',
  'ESOCKET',
  'EDNS',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPROTOCOL',
  'ETLS',
  'EAI_AGAIN',
]);

export function createSmtpMailer(config: SmtpConfig): Mailer {
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.secure,
    auth: { user: config.username, pass: config.password },
    connectionTimeout: config.timeoutSec * 1000,
    greetingTimeout: config.timeoutSec * 1000,
    socketTimeout: config.timeoutSec * 1000,
  });
}

/**
 * Sort a nodemailer failure into retryable or not.
 *
 *   5xx reply, bad credentials, rejected envelope, unreadable attachment -> permanent
 *   4xx reply, connection/timeout/TLS/DNS trouble, other SMTP errors     -> transient
 *   anything without an error code                                       -> permanent
 */
export function classifySmtpError(err: unknown): Exclude<DeliveryResult, { status: 'ok' }> {
  const message = errorMessage(err);
  const fields: object = typeof err === 'object' && err !== null ? err : {};
  const code = 'code' in fields && typeof fields.code === 'string' ? fields.code : undefined;
  const responseCode =
    'responseCode' in fields && typeof fields.responseCode === 'number' ? fields.responseCode : undefined;

  if (responseCode !== undefined) {
    const error = `SMTP ${responseCode}: ${message}`;
    if (responseCode >= 500) return { status: 'permanent_error', error };
    if (responseCode >= 400) return { status: 'transient_error', error };
  }
  if (code && PERMANENT_CODES.has(code)) return { status: 'permanent_error', error: `${code}: ${message}` };
  if (code && TRANSIENT_CODES.has(code)) return { status: 'transient_error', error: `${code}: ${message}` };
  if (code) return { status: 'transient_error', error: `${code}: ${message}` };
  return { status: 'permanent_error', error: message };
}

export class SmtpTransport implements MailTransport {
  private readonly mailer: Mailer;

  constructor(private readonly config: SmtpConfig, mailer?: Mailer) {
    this.mailer = mailer ?? createSmtpMailer(config);
  }

  async deliver(message: OutboundMessage, recipient: string): Promise<DeliveryResult> {
    const { sender } = this.config;
    try {
      const info = await this.mailer.sendMail({
        from: { name: sender.name, address: sender.email },
        to: recipient,
        cc: message.cc.length ? message.cc : undefined,
        bcc: message.bcc.length ? message.bcc : undefined,
        replyTo: sender.replyTo,
        subject: message.subject,
        text: message.text,
        html: message.html ?? undefined,
        attachments: message.attachments.map((file) => ({ filename: path.basename(file), path: file })),
      });
      return { status: 'ok', messageId: info.messageId ?? null };
    } catch (err) {
      return classifySmtpError(err);
    }
  }

  async verify() {
    await this.mailer.verify();
  }

  close() {
    this.mailer.close();
  }
}
