/**
 * SMTP sender for carrier gateway texts.
 *
 * Resolves the recipient's gateway address and submits a plain-text mail
 * over an authenticated STARTTLS session. Failures come back as a failed
 * SendResult so a bad recipient never stops the rest of a batch.
 */

import { createTransport, type SendMailOptions } from 'nodemailer';
import type { CarrierDirectory } from '../carriers/index.js';
import { encodeAddress } from '../../utils/address.js';
import { errorMessage } from '../../utils/errors.js';
import { createLogger, redactPhone } from '../../utils/observability/index.js';
import type { OutboundSender, OutboundText, SendResult, SmtpSettings } from './types.js';

const logger = createLogger({ domain: 'mail-outbound' });

/** The part of a nodemailer transporter the sender calls. */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId?: unknown }>;
  verify(): Promise<unknown>;
}

export class SmtpOutboundSender implements OutboundSender {
  private readonly transporter: MailTransport;

  constructor(
    private readonly settings: SmtpSettings,
    private readonly carriers: CarrierDirectory,
    transporter?: MailTransport
  ) {
    this.transporter = transporter ?? createTransport({
      host: settings.host,
      port: settings.port,
      secure: false,
      requireTLS: true,
      auth: {
        user: settings.user,
        pass: settings.password,
      },
    });
  }

  async send(text: OutboundText): Promise<SendResult> {
    let recipient: string;
    try {
      recipient = encodeAddress(text.phoneNumber, text.carrierId, this.carriers);
    } catch (err) {
      logger.warn('send_aborted_unknown_carrier', {
        phone: text.phoneNumber,
        carrierId: text.carrierId,
      });
      return { success: false, error: errorMessage(err) };
    }

    try {
      const info = await this.transporter.sendMail({
        from: this.settings.user,
        to: recipient,
        text: text.body,
        ...(text.subject ? { subject: text.subject } : {}),
      });
      const messageId = typeof info.messageId === 'string' ? info.messageId : '';

      logger.info('text_sent', {
        recipient,
        carrierId: text.carrierId,
        bodyLength: text.body.length,
        messageId,
      });
      return { success: true, data: { messageId, recipient } };
    } catch (err) {
      logger.error('text_send_failed', {
        recipient,
        carrierId: text.carrierId,
        error: errorMessage(err),
      });
      return {
        success: false,
        error: `Failed to send to ${redactPhone(text.phoneNumber)} (${text.carrierId}): ${errorMessage(err)}`,
      };
    }
  }

  /** Check credentials and the TLS upgrade without sending anything. */
  async verify(): Promise<boolean> {
    try {
      await this.transporter.verify();
      return true;
    } catch (err) {
      logger.warn('smtp_verify_failed', { host: this.settings.host, error: errorMessage(err) });
      return false;
    }
  }
}
