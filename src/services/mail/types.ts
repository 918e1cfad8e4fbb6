/**
 * Type definitions for the mail transport.
 */

import type { Result } from '../../utils/errors.js';

/** Which mailbox messages a run should pick up. */
export type MailSelection =
  | { mode: 'all'; limit: number }
  | { mode: 'unread' }
  | { mode: 'unread-matching'; targetPhone: string };

/** A text message recovered from a gateway email. */
export interface InboundSms {
  phoneNumber: string;
  carrierId: string;
  body: string;
  receivedAt?: Date;
  uid?: number;
}

export interface InboundReader {
  /**
   * Fetch the messages the selection picks.
   * @throws NoMessagesFoundError when nothing is selected or nothing survives filtering
   */
  fetch(selection: MailSelection): Promise<InboundSms[]>;
}

export interface OutboundText {
  phoneNumber: string;
  carrierId: string;
  body: string;
  subject?: string;
}

/** On success: the SMTP message id and the gateway address it went to. */
export type SendResult = Result<{ messageId: string; recipient: string }>;

export interface OutboundSender {
  send(text: OutboundText): Promise<SendResult>;
}

export interface ImapSettings {
  user: string;
  password: string;
  host: string;
  port: number;
  authTimeoutMs?: number;
}

export interface SmtpSettings {
  user: string;
  password: string;
  host: string;
  port: number;
}
