/**
 * Mail transport - IMAP reader and SMTP sender for carrier gateways.
 */

export { ImapInboundReader, type ImapConnection, type ImapConnector } from './inbound.js';
export { SmtpOutboundSender, type MailTransport } from './outbound.js';
export type {
  InboundReader,
  InboundSms,
  MailSelection,
  OutboundSender,
  OutboundText,
  SendResult,
  ImapSettings,
  SmtpSettings,
} from './types.js';
