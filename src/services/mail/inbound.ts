/**
 * @fileoverview IMAP reader for gateway text messages.
 *
 * Connects to the account's INBOX, selects messages for the requested
 * selection mode, and turns each usable gateway email into an InboundSms.
 * The text is the first text/plain part (see mime.ts).
 * Messages without a sender, from an address that is not a known carrier
 * gateway, that fail to parse, or with an empty text body are skipped; they
 * are expected in a shared inbox and never stop the batch.
 */

import imaps from 'imap-simple';
import type { ImapSimple, ImapSimpleOptions, Message } from 'imap-simple';
import { simpleParser, type ParsedMail } from 'mailparser';
import type { CarrierDirectory } from '../carriers/index.js';
import { tryDecodeAddress } from '../../utils/address.js';
import { NoMessagesFoundError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/observability/index.js';
import { extractTextBody } from './mime.js';
import type { ImapSettings, InboundReader, InboundSms, MailSelection } from './types.js';

const logger = createLogger({ domain: 'mail-inbound' });

/** The slice of an imap-simple connection the reader uses. */
export type ImapConnection = Pick<ImapSimple, 'openBox' | 'search' | 'addFlags' | 'end'>;
export type ImapConnector = (options: ImapSimpleOptions) => Promise<ImapConnection>;

const MAILBOX = 'INBOX';
const SEEN_FLAG = '\\Seen';
const FULL_MESSAGE = '';

type SkipReason = 'missing-raw' | 'parse-failed' | 'missing-from' | 'unknown-sender' | 'other-sender' | 'empty-body';

type Candidate =
  | { kind: 'accepted'; sms: InboundSms }
  | { kind: 'skipped'; reason: SkipReason; uid: number; phoneNumber?: string };

export class ImapInboundReader implements InboundReader {
  constructor(
    private readonly settings: ImapSettings,
    private readonly carriers: CarrierDirectory,
    private readonly connector: ImapConnector = imaps.connect
  ) {}

  async fetch(selection: MailSelection): Promise<InboundSms[]> {
    const connection = await this.connect();
    try {
      await connection.openBox(MAILBOX);

      const messages = await this.select(connection, selection);
      if (messages.length === 0) {
        logger.info('mailbox_selection_empty', { mode: selection.mode });
        throw new NoMessagesFoundError('mailbox-empty');
      }

      const accepted: InboundSms[] = [];
      const claimedUids: number[] = [];

      for (const message of messages) {
        const candidate = await this.toCandidate(message, selection);
        if (candidate.kind === 'skipped') {
          logger.debug('message_skipped', { uid: candidate.uid, reason: candidate.reason });
          // A message from the served number is ours even when it carries no usable text.
          if (candidate.reason === 'empty-body' && selection.mode === 'unread-matching') {
            claimedUids.push(candidate.uid);
          }
          continue;
        }
        accepted.push(candidate.sms);
        if (candidate.sms.uid !== undefined) {
          claimedUids.push(candidate.sms.uid);
        }
      }

      // Only this mode fetches without marking, so other senders' mail stays unread.
      if (selection.mode === 'unread-matching' && claimedUids.length > 0) {
        await connection.addFlags(claimedUids, SEEN_FLAG);
      }

      logger.info('mailbox_fetched', {
        mode: selection.mode,
        selected: messages.length,
        accepted: accepted.length,
      });

      if (accepted.length === 0) {
        throw new NoMessagesFoundError('all-filtered', messages.length);
      }
      return accepted;
    } finally {
      connection.end();
    }
  }

  private async connect(): Promise<ImapConnection> {
    try {
      return await this.connector({
        imap: {
          user: this.settings.user,
          password: this.settings.password,
          host: this.settings.host,
          port: this.settings.port,
          tls: true,
          authTimeout: this.settings.authTimeoutMs ?? 30000,
        },
      });
    } catch (err) {
      logger.error('imap_connect_failed', { host: this.settings.host, error: errorMessage(err) });
      throw new Error(`IMAP connection failed: ${errorMessage(err)}`);
    }
  }

  private async select(connection: ImapConnection, selection: MailSelection): Promise<Message[]> {
    switch (selection.mode) {
      case 'all': {
        // Find the newest UIDs cheaply first, then download only those.
        const headers = await connection.search(['ALL'], { bodies: ['HEADER.FIELDS (DATE)'], markSeen: false });
        const uids = headers
          .map((m) => m.attributes.uid)
          .sort((a, b) => a - b)
          .slice(-selection.limit);
        if (uids.length === 0) return [];
        const messages = await connection.search([['UID', uids.join(',')]], { bodies: [FULL_MESSAGE], markSeen: false });
        return messages.sort((a, b) => a.attributes.uid - b.attributes.uid);
      }
      case 'unread':
        return connection.search(['UNSEEN'], { bodies: [FULL_MESSAGE], markSeen: true });
      case 'unread-matching':
        return connection.search(['UNSEEN'], { bodies: [FULL_MESSAGE], markSeen: false });
    }
  }

  private async toCandidate(message: Message, selection: MailSelection): Promise<Candidate> {
    const uid = message.attributes.uid;
    const raw: unknown = message.parts.find((part) => part.which === FULL_MESSAGE)?.body;
    if (typeof raw !== 'string' && !Buffer.isBuffer(raw)) {
      return { kind: 'skipped', reason: 'missing-raw', uid };
    }

    let parsed: ParsedMail;
    try {
      parsed = await simpleParser(raw);
    } catch (err) {
      logger.debug('message_parse_failed', { uid, error: errorMessage(err) });
      return { kind: 'skipped', reason: 'parse-failed', uid };
    }

    const from = parsed.from?.value[0]?.address || parsed.from?.text;
    if (!from) {
      return { kind: 'skipped', reason: 'missing-from', uid };
    }

    const decoded = tryDecodeAddress(from, this.carriers);
    if (!decoded.success) {
      return { kind: 'skipped', reason: 'unknown-sender', uid };
    }

    const { phoneNumber, carrierId } = decoded.data;
    if (selection.mode === 'unread-matching' && phoneNumber !== selection.targetPhone) {
      return { kind: 'skipped', reason: 'other-sender', uid, phoneNumber };
    }

    let body: string;
    try {
      body = (await extractTextBody(raw, parsed)).trim();
    } catch (err) {
      logger.debug('message_parse_failed', { uid, error: errorMessage(err) });
      return { kind: 'skipped', reason: 'parse-failed', uid, phoneNumber };
    }
    if (!body) {
      return { kind: 'skipped', reason: 'empty-body', uid, phoneNumber };
    }

    return {
      kind: 'accepted',
      sms: {
        phoneNumber,
        carrierId,
        body,
        receivedAt: parsed.date ?? message.attributes.date,
        uid,
      },
    };
  }
}
