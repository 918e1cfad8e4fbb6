/**
 * Text body selection for gateway mail.
 *
 * A single-part message yields its decoded payload. A multipart message yields
 * the first `text/plain` leaf in document order; other parts are ignored, so
 * alternatives and attachments never leak into the text.
 */

import { Splitter, type MimeNode, type SplitterChunk } from 'mailsplit';
import { simpleParser, type ParsedMail } from 'mailparser';

interface MimeScan {
  root: MimeNode | undefined;
  /** Headers plus body of the first text/plain leaf, still transfer-encoded. */
  firstPlain: Buffer | undefined;
}

function isPlainText(node: MimeNode): boolean {
  // RFC 2045: a part without Content-Type is text/plain
  return !node.multipart && (node.contentType === false || node.contentType === 'text/plain');
}

async function scan(raw: string | Buffer): Promise<MimeScan> {
  const splitter = new Splitter();
  splitter.end(raw);

  let root: MimeNode | undefined;
  let plain: MimeNode | undefined;
  const headers: Buffer[] = [];
  const body: Buffer[] = [];

  for await (const item of splitter) {
    const chunk: SplitterChunk = item;
    if (chunk.type === 'node') {
      root ??= chunk;
      if (!plain && chunk !== root && isPlainText(chunk)) {
        plain = chunk;
        headers.push(chunk.getHeaders());
      }
    } else if (chunk.type === 'body' && plain && chunk.node === plain) {
      body.push(chunk.value);
    }
  }

  if (!plain) return { root, firstPlain: undefined };
  // Rebuild the leaf as a standalone entity so its own transfer encoding and charset apply
  const head = Buffer.from(`${Buffer.concat(headers).toString('binary').trimEnd()}\r\n\r\n`, 'binary');
  return { root, firstPlain: Buffer.concat([head, ...body]) };
}

/**
 * The message text: first `text/plain` part of a multipart message, or the
 * payload of a single-part one. Untrimmed; '' when there is none.
 */
export async function extractTextBody(raw: string | Buffer, parsed: ParsedMail): Promise<string> {
  const { root, firstPlain } = await scan(raw);

  if (!root?.multipart) {
    if (root?.contentType === 'text/html') {
      return typeof parsed.html === 'string' ? parsed.html : '';
    }
    return parsed.text ?? '';
  }

  if (!firstPlain) return '';
  const part = await simpleParser(firstPlain);
  return part.text ?? '';
}
