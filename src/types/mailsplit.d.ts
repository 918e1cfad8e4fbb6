/**
 * Type declarations for mailsplit, which ships none.
 * Covers the Splitter stream and the chunks it emits.
 */
declare module 'mailsplit' {
  import { Transform } from 'stream';

  /** Header block of one MIME node; emitted as a `node` chunk. */
  export interface MimeNode {
    type: 'node';
    /** Lower-cased media type, or false when the node has no Content-Type. */
    contentType: string | false;
    /** Multipart subtype such as `mixed`, or false for a leaf. */
    multipart: string | false;
    getHeaders(): Buffer;
  }

  export interface BodyChunk {
    type: 'body';
    node: MimeNode;
    value: Buffer;
  }

  /** Multipart structure between nodes: preambles and boundaries. */
  export interface DataChunk {
    type: 'data';
    value: Buffer;
  }

  export type SplitterChunk = MimeNode | BodyChunk | DataChunk;

  export class Splitter extends Transform {
    constructor(options?: { ignoreEmbedded?: boolean; maxHeadSize?: number });
  }
}
