export type ReadStatus = "read" | "unread" | "unknown";

/**
 * How the emitted message is framed, decided once when its header block ends.
 */
export type MimeFraming =
  | { kind: "single"; mainType: string; subType: string }
  | { kind: "multipart"; subType: string };

export type AttachmentCategory = "application" | "image" | "text" | "audio";

export interface AttachmentPart {
  fileName: string;
  category: AttachmentCategory;
  subType: string;
  content: Uint8Array;
}

export interface HeaderField {
  name: string; // without the trailing colon
  value: string;
}

/**
 * Content headers of a body the archive stored ready to send: already
 * quoted-printable or base64, or a multipart with its own boundary. The body
 * is written out unchanged under these headers.
 */
export interface VerbatimContent {
  contentType: string;
  transferEncoding: string | undefined;
}

export interface MailboxMessage {
  /** Envelope line remainder, written after "From " in the container */
  envelope: string;
  headers: HeaderField[];
  framing: MimeFraming;
  body: string;
  isHtml: boolean;
  verbatim: VerbatimContent | undefined;
  attachments: AttachmentPart[];
}

export interface PathTally {
  found: number;
  missing: number;
}

export interface AttachmentCounts {
  listed: number;
  found: number;
  missing: number;
  byPath: Record<string, PathTally>;
}

export interface ConversionResult {
  archivePath: string;
  outputPath: string;
  lines: number;
  messages: number;
  attachments: AttachmentCounts;
  warnings: number;
  errors: number;
}

export interface TocLookup {
  statusAt(offset: number): ReadStatus;
}

export interface ReplyLookup {
  isRepliedTo(messageId: string): boolean;
}

/** Destination container (mbox file) the converter appends to. */
export interface MessageContainer {
  append(message: MailboxMessage): void;
  close(): void;
}
