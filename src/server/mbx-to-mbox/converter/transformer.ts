import { readFileSync } from "node:fs";
import { AttachmentTally, type ResolverOptions, resolveAttachment } from "../attachments/index.js";
import { getErrorMessage } from "../errors.js";
import { ENVELOPE_FIELD, HeaderRecord } from "../headers/index.js";
import type { SourceLine } from "../io/index.js";
import type { ConversionLog } from "../logging/index.js";
import {
  classifyAttachment,
  createAttachmentPart,
  framingFromContentType,
  getMimeType,
  verbatimContent,
  withAttachments,
} from "../mime/index.js";
import {
  envelopeRemainder,
  hasHtmlMarker,
  isAttachmentLine,
  isBlank,
  isContinuation,
  isMessageBoundary,
  scrubMarkup,
  stripLineSeparator,
} from "../parsing/index.js";
import type {
  AttachmentCounts,
  AttachmentPart,
  HeaderField,
  MessageContainer,
  MimeFraming,
  ReplyLookup,
  TocLookup,
  VerbatimContent,
} from "../types/index.js";

type ParserState = "expecting-start" | "in-headers" | "in-body";

// Re-derived on output from the framing, or carried in VerbatimContent
const DERIVED_HEADERS = /^(content-type|content-transfer-encoding|mime-version):$/i;
const ATTACHMENT_FLAG_HEADER = "X-Attachments:";

interface PendingAttachment {
  line: string;
  target: string;
}

interface MessageInProgress {
  headers: HeaderRecord;
  offset: number;
  framing: MimeFraming | undefined;
  verbatim: VerbatimContent | undefined;
  fields: HeaderField[];
  envelope: string;
  bodyLines: string[];
  isHtml: boolean;
  attachments: PendingAttachment[];
}

export interface TransformerOptions {
  attachmentDirs: string[];
  target: string;
  homeDir: string;
  scrubMarkup: boolean;
}

export interface TransformSummary {
  lines: number;
  messages: number;
  attachments: AttachmentCounts;
}

/**
 * Line-driven state machine turning a legacy archive into mailbox messages.
 * Feed it every line of the archive, then call finish().
 */
export class MailboxTransformer {
  private state: ParserState = "expecting-start";
  private current: MessageInProgress | undefined;
  private lineCount = 0;
  private messageCount = 0;
  private skippedLeadingLines = 0;
  private readonly tally = new AttachmentTally();
  private readonly resolver: ResolverOptions;

  constructor(
    private readonly container: MessageContainer,
    private readonly toc: TocLookup,
    private readonly replies: ReplyLookup,
    private readonly log: ConversionLog,
    private readonly options: TransformerOptions,
  ) {
    this.resolver = { directories: options.attachmentDirs, target: options.target, homeDir: options.homeDir };
  }

  get messages(): number {
    return this.messageCount;
  }

  feed(line: SourceLine): void {
    this.lineCount++;
    this.log.line = line.number;

    if (isMessageBoundary(line.text)) {
      this.startMessage(line);
      return;
    }

    const message = this.current;
    if (!message) {
      this.skippedLeadingLines++;
      return;
    }

    if (this.state === "in-headers") {
      if (isContinuation(line.text)) {
        message.headers.appendToLast(line.text);
      } else if (!isBlank(line.text)) {
        message.headers.addLine(line.text);
      } else {
        this.endHeaders(message);
      }
    } else {
      this.addBodyLine(message, line.text);
    }
  }

  finish(): TransformSummary {
    if (this.current) {
      this.seal(this.current);
      this.current = undefined;
    }
    this.state = "expecting-start";

    if (this.skippedLeadingLines > 0) {
      this.log.warn(`${this.skippedLeadingLines} line(s) before the first message were skipped`);
    }
    if (this.lineCount === 0) {
      this.log.warn("empty file");
    } else if (this.messageCount === 0) {
      this.log.error("no messages (not a legacy mailbox file?)");
    }

    return { lines: this.lineCount, messages: this.messageCount, attachments: this.tally.toCounts() };
  }

  private startMessage(line: SourceLine): void {
    if (this.current) {
      if (this.state === "in-headers") {
        // previous message never reached the blank line ending its headers
        this.log.error("message start found inside message headers");
      }
      this.seal(this.current);
    }

    const headers = new HeaderRecord();
    headers.add(ENVELOPE_FIELD, envelopeRemainder(line.text));
    this.current = {
      headers,
      offset: line.offset,
      framing: undefined,
      verbatim: undefined,
      fields: [],
      envelope: "",
      bodyLines: [],
      isHtml: false,
      attachments: [],
    };
    this.messageCount++;
    this.log.message = this.messageCount;
    this.state = "in-headers";
  }

  private endHeaders(message: MessageInProgress): void {
    const { headers } = message;
    const contentType = headers.findValue("Content-Type:");
    message.framing = framingFromContentType(contentType, headers.findValue(ATTACHMENT_FLAG_HEADER) !== undefined);
    message.verbatim = verbatimContent(contentType, headers.findValue("Content-Transfer-Encoding:"));

    headers.clean(this.toc, message.offset, this.replies);

    for (const [name, value] of headers) {
      if (name !== ENVELOPE_FIELD && !DERIVED_HEADERS.test(name)) {
        message.fields.push({ name: name.slice(0, -1), value });
      }
    }
    message.envelope = headers.getValue(ENVELOPE_FIELD) ?? "";
    this.state = "in-body";
  }

  private addBodyLine(message: MessageInProgress, text: string): void {
    if (hasHtmlMarker(text)) {
      message.isHtml = true;
    }

    if (this.options.attachmentDirs.length > 0 && isAttachmentLine(text)) {
      // the client puts an empty line before each attachment line
      if (message.bodyLines[message.bodyLines.length - 1] === "\n") {
        message.bodyLines.pop();
      }
      message.attachments.push({ line: text, target: this.options.target });
      return;
    }

    const cleaned = this.options.scrubMarkup ? scrubMarkup(text) : text;
    message.bodyLines.push(`${stripLineSeparator(cleaned)}\n`);
  }

  private seal(message: MessageInProgress): void {
    if (this.state === "in-headers") {
      this.endHeaders(message);
    }

    const attachments: AttachmentPart[] = [];
    for (const pending of message.attachments) {
      const part = this.loadAttachment(pending);
      if (part) attachments.push(part);
    }

    const framing = withAttachments(
      message.framing ?? framingFromContentType(undefined, false),
      message.attachments.length,
    );

    try {
      this.container.append({
        envelope: message.envelope,
        headers: message.fields,
        framing,
        body: message.bodyLines.join(""),
        isHtml: message.isHtml,
        verbatim: message.verbatim,
        attachments,
      });
    } catch (error) {
      this.log.error(`failed to write message: ${getErrorMessage(error)}`);
    }
  }

  private loadAttachment(pending: PendingAttachment): AttachmentPart | undefined {
    const resolution = resolveAttachment(pending.line, { ...this.resolver, target: pending.target });
    this.tally.record(resolution);

    const { description } = resolution;
    if (description.dialect === "opaque") {
      this.log.warn(`FAILED to convert attachment: '${description.fileName}'`);
    }
    if (resolution.status === "missing") {
      this.log.warn(`FAILED to find attachment: '${resolution.lastTried ?? description.fileName}'`);
      return undefined;
    }

    const mimeType = getMimeType(resolution.fileName);
    const kind = classifyAttachment(mimeType);
    if (!kind) {
      this.log.error(`Unrecognized mime type '${mimeType}' while processing attachment '${resolution.filePath}'`);
      return undefined;
    }

    try {
      return createAttachmentPart(resolution.fileName, kind, readFileSync(resolution.filePath));
    } catch (error) {
      this.log.error(`cannot read attachment '${resolution.filePath}': ${getErrorMessage(error)}`);
      return undefined;
    }
  }
}
