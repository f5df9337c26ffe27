import { encodeBase64Lines, encodeQuotedPrintable, encodeRfc2047, foldHeader, formatFilenameParams, isAscii } from "../encoding/index.js";
import { generateBoundary } from "../mime/index.js";
import type { AttachmentPart, HeaderField, MailboxMessage, VerbatimContent } from "../types/index.js";

export interface SerializeOptions {
  boundary?: () => string;
}

export function formatHeaderField(field: HeaderField): string {
  const value = isAscii(field.value) ? field.value : encodeRfc2047(field.value);
  return foldHeader(field.name, value);
}

export function generateTextPart(body: string, subType: string): string {
  let part = "";
  part += `Content-Type: text/${subType}; charset="utf-8"\n`;
  part += `Content-Transfer-Encoding: quoted-printable\n`;
  part += `\n`;
  part += encodeQuotedPrintable(body);
  return part.endsWith("\n") ? part : `${part}\n`;
}

/** A stored body under its own content headers, byte for byte. */
export function generateVerbatimPart(content: VerbatimContent, body: string): string {
  let part = "";
  part += `${foldHeader("Content-Type", content.contentType)}\n`;
  if (content.transferEncoding) {
    part += `Content-Transfer-Encoding: ${content.transferEncoding}\n`;
  }
  part += `\n`;
  part += body;
  return part.endsWith("\n") ? part : `${part}\n`;
}

export function generateAttachmentPart(att: AttachmentPart): string {
  const filenameParams = formatFilenameParams(att.fileName);
  let part = "";
  part += `Content-Type: ${att.category}/${att.subType}; ${filenameParams.name}\n`;
  part += `Content-Disposition: attachment; ${filenameParams.disposition}\n`;
  part += `Content-Transfer-Encoding: base64\n`;
  part += `\n`;
  part += encodeBase64Lines(att.content);
  return part;
}

/**
 * Renders a message as RFC 822 text with LF line endings, without the
 * envelope line. MIME-Version, Content-Type and Content-Transfer-Encoding
 * are always generated here; a verbatim body keeps its stored ones, and is
 * nested as the first part of a multipart/mixed when attachments are added.
 */
export function serializeMessage(message: MailboxMessage, options: SerializeOptions = {}): string {
  let text = "";
  for (const field of message.headers) {
    text += `${formatHeaderField(field)}\n`;
  }
  text += `MIME-Version: 1.0\n`;

  const { framing, verbatim } = message;
  const hasAttachments = message.attachments.length > 0;
  if (verbatim && !hasAttachments) {
    text += generateVerbatimPart(verbatim, message.body);
  } else if (framing.kind === "single" && !hasAttachments) {
    const subType = framing.mainType === "text" && framing.subType === "plain" && message.isHtml ? "html" : framing.subType;
    const charset = framing.mainType === "text" ? `; charset="utf-8"` : "";
    text += `Content-Type: ${framing.mainType}/${subType}${charset}\n`;
    text += `Content-Transfer-Encoding: quoted-printable\n`;
    text += `\n`;
    text += encodeQuotedPrintable(message.body);
  } else {
    const boundary = (options.boundary ?? generateBoundary)();
    const subType = verbatim || framing.kind === "single" ? "mixed" : framing.subType;
    text += `Content-Type: multipart/${subType}; boundary="${boundary}"\n`;
    text += `\n`;
    text += `--${boundary}\n`;
    text += verbatim
      ? generateVerbatimPart(verbatim, message.body)
      : generateTextPart(message.body, message.isHtml ? "html" : "plain");
    for (const att of message.attachments) {
      text += `--${boundary}\n`;
      text += generateAttachmentPart(att);
    }
    text += `--${boundary}--\n`;
  }

  return text.endsWith("\n") ? text : `${text}\n`;
}
