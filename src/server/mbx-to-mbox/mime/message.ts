import type { AttachmentCategory, AttachmentPart, MimeFraming, VerbatimContent } from "../types/index.js";

const MULTIPART_TYPE = /^multipart\/([^;\s]+)/i;
const SINGLE_TYPE = /^([^;\s]+)\/([^;\s]+)/;
const BOUNDARY_PARAM = /;\s*boundary\s*=/i;
const ENCODED_TRANSFER = /^(quoted-printable|base64)$/;
const CATEGORIES: readonly AttachmentCategory[] = ["application", "image", "text", "audio"];

export function createSinglePart(mainType: string, subType: string): MimeFraming {
  return { kind: "single", mainType: mainType.toLowerCase(), subType: subType.toLowerCase() };
}

export function createMultipart(subType = "mixed"): MimeFraming {
  return { kind: "multipart", subType: subType.toLowerCase() };
}

/**
 * Decides the framing from the message's Content-Type header. A message
 * without one is plain text, unless the client flagged it as carrying
 * attachments.
 */
export function framingFromContentType(contentType: string | undefined, hasAttachmentHeader: boolean): MimeFraming {
  if (!contentType) {
    return hasAttachmentHeader ? createMultipart() : createSinglePart("text", "plain");
  }
  const multipart = contentType.match(MULTIPART_TYPE);
  if (multipart) {
    return createMultipart(multipart[1]);
  }
  const single = contentType.trim().match(SINGLE_TYPE);
  if (single) {
    return createSinglePart(single[1], single[2]);
  }
  return createSinglePart("text", "plain");
}

/**
 * Decides whether a body is kept exactly as stored. Bodies that are already
 * quoted-printable or base64, and multiparts that carry their own boundary,
 * are; anything else is re-encoded from the decoded text.
 */
export function verbatimContent(
  contentType: string | undefined,
  transferEncoding: string | undefined,
): VerbatimContent | undefined {
  const encoding = transferEncoding?.trim().toLowerCase() || undefined;
  const type = contentType?.trim() || undefined;
  if (encoding && ENCODED_TRANSFER.test(encoding)) {
    return { contentType: type ?? "text/plain", transferEncoding: encoding };
  }
  if (type && MULTIPART_TYPE.test(type) && BOUNDARY_PARAM.test(type)) {
    return { contentType: type, transferEncoding: encoding };
  }
  return undefined;
}

/** A message gains multipart framing as soon as it has an attachment. */
export function withAttachments(framing: MimeFraming, attachmentCount: number): MimeFraming {
  if (attachmentCount === 0 || framing.kind === "multipart") return framing;
  return createMultipart();
}

export type AttachmentClass = { category: AttachmentCategory; subType: string };

/**
 * Maps a resolved MIME type onto the part kinds the converter emits. Video
 * is carried as an opaque application part; other top-level types (message,
 * font, model) are not supported.
 */
export function classifyAttachment(mimeType: string): AttachmentClass | undefined {
  const [mainType, subType] = mimeType.toLowerCase().split("/");
  if (mainType === "video") {
    return { category: "application", subType: "octet-stream" };
  }
  const category = CATEGORIES.find((c) => c === mainType);
  return category ? { category, subType: subType || "octet-stream" } : undefined;
}

export function createAttachmentPart(fileName: string, kind: AttachmentClass, content: Uint8Array): AttachmentPart {
  return { fileName, category: kind.category, subType: kind.subType, content };
}
