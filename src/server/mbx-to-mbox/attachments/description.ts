import { stripLineSeparator } from "../parsing/boundary.js";
import { ATTACHMENT_LINE } from "../parsing/markup.js";

/** Prefix some outbound attachment paths carry that is absent on disk. */
export const OUTBOUND_PREFIX = "OutboundG4:";

export type PathDialect = "windows" | "macintosh" | "opaque";

export interface AttachmentDescription {
  dialect: PathDialect;
  fileName: string;
  /** Directory part of the recorded path, slash-separated, used for reporting */
  originalPath: string;
}

const WINDOWS_PATH = /:\\/;
// "Volume:Folder:name.pdf (PDF /CARO) (00000645)"
const MACINTOSH_INFO = /^(.*?)\s(\(.*?\)).*$/;

/** The text after the marker, unquoted, with the outbound prefix removed. */
export function extractDescription(line: string): string {
  const match = stripLineSeparator(line).match(ATTACHMENT_LINE);
  let description = (match ? match[1] : stripLineSeparator(line)).trim();
  const quoted = description.match(/^"(.*)"$/);
  if (quoted) {
    description = quoted[1];
  }
  return description.split(OUTBOUND_PREFIX).join("");
}

export function parseWindowsPath(description: string): AttachmentDescription | undefined {
  if (!WINDOWS_PATH.test(description)) return undefined;
  const segments = description.split("\\");
  const last = segments.pop() ?? "";
  const fileName = last.trim().replace(/"$/, "");
  return { dialect: "windows", fileName, originalPath: segments.join("/") };
}

export function parseMacintoshPath(description: string): AttachmentDescription | undefined {
  const match = description.match(MACINTOSH_INFO);
  if (!match) return undefined;
  const segments = match[1].split(":");
  const fileName = (segments.pop() ?? "").trim();
  return { dialect: "macintosh", fileName, originalPath: segments.join("/") };
}

export function parseOpaquePath(description: string): AttachmentDescription {
  return { dialect: "opaque", fileName: description.trim(), originalPath: "" };
}

export function parseAttachmentDescription(line: string): AttachmentDescription {
  const description = extractDescription(line);
  return parseWindowsPath(description) ?? parseMacintoshPath(description) ?? parseOpaquePath(description);
}
