/** Body line the legacy client leaves where it detached a file. */
export const ATTACHMENT_LINE = /^Attachment converted: (.*?)$/i;

const X_HTML = /<\/?x-html>/;
const X_FLOWED = /<\/?x-flowed>/g;
const X_HTML_ALL = /<\/?x-html>/g;
const PETE_STUFF = /<!x-stuff-for-pete[^>]+>/g;

export function hasHtmlMarker(line: string): boolean {
  return X_HTML.test(line);
}

export function isAttachmentLine(line: string): boolean {
  return ATTACHMENT_LINE.test(line.replace(/\r?\n$/, ""));
}

/** Removes the client's private markup tokens from a body line. */
export function scrubMarkup(line: string): string {
  return line.replace(X_FLOWED, "").replace(X_HTML_ALL, "").replace(PETE_STUFF, "");
}
