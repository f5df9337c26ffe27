/** Sender placeholder the legacy client writes on its message-start lines. */
export const PLACEHOLDER_SENDER = "???@???";

const DAY = "(?:Mon|Tue|Wed|Thu|Fri|Sat|Sun)";
const MONTH = "(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)";

/**
 * `From ???@??? Thu Jan 03 11:42:42 2002`. The timestamp must be complete,
 * so body text that merely starts with the placeholder is not a boundary.
 */
const MESSAGE_START = new RegExp(
  `^From \\?\\?\\?@\\?\\?\\? +${DAY} +${MONTH} +\\d{1,2} +\\d{1,2}:\\d{2}(?::\\d{2})? +\\d{4}\\s*$`,
);

// Eudora search results look like message starts; they are never one.
const EXCLUDED_PREFIX = "Find ";

export function stripLineSeparator(line: string): string {
  return line.replace(/\r?\n$/, "").replace(/\r$/, "");
}

export function isMessageBoundary(line: string): boolean {
  return !line.startsWith(EXCLUDED_PREFIX) && MESSAGE_START.test(line);
}

/** The part of a boundary line after "From ", trimmed. */
export function envelopeRemainder(line: string): string {
  return stripLineSeparator(line).slice("From ".length).trim();
}

export function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

export function isContinuation(line: string): boolean {
  return /^[ \t]+\S/.test(line);
}
