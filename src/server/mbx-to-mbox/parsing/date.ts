const ENVELOPE_DATE = /^(\w{3})\s+(\w{3})\s+(\d{1,2})\s+(\d{1,2}:\d{2}(?::\d{2})?)\s+(\d{4})$/;

/**
 * Reorders an envelope timestamp (`Thu Jan 03 11:42:42 2002`) into a Date
 * header value (`Thu, 03 Jan 2002 11:42:42 -0000`). The legacy client stores
 * local time without a zone, hence `-0000`.
 */
export function envelopeDateToHeader(envelopeDate: string): string | undefined {
  const match = envelopeDate.trim().match(ENVELOPE_DATE);
  if (!match) return undefined;
  const [, dayName, monthName, day, time, year] = match;
  return `${dayName}, ${day.padStart(2, "0")} ${monthName} ${year} ${time} -0000`;
}

/** Splits an envelope remainder into its sender token and its timestamp. */
export function splitEnvelope(remainder: string): { sender: string; date: string } {
  const trimmed = remainder.trim();
  const space = trimmed.search(/\s/);
  if (space === -1) {
    return { sender: trimmed, date: "" };
  }
  return { sender: trimmed.slice(0, space), date: trimmed.slice(space).trim() };
}
