/**
 * Pulls the bare address out of an address header value.
 *
 * Handles formats like:
 *   user@example.com
 *   "Display Name" <user@example.com>
 *   Display Name <user@example.com>
 *   user@example.com (Display Name)
 */
export function extractAddress(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();

  const angleMatch = trimmed.match(/<([^>]*)>/);
  if (angleMatch) {
    const address = angleMatch[1].trim();
    return address || undefined;
  }

  const bare = trimmed.split(/[\s,;()]+/).find((token) => token.includes("@"));
  return bare || undefined;
}
