import { isAscii } from "./mime-words.js";

// RFC 2231 attribute-chars we leave unescaped
const ATTRIBUTE_SAFE = /^[A-Za-z0-9._-]$/;

/**
 * RFC 2231 extended parameter value: UTF-8''<percent-encoded bytes>
 */
export function encodeRfc2231(value: string): string {
  let encoded = "";
  for (const byte of Buffer.from(value, "utf8")) {
    const char = String.fromCharCode(byte);
    encoded += ATTRIBUTE_SAFE.test(char) ? char : `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
  }
  return `UTF-8''${encoded}`;
}

/**
 * Content-Type `name` and Content-Disposition `filename` parameters for an
 * attachment. ASCII names are quoted; others use the RFC 2231 form.
 */
export function formatFilenameParams(fileName: string): { name: string; disposition: string } {
  if (isAscii(fileName)) {
    const quoted = fileName.replace(/["\\]/g, "\\$&");
    return { name: `name="${quoted}"`, disposition: `filename="${quoted}"` };
  }
  const encoded = encodeRfc2231(fileName);
  return { name: `name*=${encoded}`, disposition: `filename*=${encoded}` };
}
