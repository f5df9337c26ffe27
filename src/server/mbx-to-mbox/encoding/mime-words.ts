const ENCODED_WORD_PREFIX = "=?UTF-8?B?";
const ENCODED_WORD_SUFFIX = "?=";
// 75 characters per encoded word, minus "=?UTF-8?B?" and "?="
const MAX_ENCODED_TEXT = 75 - ENCODED_WORD_PREFIX.length - ENCODED_WORD_SUFFIX.length;

export function isAscii(str: string): boolean {
  for (let i = 0; i < str.length; i++) {
    if (str.charCodeAt(i) > 127) {
      return false;
    }
  }
  return true;
}

/**
 * RFC 2047 "B" encoding for header values that carry non-ASCII text.
 * Splits on code point boundaries so every encoded word is valid UTF-8;
 * adjacent words are separated by a single space.
 */
export function encodeRfc2047(text: string): string {
  if (!text || isAscii(text)) {
    return text;
  }

  const words: string[] = [];
  let chunk = "";
  let chunkBytes = 0;
  const flush = () => {
    words.push(`${ENCODED_WORD_PREFIX}${Buffer.from(chunk, "utf8").toString("base64")}${ENCODED_WORD_SUFFIX}`);
    chunk = "";
    chunkBytes = 0;
  };

  for (const char of text) {
    const charBytes = Buffer.byteLength(char, "utf8");
    if (chunk && Math.ceil((chunkBytes + charBytes) / 3) * 4 > MAX_ENCODED_TEXT) {
      flush();
    }
    chunk += char;
    chunkBytes += charBytes;
  }
  if (chunk) flush();

  return words.join(" ");
}
