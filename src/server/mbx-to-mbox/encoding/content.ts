const QP_LINE_LIMIT = 76;

export function encodeBase64(data: Uint8Array): string {
  return Buffer.from(data).toString("base64");
}

/** Base64 text wrapped at 76 columns, each line LF-terminated. */
export function encodeBase64Lines(data: Uint8Array): string {
  const base64 = encodeBase64(data);
  let out = "";
  for (let i = 0; i < base64.length; i += QP_LINE_LIMIT) {
    out += `${base64.slice(i, i + QP_LINE_LIMIT)}\n`;
  }
  return out;
}

function hexByte(byte: number): string {
  return `=${byte.toString(16).toUpperCase().padStart(2, "0")}`;
}

function encodeQuotedPrintableLine(line: string): string {
  const bytes = Buffer.from(line, "utf8");
  let out = "";
  let current = "";
  for (let i = 0; i < bytes.length; i++) {
    const byte = bytes[i];
    const isLast = i === bytes.length - 1;
    let token: string;
    if ((byte === 0x20 || byte === 0x09) && isLast) {
      token = hexByte(byte);
    } else if (byte === 0x20 || byte === 0x09 || (byte >= 0x21 && byte <= 0x7e && byte !== 0x3d)) {
      token = String.fromCharCode(byte);
    } else {
      token = hexByte(byte);
    }
    // leave room for the soft break "="
    if (current.length + token.length > QP_LINE_LIMIT - 1) {
      out += `${current}=\n`;
      current = "";
    }
    current += token;
  }
  return out + current;
}

/**
 * Quoted-printable (RFC 2045) over the UTF-8 bytes of the text. Hard line
 * breaks are kept as LF; lines longer than 76 columns get soft breaks.
 */
export function encodeQuotedPrintable(text: string): string {
  return text.split("\n").map(encodeQuotedPrintableLine).join("\n");
}
