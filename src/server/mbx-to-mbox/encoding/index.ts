export { encodeBase64, encodeBase64Lines, encodeQuotedPrintable } from "./content.js";
export { encodeRfc2231, formatFilenameParams } from "./filename.js";
export { foldHeader } from "./headers.js";
export { encodeRfc2047, isAscii } from "./mime-words.js";
