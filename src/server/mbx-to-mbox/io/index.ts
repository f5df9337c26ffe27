export { LineCursor, type SourceLine } from "./line-cursor.js";
export { MboxWriter, quoteFromLines } from "./mbox-writer.js";
