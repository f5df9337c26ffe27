export {
  type AttachmentDescription,
  type AttachmentResolution,
  AttachmentTally,
  candidateNames,
  parseAttachmentDescription,
  type PathDialect,
  resolveAttachment,
} from "./mbx-to-mbox/attachments/index.js";
export {
  type ConvertOptions,
  loadServerConfig,
  resolveConvertOptions,
  type ServerConfig,
  splitDirectoryList,
} from "./mbx-to-mbox/config/index.js";
export { convertMailbox, MailboxTransformer, serializeMessage } from "./mbx-to-mbox/converter/index.js";
export { ConversionError, getErrorMessage } from "./mbx-to-mbox/errors.js";
export { HeaderRecord, UNKNOWN_SENDER } from "./mbx-to-mbox/headers/index.js";
export { LineCursor, MboxWriter } from "./mbx-to-mbox/io/index.js";
export { ConversionLog, type LogEntry, type LogSink } from "./mbx-to-mbox/logging/index.js";
export { ReplyGraph } from "./mbx-to-mbox/replies/index.js";
export { TocIndex } from "./mbx-to-mbox/toc/index.js";
export type {
  AttachmentCounts,
  AttachmentPart,
  ConversionResult,
  MailboxMessage,
  MessageContainer,
  MimeFraming,
  ReadStatus,
} from "./mbx-to-mbox/types/index.js";
