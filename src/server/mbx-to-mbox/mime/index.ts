export {
  type AttachmentClass,
  classifyAttachment,
  createAttachmentPart,
  createMultipart,
  createSinglePart,
  framingFromContentType,
  verbatimContent,
  withAttachments,
} from "./message.js";
export { generateBoundary, getMimeType, trimNameSuffix } from "./utils.js";
