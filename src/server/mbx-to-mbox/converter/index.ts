export { convertMailbox } from "./convert.js";
export {
  formatHeaderField,
  generateAttachmentPart,
  generateTextPart,
  generateVerbatimPart,
  type SerializeOptions,
  serializeMessage,
} from "./serialize.js";
export { MailboxTransformer, type TransformerOptions, type TransformSummary } from "./transformer.js";
