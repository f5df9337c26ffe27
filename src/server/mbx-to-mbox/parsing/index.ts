export {
  envelopeRemainder,
  isBlank,
  isContinuation,
  isMessageBoundary,
  PLACEHOLDER_SENDER,
  stripLineSeparator,
} from "./boundary.js";
export { envelopeDateToHeader, splitEnvelope } from "./date.js";
export { ATTACHMENT_LINE, hasHtmlMarker, isAttachmentLine, scrubMarkup } from "./markup.js";
export { extractAddress } from "./sender.js";
