export {
  type AttachmentDescription,
  extractDescription,
  OUTBOUND_PREFIX,
  parseAttachmentDescription,
  parseMacintoshPath,
  parseOpaquePath,
  parseWindowsPath,
  type PathDialect,
} from "./description.js";
export {
  type AttachmentResolution,
  candidateNames,
  candidatePath,
  isInside,
  type ResolverOptions,
  resolveAttachment,
  searchRoot,
} from "./resolver.js";
export { AttachmentTally } from "./tally.js";
