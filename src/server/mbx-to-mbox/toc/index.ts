export { parseToc, TOC_ENTRY_SIZE, TOC_HEADER_SIZE, TocIndex, tocPathsFor } from "./toc-index.js";
