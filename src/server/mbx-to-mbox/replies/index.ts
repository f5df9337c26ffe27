export { extractMessageIds, ReplyGraph } from "./reply-graph.js";
