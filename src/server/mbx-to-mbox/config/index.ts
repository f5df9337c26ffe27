export {
  type ConvertOptions,
  DEFAULT_ENCODING,
  type ResolvedOptions,
  resolveConvertOptions,
  splitDirectoryList,
} from "./options.js";
export { loadServerConfig, type ServerConfig } from "./server-config.js";
