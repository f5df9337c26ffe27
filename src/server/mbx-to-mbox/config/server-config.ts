import { DEFAULT_ENCODING, splitDirectoryList } from "./options.js";

export interface ServerConfig {
  port: number;
  attachmentDirs: string[];
  encoding: string;
  target: string;
  maxUpload: string;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = Number.parseInt(env.PORT ?? "", 10);
  return {
    port: Number.isFinite(port) && port > 0 ? port : 3000,
    attachmentDirs: splitDirectoryList(env.ATTACHMENTS_DIR),
    encoding: env.MAILBOX_ENCODING || DEFAULT_ENCODING,
    target: env.TARGET_CLIENT ?? "",
    maxUpload: env.MAX_UPLOAD || "50mb",
  };
}
