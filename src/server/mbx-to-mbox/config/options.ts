import { homedir } from "node:os";
import type { ConversionLog } from "../logging/index.js";

export const DEFAULT_ENCODING = "windows-1252";

export interface ConvertOptions {
  /** Attachment directories; a string is a colon-separated list */
  attachmentsDir?: string | string[];
  /** Destination-client hint (e.g. "pine", "kmail") */
  target?: string;
  /** Output mailbox path; defaults to "<archive>.new" */
  outputPath?: string;
  /** Charset of the legacy archive */
  encoding?: string;
  /** Remove the client's private markup tokens from body text */
  scrubMarkup?: boolean;
  homeDir?: string;
  log?: ConversionLog;
  boundary?: () => string;
}

export interface ResolvedOptions {
  attachmentDirs: string[];
  target: string;
  outputPath: string;
  encoding: string;
  scrubMarkup: boolean;
  homeDir: string;
  boundary: (() => string) | undefined;
}

export function splitDirectoryList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  const list = Array.isArray(value) ? value : value.split(":");
  return list.map((d) => d.trim()).filter((d) => d.length > 0);
}

export function resolveConvertOptions(archivePath: string, options: ConvertOptions = {}): ResolvedOptions {
  return {
    attachmentDirs: splitDirectoryList(options.attachmentsDir),
    target: options.target ?? "",
    outputPath: options.outputPath ?? `${archivePath}.new`,
    encoding: options.encoding ?? DEFAULT_ENCODING,
    scrubMarkup: options.scrubMarkup ?? true,
    homeDir: options.homeDir ?? homedir(),
    boundary: options.boundary,
  };
}
