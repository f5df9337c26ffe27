import { existsSync, readFileSync } from "node:fs";
import { extname } from "node:path";
import { getErrorMessage } from "../errors.js";
import type { ConversionLog } from "../logging/index.js";
import type { ReadStatus, TocLookup } from "../types/index.js";

export const TOC_HEADER_SIZE = 104;
export const TOC_ENTRY_SIZE = 218;

const ENTRY_OFFSET = 0;
const ENTRY_STATUS = 12;
const STATUS_UNREAD = 0;

/** Candidate index files for an archive: "In.mbx" -> "In.toc", "In.TOC". */
export function tocPathsFor(archivePath: string): string[] {
  const ext = extname(archivePath);
  const base = ext ? archivePath.slice(0, -ext.length) : archivePath;
  return [`${base}.toc`, `${base}.TOC`];
}

/**
 * Reads offset -> status pairs from a raw index file. Returns undefined when
 * the size does not match a header plus whole entries.
 */
export function parseToc(data: Buffer): Map<number, ReadStatus> | undefined {
  if (data.length < TOC_HEADER_SIZE || (data.length - TOC_HEADER_SIZE) % TOC_ENTRY_SIZE !== 0) {
    return undefined;
  }
  const entries = new Map<number, ReadStatus>();
  for (let at = TOC_HEADER_SIZE; at < data.length; at += TOC_ENTRY_SIZE) {
    const offset = data.readUInt32LE(at + ENTRY_OFFSET);
    const status = data.readInt16LE(at + ENTRY_STATUS);
    entries.set(offset, status === STATUS_UNREAD ? "unread" : "read");
  }
  return entries;
}

/**
 * Read/unread flags from the archive's companion index. A missing or
 * damaged index leaves every message "unknown".
 */
export class TocIndex implements TocLookup {
  private constructor(
    private readonly entries: Map<number, ReadStatus> | undefined,
    private readonly log: ConversionLog | undefined,
  ) {}

  static empty(): TocIndex {
    return new TocIndex(undefined, undefined);
  }

  static fromEntries(entries: Map<number, ReadStatus>, log?: ConversionLog): TocIndex {
    return new TocIndex(entries, log);
  }

  static load(archivePath: string, log: ConversionLog): TocIndex {
    const tocPath = tocPathsFor(archivePath).find((p) => existsSync(p));
    if (!tocPath) {
      log.warn("no index file found, read status unknown for all messages");
      return TocIndex.empty();
    }
    let data: Buffer;
    try {
      data = readFileSync(tocPath);
    } catch (error) {
      log.warn(`cannot read index "${tocPath}", ${getErrorMessage(error)}`);
      return TocIndex.empty();
    }
    const entries = parseToc(data);
    if (!entries) {
      log.warn(`index "${tocPath}" is corrupt, read status unknown for all messages`);
      return TocIndex.empty();
    }
    return new TocIndex(entries, log);
  }

  get size(): number {
    return this.entries?.size ?? 0;
  }

  statusAt(offset: number): ReadStatus {
    if (!this.entries) return "unknown";
    const status = this.entries.get(offset);
    if (status === undefined) {
      this.log?.warn(`no index entry for message at offset ${offset}, archive and index out of sync`);
      return "unknown";
    }
    return status;
  }
}
