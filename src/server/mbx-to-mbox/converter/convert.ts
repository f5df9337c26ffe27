import { basename } from "node:path";
import { type ConvertOptions, resolveConvertOptions } from "../config/index.js";
import { LineCursor, MboxWriter } from "../io/index.js";
import { ConversionLog } from "../logging/index.js";
import { ReplyGraph } from "../replies/index.js";
import { TocIndex } from "../toc/index.js";
import type { ConversionResult } from "../types/index.js";
import { MailboxTransformer } from "./transformer.js";

/**
 * Converts one legacy archive into an mbox file.
 *
 * Throws ConversionError when the archive cannot be opened or the output
 * cannot be created or closed; every other problem is reported through the
 * log and the conversion carries on.
 */
export function convertMailbox(archivePath: string, options: ConvertOptions = {}): ConversionResult {
  const resolved = resolveConvertOptions(archivePath, options);
  const log = options.log ?? new ConversionLog(basename(archivePath));

  log.info(`Converting ${archivePath}`);
  const cursor = LineCursor.open(archivePath, resolved.encoding);
  try {
    const container = MboxWriter.create(resolved.outputPath, { boundary: resolved.boundary });
    try {
      const toc = TocIndex.load(archivePath, log);
      const replies = ReplyGraph.scan(archivePath, resolved.encoding, log);
      log.info(`Index has ${toc.size} entries, reply scan saw ${replies.size} message id(s)`);
      const transformer = new MailboxTransformer(container, toc, replies, log, {
        attachmentDirs: resolved.attachmentDirs,
        target: resolved.target,
        homeDir: resolved.homeDir,
        scrubMarkup: resolved.scrubMarkup,
      });

      for (const line of cursor) {
        transformer.feed(line);
      }
      const summary = transformer.finish();

      return {
        archivePath,
        outputPath: resolved.outputPath,
        lines: summary.lines,
        messages: summary.messages,
        attachments: summary.attachments,
        warnings: log.warnings,
        errors: log.errors,
      };
    } finally {
      container.close();
    }
  } finally {
    cursor.close();
  }
}
