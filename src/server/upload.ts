import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type ConversionResult, ConversionLog, convertMailbox, type LogSink, type ServerConfig } from "./mbx-to-mbox.js";

// A destination-client name such as "pine"; never a path
const TARGET_HINT = /^[A-Za-z0-9_-]+$/;

/**
 * The destination-client hint requested for an upload: the configured one
 * when none is given, undefined when the request names anything but a bare
 * client token.
 */
export function parseTargetHint(requested: unknown, configured: string): string | undefined {
  if (requested === undefined) return configured;
  return typeof requested === "string" && TARGET_HINT.test(requested) ? requested : undefined;
}

export interface UploadResult {
  mbox: Buffer;
  result: ConversionResult;
}

/**
 * Converts an uploaded archive inside a private temporary directory, which
 * is removed afterwards.
 */
export function convertUpload(
  archive: Buffer,
  config: Pick<ServerConfig, "attachmentDirs" | "encoding" | "target">,
  sink: LogSink = console,
): UploadResult {
  const workDir = mkdtempSync(join(tmpdir(), "mbx2mbox-"));
  try {
    const archivePath = join(workDir, "upload.mbx");
    const outputPath = join(workDir, "upload.mbox");
    writeFileSync(archivePath, archive);

    const result = convertMailbox(archivePath, {
      attachmentsDir: config.attachmentDirs,
      encoding: config.encoding,
      target: config.target,
      outputPath,
      log: new ConversionLog("upload", sink),
    });
    return { mbox: readFileSync(outputPath), result };
  } finally {
    rmSync(workDir, { recursive: true, force: true });
  }
}
