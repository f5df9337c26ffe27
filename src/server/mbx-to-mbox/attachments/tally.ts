import type { AttachmentCounts } from "../types/index.js";
import type { AttachmentResolution } from "./resolver.js";

/** Listed/found/missing counts for one archive, overall and per recorded path. */
export class AttachmentTally {
  private listed = 0;
  private found = 0;
  private missing = 0;
  private readonly byPath = new Map<string, { found: number; missing: number }>();

  record(resolution: AttachmentResolution): void {
    const key = resolution.description.originalPath;
    const entry = this.byPath.get(key) ?? { found: 0, missing: 0 };
    this.listed++;
    if (resolution.status === "found") {
      this.found++;
      entry.found++;
    } else {
      this.missing++;
      entry.missing++;
    }
    this.byPath.set(key, entry);
  }

  toCounts(): AttachmentCounts {
    const byPath: AttachmentCounts["byPath"] = {};
    for (const [path, tally] of this.byPath) {
      byPath[path] = { ...tally };
    }
    return { listed: this.listed, found: this.found, missing: this.missing, byPath };
  }
}
