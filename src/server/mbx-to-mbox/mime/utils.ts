import { readFileSync } from "node:fs";

const DEFAULT_MIME_TYPE = "application/octet-stream";

// data/ sits four levels above this module in both src/ and dist/
const MIME_TABLE_URL = new URL("../../../../data/mime-types.json", import.meta.url);

let mimeTable: Map<string, string> | undefined;

function loadMimeTable(): Map<string, string> {
  const parsed: unknown = JSON.parse(readFileSync(MIME_TABLE_URL, "utf8"));
  const table = new Map<string, string>();
  if (parsed && typeof parsed === "object") {
    for (const [ext, type] of Object.entries(parsed)) {
      if (typeof type === "string") table.set(ext.toLowerCase(), type);
    }
  }
  return table;
}

export function generateBoundary(): string {
  return `----=_Part_${Math.random().toString(36).substring(2, 15)}`;
}

/** Trims a trailing disambiguator after the extension: "deck.ppt 1" -> "deck.ppt". */
export function trimNameSuffix(fileName: string): string {
  const match = fileName.match(/^(.*\.\S+)\s.*$/);
  return match ? match[1] : fileName;
}

export function getMimeType(fileName: string): string {
  mimeTable ??= loadMimeTable();
  const name = trimNameSuffix(fileName);
  const dot = name.lastIndexOf(".");
  if (dot === -1) return DEFAULT_MIME_TYPE;
  return mimeTable.get(name.slice(dot + 1).toLowerCase()) ?? DEFAULT_MIME_TYPE;
}
