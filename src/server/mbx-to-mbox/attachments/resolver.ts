import { statSync } from "node:fs";
import { isAbsolute, relative, resolve, sep } from "node:path";
import { trimNameSuffix } from "../mime/utils.js";
import { type AttachmentDescription, OUTBOUND_PREFIX, parseAttachmentDescription } from "./description.js";

export interface ResolverOptions {
  /** Candidate attachment directories, searched in order */
  directories: string[];
  /** Destination-client hint; a relative hint is taken from the home directory */
  target: string;
  homeDir: string;
}

export type AttachmentResolution =
  | { status: "found"; description: AttachmentDescription; filePath: string; fileName: string }
  | { status: "missing"; description: AttachmentDescription; lastTried: string | undefined };

function pushUnique(list: string[], name: string): void {
  if (name && !list.includes(name)) list.push(name);
}

/**
 * File names to try for a recorded attachment name, in order: as recorded,
 * without the outbound prefix, without "/", "_" as spaces, spaces as "_",
 * then the same with a trailing " N" suffix trimmed.
 */
export function candidateNames(name: string): string[] {
  const names: string[] = [];
  pushUnique(names, name);

  const unprefixed = name.startsWith(OUTBOUND_PREFIX) ? name.slice(OUTBOUND_PREFIX.length) : name;
  pushUnique(names, unprefixed);

  const noSlashes = unprefixed.replaceAll("/", "");
  pushUnique(names, noSlashes);
  pushUnique(names, noSlashes.replaceAll("_", " "));
  pushUnique(names, noSlashes.replaceAll(" ", "_"));

  const trimmed = trimNameSuffix(noSlashes);
  pushUnique(names, trimmed);
  pushUnique(names, trimmed.replaceAll("_", " "));
  pushUnique(names, trimmed.replaceAll(" ", "_"));

  return names;
}

/** Directory a candidate name is looked up in. */
export function searchRoot(options: ResolverOptions, directory: string): string {
  return resolve(options.homeDir, options.target, directory);
}

export function candidatePath(options: ResolverOptions, directory: string, name: string): string {
  return resolve(searchRoot(options, directory), name);
}

/** True when `path` names something below `root`, never `root` itself or outside it. */
export function isInside(root: string, path: string): boolean {
  const rel = relative(root, path);
  return rel !== "" && rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

/**
 * Locates the file an "Attachment converted:" line refers to. Each directory
 * is tried with every candidate name before moving to the next directory.
 * Names that lead out of the directory (absolute, or through "..") are never
 * tried.
 */
export function resolveAttachment(line: string, options: ResolverOptions): AttachmentResolution {
  const description = parseAttachmentDescription(line);
  let lastTried: string | undefined;

  if (description.fileName) {
    const names = candidateNames(description.fileName);
    for (const directory of options.directories) {
      const root = searchRoot(options, directory);
      for (const name of names) {
        const filePath = resolve(root, name);
        if (!isInside(root, filePath)) continue;
        lastTried = filePath;
        if (isFile(filePath)) {
          return { status: "found", description, filePath, fileName: name };
        }
      }
    }
  }

  return { status: "missing", description, lastTried };
}
