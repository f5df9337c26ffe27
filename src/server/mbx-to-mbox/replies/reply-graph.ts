import { getErrorMessage } from "../errors.js";
import { HeaderRecord } from "../headers/index.js";
import { LineCursor } from "../io/index.js";
import type { ConversionLog } from "../logging/index.js";
import { isBlank, isContinuation, isMessageBoundary } from "../parsing/index.js";
import type { ReplyLookup } from "../types/index.js";

/**
 * Message identifiers in a header value: every `<...>` token, or the bare
 * trimmed value when there are none.
 */
export function extractMessageIds(value: string | undefined): string[] {
  if (!value) return [];
  const ids = value.match(/<[^<>\s]+>/g);
  if (ids) return ids;
  const bare = value.trim();
  return bare ? [bare] : [];
}

/**
 * Which messages of an archive have been answered: a Message-ID counts as
 * replied to when some In-Reply-To in the same archive names it.
 */
export class ReplyGraph implements ReplyLookup {
  private readonly messageIds = new Set<string>();
  private readonly repliedTo = new Set<string>();

  /** Builds the graph from already-decoded archive lines. */
  static fromLines(lines: Iterable<string>): ReplyGraph {
    const graph = new ReplyGraph();
    let headers: HeaderRecord | undefined;

    for (const line of lines) {
      if (isMessageBoundary(line)) {
        if (headers) graph.record(headers);
        headers = new HeaderRecord();
      } else if (headers) {
        if (isContinuation(line)) {
          headers.appendToLast(line);
        } else if (!isBlank(line)) {
          headers.addLine(line);
        } else {
          graph.record(headers);
          headers = undefined;
        }
      }
    }
    if (headers) graph.record(headers);
    return graph;
  }

  /** Independent pass over the archive with its own cursor. */
  static scan(archivePath: string, encoding: string, log: ConversionLog): ReplyGraph {
    let cursor: LineCursor | undefined;
    try {
      cursor = LineCursor.open(archivePath, encoding);
      return ReplyGraph.fromLines(textOf(cursor));
    } catch (error) {
      log.warn(`reply scan failed, no messages marked as replied: ${getErrorMessage(error)}`);
      return new ReplyGraph();
    } finally {
      cursor?.close();
    }
  }

  get size(): number {
    return this.messageIds.size;
  }

  isRepliedTo(messageId: string): boolean {
    return extractMessageIds(messageId).some((id) => this.repliedTo.has(id));
  }

  private record(headers: HeaderRecord): void {
    for (const id of extractMessageIds(headers.findValue("Message-ID:"))) {
      this.messageIds.add(id);
    }
    for (const id of extractMessageIds(headers.findValue("In-Reply-To:"))) {
      this.repliedTo.add(id);
    }
  }
}

function* textOf(lines: Iterable<{ text: string }>): Generator<string> {
  for (const line of lines) yield line.text;
}
