import { envelopeDateToHeader, splitEnvelope } from "../parsing/date.js";
import { PLACEHOLDER_SENDER, stripLineSeparator } from "../parsing/boundary.js";
import { extractAddress } from "../parsing/sender.js";
import type { ReplyLookup, TocLookup } from "../types/index.js";

/** Pseudo-header holding the boundary line remainder; always the first pair. */
export const ENVELOPE_FIELD = "From ";
export const UNKNOWN_SENDER = "unknown@unknown.unknown";

const SENDER_FIELDS = ["From:", "Sender:", "Return-Path:"];

/**
 * Ordered header pairs of one message. Names keep their trailing colon
 * ("Subject:"), except the envelope pseudo-header ("From ").
 *
 * Folded lines are unfolded on the way in: a continuation is trimmed and
 * joined to the previous value with a single space.
 */
export class HeaderRecord implements Iterable<[string, string]> {
  private readonly fields: Array<[string, string]> = [];
  private cleaned = false;

  add(name: string, value: string): void {
    this.fields.push([name, value]);
  }

  /** Parses `Name: value`; a line with no colon is treated as a continuation. */
  addLine(rawLine: string): void {
    const line = stripLineSeparator(rawLine);
    const colon = line.indexOf(":");
    if (colon <= 0) {
      this.appendToLast(line);
      return;
    }
    this.add(line.slice(0, colon + 1), line.slice(colon + 1).trim());
  }

  appendToLast(rawLine: string): void {
    const last = this.fields[this.fields.length - 1];
    const text = stripLineSeparator(rawLine).trim();
    if (!last || !text) return;
    last[1] = last[1] ? `${last[1]} ${text}` : text;
  }

  /** Exact, case-sensitive lookup of the first pair with this name. */
  getValue(name: string): string | undefined {
    return this.fields.find(([n]) => n === name)?.[1];
  }

  /** Case-insensitive lookup, for headers whose capitalisation varies between mailers. */
  findValue(name: string): string | undefined {
    const wanted = name.toLowerCase();
    return this.fields.find(([n]) => n.toLowerCase() === wanted)?.[1];
  }

  /** Address for the destination envelope line. */
  senderAddress(): string {
    for (const field of SENDER_FIELDS) {
      const address = extractAddress(this.findValue(field));
      if (address) return address;
    }
    return UNKNOWN_SENDER;
  }

  /**
   * Fills in what the destination format needs and the legacy archive may
   * lack: a Date, a real envelope sender, and Status/X-Status flags. Runs
   * once; later calls do nothing.
   */
  clean(toc: TocLookup, messageOffset: number, replies: ReplyLookup): void {
    if (this.cleaned) return;
    this.cleaned = true;

    const envelope = splitEnvelope(this.getValue(ENVELOPE_FIELD) ?? "");

    if (this.findValue("Date:") === undefined) {
      const date = envelopeDateToHeader(envelope.date);
      if (date) this.add("Date:", date);
    }

    const sender = envelope.sender === PLACEHOLDER_SENDER || !envelope.sender ? this.senderAddress() : envelope.sender;
    this.setEnvelope(envelope.date ? `${sender} ${envelope.date}` : sender);

    const status = toc.statusAt(messageOffset);
    if (status === "read") {
      this.add("Status:", "RO");
    } else if (status === "unread") {
      this.add("Status:", "O");
    }

    const messageId = this.findValue("Message-ID:");
    if (messageId && replies.isRepliedTo(messageId)) {
      this.add("X-Status:", "A");
    }
  }

  *[Symbol.iterator](): Iterator<[string, string]> {
    for (const [name, value] of this.fields) {
      yield [name, value];
    }
  }

  private setEnvelope(value: string): void {
    const envelope = this.fields.find(([n]) => n === ENVELOPE_FIELD);
    if (envelope) {
      envelope[1] = value;
    } else {
      this.fields.unshift([ENVELOPE_FIELD, value]);
    }
  }
}
