import type { AttachmentCounts } from "../types/index.js";

export type LogLevel = "warning" | "error";

export interface LogEntry {
  level: LogLevel;
  text: string;
  line: number;
  message: number;
}

/** Anything with the console's log/warn/error methods. */
export interface LogSink {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Per-archive reporting channel. Warnings and errors are tagged with the line
 * and message number current at the time they are raised.
 */
export class ConversionLog {
  public line = 0;
  public message = 0;
  private readonly entries: LogEntry[] = [];

  constructor(
    private readonly tag: string,
    private readonly sink: LogSink = console,
    private readonly quiet = false,
  ) {}

  info(text: string): void {
    if (!this.quiet) {
      this.sink.log(`[${this.tag}] ${text}`);
    }
  }

  warn(text: string): void {
    this.record("warning", text);
    if (!this.quiet) {
      this.sink.warn(`[${this.tag}] ${this.position()}warning: ${text}`);
    }
  }

  error(text: string): void {
    this.record("error", text);
    this.sink.error(`[${this.tag}] ${this.position()}error: ${text}`);
  }

  get warnings(): number {
    return this.entries.filter((e) => e.level === "warning").length;
  }

  get errors(): number {
    return this.entries.filter((e) => e.level === "error").length;
  }

  getEntries(): readonly LogEntry[] {
    return this.entries;
  }

  summary(messages: number, attachments: AttachmentCounts): string {
    const lines: string[] = [];
    if (messages === 1) {
      lines.push("total: Converted 1 message");
    } else if (messages > 1) {
      lines.push(`total: Converted ${messages} messages`);
    } else {
      lines.push("total: Converted no messages");
    }
    if (attachments.listed > 0) {
      lines.push(
        `attachments: ${attachments.listed} listed, ${attachments.found} found, ${attachments.missing} missing`,
      );
      for (const [path, tally] of Object.entries(attachments.byPath)) {
        lines.push(`  ${path || "(no path)"}: ${tally.found} found, ${tally.missing} missing`);
      }
    }
    lines.push(`${this.warnings} warning(s), ${this.errors} error(s)`);
    return lines.join("\n");
  }

  private record(level: LogLevel, text: string): void {
    this.entries.push({ level, text, line: this.line, message: this.message });
  }

  private position(): string {
    if (this.line === 0) return "";
    return this.message > 0 ? `line ${this.line}, message ${this.message}: ` : `line ${this.line}: `;
  }
}
