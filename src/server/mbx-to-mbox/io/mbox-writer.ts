import { closeSync, openSync, writeSync } from "node:fs";
import { serializeMessage, type SerializeOptions } from "../converter/serialize.js";
import { ConversionError, getErrorMessage } from "../errors.js";
import type { MailboxMessage, MessageContainer } from "../types/index.js";

/** mboxrd quoting: any line matching `^>*From ` gains one more `>`. */
export function quoteFromLines(text: string): string {
  return text.replace(/^(>*From )/gm, ">$1");
}

/**
 * Appends messages to a Unix mbox file. The file is truncated when the
 * writer is created.
 */
export class MboxWriter implements MessageContainer {
  private fd: number | undefined;

  private constructor(
    public readonly path: string,
    fd: number,
    private readonly options: SerializeOptions,
  ) {
    this.fd = fd;
  }

  static create(path: string, options: SerializeOptions = {}): MboxWriter {
    try {
      return new MboxWriter(path, openSync(path, "w"), options);
    } catch (error) {
      throw new ConversionError(`cannot open "${path}", ${getErrorMessage(error)}`, path);
    }
  }

  append(message: MailboxMessage): void {
    if (this.fd === undefined) {
      throw new Error(`mailbox "${this.path}" is closed`);
    }
    const text = quoteFromLines(serializeMessage(message, this.options));
    writeSync(this.fd, `From ${message.envelope}\n${text}\n`);
  }

  /** Close failures usually mean the disk is full, so they are fatal. */
  close(): void {
    if (this.fd === undefined) return;
    const fd = this.fd;
    this.fd = undefined;
    try {
      closeSync(fd);
    } catch (error) {
      throw new ConversionError(`cannot close "${this.path}", ${getErrorMessage(error)}`, this.path);
    }
  }
}
