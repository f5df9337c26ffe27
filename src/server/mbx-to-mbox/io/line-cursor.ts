import { closeSync, openSync, readSync } from "node:fs";
import iconv from "iconv-lite";
import { ConversionError, getErrorMessage } from "../errors.js";

export interface SourceLine {
  /** Decoded line, including its terminator */
  text: string;
  /** Byte offset of the line's first byte in the file */
  offset: number;
  /** 1-based line number */
  number: number;
}

const CHUNK_SIZE = 64 * 1024;
const LF = 0x0a;

/**
 * Sequential, synchronous line reader over one file descriptor. Each cursor
 * owns its descriptor, so several cursors can walk the same archive.
 */
export class LineCursor implements Iterable<SourceLine> {
  private fd: number | undefined;

  private constructor(
    private readonly path: string,
    fd: number,
    private readonly encoding: string,
  ) {
    this.fd = fd;
  }

  static open(path: string, encoding: string): LineCursor {
    if (!iconv.encodingExists(encoding)) {
      throw new ConversionError(`unknown source encoding "${encoding}"`, path);
    }
    try {
      return new LineCursor(path, openSync(path, "r"), encoding);
    } catch (error) {
      throw new ConversionError(`cannot open "${path}", ${getErrorMessage(error)}`, path);
    }
  }

  *[Symbol.iterator](): Iterator<SourceLine> {
    const fd = this.fd;
    if (fd === undefined) return;

    const chunk = Buffer.alloc(CHUNK_SIZE);
    let pending: Buffer = Buffer.alloc(0);
    let position = 0;
    let lineStart = 0;
    let number = 0;

    for (;;) {
      const read = readSync(fd, chunk, 0, CHUNK_SIZE, position);
      if (read === 0) break;
      position += read;

      let data = Buffer.concat([pending, chunk.subarray(0, read)]);
      let newline = data.indexOf(LF);
      while (newline !== -1) {
        const bytes = data.subarray(0, newline + 1);
        number++;
        yield { text: iconv.decode(bytes, this.encoding), offset: lineStart, number };
        lineStart += bytes.length;
        data = data.subarray(newline + 1);
        newline = data.indexOf(LF);
      }
      pending = Buffer.from(data);
    }

    if (pending.length > 0) {
      number++;
      yield { text: iconv.decode(pending, this.encoding), offset: lineStart, number };
    }
  }

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
