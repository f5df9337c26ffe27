import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConversionError, ConversionLog, convertMailbox, type LogSink } from "./mbx-to-mbox.js";

const silentSink: LogSink = { log: () => {}, warn: () => {}, error: () => {} };

const FIRST_MESSAGE = [
  "From ???@??? Thu Jan 03 11:42:42 2002\n",
  "From: Alice <alice@example.com>\n",
  "To: bob@example.com\n",
  "Subject: Lunch?\n",
  "Message-ID: <lunch-1@example.com>\n",
  "\n",
  "Are we still on for lunch?\n",
].join("");

const SECOND_MESSAGE = [
  "From ???@??? Thu Jan 03 12:05:00 2002\n",
  "From: Bob <bob@example.com>\n",
  "To: alice@example.com\n",
  "Subject: Re: Lunch?\n",
  "In-Reply-To: <lunch-1@example.com>\n",
  "\n",
  "Yes. Today's menu:\n",
  "\n",
  "Attachment converted: Macintosh HD:Menus:menu_today.txt (TEXT/ttxt) (00012345)\n",
  "From the kitchen\n",
].join("");

/**
 * Index with one entry per message start: a 104-byte header, then 218-byte
 * entries carrying the offset and the status word.
 */
function buildToc(entries: Array<[offset: number, status: number]>): Buffer {
  const data = Buffer.alloc(104 + entries.length * 218);
  entries.forEach(([offset, status], i) => {
    data.writeUInt32LE(offset, 104 + i * 218);
    data.writeInt16LE(status, 104 + i * 218 + 12);
  });
  return data;
}

function silentLog(): ConversionLog {
  return new ConversionLog("test", silentSink);
}

describe("Integration Tests", () => {
  let dir: string;
  let attachDir: string;
  let archive: string;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), "mbx2mbox-it-"));
    attachDir = join(dir, "Attach");
    mkdirSync(attachDir);
    writeFileSync(join(attachDir, "menu today.txt"), "Soup\n");

    archive = join(dir, "In.mbx");
    writeFileSync(archive, FIRST_MESSAGE + SECOND_MESSAGE);
    writeFileSync(
      join(dir, "In.toc"),
      buildToc([
        [0, 1],
        [Buffer.byteLength(FIRST_MESSAGE), 0],
      ]),
    );
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("Full archive conversion", () => {
    it("should convert an archive with its index, replies and attachments", () => {
      const output = join(dir, "In.mbox");
      const result = convertMailbox(archive, {
        attachmentsDir: attachDir,
        outputPath: output,
        homeDir: dir,
        log: silentLog(),
        boundary: () => "BOUNDARY",
      });

      assert.deepStrictEqual(result, {
        archivePath: archive,
        outputPath: output,
        lines: 17,
        messages: 2,
        attachments: {
          listed: 1,
          found: 1,
          missing: 0,
          byPath: { "Macintosh HD/Menus": { found: 1, missing: 0 } },
        },
        warnings: 0,
        errors: 0,
      });

      assert.strictEqual(
        readFileSync(output, "utf8"),
        [
          "From alice@example.com Thu Jan 03 11:42:42 2002",
          "From: Alice <alice@example.com>",
          "To: bob@example.com",
          "Subject: Lunch?",
          "Message-ID: <lunch-1@example.com>",
          "Date: Thu, 03 Jan 2002 11:42:42 -0000",
          "Status: RO",
          "X-Status: A",
          "MIME-Version: 1.0",
          'Content-Type: text/plain; charset="utf-8"',
          "Content-Transfer-Encoding: quoted-printable",
          "",
          "Are we still on for lunch?",
          "",
          "From bob@example.com Thu Jan 03 12:05:00 2002",
          "From: Bob <bob@example.com>",
          "To: alice@example.com",
          "Subject: Re: Lunch?",
          "In-Reply-To: <lunch-1@example.com>",
          "Date: Thu, 03 Jan 2002 12:05:00 -0000",
          "Status: O",
          "MIME-Version: 1.0",
          'Content-Type: multipart/mixed; boundary="BOUNDARY"',
          "",
          "--BOUNDARY",
          'Content-Type: text/plain; charset="utf-8"',
          "Content-Transfer-Encoding: quoted-printable",
          "",
          "Yes. Today's menu:",
          ">From the kitchen",
          "--BOUNDARY",
          'Content-Type: text/plain; name="menu today.txt"',
          'Content-Disposition: attachment; filename="menu today.txt"',
          "Content-Transfer-Encoding: base64",
          "",
          "U291cAo=",
          "--BOUNDARY--",
          "",
          "",
        ].join("\n"),
      );
    });

    it("should write next to the archive by default", () => {
      convertMailbox(archive, { homeDir: dir, log: silentLog() });
      assert.ok(existsSync(`${archive}.new`));
    });

    it("should leave attachment lines in place without attachment directories", () => {
      const output = join(dir, "NoAttach.mbox");
      const result = convertMailbox(archive, { outputPath: output, homeDir: dir, log: silentLog() });
      assert.strictEqual(result.attachments.listed, 0);
      assert.ok(
        readFileSync(output, "utf8").includes(
          "\nAttachment converted: Macintosh HD:Menus:menu_today.txt (TEXT/ttxt) (00012345)\n",
        ),
      );
    });
  });

  describe("Degraded input", () => {
    it("should convert an empty archive to an empty mailbox", () => {
      const empty = join(dir, "Empty.mbx");
      writeFileSync(empty, "");
      const log = silentLog();
      const result = convertMailbox(empty, { outputPath: join(dir, "Empty.mbox"), log });

      assert.strictEqual(result.messages, 0);
      assert.strictEqual(readFileSync(join(dir, "Empty.mbox"), "utf8"), "");
      assert.deepStrictEqual(
        log.getEntries().map((e) => e.text),
        ["no index file found, read status unknown for all messages", "empty file"],
      );
    });
  });
});

describe("Error Handling", () => {
  it("should throw a ConversionError for a missing archive", () => {
    assert.throws(
      () => convertMailbox(join(tmpdir(), "mbx2mbox-absent", "Gone.mbx"), { log: silentLog() }),
      ConversionError,
    );
  });

  it("should throw a ConversionError when the output cannot be created", () => {
    const dir = mkdtempSync(join(tmpdir(), "mbx2mbox-err-"));
    try {
      const archive = join(dir, "In.mbx");
      writeFileSync(archive, FIRST_MESSAGE);
      assert.throws(
        () => convertMailbox(archive, { outputPath: join(dir, "missing", "out.mbox"), log: silentLog() }),
        ConversionError,
      );
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
