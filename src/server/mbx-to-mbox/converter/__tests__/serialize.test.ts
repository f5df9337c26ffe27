import assert from "node:assert";
import { describe, it } from "node:test";
import type { MailboxMessage } from "../../types/index.js";
import { formatHeaderField, generateAttachmentPart, generateVerbatimPart, serializeMessage } from "../serialize.js";

const fixedBoundary = () => "BOUNDARY";

function message(overrides: Partial<MailboxMessage> = {}): MailboxMessage {
  return {
    envelope: "alice@example.com Thu Jan 03 11:42:42 2002",
    headers: [{ name: "From", value: "alice@example.com" }],
    framing: { kind: "single", mainType: "text", subType: "plain" },
    body: "hello\n",
    isHtml: false,
    verbatim: undefined,
    attachments: [],
    ...overrides,
  };
}

describe("formatHeaderField", () => {
  it("should encode non-ASCII values", () => {
    assert.strictEqual(formatHeaderField({ name: "Subject", value: "Café" }), "Subject: =?UTF-8?B?Q2Fmw6k=?=");
  });

  it("should leave ASCII values alone", () => {
    assert.strictEqual(formatHeaderField({ name: "Subject", value: "lunch" }), "Subject: lunch");
  });
});

describe("generateAttachmentPart", () => {
  it("should use the RFC 2231 form for non-ASCII names", () => {
    const part = generateAttachmentPart({
      fileName: "menü.txt",
      category: "text",
      subType: "plain",
      content: Buffer.from("hi"),
    });
    assert.strictEqual(
      part,
      [
        "Content-Type: text/plain; name*=UTF-8''men%C3%BC.txt",
        "Content-Disposition: attachment; filename*=UTF-8''men%C3%BC.txt",
        "Content-Transfer-Encoding: base64",
        "",
        "aGk=",
        "",
      ].join("\n"),
    );
  });
});

describe("generateVerbatimPart", () => {
  it("should leave out the transfer encoding when there is none", () => {
    assert.strictEqual(
      generateVerbatimPart({ contentType: 'multipart/alternative; boundary="alt"', transferEncoding: undefined }, "--alt--"),
      'Content-Type: multipart/alternative; boundary="alt"\n\n--alt--\n',
    );
  });
});

describe("serializeMessage", () => {
  it("should render a single text part", () => {
    assert.strictEqual(
      serializeMessage(message()),
      [
        "From: alice@example.com",
        "MIME-Version: 1.0",
        'Content-Type: text/plain; charset="utf-8"',
        "Content-Transfer-Encoding: quoted-printable",
        "",
        "hello",
        "",
      ].join("\n"),
    );
  });

  it("should label flagged plain text as HTML", () => {
    const text = serializeMessage(message({ body: "<b>hi</b>\n", isHtml: true }));
    assert.ok(text.includes('\nContent-Type: text/html; charset="utf-8"\n'));
  });

  it("should not add a charset to non-text single parts", () => {
    const text = serializeMessage(message({ framing: { kind: "single", mainType: "application", subType: "pdf" } }));
    assert.ok(text.includes("\nContent-Type: application/pdf\n"));
  });

  it("should end a body without a trailing newline with one", () => {
    assert.ok(serializeMessage(message({ body: "no newline" })).endsWith("\n\nno newline\n"));
  });

  it("should render a multipart message with its attachments", () => {
    const text = serializeMessage(
      message({
        headers: [
          { name: "From", value: "alice@example.com" },
          { name: "Subject", value: "Café" },
        ],
        framing: { kind: "multipart", subType: "mixed" },
        body: "see attached\n",
        attachments: [{ fileName: "a.txt", category: "text", subType: "plain", content: Buffer.from("hi") }],
      }),
      { boundary: fixedBoundary },
    );

    assert.strictEqual(
      text,
      [
        "From: alice@example.com",
        "Subject: =?UTF-8?B?Q2Fmw6k=?=",
        "MIME-Version: 1.0",
        'Content-Type: multipart/mixed; boundary="BOUNDARY"',
        "",
        "--BOUNDARY",
        'Content-Type: text/plain; charset="utf-8"',
        "Content-Transfer-Encoding: quoted-printable",
        "",
        "see attached",
        "--BOUNDARY",
        'Content-Type: text/plain; name="a.txt"',
        'Content-Disposition: attachment; filename="a.txt"',
        "Content-Transfer-Encoding: base64",
        "",
        "aGk=",
        "--BOUNDARY--",
        "",
      ].join("\n"),
    );
  });

  it("should use an HTML text part in a multipart message when flagged", () => {
    const text = serializeMessage(
      message({ framing: { kind: "multipart", subType: "mixed" }, isHtml: true }),
      { boundary: fixedBoundary },
    );
    assert.ok(text.includes('--BOUNDARY\nContent-Type: text/html; charset="utf-8"\n'));
  });

  it("should keep a stored quoted-printable body as it is", () => {
    const text = serializeMessage(
      message({
        body: "caf=E9 1+1=3D2\n",
        verbatim: { contentType: "text/plain; charset=iso-8859-1", transferEncoding: "quoted-printable" },
      }),
    );
    assert.strictEqual(
      text,
      [
        "From: alice@example.com",
        "MIME-Version: 1.0",
        "Content-Type: text/plain; charset=iso-8859-1",
        "Content-Transfer-Encoding: quoted-printable",
        "",
        "caf=E9 1+1=3D2",
        "",
      ].join("\n"),
    );
  });

  it("should nest a stored body under mixed when attachments are added", () => {
    const text = serializeMessage(
      message({
        framing: { kind: "multipart", subType: "alternative" },
        body: "--alt\n\nhi\n--alt--\n",
        verbatim: { contentType: 'multipart/alternative; boundary="alt"', transferEncoding: undefined },
        attachments: [{ fileName: "a.txt", category: "text", subType: "plain", content: Buffer.from("hi") }],
      }),
      { boundary: fixedBoundary },
    );
    assert.strictEqual(
      text,
      [
        "From: alice@example.com",
        "MIME-Version: 1.0",
        'Content-Type: multipart/mixed; boundary="BOUNDARY"',
        "",
        "--BOUNDARY",
        'Content-Type: multipart/alternative; boundary="alt"',
        "",
        "--alt",
        "",
        "hi",
        "--alt--",
        "--BOUNDARY",
        'Content-Type: text/plain; name="a.txt"',
        'Content-Disposition: attachment; filename="a.txt"',
        "Content-Transfer-Encoding: base64",
        "",
        "aGk=",
        "--BOUNDARY--",
        "",
      ].join("\n"),
    );
  });
});
