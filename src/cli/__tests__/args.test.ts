import { describe, it } from "node:test";
import assert from "node:assert";
import { parseArgs, UsageError } from "../args.js";

describe("parseArgs", () => {
  it("should use defaults for a bare archive", () => {
    assert.deepStrictEqual(parseArgs(["In.mbx"]), {
      archives: ["In.mbx"],
      attachmentsDir: undefined,
      target: "",
      outputPath: undefined,
      encoding: undefined,
      scrubMarkup: true,
      strict: false,
      quiet: false,
      help: false,
    });
  });

  it("should read every option", () => {
    assert.deepStrictEqual(
      parseArgs(["-a", "/att:/more", "--target", "kmail", "-o", "out.mbox", "-e", "utf-8", "--no-scrub", "--strict", "-q", "In.mbx"]),
      {
        archives: ["In.mbx"],
        attachmentsDir: "/att:/more",
        target: "kmail",
        outputPath: "out.mbox",
        encoding: "utf-8",
        scrubMarkup: false,
        strict: true,
        quiet: true,
        help: false,
      },
    );
  });

  it("should accept several archives", () => {
    assert.deepStrictEqual(parseArgs(["In.mbx", "Out.mbx"]).archives, ["In.mbx", "Out.mbx"]);
  });

  it("should allow help without archives", () => {
    assert.strictEqual(parseArgs(["--help"]).help, true);
  });

  it("should reject bad usage", () => {
    assert.throws(() => parseArgs([]), { name: "UsageError", message: "no mailbox file given" });
    assert.throws(() => parseArgs(["In.mbx", "-a"]), { message: "option -a needs a value" });
    assert.throws(() => parseArgs(["--bogus", "In.mbx"]), { message: "unknown option --bogus" });
    assert.throws(() => parseArgs(["-o", "x", "In.mbx", "Out.mbx"]), UsageError);
  });
});
