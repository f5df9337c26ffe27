#!/usr/bin/env node
import { basename } from "node:path";
import { ConversionError, ConversionLog, convertMailbox, getErrorMessage } from "../server/mbx-to-mbox.js";
import { type CliOptions, parseArgs, USAGE, UsageError } from "./args.js";

function run(options: CliOptions): number {
  let exitCode = 0;

  for (const archive of options.archives) {
    const log = new ConversionLog(basename(archive), console, options.quiet);
    try {
      const result = convertMailbox(archive, {
        attachmentsDir: options.attachmentsDir,
        target: options.target,
        outputPath: options.outputPath,
        encoding: options.encoding,
        scrubMarkup: options.scrubMarkup,
        log,
      });
      console.log(log.summary(result.messages, result.attachments));
      if (options.strict && (result.warnings > 0 || result.errors > 0)) {
        exitCode = 1;
      }
    } catch (error) {
      if (!(error instanceof ConversionError)) throw error;
      console.error(`mbx2mbox: ${getErrorMessage(error)}`);
      exitCode = 1;
    }
  }

  return exitCode;
}

function main(argv: string[]): number {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(`mbx2mbox: ${error.message}`);
    console.error(USAGE);
    return 1;
  }
  if (options.help) {
    console.log(USAGE);
    return 0;
  }
  return run(options);
}

process.exitCode = main(process.argv.slice(2));
