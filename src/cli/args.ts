export interface CliOptions {
  archives: string[];
  attachmentsDir: string | undefined;
  target: string;
  outputPath: string | undefined;
  encoding: string | undefined;
  scrubMarkup: boolean;
  strict: boolean;
  quiet: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const VALUE_FLAGS: Record<string, "attachmentsDir" | "target" | "outputPath" | "encoding"> = {
  "-a": "attachmentsDir",
  "--attachments": "attachmentsDir",
  "-t": "target",
  "--target": "target",
  "-o": "outputPath",
  "--out": "outputPath",
  "-e": "encoding",
  "--encoding": "encoding",
};

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    archives: [],
    attachmentsDir: undefined,
    target: "",
    outputPath: undefined,
    encoding: undefined,
    scrubMarkup: true,
    strict: false,
    quiet: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const key = VALUE_FLAGS[arg];
    if (key) {
      const value = args[i + 1];
      if (value === undefined) {
        throw new UsageError(`option ${arg} needs a value`);
      }
      options[key] = value;
      i++;
    } else if (arg === "--no-scrub") {
      options.scrubMarkup = false;
    } else if (arg === "--strict") {
      options.strict = true;
    } else if (arg === "--quiet" || arg === "-q") {
      options.quiet = true;
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`unknown option ${arg}`);
    } else if (arg.trim()) {
      options.archives.push(arg);
    }
  }

  if (!options.help && options.archives.length === 0) {
    throw new UsageError("no mailbox file given");
  }
  if (options.outputPath !== undefined && options.archives.length > 1) {
    throw new UsageError("-o can only be used with a single mailbox file");
  }
  return options;
}

export const USAGE = `Usage: mbx2mbox [options] <mailbox.mbx>...

Options:
  -a, --attachments <dirs>  Attachment directories, colon-separated
  -t, --target <client>     Destination client hint (e.g. pine, kmail)
  -o, --out <file>          Output file (single mailbox only; default <mailbox>.new)
  -e, --encoding <charset>  Charset of the mailbox (default windows-1252)
      --no-scrub            Keep the client's private markup tokens in bodies
      --strict              Exit non-zero when any warning or error was reported
  -q, --quiet               Only print errors and summaries
  -h, --help                Show this help message`;
