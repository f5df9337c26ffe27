/**
 * Raised for failures that abort a whole conversion: the archive cannot be
 * opened, or the output container cannot be created or closed.
 */
export class ConversionError extends Error {
  public readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.name = "ConversionError";
    this.path = path;
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
