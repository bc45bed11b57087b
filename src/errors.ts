/** Bad command line: detected before any input is read or output created. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length ? `${message}\n  ${issues.join("\n  ")}` : message);
    this.name = "ConfigError";
  }
}

/** Corpus or sink failure; the underlying error is kept as `cause`. */
export class IoError extends Error {
  constructor(message: string, cause?: unknown) {
    super(cause instanceof Error ? `${message}: ${cause.message}` : message, { cause });
    this.name = "IoError";
  }
}
