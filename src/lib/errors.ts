/** Error thrown when a source cannot be decoded or identified */
export class MalformedDocumentError extends Error {
  constructor(
    public id: string,
    public reason: string,
  ) {
    super(`Malformed document ${id}: ${reason}`);
    this.name = "MalformedDocumentError";
  }
}

/** Error thrown when a source reuses an already-loaded id */
export class DuplicateDocumentError extends Error {
  constructor(public id: string) {
    super(`Duplicate document: ${id}`);
    this.name = "DuplicateDocumentError";
  }
}

/** Error raised when an internal link target or fragment does not exist */
export class BrokenLinkError extends Error {
  constructor(
    public sourceId: string,
    public href: string,
    public fragment?: string,
  ) {
    super(
      fragment === undefined
        ? `Broken link in ${sourceId}: ${href}`
        : `Broken link in ${sourceId}: ${href} (no heading #${fragment})`,
    );
    this.name = "BrokenLinkError";
  }
}

/** Error thrown when the input set as a whole cannot be read */
export class SourceUnreadableError extends Error {
  constructor(
    public path: string,
    cause?: unknown,
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Cannot read sources from ${path}${detail}`);
    this.name = "SourceUnreadableError";
  }
}

/** Error thrown for invalid configuration values */
export class ConfigError extends Error {
  constructor(
    public key: string,
    message: string,
  ) {
    super(`Invalid config "${key}": ${message}`);
    this.name = "ConfigError";
  }
}

/** Message of an unknown thrown value */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : "Unknown error";
}
