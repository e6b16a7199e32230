export type IngestErrorCode = "SOURCE_NOT_FOUND" | "MALFORMED_SOURCE";

/** Base class for failures that abort ingestion but not the process. */
export abstract class IngestError extends Error {
  abstract readonly code: IngestErrorCode;
}

export class SourceNotFoundError extends IngestError {
  readonly code = "SOURCE_NOT_FOUND";

  /**
   * @param reason Set when the path exists but cannot be read as a file.
   */
  constructor(readonly sourcePath: string, reason?: string) {
    super(reason ? `Forecast source unreadable: ${sourcePath} (${reason})` : `Forecast source not found: ${sourcePath}`);
    this.name = "SourceNotFoundError";
  }
}

export class MalformedSourceError extends IngestError {
  readonly code = "MALFORMED_SOURCE";

  /**
   * @param issuePath Key path of the first missing or invalid field, when known.
   */
  constructor(message: string, readonly issuePath: (string | number)[] = []) {
    super(issuePath.length ? `${message} (at ${issuePath.join(".")})` : message);
    this.name = "MalformedSourceError";
  }
}
