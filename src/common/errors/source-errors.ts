/**
 * Recoverable failure categories a data source can report.
 * Anything outside these is a programming error and propagates.
 */
export type SourceErrorCategory = "network" | "malformed_response" | "not_configured";

export abstract class SourceError extends Error {
  abstract readonly category: SourceErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /**
   * Human readable form stored as a source's lastError
   */
  describe(): string {
    return `${this.category}: ${this.message}`;
  }
}

/** Transport failure, DNS failure, refused connection or timeout */
export class NetworkError extends SourceError {
  readonly category = "network";

  constructor(
    message: string,
    public readonly timedOut = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Non-2xx response. 401/403 mean the source is not usable with the current credentials */
export class HttpStatusError extends SourceError {
  readonly category: SourceErrorCategory;

  constructor(
    public readonly status: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.category = status === 401 || status === 403 ? "not_configured" : "network";
  }
}

/** Body that is not JSON or lacks required fields */
export class MalformedResponseError extends SourceError {
  readonly category = "malformed_response";
}

/** Missing credentials or disabled integration */
export class NotConfiguredError extends SourceError {
  readonly category = "not_configured";
}
