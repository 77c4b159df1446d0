import {
  HttpStatusError,
  MalformedResponseError,
  NetworkError,
  NotConfiguredError,
  SourceError,
} from "@/common/errors";

/**
 * Centralized classification of thrown values into source error categories
 */

/**
 * Extract HTTP status code from error message
 */
export function extractStatusCode(message: string): number | null {
  // Match patterns like "503", "Unexpected server response: 503", etc.
  const patterns = [
    /unexpected server response: (\d+)/i,
    /server response: (\d+)/i,
    /status code: (\d+)/i,
    /http (\d+)/i,
    /(\d{3})\s/, // 3-digit number followed by space
    /^(\d{3})$/, // Just the 3-digit number
  ];

  for (const pattern of patterns) {
    const match = message.match(pattern);
    if (match) {
      const code = parseInt(match[1], 10);
      if (code >= 100 && code < 600) {
        return code;
      }
    }
  }

  return null;
}

// Built-in error types that signal a bug rather than a remote failure
const PROGRAMMING_ERROR_TYPES = [TypeError, ReferenceError, RangeError, EvalError, URIError];

function isAbortLike(error: Error): boolean {
  return error.name === "AbortError" || error.name === "TimeoutError";
}

function isFetchTransportFailure(error: Error): boolean {
  // undici reports transport failures as TypeError("fetch failed") with the socket error as cause
  return error instanceof TypeError && error.message.toLowerCase().includes("fetch failed");
}

export function isProgrammingError(error: unknown): boolean {
  if (!(error instanceof Error) || error instanceof SourceError) return false;
  if (isAbortLike(error) || isFetchTransportFailure(error)) return false;
  return PROGRAMMING_ERROR_TYPES.some(type => error instanceof type);
}

/**
 * Map an arbitrary thrown value onto a SourceError, or null when it is a programming error
 */
export function classifySourceError(error: unknown): SourceError | null {
  if (error instanceof SourceError) {
    return error;
  }

  if (!(error instanceof Error)) {
    return new NetworkError(typeof error === "string" ? error : `Unexpected failure: ${String(error)}`);
  }

  if (isAbortLike(error)) {
    return new NetworkError(`Request timed out: ${error.message}`, true, { cause: error });
  }

  if (isFetchTransportFailure(error)) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    return new NetworkError(`${error.message}${cause}`, false, { cause: error });
  }

  if (error instanceof SyntaxError) {
    return new MalformedResponseError(error.message, { cause: error });
  }

  if (isProgrammingError(error)) {
    return null;
  }

  const status = extractStatusCode(error.message);
  if (status !== null && status >= 400) {
    return new HttpStatusError(status, error.message, { cause: error });
  }

  const message = error.message.toLowerCase();
  if (message.includes("not configured") || message.includes("unauthorized") || message.includes("forbidden")) {
    return new NotConfiguredError(error.message, { cause: error });
  }

  return new NetworkError(error.message, message.includes("timeout") || message.includes("timed out"), {
    cause: error,
  });
}
