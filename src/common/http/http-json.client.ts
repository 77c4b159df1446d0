import { Inject, Injectable, Optional } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { HttpStatusError, MalformedResponseError, NetworkError, NotConfiguredError } from "@/common/errors";
import { executeWithExponentialBackoff } from "@/common/utils/async.utils";
import { ENV } from "@/config/environment.constants";

export interface HttpJsonClientOptions {
  timeoutMs: number;
  maxRateLimitRetries: number;
  rateLimitBaseDelayMs: number;
}

export interface JsonRequest {
  params?: Record<string, string | number | boolean>;
  headers?: Record<string, string>;
  /** Prefix for error messages, e.g. "Failed to fetch mempool fees" */
  context?: string;
}

export const HTTP_JSON_CLIENT_OPTIONS = "HTTP_JSON_CLIENT_OPTIONS";

/**
 * Thin fetch wrapper shared by every source.
 * Every failure surfaces as a SourceError so managers can classify it.
 */
@Injectable()
export class HttpJsonClient extends BaseService {
  private readonly options: HttpJsonClientOptions;

  constructor(@Optional() @Inject(HTTP_JSON_CLIENT_OPTIONS) options?: Partial<HttpJsonClientOptions>) {
    super();
    this.options = {
      timeoutMs: ENV.TIMEOUTS.HTTP_MS,
      maxRateLimitRetries: ENV.HTTP.RATE_LIMIT_MAX_RETRIES,
      rateLimitBaseDelayMs: ENV.HTTP.RATE_LIMIT_BASE_DELAY_MS,
      ...options,
    };
  }

  async getJson(url: string, request: JsonRequest = {}): Promise<unknown> {
    const target = this.buildUrl(url, request.params);
    const context = request.context ?? `GET ${target.origin}${target.pathname}`;
    const { maxRateLimitRetries, rateLimitBaseDelayMs } = this.options;

    // Only rate limiting is retried here; other failures go straight to the source manager
    const response = await executeWithExponentialBackoff(() => this.fetchOnce(target, request.headers ?? {}, context), {
      maxAttempts: maxRateLimitRetries + 1,
      initialDelay: rateLimitBaseDelayMs,
      maxDelay: rateLimitBaseDelayMs * Math.pow(2, maxRateLimitRetries),
      shouldRetry: error => error instanceof HttpStatusError && error.status === 429,
      onRetry: (_error, attempt, delay) => {
        this.logger.debug(
          `Rate limited by ${target.host}, retrying in ${delay}ms (attempt ${attempt + 1}/${maxRateLimitRetries + 1})`
        );
      },
    });

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw this.toNetworkError(error, context);
    }

    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch (error) {
      throw new MalformedResponseError(`${context}: response is not valid JSON`, { cause: error });
    }
  }

  private async fetchOnce(url: URL, headers: Record<string, string>, context: string): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Accept: "application/json", ...headers },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw this.toNetworkError(error, context);
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new HttpStatusError(response.status, `${context}: HTTP ${response.status}: ${response.statusText}`);
    }

    return response;
  }

  private buildUrl(url: string, params: JsonRequest["params"]): URL {
    let target: URL;
    try {
      target = new URL(url);
    } catch (error) {
      // Endpoints come from configuration, so a bad one is a configuration failure
      throw new NotConfiguredError(`Invalid endpoint URL "${url}"`, { cause: error });
    }
    for (const [name, value] of Object.entries(params ?? {})) {
      target.searchParams.set(name, String(value));
    }
    return target;
  }

  private toNetworkError(error: unknown, context: string): NetworkError {
    if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
      return new NetworkError(`${context}: timed out after ${this.options.timeoutMs}ms`, true, { cause: error });
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error && error.cause instanceof Error ? ` (${error.cause.message})` : "";
    return new NetworkError(`${context}: ${message}${cause}`, false, { cause: error });
  }
}
