import { StandardService } from "@/common/base/composed.service";
import { NotConfiguredError } from "@/common/errors";
import { classifySourceError } from "@/common/utils/error-classification.utils";
import type { TimeBoxedCacheService } from "@/cache/time-boxed-cache.service";
import type {
  CachedResult,
  ErrorResult,
  FetchOutcome,
  FetchResult,
  FetchStatus,
  FreshFetchResult,
  SourceCacheInfo,
  SourceDefinition,
} from "@/common/types/sources";
import { isSyntheticData, type SyntheticData } from "./synthetic-data";

const SLOW_FETCH_MS = 5000;
const CONSECUTIVE_FAILURE_THRESHOLD = 5;

/**
 * Uniform cache-first contract over one remote data source.
 *
 * `getData` never throws for network, malformed-response or not-configured failures:
 * those become `cached` (stale data kept) or `error` (nothing to fall back on) results.
 * Anything else thrown by the hook is a bug and propagates.
 */
export abstract class SourceManager<T> extends StandardService {
  private stored?: FreshFetchResult<T>;
  private inFlight?: Promise<FetchResult<T>>;
  private lastError: string | null = null;
  private lastStatus: FetchStatus | "unknown" = "unknown";

  protected constructor(
    protected readonly cache: TimeBoxedCacheService,
    protected readonly definition: SourceDefinition
  ) {
    super();
  }

  /**
   * Fetch and normalise the source's payload. Wrap it in SyntheticData when invented.
   */
  protected abstract fetchData(): Promise<T | SyntheticData<T>>;

  get key(): string {
    return this.definition.key;
  }

  get refreshIntervalMs(): number {
    const interval = this.definition.refreshIntervalMs;
    return typeof interval === "function" ? interval() : interval;
  }

  /**
   * Whether the scheduler should refresh this source. Unconfigured sources override this.
   */
  isEnabled(): boolean {
    return true;
  }

  getLastError(): string | null {
    return this.lastError;
  }

  async getData(forceRefresh = false): Promise<FetchResult<T>> {
    if (!forceRefresh) {
      const cached = this.readCache();
      if (cached && !this.cache.isExpired(this.key, this.refreshIntervalMs)) {
        return cached;
      }
    }

    // A forced refresh from the UI can overlap the scheduler; share one fetch
    if (!this.inFlight) {
      this.inFlight = this.refresh().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  clearCache(): void {
    this.cache.clear(this.key);
    this.stored = undefined;
    this.lastStatus = "unknown";
  }

  isDataFresh(): boolean {
    return this.readCache() !== undefined && !this.cache.isExpired(this.key, this.refreshIntervalMs);
  }

  getCacheInfo(): SourceCacheInfo {
    const cached = this.readCache();
    const refreshIntervalMs = this.refreshIntervalMs;

    return {
      key: this.key,
      cached: cached !== undefined,
      ageMs: cached ? (this.cache.age(this.key) ?? null) : null,
      isExpired: cached ? this.cache.isExpired(this.key, refreshIntervalMs) : true,
      refreshIntervalMs,
      lastError: this.lastError,
      status: this.lastStatus,
    };
  }

  /**
   * URL configured for one of this source's upstream calls
   */
  protected endpoint(name: string): string {
    const url = this.definition.endpoints?.[name];
    if (!url) {
      throw new NotConfiguredError(`No endpoint configured for "${name}"`);
    }
    return url;
  }

  private async refresh(): Promise<FetchResult<T>> {
    const started = Date.now();
    const outcome = await this.attemptFetch();
    this.logPerformance(`${this.key} fetch`, Date.now() - started, SLOW_FETCH_MS);

    if (outcome.ok) {
      const base = { data: outcome.payload, lastUpdated: Date.now(), source: this.key };
      const result: FreshFetchResult<T> = outcome.synthetic
        ? { status: "mock", ...base }
        : { status: "success", ...base };
      Object.freeze(result);

      this.stored = result;
      this.cache.set(this.key, result);
      this.lastError = null;
      this.lastStatus = result.status;
      this.resetErrorTracking("fetch");
      this.logDebug(`Refreshed (${result.status})`, this.key);
      return result;
    }

    const message = outcome.reason.describe();
    this.lastError = message;
    this.handleError(outcome.reason, "fetch", {
      shouldThrow: false,
      shouldLog: false,
      threshold: CONSECUTIVE_FAILURE_THRESHOLD,
    });

    const previous = this.readCache();
    if (previous) {
      this.logWarning(`Refresh failed, serving cached data: ${message}`, this.key);
      this.lastStatus = "cached";
      const stale: CachedResult<T> = {
        status: "cached",
        data: previous.data,
        lastUpdated: previous.lastUpdated,
        source: this.key,
        error: message,
      };
      return Object.freeze(stale);
    }

    this.logWarning(`Refresh failed with nothing cached: ${message}`, this.key);
    this.lastStatus = "error";
    const failure: ErrorResult = { status: "error", error: message, lastUpdated: Date.now(), source: this.key };
    return Object.freeze(failure);
  }

  private async attemptFetch(): Promise<FetchOutcome<T>> {
    try {
      const value = await this.fetchData();
      return isSyntheticData(value)
        ? { ok: true, payload: value.payload, synthetic: true }
        : { ok: true, payload: value, synthetic: false };
    } catch (error) {
      const reason = classifySourceError(error);
      if (reason) {
        return { ok: false, reason };
      }

      if (error instanceof Error) {
        this.handleError(error, `${this.key} fetch (programming error)`);
      }
      throw error;
    }
  }

  /**
   * The stored result, but only while the cache still holds exactly it.
   * A foreign write or a clear under this key invalidates it.
   */
  private readCache(): FreshFetchResult<T> | undefined {
    const stored = this.stored;
    if (stored === undefined || this.cache.get(this.key) !== stored) {
      return undefined;
    }
    return stored;
  }
}
