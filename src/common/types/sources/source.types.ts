import type { SourceError } from "../../errors/source-errors";

export type FetchStatus = "success" | "mock" | "cached" | "error";

interface FetchResultBase {
  /** Key of the source manager that produced the result */
  readonly source: string;
  /** Epoch ms of the fetch that produced the data, or of the failed attempt for errors */
  readonly lastUpdated: number;
}

export interface SuccessResult<T> extends FetchResultBase {
  readonly status: "success";
  readonly data: T;
}

export interface MockResult<T> extends FetchResultBase {
  readonly status: "mock";
  readonly data: T;
}

export interface CachedResult<T> extends FetchResultBase {
  readonly status: "cached";
  readonly data: T;
  readonly error: string;
}

export interface ErrorResult extends FetchResultBase {
  readonly status: "error";
  readonly error: string;
}

/** Results that are written to the cache */
export type FreshFetchResult<T> = SuccessResult<T> | MockResult<T>;

/**
 * What every source manager returns. Consumers branch on `status`, never on exceptions.
 */
export type FetchResult<T> = FreshFetchResult<T> | CachedResult<T> | ErrorResult;

/**
 * Outcome of one attempt at the source hook
 */
export type FetchOutcome<T> =
  | { readonly ok: true; readonly payload: T; readonly synthetic: boolean }
  | { readonly ok: false; readonly reason: SourceError };

export interface SourceDefinition {
  /** Cache namespace, unique across the registry */
  readonly key: string;
  /** Fixed interval, or a function re-read on every freshness check */
  readonly refreshIntervalMs: number | (() => number);
  readonly endpoints?: Readonly<Record<string, string>>;
}

export interface SourceCacheInfo {
  key: string;
  cached: boolean;
  ageMs: number | null;
  isExpired: boolean;
  refreshIntervalMs: number;
  lastError: string | null;
  status: FetchStatus | "unknown";
}

export type RefreshOutcomeStatus = FetchStatus | "failed" | "skipped";

export interface SourceRefreshReport {
  key: string;
  status: RefreshOutcomeStatus;
  durationMs: number;
  error?: string;
}

export interface RefreshCycleReport {
  startedAt: number;
  durationMs: number;
  results: SourceRefreshReport[];
}

export type SchedulerState = "running" | "stopped";
