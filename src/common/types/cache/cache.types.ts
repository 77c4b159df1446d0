/**
 * A single cached payload. Frozen on insertion and replaced wholesale on the next write.
 */
export interface CacheEntry<T = unknown> {
  readonly payload: T;
  /** Epoch milliseconds at which the payload was stored */
  readonly recordedAt: number;
}

export interface CacheEntryInfo {
  ageMs: number;
  /** Length of the payload's JSON serialisation */
  sizeBytes: number;
}

/**
 * Snapshot of every entry, used by the health and diagnostics endpoints.
 */
export interface CacheInfo {
  totalEntries: number;
  entries: Record<string, CacheEntryInfo>;
}
