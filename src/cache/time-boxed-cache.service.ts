import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import type { CacheEntry, CacheInfo } from "@/common/types/cache";

/**
 * In-memory map from source key to the last payload written, with freshness queries.
 *
 * Every method is a synchronous body, so each runs to completion on the event loop
 * before any other reader or writer can observe the map. Readers see either the
 * previous entry or the new one, never a partial write.
 */
@Injectable()
export class TimeBoxedCacheService extends BaseService {
  private readonly entries = new Map<string, CacheEntry>();

  /**
   * Stored payload, regardless of age
   */
  get(key: string): unknown {
    return this.entries.get(key)?.payload;
  }

  getEntry(key: string): CacheEntry | undefined {
    return this.entries.get(key);
  }

  /**
   * Overwrites unconditionally and stamps the entry with the current time
   */
  set(key: string, payload: unknown): void {
    this.entries.set(key, Object.freeze({ payload, recordedAt: Date.now() }));
  }

  /**
   * True when absent or older than `maxAgeMs`
   */
  isExpired(key: string, maxAgeMs: number): boolean {
    const entry = this.entries.get(key);
    if (!entry) return true;
    return Date.now() - entry.recordedAt > maxAgeMs;
  }

  age(key: string): number | undefined {
    const entry = this.entries.get(key);
    return entry ? Date.now() - entry.recordedAt : undefined;
  }

  clear(key?: string): void {
    if (key === undefined) {
      this.entries.clear();
      this.logger.debug("Cleared all cache entries");
    } else {
      this.entries.delete(key);
    }
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  getCacheInfo(): CacheInfo {
    const now = Date.now();
    const info: CacheInfo = { totalEntries: this.entries.size, entries: {} };

    for (const [key, entry] of this.entries) {
      info.entries[key] = {
        ageMs: now - entry.recordedAt,
        sizeBytes: this.measure(entry.payload),
      };
    }

    return info;
  }

  private measure(payload: unknown): number {
    try {
      return (JSON.stringify(payload) ?? "").length;
    } catch {
      // Circular payloads are never written by sources; report them as unmeasurable
      return 0;
    }
  }
}
