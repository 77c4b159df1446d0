import { TimeBoxedCacheService } from "../time-boxed-cache.service";

describe("TimeBoxedCacheService", () => {
  let cache: TimeBoxedCacheService;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date("2024-03-01T12:00:00Z"));
    cache = new TimeBoxedCacheService();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe("Basic Cache Operations", () => {
    it("should set and get payloads", () => {
      cache.set("weather", { temperature: 12 });

      expect(cache.get("weather")).toEqual({ temperature: 12 });
    });

    it("should return undefined for missing keys", () => {
      expect(cache.get("missing")).toBeUndefined();
      expect(cache.getEntry("missing")).toBeUndefined();
      expect(cache.age("missing")).toBeUndefined();
    });

    it("should overwrite unconditionally", () => {
      cache.set("bitcoin", { price: 1 });
      jest.advanceTimersByTime(500);
      cache.set("bitcoin", { price: 2 });

      expect(cache.get("bitcoin")).toEqual({ price: 2 });
      expect(cache.getEntry("bitcoin")?.recordedAt).toBe(new Date("2024-03-01T12:00:00.500Z").getTime());
    });

    it("should freeze stored entries", () => {
      cache.set("weather", { temperature: 12 });
      const entry = cache.getEntry("weather");

      expect(Object.isFrozen(entry)).toBe(true);
    });

    it("should list keys in insertion order", () => {
      cache.set("a", 1);
      cache.set("b", 2);

      expect(cache.keys()).toEqual(["a", "b"]);
    });
  });

  describe("Freshness", () => {
    it("should report absent keys as expired", () => {
      expect(cache.isExpired("never-set", 60_000)).toBe(true);
    });

    it("should be fresh within the max age and expired after it", () => {
      cache.set("weather", { temperature: 12 });

      jest.advanceTimersByTime(60_000);
      expect(cache.isExpired("weather", 60_000)).toBe(false);

      jest.advanceTimersByTime(1);
      expect(cache.isExpired("weather", 60_000)).toBe(true);
    });

    it("should report age since the last write", () => {
      cache.set("weather", { temperature: 12 });
      jest.advanceTimersByTime(1234);

      expect(cache.age("weather")).toBe(1234);
    });
  });

  describe("Clearing", () => {
    it("should clear a single key", () => {
      cache.set("a", 1);
      cache.set("b", 2);

      cache.clear("a");

      expect(cache.keys()).toEqual(["b"]);
    });

    it("should clear everything without a key", () => {
      cache.set("a", 1);
      cache.set("b", 2);

      cache.clear();

      expect(cache.keys()).toEqual([]);
    });
  });

  describe("getCacheInfo", () => {
    it("should report age and serialised size per entry", () => {
      cache.set("weather", { t: 1 });
      jest.advanceTimersByTime(250);

      expect(cache.getCacheInfo()).toEqual({
        totalEntries: 1,
        entries: { weather: { ageMs: 250, sizeBytes: '{"t":1}'.length } },
      });
    });
  });
});

describe("TimeBoxedCacheService concurrent access", () => {
  it("should lose no writes when workers hammer disjoint keys for a second", async () => {
    const cache = new TimeBoxedCacheService();
    const workers = 8;
    const deadline = Date.now() + 1000;
    const lastWritten = new Array<number>(workers).fill(-1);

    const worker = async (id: number) => {
      const key = `worker-${id}`;
      let i = 0;
      while (Date.now() < deadline) {
        cache.set(key, { id, i });
        const read = cache.get(key);
        expect(read).toEqual({ id, i });
        lastWritten[id] = i;
        i++;
        await new Promise<void>(resolve => setImmediate(resolve));
      }
    };

    await Promise.all(Array.from({ length: workers }, (_, id) => worker(id)));

    expect(cache.keys()).toHaveLength(workers);
    for (let id = 0; id < workers; id++) {
      expect(cache.get(`worker-${id}`)).toEqual({ id, i: lastWritten[id] });
    }
  });
});
