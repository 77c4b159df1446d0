import { TimeBoxedCacheService } from "@/cache/time-boxed-cache.service";
import { NetworkError } from "@/common/errors";
import type { ConfigService } from "@/config/config.service";
import { SourceRegistry } from "@/sources/base/source.registry";
import { FakeSource, MockFactory, TestHelpers } from "@/__tests__/utils";
import { RefreshSchedulerService, type RefreshSchedulerSettings } from "../refresh-scheduler.service";

describe("RefreshSchedulerService", () => {
  let cache: TimeBoxedCacheService;
  let registry: SourceRegistry;
  let config: ConfigService;
  let scheduler: RefreshSchedulerService | undefined;

  const createScheduler = (settings: Partial<RefreshSchedulerSettings> = {}) => {
    scheduler = new RefreshSchedulerService(registry, config, {
      enabled: false,
      checkIntervalMs: 5,
      errorBackoffMs: 10_000,
      shutdownTimeoutMs: 1000,
      ...settings,
    });
    return scheduler;
  };

  const addSource = <T>(key: string, payload?: T): FakeSource<T> => {
    const source = MockFactory.createSource<T>(key, payload, cache);
    registry.register(source);
    return source;
  };

  beforeEach(() => {
    cache = new TimeBoxedCacheService();
    registry = new SourceRegistry();
    config = MockFactory.createConfigService();
  });

  afterEach(async () => {
    await scheduler?.stop(1000);
    scheduler = undefined;
    jest.restoreAllMocks();
  });

  describe("runCycle", () => {
    it("should refresh sources one at a time in registration order", async () => {
      const order: string[] = [];
      for (const key of ["bitcoin", "weather", "calendar_events"]) {
        const source = addSource<number>(key);
        source.fetcher.mockImplementation(async () => {
          order.push(`${key}:start`);
          await TestHelpers.wait(5);
          order.push(`${key}:end`);
          return 1;
        });
      }

      const report = await createScheduler().runCycle();

      expect(order).toEqual([
        "bitcoin:start",
        "bitcoin:end",
        "weather:start",
        "weather:end",
        "calendar_events:start",
        "calendar_events:end",
      ]);
      expect(report.results.map(result => [result.key, result.status])).toEqual([
        ["bitcoin", "success"],
        ["weather", "success"],
        ["calendar_events", "success"],
      ]);
    });

    it("should force a refresh even when the cache is fresh", async () => {
      const source = addSource("bitcoin", 1);
      const service = createScheduler();

      await service.runCycle();
      await service.runCycle();

      expect(source.fetcher).toHaveBeenCalledTimes(2);
    });

    it("should isolate each source's failure", async () => {
      const down = addSource<number>("down");
      down.fetcher.mockRejectedValue(new NetworkError("down"));
      const buggy = addSource<number>("buggy");
      buggy.fetcher.mockRejectedValue(new TypeError("Cannot read properties of undefined (reading 'usd')"));
      const healthy = addSource("healthy", 3);
      const service = createScheduler();

      const report = await service.runCycle();

      expect(report.results).toEqual([
        { key: "down", status: "error", durationMs: expect.any(Number), error: "network: down" },
        {
          key: "buggy",
          status: "failed",
          durationMs: expect.any(Number),
          error: "Cannot read properties of undefined (reading 'usd')",
        },
        { key: "healthy", status: "success", durationMs: expect.any(Number) },
      ]);
      expect(healthy.fetcher).toHaveBeenCalledTimes(1);
      expect(service.getErrorCount("refresh buggy")).toBe(1);
    });

    it("should report stale data served after a failed refresh", async () => {
      const source = addSource("bitcoin", 1);
      const service = createScheduler();
      await service.runCycle();
      source.fetcher.mockRejectedValue(new NetworkError("timeout", true));

      const report = await service.runCycle();

      expect(report.results[0]).toEqual({
        key: "bitcoin",
        status: "cached",
        durationMs: expect.any(Number),
        error: "network: timeout",
      });
    });

    it("should skip disabled sources without fetching", async () => {
      const source = addSource("calendar_events", 1);
      source.enabled = false;

      const report = await createScheduler().runCycle();

      expect(report.results).toEqual([{ key: "calendar_events", status: "skipped", durationMs: 0 }]);
      expect(source.fetcher).not.toHaveBeenCalled();
    });

    it("should record the last cycle", async () => {
      addSource("bitcoin", 1);
      const service = createScheduler();
      expect(service.getLastCycle()).toBeNull();
      expect(service.getLastCycleAt()).toBeNull();

      const report = await service.runCycle();

      expect(service.getLastCycle()).toBe(report);
      expect(service.getLastCycleAt()).toBe(report.startedAt);
    });
  });

  describe("background loop", () => {
    it("should run a cycle right after start and stop promptly", async () => {
      const source = addSource("bitcoin", 1);
      const service = createScheduler({ checkIntervalMs: 60_000 });

      service.start();
      expect(service.isRunning()).toBe(true);
      expect(service.getState()).toBe("running");
      await TestHelpers.waitFor(() => service.getLastCycle() !== null);

      const { result: exited, duration } = await TestHelpers.measureTime(() => service.stop());

      expect(exited).toBe(true);
      expect(duration).toBeLessThan(1000);
      expect(service.getState()).toBe("stopped");
      expect(source.fetcher).toHaveBeenCalledTimes(1);
    });

    it("should wait for the update interval between cycles and re-read it", async () => {
      const source = addSource("bitcoin", 1);
      const service = createScheduler();

      service.start();
      await TestHelpers.waitFor(() => source.fetcher.mock.calls.length === 1);
      await TestHelpers.wait(50);
      expect(source.fetcher).toHaveBeenCalledTimes(1);

      config.set("app.api_update_interval", 0);
      await TestHelpers.waitFor(() => source.fetcher.mock.calls.length >= 3);
    });

    it("should ignore a second start", async () => {
      const source = addSource("bitcoin", 1);
      const service = createScheduler({ checkIntervalMs: 60_000 });

      service.start();
      service.start();
      await TestHelpers.waitFor(() => service.getLastCycle() !== null);
      await TestHelpers.wait(20);

      expect(source.fetcher).toHaveBeenCalledTimes(1);
    });

    it("should give up waiting after the timeout and report it", async () => {
      const source = addSource<number>("slow");
      const deferred = TestHelpers.createDeferredPromise<number>();
      source.fetcher.mockReturnValue(deferred.promise);
      const service = createScheduler();

      service.start();
      await TestHelpers.waitFor(() => source.fetcher.mock.calls.length === 1);

      expect(await service.stop(20)).toBe(false);
      expect(service.isRunning()).toBe(false);

      deferred.resolve(5);
      expect(await service.stop(1000)).toBe(true);
      expect(source.fetcher).toHaveBeenCalledTimes(1);
    });

    it("should back off after an iteration fails outside the sources", async () => {
      const source = addSource("bitcoin", 1);
      jest.spyOn(registry, "getAll").mockImplementationOnce(() => {
        throw new Error("registry unavailable");
      });
      const service = createScheduler({ errorBackoffMs: 10_000 });

      service.start();
      await TestHelpers.waitFor(() => service.getErrorCount("refresh loop") === 1);
      await TestHelpers.wait(50);

      expect(source.fetcher).not.toHaveBeenCalled();
      expect(service.isRunning()).toBe(true);
      expect(await service.stop()).toBe(true);
    });
  });

  describe("module lifecycle", () => {
    it("should stay stopped on init when disabled", async () => {
      const service = createScheduler({ enabled: false });

      await service.onModuleInit();

      expect(service.isRunning()).toBe(false);
      expect(service.isServiceInitialized()).toBe(true);
    });

    it("should start on init when enabled and stop on destroy", async () => {
      addSource("bitcoin", 1);
      const service = createScheduler({ enabled: true, checkIntervalMs: 60_000 });

      await service.onModuleInit();
      expect(service.isRunning()).toBe(true);

      await service.onModuleDestroy();
      expect(service.isRunning()).toBe(false);
      expect(service.isServiceDestroyed()).toBe(true);
    });
  });
});
