import type { INestApplication } from "@nestjs/common";
import request from "supertest";
import { TimeBoxedCacheService } from "@/cache/time-boxed-cache.service";
import { NetworkError } from "@/common/errors";
import { RefreshSchedulerService } from "@/scheduler/refresh-scheduler.service";
import { SourceRegistry } from "@/sources/base/source.registry";
import { SyntheticData } from "@/sources/base/synthetic-data";
import { createTestModule, FakeSource, MockFactory } from "@/__tests__/utils";
import { DashboardController } from "../dashboard.controller";

describe("DashboardController", () => {
  let app: INestApplication;
  let bitcoin: FakeSource<{ usd: number }>;
  let weather: FakeSource<{ temperature: number }>;
  let calendar: FakeSource<{ events: string[] }>;

  beforeEach(async () => {
    const cache = new TimeBoxedCacheService();
    const registry = new SourceRegistry();
    bitcoin = MockFactory.createSource("bitcoin", { usd: 67250.5 }, cache);
    weather = MockFactory.createSource<{ temperature: number }>("weather", undefined, cache);
    weather.fetcher.mockResolvedValue(new SyntheticData({ temperature: 21 }));
    calendar = MockFactory.createSource<{ events: string[] }>("calendar_events", undefined, cache);
    calendar.fetcher.mockRejectedValue(new NetworkError("connection refused"));
    calendar.enabled = false;
    registry.register(bitcoin);
    registry.register(weather);
    registry.register(calendar);

    const scheduler = new RefreshSchedulerService(registry, MockFactory.createConfigService(), { enabled: false });

    app = await createTestModule()
      .addController(DashboardController)
      .addValue(SourceRegistry, registry)
      .addValue(RefreshSchedulerService, scheduler)
      .buildApp();
  });

  afterEach(async () => {
    await app.close();
    jest.restoreAllMocks();
  });

  describe("GET /sources", () => {
    it("should list registered sources in registration order", async () => {
      const response = await request(app.getHttpServer()).get("/sources").expect(200);

      expect(response.body).toEqual([
        {
          key: "bitcoin",
          cached: false,
          ageMs: null,
          isExpired: true,
          refreshIntervalMs: 60000,
          lastError: null,
          status: "unknown",
          enabled: true,
        },
        {
          key: "weather",
          cached: false,
          ageMs: null,
          isExpired: true,
          refreshIntervalMs: 60000,
          lastError: null,
          status: "unknown",
          enabled: true,
        },
        {
          key: "calendar_events",
          cached: false,
          ageMs: null,
          isExpired: true,
          refreshIntervalMs: 60000,
          lastError: null,
          status: "unknown",
          enabled: false,
        },
      ]);
    });
  });

  describe("GET /sources/:key", () => {
    it("should return a tagged success result", async () => {
      const response = await request(app.getHttpServer()).get("/sources/bitcoin").expect(200);

      expect(response.body).toEqual({
        status: "success",
        data: { usd: 67250.5 },
        lastUpdated: expect.any(Number),
        source: "bitcoin",
      });
    });

    it("should serve the cached result until refresh=true is passed", async () => {
      const server = app.getHttpServer();

      const first = await request(server).get("/sources/bitcoin").expect(200);
      const second = await request(server).get("/sources/bitcoin?refresh=false").expect(200);
      expect(second.body).toEqual(first.body);
      expect(bitcoin.fetcher).toHaveBeenCalledTimes(1);

      await request(server).get("/sources/bitcoin?refresh=true").expect(200);
      expect(bitcoin.fetcher).toHaveBeenCalledTimes(2);
    });

    it("should tag synthetic data as mock", async () => {
      const response = await request(app.getHttpServer()).get("/sources/weather").expect(200);

      expect(response.body.status).toBe("mock");
      expect(response.body.data).toEqual({ temperature: 21 });
    });

    it("should report upstream failures in the body, not the status code", async () => {
      const response = await request(app.getHttpServer()).get("/sources/calendar_events").expect(200);

      expect(response.body).toEqual({
        status: "error",
        error: "network: connection refused",
        lastUpdated: expect.any(Number),
        source: "calendar_events",
      });
    });

    it("should answer 500 when a source hook has a bug", async () => {
      bitcoin.fetcher.mockRejectedValue(new ReferenceError("price is not defined"));

      const response = await request(app.getHttpServer()).get("/sources/bitcoin").expect(500);

      expect(response.body.success).toBe(false);
      expect(response.body.error.code).toBe("INTERNAL_ERROR");
      expect(response.body.error.message).toBe("price is not defined");
    });

    it("should reject a non-boolean refresh flag", async () => {
      const response = await request(app.getHttpServer()).get("/sources/bitcoin?refresh=maybe").expect(400);

      expect(response.body.error.code).toBe("BAD_REQUEST");
      expect(bitcoin.fetcher).not.toHaveBeenCalled();
    });

    it("should answer 404 SOURCE_NOT_FOUND for an unknown key", async () => {
      const response = await request(app.getHttpServer()).get("/sources/traffic").expect(404);

      expect(response.body).toEqual({
        success: false,
        error: { code: "SOURCE_NOT_FOUND", message: "Unknown source: traffic", timestamp: expect.any(Number) },
        timestamp: expect.any(Number),
      });
    });
  });

  describe("cache routes", () => {
    it("should report cache info after a fetch", async () => {
      const server = app.getHttpServer();
      await request(server).get("/sources/bitcoin").expect(200);

      const response = await request(server).get("/sources/bitcoin/cache").expect(200);

      expect(response.body).toEqual({
        key: "bitcoin",
        cached: true,
        ageMs: expect.any(Number),
        isExpired: false,
        refreshIntervalMs: 60000,
        lastError: null,
        status: "success",
      });
    });

    it("should clear one source's cache and leave the others", async () => {
      const server = app.getHttpServer();
      await request(server).get("/sources/bitcoin").expect(200);
      await request(server).get("/sources/weather").expect(200);

      const response = await request(server).post("/sources/bitcoin/cache/clear").expect(200);

      expect(response.body.cached).toBe(false);
      expect(response.body.status).toBe("unknown");
      expect(weather.getCacheInfo().cached).toBe(true);
    });

    it("should answer 404 when clearing an unknown source", async () => {
      const response = await request(app.getHttpServer()).post("/sources/traffic/cache/clear").expect(404);

      expect(response.body.error.code).toBe("SOURCE_NOT_FOUND");
    });
  });

  describe("POST /sources/refresh", () => {
    it("should run one cycle and return its report", async () => {
      const response = await request(app.getHttpServer()).post("/sources/refresh").expect(200);

      expect(response.body.results).toEqual([
        { key: "bitcoin", status: "success", durationMs: expect.any(Number) },
        { key: "weather", status: "mock", durationMs: expect.any(Number) },
        { key: "calendar_events", status: "skipped", durationMs: 0 },
      ]);
      expect(calendar.fetcher).not.toHaveBeenCalled();
    });
  });
});
