import { TimeBoxedCacheService } from "@/cache/time-boxed-cache.service";
import { NetworkError } from "@/common/errors";
import { CompositeSourceManager, type CompositePayload } from "../composite-source-manager";

interface Snapshot extends CompositePayload {
  price: number;
  fees: { fastest: number };
}

class TwoSectionSource extends CompositeSourceManager<Snapshot> {
  readonly priceFetcher = jest.fn<Promise<{ price: number }>, []>();
  readonly feesFetcher = jest.fn<Promise<{ fastest: number }>, []>();

  constructor(cache: TimeBoxedCacheService) {
    super(cache, { key: "composite", refreshIntervalMs: 60_000 });
  }

  protected async fetchData(): Promise<Snapshot> {
    const [price, fees] = await Promise.all([
      this.fetchSection("price", () => this.priceFetcher(), { price: 0 }),
      this.fetchSection("fees", () => this.feesFetcher(), { fastest: 0 }),
    ]);

    return {
      price: price.value.price,
      fees: fees.value,
      degradedSections: this.degradedSections({ price, fees }),
    };
  }
}

describe("CompositeSourceManager", () => {
  let source: TwoSectionSource;

  beforeEach(() => {
    source = new TwoSectionSource(new TimeBoxedCacheService());
  });

  it("should merge every section when all succeed", async () => {
    source.priceFetcher.mockResolvedValue({ price: 100 });
    source.feesFetcher.mockResolvedValue({ fastest: 12 });

    const result = await source.getData();

    expect(result.status).toBe("success");
    expect(result.status === "success" && result.data).toEqual({
      price: 100,
      fees: { fastest: 12 },
      degradedSections: [],
    });
  });

  it("should substitute the default for a failing section and still report success", async () => {
    source.priceFetcher.mockResolvedValue({ price: 100 });
    source.feesFetcher.mockRejectedValue(new NetworkError("mempool unreachable"));

    const result = await source.getData();

    expect(result.status).toBe("success");
    expect(result.status === "success" && result.data).toEqual({
      price: 100,
      fees: { fastest: 0 },
      degradedSections: ["fees"],
    });
    expect(source.getLastError()).toBeNull();
  });

  it("should still run the other sections when one fails first", async () => {
    source.priceFetcher.mockRejectedValue(new Error("HTTP 503: Service Unavailable"));
    source.feesFetcher.mockResolvedValue({ fastest: 4 });

    const result = await source.getData();

    expect(source.feesFetcher).toHaveBeenCalledTimes(1);
    expect(result.status === "success" && result.data.degradedSections).toEqual(["price"]);
  });

  it("should report success with every default when all sections fail", async () => {
    source.priceFetcher.mockRejectedValue(new NetworkError("down"));
    source.feesFetcher.mockRejectedValue(new NetworkError("down"));

    const result = await source.getData();

    expect(result.status === "success" && result.data).toEqual({
      price: 0,
      fees: { fastest: 0 },
      degradedSections: ["price", "fees"],
    });
  });

  it("should let programming errors in a section propagate", async () => {
    source.priceFetcher.mockRejectedValue(new TypeError("price.toFixed is not a function"));
    source.feesFetcher.mockResolvedValue({ fastest: 1 });

    await expect(source.getData()).rejects.toThrow("price.toFixed is not a function");
  });
});
