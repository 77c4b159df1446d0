import { Injectable } from "@nestjs/common";
import { TimeBoxedCacheService } from "@/cache/time-boxed-cache.service";
import { HttpJsonClient } from "@/common/http/http-json.client";
import {
  expectArray,
  expectRecord,
  readNumber,
  readOptionalNumber,
  readRecord,
  readString,
} from "@/common/utils/payload.utils";
import { ConfigService } from "@/config/config.service";
import { CompositeSourceManager } from "../base/composite-source-manager";
import { refreshIntervalFrom, resolveEndpoints } from "../source-config.utils";
import {
  BITCOIN_SOURCE_KEY,
  DEFAULT_BITCOIN_ENDPOINTS,
  RECENT_BLOCK_COUNT,
  ZERO_DIFFICULTY,
  ZERO_FEES,
  ZERO_HASHRATE,
  ZERO_MEMPOOL,
  ZERO_PRICE,
} from "./bitcoin.constants";
import type {
  BitcoinData,
  BitcoinFees,
  BitcoinPrice,
  BlockSummary,
  DifficultyAdjustment,
  HashrateInfo,
  MempoolInfo,
} from "./bitcoin.types";

export function formatUsd(value: number): string {
  return `$${value.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

export function formatHashrate(hashesPerSecond: number): string {
  return `${(hashesPerSecond / 1e18).toFixed(1)} EH/s`;
}

export function shortenHash(hash: string): string {
  return hash ? `${hash.slice(0, 16)}...` : "";
}

/**
 * Bitcoin network stats assembled from CoinGecko and mempool.space.
 * Each of the six upstream calls degrades independently.
 */
@Injectable()
export class BitcoinSourceService extends CompositeSourceManager<BitcoinData> {
  constructor(
    cache: TimeBoxedCacheService,
    private readonly http: HttpJsonClient,
    config: ConfigService
  ) {
    super(cache, {
      key: BITCOIN_SOURCE_KEY,
      refreshIntervalMs: refreshIntervalFrom(config, "bitcoin"),
      endpoints: resolveEndpoints(config, "bitcoin", DEFAULT_BITCOIN_ENDPOINTS),
    });
  }

  protected async fetchData(): Promise<BitcoinData> {
    const [price, fees, difficulty, hashrate, recentBlocks, mempool] = await Promise.all([
      this.fetchSection("price", () => this.fetchPrice(), ZERO_PRICE),
      this.fetchSection("fees", () => this.fetchFees(), ZERO_FEES),
      this.fetchSection("difficulty", () => this.fetchDifficulty(), ZERO_DIFFICULTY),
      this.fetchSection("hashrate", () => this.fetchHashrate(), ZERO_HASHRATE),
      this.fetchSection<BlockSummary[]>("recentBlocks", () => this.fetchRecentBlocks(), []),
      this.fetchSection("mempool", () => this.fetchMempool(), ZERO_MEMPOOL),
    ]);

    const tip = recentBlocks.value[0];
    const blockHash = tip?.hash ?? "";

    return {
      price: price.value,
      priceFormatted: formatUsd(price.value.usd),
      fees: fees.value,
      difficulty: difficulty.value,
      hashrate: hashrate.value,
      hashrateFormatted: formatHashrate(hashrate.value.currentHashrate),
      recentBlocks: recentBlocks.value,
      blockHeight: tip?.height ?? 0,
      blockHash,
      blockHashShort: shortenHash(blockHash),
      mempool: mempool.value,
      degradedSections: this.degradedSections({ price, fees, difficulty, hashrate, recentBlocks, mempool }),
    };
  }

  async getPrice(): Promise<number> {
    const result = await this.getData();
    return result.status === "error" ? 0 : result.data.price.usd;
  }

  async getBlockHeight(): Promise<number> {
    const result = await this.getData();
    return result.status === "error" ? 0 : result.data.blockHeight;
  }

  async getFormattedPrice(): Promise<string> {
    const result = await this.getData();
    return result.status === "error" ? formatUsd(0) : result.data.priceFormatted;
  }

  async getStatus(): Promise<string> {
    const result = await this.getData();
    return result.status;
  }

  private async fetchPrice(): Promise<BitcoinPrice> {
    const body = expectRecord(
      await this.http.getJson(this.endpoint("price"), {
        params: { ids: "bitcoin", vs_currencies: "usd", include_24hr_change: "true" },
        context: "Failed to fetch bitcoin price",
      }),
      "price"
    );
    const bitcoin = readRecord(body, "bitcoin", "price");

    return {
      usd: readNumber(bitcoin, "usd", "price.bitcoin"),
      change24h: readOptionalNumber(bitcoin, "usd_24h_change"),
    };
  }

  private async fetchFees(): Promise<BitcoinFees> {
    const body = expectRecord(
      await this.http.getJson(this.endpoint("fees"), { context: "Failed to fetch recommended fees" }),
      "fees"
    );

    return {
      fastestFee: readNumber(body, "fastestFee", "fees"),
      halfHourFee: readNumber(body, "halfHourFee", "fees"),
      hourFee: readNumber(body, "hourFee", "fees"),
      economyFee: readOptionalNumber(body, "economyFee"),
      minimumFee: readOptionalNumber(body, "minimumFee"),
    };
  }

  private async fetchDifficulty(): Promise<DifficultyAdjustment> {
    const body = expectRecord(
      await this.http.getJson(this.endpoint("difficulty"), { context: "Failed to fetch difficulty adjustment" }),
      "difficulty"
    );

    return {
      progressPercent: readNumber(body, "progressPercent", "difficulty"),
      difficultyChange: readNumber(body, "difficultyChange", "difficulty"),
      remainingBlocks: readOptionalNumber(body, "remainingBlocks"),
      estimatedRetargetDate: readOptionalNumber(body, "estimatedRetargetDate"),
    };
  }

  private async fetchHashrate(): Promise<HashrateInfo> {
    const body = expectRecord(
      await this.http.getJson(this.endpoint("hashrate"), { context: "Failed to fetch hashrate" }),
      "hashrate"
    );

    return {
      currentHashrate: readNumber(body, "currentHashrate", "hashrate"),
      currentDifficulty: readOptionalNumber(body, "currentDifficulty"),
    };
  }

  private async fetchRecentBlocks(): Promise<BlockSummary[]> {
    const blocks = expectArray(
      await this.http.getJson(this.endpoint("blocks"), { context: "Failed to fetch recent blocks" }),
      "blocks"
    );

    return blocks.slice(0, RECENT_BLOCK_COUNT).map((raw, index) => {
      const block = expectRecord(raw, `blocks[${index}]`);
      return {
        height: readNumber(block, "height", `blocks[${index}]`),
        hash: readString(block, "id", `blocks[${index}]`),
        timestamp: readOptionalNumber(block, "timestamp"),
        txCount: readOptionalNumber(block, "tx_count"),
        size: readOptionalNumber(block, "size"),
      };
    });
  }

  private async fetchMempool(): Promise<MempoolInfo> {
    const body = expectRecord(
      await this.http.getJson(this.endpoint("mempool"), { context: "Failed to fetch mempool" }),
      "mempool"
    );

    return {
      count: readNumber(body, "count", "mempool"),
      vsize: readNumber(body, "vsize", "mempool"),
      totalFee: readOptionalNumber(body, "total_fee"),
    };
  }
}
