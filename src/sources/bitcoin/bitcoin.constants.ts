import type {
  BitcoinEndpointName,
  BitcoinFees,
  BitcoinPrice,
  DifficultyAdjustment,
  HashrateInfo,
  MempoolInfo,
} from "./bitcoin.types";

export const BITCOIN_SOURCE_KEY = "bitcoin";

export const DEFAULT_BITCOIN_ENDPOINTS: Readonly<Record<BitcoinEndpointName, string>> = Object.freeze({
  price: "https://api.coingecko.com/api/v3/simple/price",
  fees: "https://mempool.space/api/v1/fees/recommended",
  difficulty: "https://mempool.space/api/v1/difficulty-adjustment",
  hashrate: "https://mempool.space/api/v1/mining/hashrate/3d",
  blocks: "https://mempool.space/api/v1/blocks",
  mempool: "https://mempool.space/api/mempool",
});

export const RECENT_BLOCK_COUNT = 5;

// Defaults substituted for a section whose upstream call failed
export const ZERO_PRICE: BitcoinPrice = Object.freeze({ usd: 0, change24h: 0 });

export const ZERO_FEES: BitcoinFees = Object.freeze({
  fastestFee: 0,
  halfHourFee: 0,
  hourFee: 0,
  economyFee: 0,
  minimumFee: 0,
});

export const ZERO_DIFFICULTY: DifficultyAdjustment = Object.freeze({
  progressPercent: 0,
  difficultyChange: 0,
  remainingBlocks: 0,
  estimatedRetargetDate: 0,
});

export const ZERO_HASHRATE: HashrateInfo = Object.freeze({ currentHashrate: 0, currentDifficulty: 0 });

export const ZERO_MEMPOOL: MempoolInfo = Object.freeze({ count: 0, vsize: 0, totalFee: 0 });
