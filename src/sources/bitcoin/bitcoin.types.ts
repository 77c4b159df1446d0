import type { CompositePayload } from "../base/composite-source-manager";

export interface BitcoinPrice {
  usd: number;
  /** Percent change over the last 24 hours */
  change24h: number;
}

/** Recommended fee rates in sat/vB */
export interface BitcoinFees {
  fastestFee: number;
  halfHourFee: number;
  hourFee: number;
  economyFee: number;
  minimumFee: number;
}

export interface DifficultyAdjustment {
  progressPercent: number;
  difficultyChange: number;
  remainingBlocks: number;
  /** Epoch ms, 0 when unknown */
  estimatedRetargetDate: number;
}

export interface HashrateInfo {
  /** Hashes per second */
  currentHashrate: number;
  currentDifficulty: number;
}

export interface BlockSummary {
  height: number;
  hash: string;
  /** Epoch seconds as reported upstream */
  timestamp: number;
  txCount: number;
  size: number;
}

export interface MempoolInfo {
  count: number;
  vsize: number;
  totalFee: number;
}

export interface BitcoinData extends CompositePayload {
  price: BitcoinPrice;
  priceFormatted: string;
  fees: BitcoinFees;
  difficulty: DifficultyAdjustment;
  hashrate: HashrateInfo;
  hashrateFormatted: string;
  recentBlocks: BlockSummary[];
  blockHeight: number;
  blockHash: string;
  blockHashShort: string;
  mempool: MempoolInfo;
}

export type BitcoinEndpointName = "price" | "fees" | "difficulty" | "hashrate" | "blocks" | "mempool";
