/**
 * Oracle domain types.
 *
 * Prices and volumes are unsigned fixed-point integers (6 decimals, USD) held as bigint.
 * Timestamps are whole seconds.
 */

export const SUPPORTED_ASSETS = ["BTC", "ETH", "SOL"] as const;

export type AssetId = (typeof SUPPORTED_ASSETS)[number];

export type ReporterId = string;

/** Fixed-point scale of every price: 1 USD = 1_000_000 */
export const PRICE_DECIMALS = 6;

/** Denominator for basis-point arithmetic (slippage, normalization, bps deviation mode) */
export const BASIS_POINTS = 10_000n;

export function isSupportedAsset(assetId: string): assetId is AssetId {
  return SUPPORTED_ASSETS.some(asset => asset === assetId);
}

/**
 * Error kinds reported by oracle operations.
 * StalePrice is reserved: staleness only excludes entries during aggregation.
 */
export enum OracleErrorKind {
  NotAuthorized = "NotAuthorized",
  InvalidChain = "InvalidChain",
  InvalidPrice = "InvalidPrice",
  InvalidWeight = "InvalidWeight",
  StalePrice = "StalePrice",
  HighDeviation = "HighDeviation",
  InsufficientSources = "InsufficientSources",
  BelowMinVolume = "BelowMinVolume",
}

export type OracleResult<T> = { ok: true; value: T } | { ok: false; error: OracleErrorKind };

export function ok<T>(value: T): OracleResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: OracleErrorKind): OracleResult<T> {
  return { ok: false, error };
}

/** The latest accepted observation of one reporter for one asset */
export interface FeedEntry {
  assetId: AssetId;
  reporterId: ReporterId;
  price: bigint;
  timestamp: number;
  volume: bigint;
  /** 0..100 */
  weight: number;
  verified: boolean;
}

export interface PriceHistory {
  lastPrice: bigint;
  lastUpdate: number;
  volatilityIndex: bigint;
}

export interface OracleParameters {
  /** Seconds an entry stays eligible for aggregation */
  validityPeriod: number;
  maxPriceDeviation: bigint;
  minRequiredSources: number;
  minVolumeThreshold: bigint;
  /** Basis points */
  slippageTolerance: bigint;
}

/**
 * How maxPriceDeviation is read: "raw" accepts |new - last| <= last * maxPriceDeviation,
 * "bps" accepts |new - last| <= last * maxPriceDeviation / 10000.
 */
export type DeviationScale = "raw" | "bps";

export interface AggregationBreakdown {
  assetId: AssetId;
  price: bigint;
  totalWeight: bigint;
  evaluatedAt: number;
  contributors: ReporterId[];
  excluded: Array<{ reporterId: ReporterId; reason: "stale" | "unverified" | "low_volume" }>;
}

/** Events emitted by the oracle service */
export interface OracleEvents {
  priceAccepted: { entry: FeedEntry; history: PriceHistory };
  submissionRejected: { caller?: ReporterId; assetId: string; error: OracleErrorKind };
  configurationUpdated: { previous: OracleParameters; current: OracleParameters; by: ReporterId };
  providerAuthorizationChanged: { reporterId: ReporterId; authorized: boolean; by: ReporterId };
  administratorTransferred: { previous: ReporterId; current: ReporterId };
}

export type OracleEventName = keyof OracleEvents;
