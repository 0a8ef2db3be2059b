import { Injectable } from "@nestjs/common";
import type { AssetId, PriceHistory } from "@/common/types/oracle";

/** EWMA weights, in hundredths */
const VOLATILITY_DECAY = 95n;
const VOLATILITY_GAIN = 5n;

function absDiff(a: bigint, b: bigint): bigint {
  return a > b ? a - b : b - a;
}

/**
 * Last accepted price per asset and an exponentially weighted volatility index.
 *
 * The index is kept unscaled: each update multiplies the previous value by 95 and adds
 * five times the absolute price move, with no division by 100.
 */
@Injectable()
export class PriceHistoryTracker {
  private readonly histories = new Map<AssetId, PriceHistory>();

  get(assetId: AssetId): PriceHistory | undefined {
    const history = this.histories.get(assetId);
    return history ? { ...history } : undefined;
  }

  /** Last accepted price, 0n when none has been accepted */
  lastPrice(assetId: AssetId): bigint {
    return this.histories.get(assetId)?.lastPrice ?? 0n;
  }

  update(assetId: AssetId, price: bigint, timestamp: number): PriceHistory {
    const previous = this.histories.get(assetId);
    const oldPrice = previous?.lastPrice ?? 0n;
    const oldVolatility = previous?.volatilityIndex ?? 0n;

    const volatilityIndex =
      oldPrice === 0n ? 0n : oldVolatility * VOLATILITY_DECAY + absDiff(price, oldPrice) * VOLATILITY_GAIN;

    const next: PriceHistory = { lastPrice: price, lastUpdate: timestamp, volatilityIndex };
    this.histories.set(assetId, next);
    return { ...next };
  }
}
