import { Inject, Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base";
import {
  BASIS_POINTS,
  fail,
  isSupportedAsset,
  ok,
  OracleErrorKind,
  type AssetId,
  type FeedEntry,
  type OracleResult,
  type ReporterId,
} from "@/common/types/oracle";
import { OracleConfigurationStore } from "../configuration/oracle-configuration.store";
import { PriceHistoryTracker } from "../history/price-history.tracker";
import { AuthorizationRegistry } from "../registry/authorization.registry";
import { FeedEntryStore } from "../storage/feed-entry.store";
import { isUsableTime, TIME_SOURCE, type TimeSource } from "../time/time-source";
import { PROOF_VERIFIER, type ProofVerifier } from "../verification/proof-verifier.interface";
import { SOURCE_WEIGHTING, type SourceWeightingStrategy } from "../weighting/source-weighting.strategy";

/**
 * Gatekeeper for price submissions. Runs the checks in a fixed order, stops at the
 * first failure and only writes once every check has passed.
 */
@Injectable()
export class SubmissionValidator extends BaseService {
  constructor(
    private readonly authorization: AuthorizationRegistry,
    private readonly configuration: OracleConfigurationStore,
    private readonly feedEntries: FeedEntryStore,
    private readonly history: PriceHistoryTracker,
    @Inject(PROOF_VERIFIER) private readonly proofVerifier: ProofVerifier,
    @Inject(SOURCE_WEIGHTING) private readonly weighting: SourceWeightingStrategy,
    @Inject(TIME_SOURCE) private readonly timeSource: TimeSource
  ) {
    super();
  }

  validateAndAccept(
    caller: ReporterId | undefined,
    assetId: string,
    price: bigint,
    volume: bigint,
    proof?: Uint8Array
  ): OracleResult<FeedEntry> {
    if (caller === undefined || !this.authorization.isAuthorized(caller)) {
      return fail(OracleErrorKind.NotAuthorized);
    }
    if (!isSupportedAsset(assetId)) {
      return fail(OracleErrorKind.InvalidChain);
    }
    // Prices and volumes are unsigned fixed point
    if (price < 0n || volume < 0n) {
      return fail(OracleErrorKind.InvalidPrice);
    }
    if (volume < this.configuration.getParameters().minVolumeThreshold) {
      return fail(OracleErrorKind.BelowMinVolume);
    }

    const now = this.timeSource.nowSeconds();
    if (!isUsableTime(now)) {
      return fail(OracleErrorKind.InvalidPrice);
    }
    if (!this.isValidPriceChange(assetId, price)) {
      return fail(OracleErrorKind.HighDeviation);
    }

    const entry: FeedEntry = {
      assetId,
      reporterId: caller,
      price,
      timestamp: now,
      volume,
      weight: this.weighting.weightFor(caller, assetId),
      verified: this.proofVerifier.verify(assetId, price, proof),
    };

    this.feedEntries.upsert(entry);
    this.history.update(assetId, price, now);
    return ok(entry);
  }

  /**
   * A first price always passes. After that the move from the last accepted price is
   * bounded by maxPriceDeviation, read as a plain multiplier or in basis points.
   */
  isValidPriceChange(assetId: AssetId, newPrice: bigint): boolean {
    const lastPrice = this.history.lastPrice(assetId);
    if (lastPrice === 0n) {
      return true;
    }

    const change = newPrice > lastPrice ? newPrice - lastPrice : lastPrice - newPrice;
    const { maxPriceDeviation } = this.configuration.getParameters();
    const bound =
      this.configuration.getDeviationScale() === "bps"
        ? (lastPrice * maxPriceDeviation) / BASIS_POINTS
        : lastPrice * maxPriceDeviation;

    return change <= bound;
  }
}
