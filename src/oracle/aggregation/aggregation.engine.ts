import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base";
import {
  fail,
  isSupportedAsset,
  ok,
  OracleErrorKind,
  type AggregationBreakdown,
  type FeedEntry,
  type OracleParameters,
  type OracleResult,
} from "@/common/types/oracle";
import { OracleConfigurationStore } from "../configuration/oracle-configuration.store";
import { FeedEntryStore } from "../storage/feed-entry.store";
import { isUsableTime } from "../time/time-source";

type ExclusionReason = AggregationBreakdown["excluded"][number]["reason"];

@Injectable()
export class AggregationEngine extends BaseService {
  constructor(
    private readonly configuration: OracleConfigurationStore,
    private readonly feedEntries: FeedEntryStore
  ) {
    super();
  }

  weightedPrice(assetId: string, now: number | undefined): OracleResult<bigint> {
    const result = this.breakdown(assetId, now);
    return result.ok ? ok(result.value.price) : result;
  }

  /**
   * Weighted mean of the eligible entries together with who took part and who was left out.
   * Summation is commutative, so entry order never changes the price.
   */
  breakdown(assetId: string, now: number | undefined): OracleResult<AggregationBreakdown> {
    if (!isSupportedAsset(assetId)) {
      return fail(OracleErrorKind.InvalidChain);
    }
    if (!isUsableTime(now)) {
      return fail(OracleErrorKind.InvalidPrice);
    }

    const parameters = this.configuration.getParameters();
    const eligible: FeedEntry[] = [];
    const excluded: AggregationBreakdown["excluded"] = [];

    for (const entry of this.feedEntries.entriesFor(assetId)) {
      const reason = this.exclusionReason(entry, parameters, now);
      if (reason) {
        excluded.push({ reporterId: entry.reporterId, reason });
      } else {
        eligible.push(entry);
      }
    }

    if (eligible.length < parameters.minRequiredSources) {
      return fail(OracleErrorKind.InsufficientSources);
    }

    let weightedSum = 0n;
    let totalWeight = 0n;
    for (const entry of eligible) {
      const weight = BigInt(entry.weight);
      weightedSum += entry.price * weight;
      totalWeight += weight;
    }

    if (totalWeight === 0n) {
      return fail(OracleErrorKind.InvalidWeight);
    }

    return ok({
      assetId,
      price: weightedSum / totalWeight,
      totalWeight,
      evaluatedAt: now,
      contributors: eligible.map(entry => entry.reporterId).sort(),
      excluded,
    });
  }

  private exclusionReason(entry: FeedEntry, parameters: OracleParameters, now: number): ExclusionReason | undefined {
    if (now - entry.timestamp > parameters.validityPeriod) {
      return "stale";
    }
    if (!entry.verified) {
      return "unverified";
    }
    if (entry.volume < parameters.minVolumeThreshold) {
      return "low_volume";
    }
    return undefined;
  }
}
