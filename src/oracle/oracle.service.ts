import { Inject, Injectable } from "@nestjs/common";
import { EventDrivenService } from "@/common/base";
import { toError } from "@/common/types/services/mixins";
import {
  fail,
  isSupportedAsset,
  ok,
  OracleErrorKind,
  SUPPORTED_ASSETS,
  type AggregationBreakdown,
  type AssetId,
  type FeedEntry,
  type OracleEventName,
  type OracleEvents,
  type OracleParameters,
  type OracleResult,
  type PriceHistory,
  type ReporterId,
} from "@/common/types/oracle";
import type { ServiceHealth } from "@/common/base/mixins/monitoring.mixin";
import { AggregationEngine } from "./aggregation/aggregation.engine";
import { PriceNormalizer } from "./aggregation/price-normalizer";
import { SlippageGuard } from "./aggregation/slippage-guard";
import { OracleConfigurationStore } from "./configuration/oracle-configuration.store";
import { PriceHistoryTracker } from "./history/price-history.tracker";
import { AuthorizationRegistry } from "./registry/authorization.registry";
import { FeedEntryStore } from "./storage/feed-entry.store";
import { TIME_SOURCE, type TimeSource } from "./time/time-source";
import { SubmissionValidator } from "./validation/submission.validator";

export interface OracleStatus {
  status: ServiceHealth;
  uptime: number;
  administrator: ReporterId;
  authorizedReporters: number;
  feeds: Record<AssetId, number>;
  counters: Record<string, number>;
}

/**
 * Public face of the oracle. Every method is synchronous, so each call runs to
 * completion before any other request is served and no caller ever sees a half
 * applied change.
 */
@Injectable()
export class OracleService extends EventDrivenService {
  constructor(
    private readonly authorization: AuthorizationRegistry,
    private readonly configuration: OracleConfigurationStore,
    private readonly feedEntries: FeedEntryStore,
    private readonly history: PriceHistoryTracker,
    private readonly validator: SubmissionValidator,
    private readonly aggregation: AggregationEngine,
    private readonly normalizer: PriceNormalizer,
    private readonly slippage: SlippageGuard,
    @Inject(TIME_SOURCE) private readonly timeSource: TimeSource
  ) {
    super({ useEnhancedLogging: true });
  }

  override async initialize(): Promise<void> {
    const { minRequiredSources, validityPeriod } = this.configuration.getParameters();
    this.logger.log(
      `Oracle ready: ${this.authorization.listAuthorized().length} reporter(s), ` +
        `${minRequiredSources} source(s) required, ${validityPeriod}s validity`
    );
  }

  // Administration

  setAuthorizedProvider(
    caller: ReporterId | undefined,
    reporterId: ReporterId,
    authorized: boolean
  ): OracleResult<void> {
    if (!this.authorization.isAdministrator(caller) || caller === undefined) {
      return this.denyAdministration("setAuthorizedProvider", caller);
    }

    this.authorization.setAuthorized(reporterId, authorized);
    this.logCriticalOperation("setAuthorizedProvider", { by: caller, reporterId, authorized });
    this.emitOracleEvent("providerAuthorizationChanged", { reporterId, authorized, by: caller });
    return ok(undefined);
  }

  /**
   * Replaces all five parameters at once. Invalid values throw from the store and
   * leave the previous parameters in place.
   */
  setConfiguration(caller: ReporterId | undefined, parameters: OracleParameters): OracleResult<OracleParameters> {
    if (!this.authorization.isAdministrator(caller) || caller === undefined) {
      return this.denyAdministration("setConfiguration", caller);
    }

    const previous = this.configuration.setParameters(parameters);
    const current = this.configuration.getParameters();
    this.logCriticalOperation("setConfiguration", {
      by: caller,
      changes: this.configuration.getConfigChanges(previous, current),
    });
    this.emitOracleEvent("configurationUpdated", { previous, current, by: caller });
    return ok(current);
  }

  transferAdministration(caller: ReporterId | undefined, newAdministrator: ReporterId): OracleResult<ReporterId> {
    if (!this.authorization.isAdministrator(caller) || caller === undefined) {
      return this.denyAdministration("transferAdministration", caller);
    }

    const previous = this.authorization.transferAdministration(newAdministrator);
    this.logCriticalOperation("transferAdministration", { previous, current: newAdministrator });
    this.emitOracleEvent("administratorTransferred", { previous, current: newAdministrator });
    return ok(newAdministrator);
  }

  getAdministrator(): ReporterId {
    return this.authorization.getAdministrator();
  }

  getConfiguration(): OracleParameters {
    return this.configuration.getParameters();
  }

  isAuthorizedProvider(reporterId: ReporterId): boolean {
    return this.authorization.isAuthorized(reporterId);
  }

  // Submissions

  submitPrice(
    caller: ReporterId | undefined,
    assetId: string,
    price: bigint,
    volume: bigint,
    proof?: Uint8Array
  ): OracleResult<FeedEntry> {
    const result = this.validator.validateAndAccept(caller, assetId, price, volume, proof);

    if (!result.ok) {
      this.incrementCounter("submissions_rejected");
      this.incrementCounter(`rejected_${result.error}`);
      this.enhancedLogger?.logSubmission(assetId, caller ?? "anonymous", price, result.error);
      this.emitOracleEvent("submissionRejected", { caller, assetId, error: result.error });
      return result;
    }

    const entry = result.value;
    this.incrementCounter("submissions_accepted");
    this.enhancedLogger?.logSubmission(entry.assetId, entry.reporterId, entry.price);

    const history = this.history.get(entry.assetId);
    if (history) {
      this.emitOracleEvent("priceAccepted", { entry, history });
    }
    return result;
  }

  // Reads

  getAggregation(assetId: string): OracleResult<AggregationBreakdown> {
    const result = this.aggregation.breakdown(assetId, this.timeSource.nowSeconds());
    if (result.ok) {
      const { value } = result;
      this.incrementCounter("aggregations_served");
      this.enhancedLogger?.logAggregation(value.assetId, value.contributors.length, value.excluded.length, value.price);
    } else {
      this.incrementCounter(`aggregation_failed_${result.error}`);
    }
    return result;
  }

  getWeightedPrice(assetId: string): OracleResult<bigint> {
    const result = this.getAggregation(assetId);
    return result.ok ? ok(result.value.price) : result;
  }

  /**
   * Weighted price raised by the asset's volatility index. Errors from the weighted
   * price pass through unchanged.
   */
  getNormalizedPrice(assetId: string): OracleResult<bigint> {
    const weighted = this.getWeightedPrice(assetId);
    if (!weighted.ok || !isSupportedAsset(assetId)) {
      return weighted;
    }
    const volatilityIndex = this.history.get(assetId)?.volatilityIndex ?? 0n;
    return ok(this.normalizer.normalize(weighted.value, volatilityIndex));
  }

  withinSlippage(price: bigint, expectedPrice: bigint): boolean {
    return this.slippage.withinSlippage(price, expectedPrice);
  }

  getPriceHistory(assetId: string): OracleResult<PriceHistory> {
    if (!isSupportedAsset(assetId)) {
      return fail(OracleErrorKind.InvalidChain);
    }
    return ok(this.history.get(assetId) ?? { lastPrice: 0n, lastUpdate: 0, volatilityIndex: 0n });
  }

  getFeedEntries(assetId: string): OracleResult<FeedEntry[]> {
    if (!isSupportedAsset(assetId)) {
      return fail(OracleErrorKind.InvalidChain);
    }
    return ok(this.feedEntries.entriesFor(assetId));
  }

  getStatus(): OracleStatus {
    const health = this.getHealthStatus();
    const feeds: Record<AssetId, number> = { BTC: 0, ETH: 0, SOL: 0 };
    for (const assetId of SUPPORTED_ASSETS) {
      feeds[assetId] = this.feedEntries.countFor(assetId);
    }

    return {
      status: health.status,
      uptime: health.uptime,
      administrator: this.authorization.getAdministrator(),
      authorizedReporters: this.authorization.listAuthorized().length,
      feeds,
      counters: this.getCounters(),
    };
  }

  // Events

  /**
   * Listeners run after state has changed. A throwing listener is logged and the
   * operation still returns its result.
   */
  emitOracleEvent<K extends OracleEventName>(event: K, payload: OracleEvents[K]): boolean {
    try {
      return this.emitWithLogging(event, payload);
    } catch (error) {
      this.logError(toError(error), `event:${event}`);
      return false;
    }
  }

  onOracleEvent<K extends OracleEventName>(event: K, listener: (payload: OracleEvents[K]) => void): this {
    return this.on<[OracleEvents[K]]>(event, listener);
  }

  private denyAdministration<T>(operation: string, caller: ReporterId | undefined): OracleResult<T> {
    this.incrementCounter("admin_denied");
    this.logWarning(`Rejected ${operation} from ${caller ?? "anonymous caller"}`, "Administration");
    return fail(OracleErrorKind.NotAuthorized);
  }
}
