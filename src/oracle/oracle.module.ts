import { Module } from "@nestjs/common";
import { ConfigService } from "@/config/config.service";
import { AggregationEngine } from "./aggregation/aggregation.engine";
import { PriceNormalizer } from "./aggregation/price-normalizer";
import { SlippageGuard } from "./aggregation/slippage-guard";
import { OracleConfigurationStore } from "./configuration/oracle-configuration.store";
import { PriceHistoryTracker } from "./history/price-history.tracker";
import { OracleService } from "./oracle.service";
import { AuthorizationRegistry } from "./registry/authorization.registry";
import { FeedEntryStore } from "./storage/feed-entry.store";
import { SystemTimeSource, TIME_SOURCE } from "./time/time-source";
import { SubmissionValidator } from "./validation/submission.validator";
import { PROOF_VERIFIER } from "./verification/proof-verifier.interface";
import { ProofVerifierRegistry } from "./verification/proof-verifier.registry";
import { ConstantSourceWeighting } from "./weighting/constant-source.weighting";
import { SOURCE_WEIGHTING } from "./weighting/source-weighting.strategy";

@Module({
  providers: [
    // State holders
    {
      provide: OracleConfigurationStore,
      useFactory: (config: ConfigService) =>
        new OracleConfigurationStore(config.getOracleDefaults(), config.getDeviationScale()),
      inject: [ConfigService],
    },
    {
      provide: AuthorizationRegistry,
      useFactory: (config: ConfigService) =>
        new AuthorizationRegistry(config.getAdministratorId(), config.getBootstrapReporters()),
      inject: [ConfigService],
    },
    FeedEntryStore,
    PriceHistoryTracker,

    // Pluggable collaborators
    {
      provide: ProofVerifierRegistry,
      useFactory: () => new ProofVerifierRegistry(),
      inject: [],
    },
    { provide: PROOF_VERIFIER, useExisting: ProofVerifierRegistry },
    {
      provide: SOURCE_WEIGHTING,
      useFactory: (config: ConfigService) => new ConstantSourceWeighting(config.getDefaultSourceWeight()),
      inject: [ConfigService],
    },
    { provide: TIME_SOURCE, useClass: SystemTimeSource },

    // Engine
    SubmissionValidator,
    AggregationEngine,
    PriceNormalizer,
    SlippageGuard,
    OracleService,
  ],
  exports: [OracleService, ProofVerifierRegistry, TIME_SOURCE],
})
export class OracleModule {}
