export * from "./oracle.module";
export * from "./oracle.service";
export * from "./aggregation/aggregation.engine";
export * from "./aggregation/price-normalizer";
export * from "./aggregation/slippage-guard";
export * from "./configuration/oracle-configuration.store";
export * from "./history/price-history.tracker";
export * from "./registry/authorization.registry";
export * from "./storage/feed-entry.store";
export * from "./time";
export * from "./validation/submission.validator";
export * from "./verification";
export * from "./weighting";
