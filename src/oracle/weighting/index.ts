export * from "./source-weighting.strategy";
export * from "./constant-source.weighting";
