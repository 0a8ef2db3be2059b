// Core base classes
export * from "./base.service";
export * from "./base.controller";

// Capability mixins
export * from "../types/services/mixins";
export * from "./mixins/configurable.mixin";
export * from "./mixins/lifecycle.mixin";
export * from "./mixins/logging.mixin";
export * from "./mixins/monitoring.mixin";
export * from "./mixins/events.mixin";

// Composed service classes
export * from "./composed.service";
