import { BaseService, LoggedService } from "./base.service";
import { WithConfiguration } from "./mixins/configurable.mixin";
import { WithEvents } from "./mixins/events.mixin";
import { WithLifecycle } from "./mixins/lifecycle.mixin";
import { WithMonitoring } from "./mixins/monitoring.mixin";

/**
 * Pre-composed service classes. Apply mixins directly for other combinations.
 */

export class MonitoringService extends WithMonitoring(BaseService) {}

export class StandardService extends WithMonitoring(WithLifecycle(BaseService)) {}

export class EventDrivenService extends WithEvents(StandardService) {}

/**
 * StandardService over a typed configuration of the caller's choosing
 */
export function ConfiguredService<TConfig extends object>(defaults: TConfig) {
  return WithMonitoring(WithLifecycle(WithConfiguration<TConfig>(defaults)(LoggedService)));
}
