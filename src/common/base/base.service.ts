import { WithConfiguration } from "./mixins/configurable.mixin";
import { WithLogging } from "./mixins/logging.mixin";
import type { BaseServiceConfig } from "../types/services/base.types";

const defaultConfig: BaseServiceConfig = {
  useEnhancedLogging: false,
};

class SimpleBase {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  constructor(..._args: any[]) {
    // Mixins pass constructor arguments through
  }
}

/**
 * A class-named logger and nothing else. Services with a typed configuration of
 * their own start here instead of at BaseService.
 */
export class LoggedService extends WithLogging(SimpleBase) {}

const ConfigurableBase = WithConfiguration<BaseServiceConfig>(defaultConfig)(LoggedService);

/**
 * Root of most services: logging plus the enhanced-logging switch
 */
export class BaseService extends ConfigurableBase {
  constructor(config?: Partial<BaseServiceConfig>) {
    super();
    if (config) this.updateConfig(config);
  }

  override onConfigUpdated(oldConfig: BaseServiceConfig, newConfig: BaseServiceConfig): void {
    if (oldConfig.useEnhancedLogging !== newConfig.useEnhancedLogging) {
      this.initializeEnhancedLogging(newConfig.useEnhancedLogging ?? false);
    }
  }
}
