import type { Constructor, LoggedInstance } from "../../types/services/mixins";
import { toError } from "../../types/services/mixins";

export interface ConfigurableCapabilities<TConfig extends object> {
  updateConfig(newConfig: Partial<TConfig>): void;
  replaceConfig(newConfig: TConfig): void;
  getConfig(): Readonly<TConfig>;
  resetConfig(): void;
  validateConfig(): void;
  onConfigUpdated?(oldConfig: TConfig, newConfig: TConfig): void;
}

export type ConfigChanges = Record<string, { old: unknown; new: unknown }>;

/**
 * Mixin that adds validated, all-or-nothing configuration to a service.
 * A failing validateConfig() restores the previous configuration and rethrows.
 */
export function WithConfiguration<TConfig extends object>(defaultConfig: TConfig) {
  return function <TBase extends Constructor<LoggedInstance>>(Base: TBase) {
    return class ConfigurableMixin extends Base implements ConfigurableCapabilities<TConfig> {
      public config: TConfig;
      public readonly defaultConfig: TConfig;

      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      constructor(...args: any[]) {
        super(...args);
        this.defaultConfig = { ...defaultConfig };
        this.config = { ...defaultConfig };
      }

      updateConfig(newConfig: Partial<TConfig>): void {
        this.applyConfig({ ...this.config, ...newConfig });
      }

      replaceConfig(newConfig: TConfig): void {
        this.applyConfig({ ...newConfig });
      }

      getConfig(): Readonly<TConfig> {
        return { ...this.config };
      }

      resetConfig(): void {
        const oldConfig = this.config;
        this.config = { ...this.defaultConfig };
        this.onConfigUpdated?.(oldConfig, this.config);
        this.logger.log("Configuration reset to defaults");
      }

      validateConfig(): void {
        // Subclasses throw here to reject a configuration
      }

      onConfigUpdated?(_oldConfig: TConfig, _newConfig: TConfig): void {
        // Subclasses react to accepted changes here
      }

      public getConfigChanges(oldConfig: TConfig, newConfig: TConfig): ConfigChanges {
        const changes: ConfigChanges = {};
        for (const key of Object.keys(newConfig)) {
          const before: unknown = Reflect.get(oldConfig, key);
          const after: unknown = Reflect.get(newConfig, key);
          if (before !== after) {
            changes[key] = { old: printable(before), new: printable(after) };
          }
        }
        return changes;
      }

      private applyConfig(candidate: TConfig): void {
        const oldConfig = this.config;
        this.config = candidate;

        try {
          this.validateConfig();
        } catch (error) {
          this.config = oldConfig;
          this.logError(toError(error), "Configuration update failed, rolled back");
          throw error;
        }

        this.onConfigUpdated?.(oldConfig, this.config);
        this.logger.log("Configuration updated successfully", {
          service: this.constructor.name,
          changes: this.getConfigChanges(oldConfig, this.config),
        });
      }
    };
  };
}

// bigint does not survive JSON.stringify in log sinks
function printable(value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}
