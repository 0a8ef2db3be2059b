import { Injectable } from "@nestjs/common";
import { ConfiguredService } from "@/common/base";
import type { DeviationScale, OracleParameters } from "@/common/types/oracle";

export const DEFAULT_ORACLE_PARAMETERS: OracleParameters = {
  validityPeriod: 300,
  maxPriceDeviation: 1000n,
  minRequiredSources: 3,
  minVolumeThreshold: 10_000n,
  slippageTolerance: 100n,
};

/**
 * Holds the single OracleParameters record. A replacement is validated first and
 * either applied whole or not at all.
 */
@Injectable()
export class OracleConfigurationStore extends ConfiguredService<OracleParameters>(DEFAULT_ORACLE_PARAMETERS) {
  constructor(
    initial: OracleParameters = DEFAULT_ORACLE_PARAMETERS,
    private readonly deviationScale: DeviationScale = "raw"
  ) {
    super();
    this.replaceConfig(initial);
  }

  getParameters(): OracleParameters {
    return { ...this.config };
  }

  setParameters(parameters: OracleParameters): OracleParameters {
    const previous = this.getParameters();
    this.replaceConfig(parameters);
    return previous;
  }

  getDeviationScale(): DeviationScale {
    return this.deviationScale;
  }

  override validateConfig(): void {
    const { validityPeriod, maxPriceDeviation, minRequiredSources, minVolumeThreshold, slippageTolerance } =
      this.config;

    if (!Number.isSafeInteger(validityPeriod) || validityPeriod < 0) {
      throw new Error(`validityPeriod must be a non-negative integer, got ${validityPeriod}`);
    }
    if (!Number.isSafeInteger(minRequiredSources) || minRequiredSources < 0) {
      throw new Error(`minRequiredSources must be a non-negative integer, got ${minRequiredSources}`);
    }
    for (const [name, value] of [
      ["maxPriceDeviation", maxPriceDeviation],
      ["minVolumeThreshold", minVolumeThreshold],
      ["slippageTolerance", slippageTolerance],
    ] as const) {
      if (value < 0n) {
        throw new Error(`${name} must not be negative, got ${value}`);
      }
    }
  }
}
