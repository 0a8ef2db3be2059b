/**
 * Config Service
 * Oracle defaults and startup settings, read from the ENV constants
 */

import { Injectable } from "@nestjs/common";
import { StandardService } from "@/common/base/composed.service";
import type { DeviationScale, OracleParameters, ReporterId } from "@/common/types/oracle";
import { ENV } from "./environment.constants";

export type OracleEnvironment = (typeof ENV)["ORACLE"];

export interface ConfigurationValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

@Injectable()
export class ConfigService extends StandardService {
  constructor(private readonly oracleEnv: OracleEnvironment = ENV.ORACLE) {
    super({ useEnhancedLogging: false });
  }

  /**
   * Parameters in force until an administrator replaces them
   */
  getOracleDefaults(): OracleParameters {
    return {
      validityPeriod: this.oracleEnv.VALIDITY_PERIOD_SEC,
      maxPriceDeviation: this.oracleEnv.MAX_PRICE_DEVIATION,
      minRequiredSources: this.oracleEnv.MIN_REQUIRED_SOURCES,
      minVolumeThreshold: this.oracleEnv.MIN_VOLUME_THRESHOLD,
      slippageTolerance: this.oracleEnv.SLIPPAGE_TOLERANCE_BPS,
    };
  }

  getDeviationScale(): DeviationScale {
    return this.oracleEnv.DEVIATION_SCALE;
  }

  getAdministratorId(): ReporterId {
    return this.oracleEnv.ADMIN_ID;
  }

  getBootstrapReporters(): ReporterId[] {
    return [...this.oracleEnv.AUTHORIZED_REPORTERS];
  }

  getDefaultSourceWeight(): number {
    return this.oracleEnv.DEFAULT_SOURCE_WEIGHT;
  }

  validateEnvironment(): ConfigurationValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (this.oracleEnv.DEFAULT_SOURCE_WEIGHT === 0) {
      warnings.push("ORACLE_DEFAULT_SOURCE_WEIGHT is 0: every aggregation will fail with InvalidWeight");
    }
    if (this.oracleEnv.MIN_REQUIRED_SOURCES === 0) {
      warnings.push("ORACLE_MIN_REQUIRED_SOURCES is 0: a price can be served without any source");
    }
    if (this.oracleEnv.AUTHORIZED_REPORTERS.includes(this.oracleEnv.ADMIN_ID)) {
      warnings.push(`Administrator ${this.oracleEnv.ADMIN_ID} is also listed as a reporter`);
    }

    return { isValid: errors.length === 0, errors, warnings };
  }
}
