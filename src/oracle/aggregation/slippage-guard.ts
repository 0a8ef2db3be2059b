import { Injectable } from "@nestjs/common";
import { BASIS_POINTS } from "@/common/types/oracle";
import { OracleConfigurationStore } from "../configuration/oracle-configuration.store";

@Injectable()
export class SlippageGuard {
  constructor(private readonly configuration: OracleConfigurationStore) {}

  /** Inclusive band of slippageTolerance basis points around the expected price */
  withinSlippage(price: bigint, expectedPrice: bigint): boolean {
    const deviation = (expectedPrice * this.configuration.getParameters().slippageTolerance) / BASIS_POINTS;
    return price >= expectedPrice - deviation && price <= expectedPrice + deviation;
  }
}
