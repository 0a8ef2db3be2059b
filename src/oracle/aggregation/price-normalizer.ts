import { Injectable } from "@nestjs/common";
import { BASIS_POINTS } from "@/common/types/oracle";

/**
 * Raises a price in proportion to the asset's volatility index. Unclamped.
 */
@Injectable()
export class PriceNormalizer {
  normalize(price: bigint, volatilityIndex: bigint): bigint {
    return price + (price * volatilityIndex) / BASIS_POINTS;
  }
}
