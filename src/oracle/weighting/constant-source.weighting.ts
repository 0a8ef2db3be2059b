import { Injectable } from "@nestjs/common";
import type { AssetId, ReporterId } from "@/common/types/oracle";
import { assertValidWeight, type SourceWeightingStrategy } from "./source-weighting.strategy";

/**
 * Every reporter gets the same weight
 */
@Injectable()
export class ConstantSourceWeighting implements SourceWeightingStrategy {
  constructor(private readonly weight: number = 50) {
    assertValidWeight(weight);
  }

  weightFor(_reporterId: ReporterId, _assetId: AssetId): number {
    return this.weight;
  }
}
