import type { AssetId, ReporterId } from "@/common/types/oracle";

export const SOURCE_WEIGHTING = Symbol("SOURCE_WEIGHTING");

export const MAX_SOURCE_WEIGHT = 100;

export interface SourceWeightingStrategy {
  /** Integer in 0..100 */
  weightFor(reporterId: ReporterId, assetId: AssetId): number;
}

export function assertValidWeight(weight: number): void {
  if (!Number.isInteger(weight) || weight < 0 || weight > MAX_SOURCE_WEIGHT) {
    throw new Error(`Source weight must be an integer within 0..${MAX_SOURCE_WEIGHT}, got ${weight}`);
  }
}
