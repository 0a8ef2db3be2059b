import type { AssetId } from "@/common/types/oracle";

export const PROOF_VERIFIER = Symbol("PROOF_VERIFIER");

/**
 * Cross-source proof check for a submitted price. Synchronous: a submission is
 * validated and stored in one uninterrupted step.
 */
export interface ProofVerifier {
  /** An absent proof verifies */
  verify(assetId: AssetId, price: bigint, proof?: Uint8Array): boolean;
}
