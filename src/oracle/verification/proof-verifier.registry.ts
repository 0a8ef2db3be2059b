import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base";
import type { AssetId } from "@/common/types/oracle";
import type { ProofVerifier } from "./proof-verifier.interface";
import { PermissiveProofVerifier } from "./permissive-proof.verifier";

/**
 * Routes each proof to the verifier registered for its asset, or to the fallback
 */
@Injectable()
export class ProofVerifierRegistry extends BaseService implements ProofVerifier {
  private readonly verifiers = new Map<AssetId, ProofVerifier>();

  constructor(private readonly fallback: ProofVerifier = new PermissiveProofVerifier()) {
    super();
  }

  register(assetId: AssetId, verifier: ProofVerifier): void {
    this.verifiers.set(assetId, verifier);
    this.logger.log(`Proof verifier registered for ${assetId}`);
  }

  unregister(assetId: AssetId): boolean {
    return this.verifiers.delete(assetId);
  }

  hasVerifier(assetId: AssetId): boolean {
    return this.verifiers.has(assetId);
  }

  verify(assetId: AssetId, price: bigint, proof?: Uint8Array): boolean {
    if (proof === undefined) {
      return true;
    }
    const verifier = this.verifiers.get(assetId) ?? this.fallback;
    return verifier.verify(assetId, price, proof);
  }
}
