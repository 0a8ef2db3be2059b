export * from "./proof-verifier.interface";
export * from "./permissive-proof.verifier";
export * from "./proof-verifier.registry";
