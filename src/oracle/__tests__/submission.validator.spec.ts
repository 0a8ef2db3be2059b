import { OracleErrorKind } from "@/common/types/oracle";
import { createOracleFixture, type OracleFixture } from "@/__tests__/utils/oracle.fixture";
import { TEST_NOW } from "@/__tests__/utils/test-data.builders";
import { TestHelpers } from "@/__tests__/utils/test.helpers";
import type { ProofVerifier } from "../verification/proof-verifier.interface";

describe("SubmissionValidator", () => {
  let fixture: OracleFixture;

  beforeEach(() => {
    fixture = createOracleFixture({ parameters: { maxPriceDeviation: 1n } });
  });

  describe("validateAndAccept", () => {
    it("should accept an authorized submission and record it", () => {
      const entry = TestHelpers.unwrap(fixture.validator.validateAndAccept("reporter-a", "BTC", 100_000000n, 20_000n));

      expect(entry).toEqual({
        assetId: "BTC",
        reporterId: "reporter-a",
        price: 100_000000n,
        timestamp: TEST_NOW,
        volume: 20_000n,
        weight: 50,
        verified: true,
      });
      expect(fixture.feedEntries.get("BTC", "reporter-a")).toEqual(entry);
      expect(fixture.history.get("BTC")).toEqual({ lastPrice: 100_000000n, lastUpdate: TEST_NOW, volatilityIndex: 0n });
    });

    it("should reject an unknown or missing caller", () => {
      expect(fixture.validator.validateAndAccept("stranger", "BTC", 1n, 20_000n)).toEqual({
        ok: false,
        error: OracleErrorKind.NotAuthorized,
      });
      expect(TestHelpers.errorOf(fixture.validator.validateAndAccept(undefined, "BTC", 1n, 20_000n))).toBe(
        OracleErrorKind.NotAuthorized
      );
      expect(fixture.feedEntries.countFor("BTC")).toBe(0);
    });

    it("should check authorization before the asset", () => {
      expect(TestHelpers.errorOf(fixture.validator.validateAndAccept("stranger", "DOGE", 1n, 0n))).toBe(
        OracleErrorKind.NotAuthorized
      );
    });

    it("should reject an unsupported asset", () => {
      expect(TestHelpers.errorOf(fixture.validator.validateAndAccept("reporter-a", "DOGE", 1n, 20_000n))).toBe(
        OracleErrorKind.InvalidChain
      );
    });

    it("should reject volume below the threshold without touching state", () => {
      const result = fixture.validator.validateAndAccept("reporter-a", "BTC", 50_000_000000n, 5_000n);

      expect(TestHelpers.errorOf(result)).toBe(OracleErrorKind.BelowMinVolume);
      expect(fixture.feedEntries.countFor("BTC")).toBe(0);
      expect(fixture.history.get("BTC")).toBeUndefined();
    });

    it("should reject a negative price or volume before any write", () => {
      expect(TestHelpers.errorOf(fixture.validator.validateAndAccept("reporter-a", "BTC", -5n, 20_000n))).toBe(
        OracleErrorKind.InvalidPrice
      );
      expect(TestHelpers.errorOf(fixture.validator.validateAndAccept("reporter-a", "BTC", 100n, -1n))).toBe(
        OracleErrorKind.InvalidPrice
      );
      expect(fixture.feedEntries.countFor("BTC")).toBe(0);
      expect(fixture.history.get("BTC")).toBeUndefined();
    });

    it("should accept volume exactly at the threshold", () => {
      expect(fixture.validator.validateAndAccept("reporter-a", "BTC", 1n, 10_000n).ok).toBe(true);
    });

    it("should fail with InvalidPrice when no time is available", () => {
      fixture.time.set(undefined);

      expect(TestHelpers.errorOf(fixture.validator.validateAndAccept("reporter-a", "BTC", 1n, 20_000n))).toBe(
        OracleErrorKind.InvalidPrice
      );
      expect(fixture.feedEntries.countFor("BTC")).toBe(0);
    });

    it("should never reject the first price of an asset for deviation", () => {
      fixture.configuration.setParameters({ ...fixture.configuration.getParameters(), maxPriceDeviation: 0n });

      expect(fixture.validator.validateAndAccept("reporter-a", "ETH", 3_000_000000n, 20_000n).ok).toBe(true);
    });

    it("should reject a move beyond the deviation bound and leave history untouched", () => {
      fixture.validator.validateAndAccept("reporter-a", "BTC", 100_000000n, 20_000n);
      fixture.time.advance(5);

      const result = fixture.validator.validateAndAccept("reporter-b", "BTC", 250_000000n, 20_000n);

      expect(TestHelpers.errorOf(result)).toBe(OracleErrorKind.HighDeviation);
      expect(fixture.history.get("BTC")).toEqual({ lastPrice: 100_000000n, lastUpdate: TEST_NOW, volatilityIndex: 0n });
      expect(fixture.feedEntries.get("BTC", "reporter-b")).toBeUndefined();
    });

    it("should accept a move exactly at the deviation bound", () => {
      fixture.validator.validateAndAccept("reporter-a", "BTC", 100_000000n, 20_000n);

      expect(fixture.validator.validateAndAccept("reporter-b", "BTC", 200_000000n, 20_000n).ok).toBe(true);
      expect(fixture.validator.validateAndAccept("reporter-c", "BTC", 0n, 20_000n).ok).toBe(true);
    });

    it("should overwrite the reporter's earlier entry", () => {
      fixture.validator.validateAndAccept("reporter-a", "BTC", 100_000000n, 20_000n);
      fixture.time.advance(10);
      fixture.validator.validateAndAccept("reporter-a", "BTC", 101_000000n, 30_000n);

      expect(fixture.feedEntries.countFor("BTC")).toBe(1);
      expect(fixture.feedEntries.get("BTC", "reporter-a")).toMatchObject({
        price: 101_000000n,
        volume: 30_000n,
        timestamp: TEST_NOW + 10,
      });
    });

    it("should store the verifier's verdict on the entry", () => {
      const rejecting: ProofVerifier = { verify: jest.fn().mockReturnValue(false) };
      fixture.verifiers.register("BTC", rejecting);
      const proof = Uint8Array.from([1, 2, 3]);

      const entry = TestHelpers.unwrap(fixture.validator.validateAndAccept("reporter-a", "BTC", 1n, 20_000n, proof));

      expect(entry.verified).toBe(false);
      expect(rejecting.verify).toHaveBeenCalledWith("BTC", 1n, proof);
    });

    it("should take the weight from the weighting strategy", () => {
      const weighted = createOracleFixture({
        weighting: { weightFor: (reporterId: string) => (reporterId === "reporter-a" ? 80 : 20) },
      });

      const first = TestHelpers.unwrap(weighted.validator.validateAndAccept("reporter-a", "SOL", 1n, 20_000n));
      const second = TestHelpers.unwrap(weighted.validator.validateAndAccept("reporter-b", "SOL", 1n, 20_000n));

      expect(first.weight).toBe(80);
      expect(second.weight).toBe(20);
    });
  });

  describe("isValidPriceChange", () => {
    it("should read the bound in basis points when configured so", () => {
      const bps = createOracleFixture({ parameters: { maxPriceDeviation: 500n }, deviationScale: "bps" });
      bps.history.update("BTC", 100_000000n, TEST_NOW);

      expect(bps.validator.isValidPriceChange("BTC", 105_000000n)).toBe(true);
      expect(bps.validator.isValidPriceChange("BTC", 95_000000n)).toBe(true);
      expect(bps.validator.isValidPriceChange("BTC", 105_000001n)).toBe(false);
      expect(bps.validator.isValidPriceChange("BTC", 94_999999n)).toBe(false);
    });

    it("should multiply the last price in raw mode", () => {
      fixture.history.update("ETH", 10n, TEST_NOW);

      expect(fixture.validator.isValidPriceChange("ETH", 20n)).toBe(true);
      expect(fixture.validator.isValidPriceChange("ETH", 21n)).toBe(false);
    });
  });
});
