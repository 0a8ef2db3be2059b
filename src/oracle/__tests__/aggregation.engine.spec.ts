import { OracleErrorKind, type FeedEntry } from "@/common/types/oracle";
import { createOracleFixture, type OracleFixture } from "@/__tests__/utils/oracle.fixture";
import { TEST_NOW, TestDataBuilder } from "@/__tests__/utils/test-data.builders";
import { TestHelpers } from "@/__tests__/utils/test.helpers";

describe("AggregationEngine", () => {
  let fixture: OracleFixture;

  beforeEach(() => {
    fixture = createOracleFixture();
  });

  function store(...entries: FeedEntry[]): void {
    entries.forEach(entry => fixture.feedEntries.upsert(entry));
  }

  it("should compute the weight-weighted mean", () => {
    store(
      TestDataBuilder.createFeedEntry({ reporterId: "reporter-a", price: 100n, weight: 25 }),
      TestDataBuilder.createFeedEntry({ reporterId: "reporter-b", price: 200n, weight: 75 })
    );

    expect(fixture.engine.weightedPrice("BTC", TEST_NOW)).toEqual({ ok: true, value: 175n });
  });

  it("should produce the BTC reference price from two equal-weight sources", () => {
    store(...TestDataBuilder.createFeedEntries("BTC", [50_000_000000n, 50_100_000000n]));

    expect(TestHelpers.unwrap(fixture.engine.weightedPrice("BTC", TEST_NOW))).toBe(50_050_000000n);
  });

  it("should truncate the division", () => {
    store(...TestDataBuilder.createFeedEntries("ETH", [10n, 11n]));

    expect(TestHelpers.unwrap(fixture.engine.weightedPrice("ETH", TEST_NOW))).toBe(10n);
  });

  it("should not depend on submission order", () => {
    const entries = [
      TestDataBuilder.createFeedEntry({ reporterId: "reporter-z", price: 301n, weight: 10 }),
      TestDataBuilder.createFeedEntry({ reporterId: "reporter-m", price: 297n, weight: 60 }),
      TestDataBuilder.createFeedEntry({ reporterId: "reporter-a", price: 305n, weight: 30 }),
    ];
    store(...entries);
    const reversed = createOracleFixture();
    [...entries].reverse().forEach(entry => reversed.feedEntries.upsert(entry));

    // (301 * 10 + 297 * 60 + 305 * 30) / 100
    expect(TestHelpers.unwrap(fixture.engine.weightedPrice("BTC", TEST_NOW))).toBe(299n);
    expect(reversed.engine.weightedPrice("BTC", TEST_NOW)).toEqual(fixture.engine.weightedPrice("BTC", TEST_NOW));
  });

  it("should fail when fewer sources than required remain", () => {
    store(TestDataBuilder.createFeedEntry());

    expect(TestHelpers.errorOf(fixture.engine.weightedPrice("BTC", TEST_NOW))).toBe(
      OracleErrorKind.InsufficientSources
    );
  });

  it("should fail when the eligible weights sum to zero", () => {
    store(...TestDataBuilder.createFeedEntries("BTC", [100n, 200n], { weight: 0 }));

    expect(TestHelpers.errorOf(fixture.engine.weightedPrice("BTC", TEST_NOW))).toBe(OracleErrorKind.InvalidWeight);
  });

  it("should report InvalidWeight for an empty feed when no sources are required", () => {
    fixture.configuration.setParameters(TestDataBuilder.createOracleParameters({ minRequiredSources: 0 }));

    expect(TestHelpers.errorOf(fixture.engine.weightedPrice("SOL", TEST_NOW))).toBe(OracleErrorKind.InvalidWeight);
  });

  it("should keep an entry exactly at the end of its validity period", () => {
    store(...TestDataBuilder.createFeedEntries("BTC", [100n, 200n], { timestamp: TEST_NOW - 300 }));

    expect(TestHelpers.unwrap(fixture.engine.weightedPrice("BTC", TEST_NOW))).toBe(150n);
    expect(TestHelpers.errorOf(fixture.engine.weightedPrice("BTC", TEST_NOW + 1))).toBe(
      OracleErrorKind.InsufficientSources
    );
  });

  it("should reject unsupported assets and unusable times", () => {
    expect(TestHelpers.errorOf(fixture.engine.weightedPrice("DOGE", TEST_NOW))).toBe(OracleErrorKind.InvalidChain);
    expect(TestHelpers.errorOf(fixture.engine.weightedPrice("BTC", undefined))).toBe(OracleErrorKind.InvalidPrice);
    expect(TestHelpers.errorOf(fixture.engine.weightedPrice("BTC", Number.NaN))).toBe(OracleErrorKind.InvalidPrice);
  });

  describe("breakdown", () => {
    it("should name contributors and excluded reporters with the first failing rule", () => {
      store(
        TestDataBuilder.createFeedEntry({ reporterId: "reporter-1", timestamp: TEST_NOW - 301, verified: false }),
        TestDataBuilder.createFeedEntry({ reporterId: "reporter-2", verified: false }),
        TestDataBuilder.createFeedEntry({ reporterId: "reporter-3", volume: 5_000n }),
        TestDataBuilder.createFeedEntry({ reporterId: "reporter-5", price: 40n }),
        TestDataBuilder.createFeedEntry({ reporterId: "reporter-4", price: 20n })
      );

      const breakdown = TestHelpers.unwrap(fixture.engine.breakdown("BTC", TEST_NOW));

      expect(breakdown).toEqual({
        assetId: "BTC",
        price: 30n,
        totalWeight: 100n,
        evaluatedAt: TEST_NOW,
        contributors: ["reporter-4", "reporter-5"],
        excluded: [
          { reporterId: "reporter-1", reason: "stale" },
          { reporterId: "reporter-2", reason: "unverified" },
          { reporterId: "reporter-3", reason: "low_volume" },
        ],
      });
    });

    it("should exclude entries that fall below a raised volume threshold", () => {
      store(...TestDataBuilder.createFeedEntries("ETH", [100n, 200n], { volume: 15_000n }));
      fixture.configuration.setParameters(TestDataBuilder.createOracleParameters({ minVolumeThreshold: 20_000n }));

      expect(TestHelpers.errorOf(fixture.engine.breakdown("ETH", TEST_NOW))).toBe(OracleErrorKind.InsufficientSources);
    });
  });
});
