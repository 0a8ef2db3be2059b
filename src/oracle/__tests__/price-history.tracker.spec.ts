import { PriceHistoryTracker } from "../history/price-history.tracker";

describe("PriceHistoryTracker", () => {
  let tracker: PriceHistoryTracker;

  beforeEach(() => {
    tracker = new PriceHistoryTracker();
  });

  it("should have no history before the first update", () => {
    expect(tracker.get("BTC")).toBeUndefined();
    expect(tracker.lastPrice("BTC")).toBe(0n);
  });

  it("should start volatility at zero", () => {
    expect(tracker.update("BTC", 100n, 10)).toEqual({ lastPrice: 100n, lastUpdate: 10, volatilityIndex: 0n });
  });

  it("should accumulate volatility from absolute price moves", () => {
    tracker.update("BTC", 100n, 10);
    expect(tracker.update("BTC", 110n, 20).volatilityIndex).toBe(50n);
    // 50 * 95 + |105 - 110| * 5
    expect(tracker.update("BTC", 105n, 30).volatilityIndex).toBe(4775n);
    expect(tracker.get("BTC")).toEqual({ lastPrice: 105n, lastUpdate: 30, volatilityIndex: 4775n });
  });

  it("should track each asset separately", () => {
    tracker.update("BTC", 100n, 10);
    tracker.update("ETH", 7n, 11);
    tracker.update("ETH", 9n, 12);

    expect(tracker.get("BTC")?.volatilityIndex).toBe(0n);
    expect(tracker.get("ETH")?.volatilityIndex).toBe(10n);
  });
});
