import { Injectable } from "@nestjs/common";
import { OracleErrorKind, fail, ok } from "@/common/types/oracle";
import { OracleService } from "@/oracle";
import {
  createOracleFixture,
  createTestModule,
  FixedTimeSource,
  TEST_NOW,
  TEST_REPORTERS,
  TestDataBuilder,
  TestHelpers,
} from "./index";

@Injectable()
class GreetingService {
  greet(name: string): string {
    return `hello ${name}`;
  }
}

describe("Test Utilities", () => {
  describe("TestDataBuilder", () => {
    it("should convert whole dollars to 6-decimal fixed point", () => {
      expect(TestDataBuilder.usd(50_000)).toBe(50_000_000000n);
    });

    it("should apply overrides on top of the default parameters", () => {
      expect(TestDataBuilder.createOracleParameters({ minRequiredSources: 5 })).toEqual({
        validityPeriod: 300,
        maxPriceDeviation: 1000n,
        minRequiredSources: 5,
        minVolumeThreshold: 10_000n,
        slippageTolerance: 100n,
      });
    });

    it("should number reporters when creating several entries", () => {
      const entries = TestDataBuilder.createFeedEntries("ETH", [1n, 2n]);

      expect(entries.map(entry => [entry.reporterId, entry.assetId, entry.price])).toEqual([
        ["reporter-1", "ETH", 1n],
        ["reporter-2", "ETH", 2n],
      ]);
    });
  });

  describe("TestHelpers", () => {
    it("should unwrap a successful result", () => {
      expect(TestHelpers.unwrap(ok(42n))).toBe(42n);
    });

    it("should return the error kind of a failed result", () => {
      expect(TestHelpers.errorOf(fail(OracleErrorKind.StalePrice))).toBe(OracleErrorKind.StalePrice);
    });

    it("should throw when unwrapping a failure", () => {
      expect(() => TestHelpers.unwrap(fail(OracleErrorKind.InvalidWeight))).toThrow(
        "Expected success, got InvalidWeight"
      );
    });

    it("should track call order", () => {
      const { mock, getCallOrder } = TestHelpers.createOrderedMock();
      mock();
      mock();

      expect(getCallOrder()).toEqual([1, 2]);
    });
  });

  describe("FixedTimeSource", () => {
    it("should move only when told to", () => {
      const time = new FixedTimeSource(100);
      time.advance(20);

      expect(time.nowSeconds()).toBe(120);
    });

    it("should refuse to advance an unavailable clock", () => {
      const time = new FixedTimeSource(undefined);

      expect(() => time.advance(1)).toThrow("Cannot advance an unavailable clock");
    });
  });

  describe("createOracleFixture", () => {
    it("should wire an oracle with the test reporters and clock", () => {
      const fixture = createOracleFixture();

      expect(fixture.service.isAuthorizedProvider(TEST_REPORTERS[0])).toBe(true);
      expect(fixture.time.nowSeconds()).toBe(TEST_NOW);
    });
  });

  describe("TestModuleBuilder", () => {
    it("should build a module with the given providers", async () => {
      const module = await createTestModule().addProvider(GreetingService).build();

      expect(TestHelpers.getService<GreetingService>(module, GreetingService).greet("oracle")).toBe("hello oracle");
      await module.close();
    });

    it("should substitute a value for a token", async () => {
      const module = await createTestModule().addProvider("GREETING", { text: "hi" }).build();

      expect(module.get("GREETING")).toEqual({ text: "hi" });
      await module.close();
    });

    it("should serve the fixture's oracle instance itself", async () => {
      const fixture = createOracleFixture();
      const module = await createTestModule().addOracle(fixture).build();

      expect(module.get(OracleService)).toBe(fixture.service);
      await module.close();
    });

    it("should refuse a string token without an implementation", () => {
      expect(() => createTestModule().addProvider("MISSING")).toThrow("Provider MISSING needs an implementation");
    });
  });
});
