import { HttpException, HttpStatus } from "@nestjs/common";
import type { TestingModule } from "@nestjs/testing";
import { PriceController } from "../price.controller";
import type { SlippageCheckDto, SubmitPriceDto } from "../dto/price.dto";
import { createOracleFixture, createTestModule, TEST_NOW, TestHelpers, type OracleFixture } from "@/__tests__/utils";

function submission(price: string, volume = "20000", proof?: string): SubmitPriceDto {
  return { price, volume, proof };
}

function captureHttpException(operation: () => unknown): HttpException {
  try {
    operation();
  } catch (error) {
    if (error instanceof HttpException) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected an HttpException");
}

describe("PriceController", () => {
  let controller: PriceController;
  let fixture: OracleFixture;
  let module: TestingModule;

  beforeEach(async () => {
    fixture = createOracleFixture();
    module = await createTestModule().addController(PriceController).addOracle(fixture).addCommonMocks().build();
    controller = TestHelpers.getService(module, PriceController);
  });

  afterEach(async () => {
    await module.close();
  });

  describe("submitPrice", () => {
    it("should accept a submission from an authorized reporter and return the stored entry", () => {
      const response = controller.submitPrice("BTC", submission("50000000000"), "reporter-a");

      expect(response.success).toBe(true);
      expect(response.requestId).toEqual(expect.any(String));
      expect(response.data).toEqual({
        assetId: "BTC",
        reporterId: "reporter-a",
        price: "50000000000",
        timestamp: TEST_NOW,
        volume: "20000",
        weight: 50,
        verified: true,
      });
      expect(fixture.feedEntries.countFor("BTC")).toBe(1);
    });

    it("should answer 403 when no caller identity is present", () => {
      const error = captureHttpException(() => controller.submitPrice("BTC", submission("50000000000"), undefined));

      expect(error.getStatus()).toBe(HttpStatus.FORBIDDEN);
      expect(error.getResponse()).toMatchObject({
        error: "CALLER_NOT_AUTHORIZED",
        code: 4031,
        details: { kind: "NotAuthorized", assetId: "BTC" },
      });
    });

    it("should answer 400 for an unsupported asset", () => {
      const error = captureHttpException(() => controller.submitPrice("DOGE", submission("1000000"), "reporter-a"));

      expect(error.getStatus()).toBe(HttpStatus.BAD_REQUEST);
      expect(error.getResponse()).toMatchObject({ error: "UNSUPPORTED_ASSET", code: 4001 });
    });

    it("should answer 422 when the volume is below the threshold", () => {
      const error = captureHttpException(() =>
        controller.submitPrice("BTC", submission("50000000000", "9999"), "reporter-a")
      );

      expect(error.getStatus()).toBe(HttpStatus.UNPROCESSABLE_ENTITY);
      expect(error.getResponse()).toMatchObject({ error: "VOLUME_BELOW_MINIMUM", code: 4221 });
    });

    it("should pass a hex proof to the asset's verifier", () => {
      const verify = jest.fn().mockReturnValue(false);
      fixture.verifiers.register("BTC", { verify });

      const response = controller.submitPrice("BTC", submission("50000000000", "20000", "0xdead"), "reporter-a");

      expect(response.data.verified).toBe(false);
      expect(verify).toHaveBeenCalledWith("BTC", 50_000_000000n, Uint8Array.from([0xde, 0xad]));
    });
  });

  describe("reads", () => {
    beforeEach(() => {
      controller.submitPrice("BTC", submission("50000000000"), "reporter-a");
      controller.submitPrice("BTC", submission("50100000000"), "reporter-b");
    });

    it("should return the weighted price with its breakdown", () => {
      const response = controller.getWeightedPrice("BTC");

      expect(response.data).toEqual({
        assetId: "BTC",
        price: "50050000000",
        totalWeight: "100",
        evaluatedAt: TEST_NOW,
        contributors: ["reporter-a", "reporter-b"],
        excluded: [],
      });
    });

    it("should answer 503 once stale entries leave too few eligible sources", () => {
      fixture.time.advance(200);
      controller.submitPrice("BTC", submission("50200000000"), "reporter-c");
      fixture.time.advance(150);

      const error = captureHttpException(() => controller.getWeightedPrice("BTC"));

      expect(error.getStatus()).toBe(HttpStatus.SERVICE_UNAVAILABLE);
      expect(error.getResponse()).toMatchObject({ error: "INSUFFICIENT_SOURCES", code: 5032 });
    });

    it("should return the current entries sorted by reporter", () => {
      const response = controller.getFeedEntries("BTC");

      expect(response.data.map(entry => [entry.reporterId, entry.price])).toEqual([
        ["reporter-a", "50000000000"],
        ["reporter-b", "50100000000"],
      ]);
    });

    it("should return the price history with a digit-string volatility index", () => {
      const response = controller.getPriceHistory("BTC");

      expect(response.data).toEqual({
        assetId: "BTC",
        lastPrice: "50100000000",
        lastUpdate: TEST_NOW,
        volatilityIndex: "500000000",
      });
    });

    it("should return an empty history for a supported asset with no submissions", () => {
      expect(controller.getPriceHistory("SOL").data).toEqual({
        assetId: "SOL",
        lastPrice: "0",
        lastUpdate: 0,
        volatilityIndex: "0",
      });
    });
  });

  describe("getNormalizedPrice", () => {
    it("should raise the weighted price by the volatility index", () => {
      controller.submitPrice("ETH", submission("1000000"), "reporter-a");
      controller.submitPrice("ETH", submission("1000100"), "reporter-b");

      expect(controller.getNormalizedPrice("ETH").data).toEqual({ assetId: "ETH", price: "1050052" });
    });

    it("should answer 503 while fewer than the required sources are eligible", () => {
      controller.submitPrice("ETH", submission("1000000"), "reporter-a");

      const error = captureHttpException(() => controller.getNormalizedPrice("ETH"));
      expect(error.getStatus()).toBe(HttpStatus.SERVICE_UNAVAILABLE);
    });
  });

  describe("checkSlippage", () => {
    const check = (price: string): SlippageCheckDto => ({ price, expectedPrice: "50000000000" });

    it("should accept a price on the edge of the band", () => {
      expect(controller.checkSlippage(check("50500000000")).data).toEqual({ withinSlippage: true });
      expect(controller.checkSlippage(check("49500000000")).data).toEqual({ withinSlippage: true });
    });

    it("should reject a price one unit outside the band", () => {
      expect(controller.checkSlippage(check("50500000001")).data).toEqual({ withinSlippage: false });
    });
  });
});
