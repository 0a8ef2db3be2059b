import * as fs from "fs";
import * as path from "path";
import { PerformanceLogger } from "../performance-logger";

jest.mock("fs");
const mockedFs = jest.mocked(fs);

describe("PerformanceLogger", () => {
  let performanceLogger: PerformanceLogger;
  let nowSpy: jest.SpyInstance<number, []>;
  const mockLogDirectory = "/tmp/test-logs";
  const mockPerformanceLogFile = path.join(mockLogDirectory, "performance.log");

  beforeEach(() => {
    jest.clearAllMocks();
    nowSpy = jest.spyOn(performance, "now").mockReturnValue(0);
    performanceLogger = new PerformanceLogger("TestContext", mockLogDirectory, true, true);
  });

  afterEach(() => {
    nowSpy.mockRestore();
  });

  it("should return the measured duration when a timer ends", () => {
    nowSpy.mockReturnValueOnce(10).mockReturnValueOnce(35);

    performanceLogger.startTimer("op-1", "submitPrice", "OracleService");
    const duration = performanceLogger.endTimer("op-1");

    expect(duration).toBe(25);
  });

  it("should track completed and failed operations with their average time", () => {
    nowSpy.mockReturnValueOnce(0).mockReturnValueOnce(0).mockReturnValueOnce(10).mockReturnValueOnce(30);

    performanceLogger.startTimer("a", "op", "C");
    performanceLogger.startTimer("b", "op", "C");
    performanceLogger.endTimer("a", true);
    performanceLogger.endTimer("b", false);

    expect(performanceLogger.getStatistics()).toEqual({
      activeOperations: 0,
      completedOperations: 2,
      failedOperations: 1,
      averageOperationTime: 20,
    });
  });

  it("should count timers that have not ended as active", () => {
    performanceLogger.startTimer("open", "op", "C");

    expect(performanceLogger.getStatistics().activeOperations).toBe(1);
  });

  it("should return undefined for an unknown timer", () => {
    expect(performanceLogger.endTimer("missing")).toBeUndefined();
    expect(performanceLogger.getStatistics().completedOperations).toBe(0);
  });

  it("should do nothing when performance logging is disabled", () => {
    const logger = new PerformanceLogger("TestContext", mockLogDirectory, false, true);

    logger.startTimer("op", "op", "C");
    expect(logger.endTimer("op")).toBeUndefined();
    expect(logger.getStatistics().activeOperations).toBe(0);
    expect(mockedFs.appendFileSync).not.toHaveBeenCalled();
  });

  it("should append the finished entry to the performance log", () => {
    performanceLogger.startTimer("op", "getWeightedPrice", "OracleService", { assetId: "BTC" });
    performanceLogger.endTimer("op", true, { sources: 3 });

    expect(mockedFs.appendFileSync).toHaveBeenCalledWith(
      mockPerformanceLogFile,
      expect.stringContaining('"operation":"getWeightedPrice"')
    );
    const line = String(mockedFs.appendFileSync.mock.calls[0][1]);
    expect(JSON.parse(line).metadata).toEqual({ assetId: "BTC", sources: 3 });
  });
});
