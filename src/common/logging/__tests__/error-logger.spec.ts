import * as fs from "fs";
import * as path from "path";
import { ErrorLogger } from "../error-logger";

jest.mock("fs");
const mockedFs = jest.mocked(fs);

class CodedError extends Error {
  readonly code = "E_TIME";

  constructor(message: string) {
    super(message);
    this.name = "CodedError";
  }
}

describe("ErrorLogger", () => {
  let errorLogger: ErrorLogger;
  const mockLogDirectory = "/tmp/test-logs";
  const mockErrorLogFile = path.join(mockLogDirectory, "errors.log");

  beforeEach(() => {
    jest.clearAllMocks();
    errorLogger = new ErrorLogger("TestContext", mockLogDirectory, 3, true);
  });

  describe("logError", () => {
    it("should take severity from the context when it is a known level", () => {
      const entry = errorLogger.logError(new Error("plain failure"), { component: "Oracle", severity: "critical" });

      expect(entry.severity).toBe("critical");
      expect(entry.errorCode).toBe("UNKNOWN_ERROR");
      expect(entry.errorType).toBe("Error");
    });

    it("should classify severity from the message otherwise", () => {
      expect(errorLogger.logError(new Error("time source unavailable")).severity).toBe("high");
      expect(errorLogger.logError(new Error("price deviation exceeded")).severity).toBe("medium");
      expect(errorLogger.logError(new Error("something odd")).severity).toBe("low");
    });

    it("should read the code property of the error before the context code", () => {
      const entry = errorLogger.logError(new CodedError("clock"), { errorCode: "FROM_CONTEXT" });

      expect(entry.errorCode).toBe("E_TIME");
      expect(entry.errorType).toBe("CodedError");
    });

    it("should mark configuration errors as not recoverable", () => {
      expect(errorLogger.logError(new Error("configuration rejected")).recoverable).toBe(false);
      expect(errorLogger.logError(new Error("stale price")).recoverable).toBe(true);
    });

    it("should write to file when file logging is enabled", () => {
      errorLogger.logError(new Error("Test error message"), { component: "TestComponent" });

      expect(mockedFs.appendFileSync).toHaveBeenCalledWith(
        mockErrorLogFile,
        expect.stringContaining("Test error message")
      );
    });

    it("should not write to file when file logging is disabled", () => {
      const logger = new ErrorLogger("TestContext", mockLogDirectory, 100, false);

      logger.logError(new Error("Test error message"));

      expect(mockedFs.appendFileSync).not.toHaveBeenCalled();
    });

    it("should survive a failing file write", () => {
      const consoleSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
      mockedFs.appendFileSync.mockImplementationOnce(() => {
        throw new Error("disk full");
      });

      expect(() => errorLogger.logError(new Error("boom"))).not.toThrow();
      expect(consoleSpy).toHaveBeenCalledWith("Failed to write error to log file:", expect.any(Error));
      consoleSpy.mockRestore();
    });
  });

  describe("getStatistics", () => {
    it("should group errors by severity, type and component", () => {
      errorLogger.logError(new Error("a"), { component: "Validator", severity: "medium" });
      errorLogger.logError(new Error("b"), { component: "Validator", severity: "medium" });
      errorLogger.logError(new CodedError("c"), { severity: "high" });

      const stats = errorLogger.getStatistics();

      expect(stats.totalErrors).toBe(3);
      expect(stats.errorsBySeverity).toEqual({ medium: 2, high: 1 });
      expect(stats.errorsByType).toEqual({ Error: 2, CodedError: 1 });
      expect(stats.errorsByComponent).toEqual({ Validator: 2, unknown: 1 });
      expect(stats.recentErrors).toHaveLength(3);
    });

    it("should keep only the configured number of entries", () => {
      for (let i = 0; i < 5; i++) {
        errorLogger.logError(new Error(`error ${i}`));
      }

      const stats = errorLogger.getStatistics();
      expect(stats.totalErrors).toBe(3);
      expect(stats.recentErrors.map(entry => entry.error.message)).toEqual(["error 2", "error 3", "error 4"]);
    });
  });
});
