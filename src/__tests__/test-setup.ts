/**
 * Jest Test Setup
 *
 * Loads decorator metadata and silences console and Nest logger output unless a test opts in.
 */

import "reflect-metadata";
import type { GlobalTestLogging, ConsoleOverride } from "./utils/test-logging.types";

process.env.NODE_ENV = "test";

const originalConsole: ConsoleOverride = {
  error: console.error,
  warn: console.warn,
  log: console.log,
  debug: console.debug,
};

let testLoggingEnabled = false;

const testLogging: GlobalTestLogging = {
  enableTestLogging: () => {
    testLoggingEnabled = true;
  },
  disableTestLogging: () => {
    testLoggingEnabled = false;
  },
};
Object.assign(global, testLogging);

const createConsoleOverride =
  (originalMethod: typeof console.error) =>
  (...args: unknown[]): void => {
    if (testLoggingEnabled) {
      originalMethod(...args);
    }
  };

console.error = createConsoleOverride(originalConsole.error);
console.warn = createConsoleOverride(originalConsole.warn);
console.log = createConsoleOverride(originalConsole.log);
console.debug = createConsoleOverride(originalConsole.debug);

// Nest's ConsoleLogger writes straight to the process streams
const originalStdoutWrite = process.stdout.write;
const originalStderrWrite = process.stderr.write;

function silence(stream: NodeJS.WriteStream, originalWrite: NodeJS.WriteStream["write"]): void {
  jest.spyOn(stream, "write").mockImplementation((...args: Parameters<NodeJS.WriteStream["write"]>) => {
    if (testLoggingEnabled) {
      return originalWrite.apply(stream, args);
    }
    const callback = args.find(arg => typeof arg === "function");
    if (typeof callback === "function") {
      callback();
    }
    return true;
  });
}

beforeEach(() => {
  silence(process.stdout, originalStdoutWrite);
  silence(process.stderr, originalStderrWrite);
});

afterEach(() => {
  jest.useRealTimers();
});

afterAll(() => {
  console.error = originalConsole.error;
  console.warn = originalConsole.warn;
  console.log = originalConsole.log;
  console.debug = originalConsole.debug;
  process.stdout.write = originalStdoutWrite;
  process.stderr.write = originalStderrWrite;
});
