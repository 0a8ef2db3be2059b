/**
 * Error handling type definitions: error envelopes, API error codes and the
 * oracle error-kind mapping
 */

export * from "./api-error.types";
export * from "./error.types";
