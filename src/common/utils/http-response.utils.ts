import type { ApiResponse } from "../types/http/http.types";

/**
 * Wrap a payload in the success envelope
 */
export function createSuccessResponse<T>(
  data: T,
  options: {
    responseTime?: number;
    requestId?: string;
  } = {}
): ApiResponse<T> {
  const { requestId, responseTime } = options;
  return {
    success: true,
    timestamp: Date.now(),
    data,
    ...(requestId ? { requestId } : {}),
    ...(responseTime !== undefined ? { responseTime } : {}),
  };
}
