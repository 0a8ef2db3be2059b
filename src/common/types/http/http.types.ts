/**
 * Success envelope returned by every non-health endpoint
 */
export interface ApiResponse<T = unknown> {
  success: true;
  timestamp: number;
  requestId?: string;
  responseTime?: number;
  data: T;
}

/** Minimal view of an incoming request used by guards, interceptors and decorators */
export interface RequestLike {
  method?: string;
  url?: string;
  headers: Record<string, string | string[] | undefined>;
  ip?: string;
  socket?: { remoteAddress?: string };
}
