export interface RateLimitConfig {
  /** Sliding window length in milliseconds */
  windowMs: number;
  maxRequests: number;
  skipSuccessfulRequests: boolean;
  skipFailedRequests: boolean;
}

export interface RateLimitInfo {
  totalHits: number;
  totalHitsInWindow: number;
  remainingPoints: number;
  msBeforeNext: number;
  isBlocked: boolean;
}

export interface ClientRecord {
  requests: number[];
  totalRequests: number;
  firstRequest: number;
}

export interface RateLimitMetrics {
  totalClients: number;
  totalRequests: number;
  allowedRequests: number;
  blockedRequests: number;
  hitRate: number;
}
