import { Injectable } from "@nestjs/common";
import { ConfiguredService } from "../base";
import type { RateLimitInfo, ClientRecord, RateLimitMetrics, RateLimitConfig } from "./rate-limit.types";

const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  windowMs: 60000,
  maxRequests: 600,
  skipSuccessfulRequests: false,
  skipFailedRequests: false,
};

/**
 * In-memory sliding-window limiter keyed by client id
 */
@Injectable()
export class RateLimiterService extends ConfiguredService<RateLimitConfig>(DEFAULT_RATE_LIMIT_CONFIG) {
  private readonly clients = new Map<string, ClientRecord>();
  private blockedRequests = 0;

  constructor(config: Partial<RateLimitConfig> = {}) {
    super();
    this.updateConfig(config);
  }

  override validateConfig(): void {
    if (!Number.isInteger(this.config.maxRequests) || this.config.maxRequests < 1) {
      throw new Error(`maxRequests must be a positive integer, got ${this.config.maxRequests}`);
    }
    if (!Number.isInteger(this.config.windowMs) || this.config.windowMs < 1) {
      throw new Error(`windowMs must be a positive integer, got ${this.config.windowMs}`);
    }
  }

  override async initialize(): Promise<void> {
    this.createInterval(() => this.pruneClients(), this.config.windowMs);
    this.logger.log(`Rate limiter initialized: ${this.config.maxRequests} requests per ${this.config.windowMs}ms`);
  }

  checkRateLimit(clientId: string, now: number = Date.now()): RateLimitInfo {
    const windowStart = now - this.config.windowMs;
    const client = this.getOrCreateClient(clientId, now);

    client.requests = client.requests.filter(timestamp => timestamp > windowStart);

    const totalHitsInWindow = client.requests.length;
    const isBlocked = totalHitsInWindow >= this.config.maxRequests;

    let msBeforeNext = 0;
    if (isBlocked) {
      // requests are appended in time order
      msBeforeNext = Math.max(0, client.requests[0] + this.config.windowMs - now);
    }

    return {
      totalHits: client.totalRequests,
      totalHitsInWindow,
      remainingPoints: Math.max(0, this.config.maxRequests - totalHitsInWindow),
      msBeforeNext,
      isBlocked,
    };
  }

  recordRequest(clientId: string, isSuccessful: boolean = true, now: number = Date.now()): RateLimitInfo {
    if (!isSuccessful) {
      this.blockedRequests++;
    }

    if (
      (isSuccessful && this.config.skipSuccessfulRequests) ||
      (!isSuccessful && this.config.skipFailedRequests)
    ) {
      return this.checkRateLimit(clientId, now);
    }

    const client = this.getOrCreateClient(clientId, now);
    client.requests.push(now);
    client.totalRequests++;

    return this.checkRateLimit(clientId, now);
  }

  getStats(): RateLimitMetrics {
    let totalRequests = 0;
    for (const client of this.clients.values()) {
      totalRequests += client.totalRequests;
    }

    const allowedRequests = Math.max(0, totalRequests - this.blockedRequests);
    return {
      totalClients: this.clients.size,
      totalRequests,
      allowedRequests,
      blockedRequests: this.blockedRequests,
      hitRate: totalRequests > 0 ? allowedRequests / totalRequests : 1,
    };
  }

  getRateLimitConfig(): Readonly<RateLimitConfig> {
    return this.getConfig();
  }

  /**
   * Drop clients idle for two windows and trim the rest
   */
  pruneClients(now: number = Date.now()): number {
    const cutoff = now - this.config.windowMs * 2;
    let cleanedCount = 0;

    for (const [clientId, client] of this.clients) {
      const lastRequest = client.requests[client.requests.length - 1];
      if (lastRequest === undefined || lastRequest < cutoff) {
        this.clients.delete(clientId);
        cleanedCount++;
        continue;
      }
      const originalLength = client.requests.length;
      client.requests = client.requests.filter(timestamp => timestamp > cutoff);
      if (client.requests.length !== originalLength) {
        cleanedCount++;
      }
    }

    if (cleanedCount > 0) {
      this.logger.debug(`Cleaned up ${cleanedCount} old rate limit records`);
    }
    return cleanedCount;
  }

  override async cleanup(): Promise<void> {
    this.clients.clear();
  }

  private getOrCreateClient(clientId: string, now: number): ClientRecord {
    let client = this.clients.get(clientId);
    if (!client) {
      client = { requests: [], totalRequests: 0, firstRequest: now };
      this.clients.set(clientId, client);
    }
    return client;
  }
}
