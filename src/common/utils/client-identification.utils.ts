import type { ClientInfo, ClientType } from "../types/http/client.types";
import type { RequestLike } from "../types/http/http.types";

export const CALLER_HEADER = "x-oracle-caller";

/**
 * Resolves who is calling, for rate limiting and logs. The oracle caller identity comes first:
 * it is what the gateway authenticated.
 */
export class ClientIdentificationUtils {
  static getClientInfo(request: RequestLike): ClientInfo {
    const clientId = this.extractClientId(request);
    return {
      id: clientId,
      type: this.getClientType(clientId),
      sanitized: this.sanitizeClientId(clientId),
    };
  }

  /**
   * Caller identity forwarded by the gateway, if present
   */
  static extractCaller(request: RequestLike): string | undefined {
    return this.headerValue(request, CALLER_HEADER);
  }

  private static extractClientId(request: RequestLike): string {
    const caller = this.extractCaller(request);
    if (caller) {
      return `caller:${caller}`;
    }

    const apiKey = this.headerValue(request, "x-api-key");
    if (apiKey) {
      return `api:${apiKey}`;
    }

    const authHeader = this.headerValue(request, "authorization");
    if (authHeader?.startsWith("Bearer ") && authHeader.length > 7) {
      return `bearer:${authHeader.substring(7)}`;
    }

    const clientId = this.headerValue(request, "x-client-id");
    if (clientId) {
      return `client:${clientId}`;
    }

    return `ip:${this.extractClientIP(request)}`;
  }

  private static extractClientIP(request: RequestLike): string {
    const candidates = [
      request.ip,
      request.socket?.remoteAddress,
      this.headerValue(request, "x-forwarded-for")?.split(",")[0]?.trim(),
      this.headerValue(request, "x-real-ip"),
    ];

    for (const candidate of candidates) {
      if (candidate && candidate !== "unknown") {
        return candidate;
      }
    }
    return "unknown";
  }

  private static headerValue(request: RequestLike, name: string): string | undefined {
    const value = request.headers[name];
    const first = Array.isArray(value) ? value[0] : value;
    const trimmed = first?.trim();
    return trimmed ? trimmed : undefined;
  }

  private static getClientType(clientId: string): ClientType {
    const prefix = clientId.substring(0, clientId.indexOf(":"));
    switch (prefix) {
      case "caller":
      case "api":
      case "bearer":
      case "client":
        return prefix;
      default:
        return "ip";
    }
  }

  /**
   * Mask secrets (API keys, bearer tokens) before they reach a log line or header
   */
  static sanitizeClientId(clientId: string): string {
    for (const prefix of ["api:", "bearer:"]) {
      if (clientId.startsWith(prefix)) {
        const secret = clientId.substring(prefix.length);
        if (secret.length > 8) {
          return `${prefix}${secret.substring(0, 4)}...${secret.substring(secret.length - 4)}`;
        }
        return `${prefix}${secret.substring(0, Math.min(4, secret.length))}...`;
      }
    }
    return clientId;
  }

  static sanitizeUserAgent(userAgent: string | undefined): string {
    if (!userAgent) {
      return "unknown";
    }
    return userAgent.length > 100 ? `${userAgent.substring(0, 100)}...` : userAgent;
  }
}
