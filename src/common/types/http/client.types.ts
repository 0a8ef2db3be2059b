/**
 * Client identification type definitions
 */

export type ClientType = "caller" | "api" | "bearer" | "client" | "ip";

export interface ClientInfo {
  id: string;
  type: ClientType;
  sanitized: string;
}
