import type { Constructor, LoggedInstance } from "../../types/services/mixins";

export type ServiceHealth = "healthy" | "unhealthy" | "degraded";

export interface MonitoringCapabilities {
  recordMetric(name: string, value: number): void;
  incrementCounter(name: string, increment?: number): void;
  startTimer(operationName: string): void;
  endTimer(operationName: string): number;
  setHealthStatus(status: ServiceHealth): void;
  getHealthStatus(): { status: ServiceHealth; lastCheck: number; uptime: number };
  getMetrics(): Record<string, number>;
  getCounters(): Record<string, number>;
}

/**
 * Mixin that adds counters, gauges and simple operation timers
 */
export function WithMonitoring<TBase extends Constructor<LoggedInstance>>(Base: TBase) {
  return class MonitoringMixin extends Base implements MonitoringCapabilities {
    public serviceMetrics = new Map<string, number>();
    public serviceCounters = new Map<string, number>();
    public serviceOperationTimers = new Map<string, number>();
    public serviceHealthStatus: ServiceHealth = "healthy";
    public readonly startedAt = Date.now();
    public lastHealthCheck = Date.now();

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
    }

    recordMetric(name: string, value: number): void {
      this.serviceMetrics.set(name, value);
      this.logDebug(`Metric recorded: ${name} = ${value}`);
    }

    incrementCounter(name: string, increment = 1): void {
      this.serviceCounters.set(name, (this.serviceCounters.get(name) ?? 0) + increment);
    }

    startTimer(operationName: string): void {
      this.serviceOperationTimers.set(operationName, Date.now());
    }

    endTimer(operationName: string): number {
      const startTime = this.serviceOperationTimers.get(operationName);
      if (startTime === undefined) {
        this.logWarning(`Timer not found for operation: ${operationName}`);
        return 0;
      }

      const duration = Date.now() - startTime;
      this.serviceOperationTimers.delete(operationName);
      this.recordMetric(`${operationName}_duration_ms`, duration);
      return duration;
    }

    setHealthStatus(status: ServiceHealth): void {
      if (this.serviceHealthStatus !== status) {
        this.logger.log(`Health status changed: ${this.serviceHealthStatus} -> ${status}`);
        this.serviceHealthStatus = status;
      }
      this.lastHealthCheck = Date.now();
    }

    getHealthStatus(): { status: ServiceHealth; lastCheck: number; uptime: number } {
      return {
        status: this.serviceHealthStatus,
        lastCheck: this.lastHealthCheck,
        uptime: Date.now() - this.startedAt,
      };
    }

    getMetrics(): Record<string, number> {
      return Object.fromEntries(this.serviceMetrics);
    }

    getCounters(): Record<string, number> {
      return Object.fromEntries(this.serviceCounters);
    }
  };
}
