import type { OnModuleDestroy, OnModuleInit } from "@nestjs/common";
import type { Constructor, LoggedInstance } from "../../types/services/mixins";
import { toError } from "../../types/services/mixins";

export interface LifecycleCapabilities {
  isServiceInitialized(): boolean;
  isServiceDestroyed(): boolean;
  createTimeout(callback: () => void, delay: number): NodeJS.Timeout;
  createInterval(callback: () => void, delay: number): NodeJS.Timeout;
  clearTimer(timer: NodeJS.Timeout): void;
  clearManagedInterval(interval: NodeJS.Timeout): void;
  initialize?(): Promise<void>;
  cleanup?(): Promise<void>;
}

/**
 * Mixin that ties a service into Nest's module lifecycle and owns its timers,
 * so nothing keeps the process alive after onModuleDestroy.
 */
export function WithLifecycle<TBase extends Constructor<LoggedInstance>>(Base: TBase) {
  return class LifecycleMixin extends Base implements OnModuleInit, OnModuleDestroy, LifecycleCapabilities {
    public isInitialized = false;
    public isDestroyed = false;
    public initializationPromise?: Promise<void>;
    public cleanupPromise?: Promise<void>;
    public managedTimers = new Set<NodeJS.Timeout>();
    public managedIntervals = new Set<NodeJS.Timeout>();

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
    }

    async onModuleInit(): Promise<void> {
      if (!this.initializationPromise) {
        this.initializationPromise = this.performInitialization();
      }
      return this.initializationPromise;
    }

    async onModuleDestroy(): Promise<void> {
      if (!this.cleanupPromise) {
        this.cleanupPromise = this.performCleanup();
      }
      return this.cleanupPromise;
    }

    isServiceInitialized(): boolean {
      return this.isInitialized;
    }

    isServiceDestroyed(): boolean {
      return this.isDestroyed;
    }

    createTimeout(callback: () => void, delay: number): NodeJS.Timeout {
      const timer = setTimeout(() => {
        this.managedTimers.delete(timer);
        callback();
      }, delay);
      this.managedTimers.add(timer);
      return timer;
    }

    createInterval(callback: () => void, delay: number): NodeJS.Timeout {
      const interval = setInterval(callback, delay);
      // Never hold the event loop open on its own
      interval.unref();
      this.managedIntervals.add(interval);
      return interval;
    }

    clearTimer(timer: NodeJS.Timeout): void {
      clearTimeout(timer);
      this.managedTimers.delete(timer);
    }

    clearManagedInterval(interval: NodeJS.Timeout): void {
      clearInterval(interval);
      this.managedIntervals.delete(interval);
    }

    initialize?(): Promise<void>;
    cleanup?(): Promise<void>;

    public async performInitialization(): Promise<void> {
      try {
        await this.initialize?.();
        this.isInitialized = true;
        this.logger.log("Service initialized");
      } catch (error) {
        this.logError(toError(error), "Service initialization failed");
        throw error;
      }
    }

    public async performCleanup(): Promise<void> {
      this.managedTimers.forEach(timer => clearTimeout(timer));
      this.managedIntervals.forEach(interval => clearInterval(interval));
      this.managedTimers.clear();
      this.managedIntervals.clear();

      try {
        await this.cleanup?.();
        this.isDestroyed = true;
        this.logger.log("Service cleanup completed");
      } catch (error) {
        this.logError(toError(error), "Service cleanup failed");
        throw error;
      }
    }
  };
}
