import { EventEmitter } from "events";
import type { Constructor, LoggedInstance } from "../../types/services/mixins";

export interface EventCapabilities {
  emit(event: string | symbol, ...args: unknown[]): boolean;
  on<T extends unknown[]>(event: string | symbol, listener: (...args: T) => void): this;
  once<T extends unknown[]>(event: string | symbol, listener: (...args: T) => void): this;
  off<T extends unknown[]>(event: string | symbol, listener: (...args: T) => void): this;
  removeAllListeners(event?: string | symbol): this;
  listenerCount(event: string | symbol): number;
  emitWithLogging(event: string, ...args: unknown[]): boolean;
  getEventStats(): Record<string, number>;
}

/**
 * Mixin that wraps an EventEmitter and tracks listener counts per event
 */
export function WithEvents<TBase extends Constructor<LoggedInstance>>(Base: TBase) {
  return class EventsMixin extends Base implements EventCapabilities {
    public readonly eventListeners = new Map<string, number>();
    public readonly eventEmitter = new EventEmitter();

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
      this.eventEmitter.on("error", (error: Error) => this.logError(error, "EventEmitter"));
      this.eventEmitter.setMaxListeners(20);
    }

    emit(event: string | symbol, ...args: unknown[]): boolean {
      return this.eventEmitter.emit(event, ...args);
    }

    on<T extends unknown[]>(event: string | symbol, listener: (...args: T) => void): this {
      this.eventEmitter.on(event, listener);
      if (typeof event === "string") {
        this.trackListener(event);
        if (this.listenerCount(event) > this.eventEmitter.getMaxListeners()) {
          this.logWarning(`Max listeners exceeded for event: ${event}`, "EventEmitter");
        }
      }
      return this;
    }

    once<T extends unknown[]>(event: string | symbol, listener: (...args: T) => void): this {
      this.eventEmitter.once(event, listener);
      return this;
    }

    off<T extends unknown[]>(event: string | symbol, listener: (...args: T) => void): this {
      this.eventEmitter.off(event, listener);
      if (typeof event === "string") {
        this.untrackListener(event);
      }
      return this;
    }

    removeAllListeners(event?: string | symbol): this {
      this.eventEmitter.removeAllListeners(event);
      if (typeof event === "string") {
        this.eventListeners.delete(event);
      } else if (event === undefined) {
        this.eventListeners.clear();
      }
      return this;
    }

    listenerCount(event: string | symbol): number {
      return this.eventEmitter.listenerCount(event);
    }

    emitWithLogging(event: string, ...args: unknown[]): boolean {
      this.logDebug(`Emitting event: ${event}`, undefined, { listeners: this.listenerCount(event) });
      return this.emit(event, ...args);
    }

    getEventStats(): Record<string, number> {
      return Object.fromEntries(this.eventListeners);
    }

    public trackListener(event: string): void {
      this.eventListeners.set(event, (this.eventListeners.get(event) ?? 0) + 1);
    }

    public untrackListener(event: string): void {
      const current = this.eventListeners.get(event) ?? 0;
      if (current > 1) {
        this.eventListeners.set(event, current - 1);
      } else {
        this.eventListeners.delete(event);
      }
    }
  };
}
