import { Injectable } from "@nestjs/common";

export const TIME_SOURCE = Symbol("TIME_SOURCE");

export interface TimeSource {
  /** Current time in whole seconds, or undefined when no trustworthy time is available */
  nowSeconds(): number | undefined;
}

export function isUsableTime(value: number | undefined): value is number {
  return value !== undefined && Number.isSafeInteger(value) && value >= 0;
}

@Injectable()
export class SystemTimeSource implements TimeSource {
  nowSeconds(): number {
    return Math.floor(Date.now() / 1000);
  }
}
