import type { TimeSource } from "@/oracle/time";

/**
 * Time source the test moves by hand. `undefined` simulates an unavailable clock.
 */
export class FixedTimeSource implements TimeSource {
  constructor(private current: number | undefined = 1_700_000_000) {}

  nowSeconds(): number | undefined {
    return this.current;
  }

  set(seconds: number | undefined): void {
    this.current = seconds;
  }

  advance(seconds: number): void {
    if (this.current === undefined) {
      throw new Error("Cannot advance an unavailable clock");
    }
    this.current += seconds;
  }
}
