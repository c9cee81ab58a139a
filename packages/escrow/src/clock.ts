/**
 * @invite-escrow/escrow — Day clocks.
 */

import { isDayIndex } from "@invite-escrow/types";
import type { DayIndex } from "@invite-escrow/types";
import type { Clock } from "./collaborators.js";
import { EscrowError } from "./types.js";

export const SECONDS_PER_DAY = 86_400;

/**
 * Day index derived from wall-clock time:
 * floor((now − dayZero) / 86400).
 */
export class SystemClock implements Clock {
  private readonly _dayZeroSeconds: number;
  private readonly _nowMs: () => number;

  constructor(dayZeroSeconds: number, nowMs: () => number = Date.now) {
    this._dayZeroSeconds = dayZeroSeconds;
    this._nowMs = nowMs;
  }

  today(): DayIndex {
    const elapsed = Math.floor(this._nowMs() / 1000) - this._dayZeroSeconds;
    if (elapsed < 0) {
      throw new EscrowError(
        "INVALID_DAY",
        `Current time precedes day zero (${String(this._dayZeroSeconds)})`,
        { dayZeroSeconds: this._dayZeroSeconds },
      );
    }
    return Math.floor(elapsed / SECONDS_PER_DAY);
  }
}

/**
 * Clock under explicit control. Used by tests and local demos.
 */
export class ManualClock implements Clock {
  private _day: DayIndex;

  constructor(day: DayIndex = 0) {
    this._day = day;
  }

  today(): DayIndex {
    return this._day;
  }

  advance(days: number): DayIndex {
    this.set(this._day + days);
    return this._day;
  }

  set(day: DayIndex): void {
    if (!isDayIndex(day)) {
      throw new EscrowError("INVALID_DAY", `Invalid day index: ${String(day)}`, { day });
    }
    this._day = day;
  }
}
