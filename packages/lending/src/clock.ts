/**
 * Clocks.
 *
 * The engine never reads the wall clock directly. The lending desk asks
 * its Clock for `now` once per operation.
 */

import type { Seconds, Timestamp } from "@circulate/types";

export interface Clock {
  /** Current Unix time in whole seconds. */
  now(): Timestamp;
}

export class SystemClock implements Clock {
  now(): Timestamp {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * A clock that only moves when told to. Used by tests and simulations.
 */
export class ManualClock implements Clock {
  private _now: Timestamp;

  constructor(start: Timestamp = 0) {
    this._now = start;
  }

  now(): Timestamp {
    return this._now;
  }

  set(to: Timestamp): void {
    this._now = to;
  }

  advance(by: Seconds): Timestamp {
    this._now += by;
    return this._now;
  }
}
