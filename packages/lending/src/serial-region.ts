/**
 * Serialized regions.
 *
 * Every loan transition runs inside the region of its key. Transitions
 * are synchronous, so in one process the only way two of them can overlap
 * on a key is re-entry: a funds sink or subscriber calling back into the
 * engine mid-transition. Re-entry is rejected before it can observe a
 * half-applied change.
 */

import { LendingError } from "./types.js";

export class SerialRegion {
  private readonly _active = new Set<string>();

  /**
   * Run `body` holding the region for `key`.
   *
   * @throws LendingError REENTRANT_CALL if `key` is already held
   */
  run<T>(key: string, body: () => T): T {
    if (this._active.has(key)) {
      throw new LendingError("REENTRANT_CALL", `A transition for "${key}" is already in progress`);
    }
    this._active.add(key);
    try {
      return body();
    } finally {
      this._active.delete(key);
    }
  }

  isHeld(key: string): boolean {
    return this._active.has(key);
  }
}
