// src/shared/time-provider.ts — TimeProvider abstraction
//
// Injectable time source for stores and staged-reward expiry.
// Default uses Date.now(). The mock enables deterministic testing.

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface TimeProvider {
  /** Get current time in Unix milliseconds */
  now(): number
}

// ---------------------------------------------------------------------------
// Default Implementation (system clock)
// ---------------------------------------------------------------------------

export class SystemTimeProvider implements TimeProvider {
  now(): number {
    return Date.now()
  }
}

// ---------------------------------------------------------------------------
// Mock Implementation (deterministic testing)
// ---------------------------------------------------------------------------

export class MockTimeProvider implements TimeProvider {
  private _nowMs: number

  constructor(initialMs: number = Date.now()) {
    this._nowMs = initialMs
  }

  now(): number {
    return this._nowMs
  }

  /** Advance time by milliseconds */
  advance(ms: number): void {
    this._nowMs += ms
  }
}
