/**
 * Matchmaking - Passive Timers
 *
 * A timer is a start instant plus a duration. Nothing fires: callers ask
 * whether it has expired or how long remains. Time comes from an injected
 * clock so tests can move it by hand.
 */

// ---------------------------------------------------------------------------
// Clock
// ---------------------------------------------------------------------------

export interface Clock {
  /** Monotonic milliseconds */
  now(): number;
}

export const systemClock: Clock = {
  now: () => performance.now(),
};

// ---------------------------------------------------------------------------
// Durations (ms)
// ---------------------------------------------------------------------------

export const seconds = (n: number): number => n * 1000;
export const minutes = (n: number): number => n * 60_000;
export const hours = (n: number): number => n * 3600_000;
export const days = (n: number): number => n * 24 * 3600_000;
export const years = (n: number): number => n * 365 * 24 * 3600_000;

// ---------------------------------------------------------------------------
// Timer
// ---------------------------------------------------------------------------

export class Timer {
  private startedAt: number;

  constructor(
    readonly durationMs: number = 0,
    private readonly clock: Clock = systemClock
  ) {
    this.startedAt = clock.now();
  }

  reset(): void {
    this.startedAt = this.clock.now();
  }

  isExpired(): boolean {
    return this.timeSinceReset() >= this.durationMs;
  }

  timeSinceReset(): number {
    return this.clock.now() - this.startedAt;
  }

  /** Milliseconds until expiry, 0 once expired */
  remaining(): number {
    return Math.max(this.durationMs - this.timeSinceReset(), 0);
  }
}
