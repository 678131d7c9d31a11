/**
 * Time — monotonic time points and the clocks that produce them.
 *
 * Durations are plain millisecond numbers throughout the codebase. An
 * Instant only has meaning relative to other Instants from the same clock.
 */

export class Instant {
  /** Milliseconds on the owning clock's timeline. */
  readonly ms: number;

  constructor(ms: number) {
    this.ms = ms;
  }

  plus(durationMs: number): Instant {
    return new Instant(this.ms + durationMs);
  }

  /**
   * Milliseconds elapsed since `earlier`. Saturates at zero when `earlier`
   * is actually later than this instant.
   */
  durationSince(earlier: Instant): number {
    return Math.max(0, this.ms - earlier.ms);
  }

  isAfter(other: Instant): boolean {
    return this.ms > other.ms;
  }
}

export interface Clock {
  now(): Instant;
}

/** Node's high-resolution monotonic clock. */
export const hrtimeClock: Clock = {
  now: () => new Instant(Number(process.hrtime.bigint()) / 1e6),
};

/** The `performance.now()` clock available in browsers and workers. */
export const performanceClock: Clock = {
  now: () => new Instant(performance.now()),
};

function runningUnderNode(): boolean {
  return typeof process !== 'undefined' && typeof process.hrtime?.bigint === 'function';
}

export const systemClock: Clock = runningUnderNode() ? hrtimeClock : performanceClock;

/**
 * A clock that only moves when told to. Hosts that drive their own timeline
 * (replays, headless rendering) hand this to the Context and to Toasts.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(startMs: number = 0) {
    this.current = startMs;
  }

  now(): Instant {
    return new Instant(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
