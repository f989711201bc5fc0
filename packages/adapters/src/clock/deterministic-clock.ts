import type { ClockPort } from '@vehicle-dash/domain';

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Drives the telemetry simulator so a given seed replays the same drive.
 */
export class SeededRng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }

  /** Returns an integer in [min, max], both inclusive. */
  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** True with probability `p`. */
  chance(p: number): boolean {
    return p > 0 && this.next() < p;
  }
}

/**
 * Clock that only moves when told to. Each `now()` returns the current
 * instant and then steps forward by `tickMs` (0 keeps it frozen).
 */
export class DeterministicClock implements ClockPort {
  private currentMs: number;

  constructor(
    epochMs: number,
    private readonly tickMs: number = 0,
  ) {
    this.currentMs = epochMs;
  }

  now(): Date {
    const ts = new Date(this.currentMs);
    this.currentMs += this.tickMs;
    return ts;
  }

  peek(): Date {
    return new Date(this.currentMs);
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }
}

export const systemClock: ClockPort = {
  now: () => new Date(),
};
