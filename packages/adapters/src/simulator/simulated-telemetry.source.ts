import type { ClockPort, ReadingInput, ReadingSink, TelemetrySourcePort } from '@vehicle-dash/domain';
import { TelemetryUnavailableError } from '@vehicle-dash/domain';
import { SeededRng, systemClock } from '../clock/deterministic-clock.js';

export interface SimulatorOptions {
  seed: number;
  intervalMs: number;
  /** Starting speed; a high value forces an overspeed alert on the first ticks */
  initialSpeedKph?: number;
  /** Probability in [0, 1] that a poll fails with TelemetryUnavailable */
  failureRate?: number;
  clock?: ClockPort;
}

export interface SimulatedVehicle {
  speedKph: number;
  rpm: number;
  batteryPct: number;
  engineTempC: number;
  fuelPct: number;
}

const MIN_RPM = 800;
const MAX_RPM = 6500;
const AMBIENT_TEMP_C = 20;

function round(value: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}

/**
 * ECU stand-in: a seeded random walk over speed with RPM, battery drain,
 * engine warm-up and fuel burn derived from it.
 */
export class SimulatedTelemetrySource implements TelemetrySourcePort {
  readonly name = 'simulator';

  private readonly rng: SeededRng;
  private readonly clock: ClockPort;
  private readonly vehicle: SimulatedVehicle;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly opts: SimulatorOptions) {
    this.rng = new SeededRng(opts.seed);
    this.clock = opts.clock ?? systemClock;
    this.vehicle = {
      speedKph: opts.initialSpeedKph ?? 0,
      rpm: 0,
      batteryPct: 100,
      engineTempC: AMBIENT_TEMP_C,
      fuelPct: 80,
    };
  }

  state(): Readonly<SimulatedVehicle> {
    return { ...this.vehicle };
  }

  /** Advance the model one interval and return the new readings, all stamped with one instant. */
  step(): ReadingInput[] {
    const v = this.vehicle;

    v.speedKph = Math.max(0, v.speedKph + this.rng.nextInt(-15, 15));
    // engine keeps idling even when stationary
    v.rpm = Math.max(MIN_RPM, Math.min(MAX_RPM, v.speedKph * 30 + this.rng.nextInt(-400, 400)));

    const drain = 0.01 + v.rpm / 1_500_000;
    v.batteryPct = round(Math.max(0, v.batteryPct - drain), 2);

    const operatingTempC = 85 + v.rpm / 500;
    v.engineTempC = round(v.engineTempC + (operatingTempC - v.engineTempC) * 0.1 + (this.rng.next() - 0.5), 1);

    const distanceKm = (v.speedKph / 3600) * (this.opts.intervalMs / 1000);
    // kept unrounded: a single step's burn is below the reported precision
    v.fuelPct = Math.max(0, v.fuelPct - 0.001 - distanceKm * 0.05);

    const ts = this.clock.now();
    return [
      { metric: 'speedKph', value: v.speedKph, ts },
      { metric: 'rpm', value: v.rpm, ts },
      { metric: 'batteryPct', value: v.batteryPct, ts },
      { metric: 'engineTempC', value: v.engineTempC, ts },
      { metric: 'fuelPct', value: round(v.fuelPct, 2), ts },
    ];
  }

  poll(sink: ReadingSink): void {
    if (this.rng.chance(this.opts.failureRate ?? 0)) {
      sink.reportFailure(new TelemetryUnavailableError(this.name, 'simulated ECU dropout'));
      return;
    }
    sink.deliver(this.step());
  }

  async start(sink: ReadingSink): Promise<void> {
    if (this.timer) return;
    this.poll(sink);
    this.timer = setInterval(() => this.poll(sink), this.opts.intervalMs);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
